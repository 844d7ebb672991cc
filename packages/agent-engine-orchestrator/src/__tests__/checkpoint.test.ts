import { VersionConflictError } from "@conclave/agent-engine-core";
import { MemoryManager, workflowScope } from "@conclave/agent-engine-memory";
import { beforeEach, describe, expect, it } from "vitest";
import { WORKFLOW_INDEX_KEY, WorkflowCheckpointStore, type WorkflowRecord } from "../checkpoint";

function record(workflowId: string): WorkflowRecord {
  return {
    workflowId,
    name: null,
    metadata: { owner: "tests" },
    state: "running",
    cancelled: false,
    archived: false,
    tasks: [],
    createdAt: 1,
    updatedAt: 1,
    completedAt: null,
  };
}

describe("WorkflowCheckpointStore", () => {
  let memory: MemoryManager;
  let store: WorkflowCheckpointStore;

  beforeEach(() => {
    memory = new MemoryManager();
    store = new WorkflowCheckpointStore(memory);
  });

  it("creates once and saves with optimistic concurrency", async () => {
    expect(await store.create(record("w1"))).toBe(1);
    await expect(store.create(record("w1"))).rejects.toBeInstanceOf(VersionConflictError);

    expect(await store.save({ ...record("w1"), updatedAt: 2 }, 1)).toBe(2);
    await expect(store.save(record("w1"), 1)).rejects.toBeInstanceOf(VersionConflictError);

    const loaded = await store.load("w1");
    expect(loaded?.version).toBe(2);
    expect(loaded?.record.updatedAt).toBe(2);
  });

  it("treats missing, deleted and unreadable checkpoints as absent", async () => {
    expect(await store.load("missing")).toBeUndefined();

    await store.create(record("gone"));
    await memory.delete(workflowScope("gone"));
    expect(await store.load("gone")).toBeUndefined();

    await memory.put(workflowScope("garbled"), { workflowId: "garbled" });
    expect(await store.load("garbled")).toBeUndefined();
  });

  it("keeps the index free of duplicates", async () => {
    await store.addToIndex("w1");
    await store.addToIndex("w2");
    await store.addToIndex("w1");
    expect(await store.listIndexed()).toEqual(["w1", "w2"]);

    await store.removeFromIndex("w1");
    expect(await store.listIndexed()).toEqual(["w2"]);
    expect(await memory.get(WORKFLOW_INDEX_KEY)).toEqual(["w2"]);
  });

  it("retries index updates that lose a version race", async () => {
    const other = new WorkflowCheckpointStore(memory);

    await Promise.all([store.addToIndex("w1"), other.addToIndex("w2")]);

    expect((await store.listIndexed()).sort()).toEqual(["w1", "w2"]);
  });
});
