import { InvalidScopeKeyError, VersionConflictError } from "@conclave/agent-engine-core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InMemoryMemoryBackend } from "../inMemoryBackend";
import { MemoryManager } from "../memoryManager";
import { agentScope, assertScopeKey, globalScope, parseScopeKey, workflowScope } from "../scope";
import { SQLiteMemoryBackend } from "../sqliteBackend";
import type { MemoryBackend } from "../types";

const backends: Array<[string, () => MemoryBackend]> = [
  ["in-memory", () => new InMemoryMemoryBackend()],
  ["sqlite", () => new SQLiteMemoryBackend({ databasePath: ":memory:" })],
];

describe.each(backends)("MemoryManager (%s backend)", (_name, createBackend) => {
  let memory: MemoryManager;
  let clock: number;

  beforeEach(() => {
    clock = 1_000;
    memory = new MemoryManager({ backend: createBackend(), now: () => clock++ });
  });

  afterEach(() => {
    memory.close();
  });

  describe("put / get", () => {
    it("starts versions at 1 and reads the latest by default", async () => {
      expect(await memory.put("global:settings", { theme: "dark" })).toBe(1);
      expect(await memory.put("global:settings", { theme: "light" })).toBe(2);

      expect(await memory.get("global:settings")).toEqual({ theme: "light" });
      expect(await memory.get("global:settings", 1)).toEqual({ theme: "dark" });
      expect(await memory.get("global:missing")).toBeUndefined();
      expect(await memory.get("global:settings", 9)).toBeUndefined();
    });

    it("records write timestamps", async () => {
      await memory.put("agent:a1", "first");
      const entry = await memory.getEntry("agent:a1");
      expect(entry).toEqual({
        scopeKey: "agent:a1",
        version: 1,
        value: "first",
        writtenAt: 1_000,
        tombstone: false,
      });
    });

    it("does not let callers mutate stored values", async () => {
      const value = { items: [1, 2] };
      await memory.put("workflow:w1", value);
      value.items.push(3);
      expect(await memory.get("workflow:w1")).toEqual({ items: [1, 2] });
    });

    it("gives concurrent writers unique, strictly increasing versions", async () => {
      const versions = await Promise.all(
        Array.from({ length: 10 }, (_, i) => memory.put("workflow:w1", { step: i }))
      );
      expect([...versions].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);

      const history = await memory.listVersions("workflow:w1");
      expect(history.map((v) => v.version)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    });

    it("rejects a stale expectedVersion", async () => {
      await memory.put("workflow:w1", { a: 1 }, { expectedVersion: 0 });
      await memory.put("workflow:w1", { a: 2 }, { expectedVersion: 1 });

      await expect(memory.put("workflow:w1", { a: 3 }, { expectedVersion: 1 })).rejects.toThrow(
        VersionConflictError
      );
      await expect(memory.put("workflow:w2", { a: 1 }, { expectedVersion: 4 })).rejects.toThrow(
        "expected 4, found 0"
      );
      expect(await memory.get("workflow:w1")).toEqual({ a: 2 });
    });

    it("lets exactly one of two racing conditional writers win", async () => {
      await memory.put("workflow:w1", { n: 0 });
      const results = await Promise.allSettled([
        memory.put("workflow:w1", { n: 1 }, { expectedVersion: 1 }),
        memory.put("workflow:w1", { n: 2 }, { expectedVersion: 1 }),
      ]);
      expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
      expect(results.filter((r) => r.status === "rejected")).toHaveLength(1);
    });

    it("rejects malformed scope keys", async () => {
      await expect(memory.put("session:x", 1)).rejects.toThrow(InvalidScopeKeyError);
      await expect(memory.get("workflow:")).rejects.toThrow(InvalidScopeKeyError);
    });
  });

  describe("delete", () => {
    it("tombstones the key and keeps history", async () => {
      await memory.put("agent:a1", { state: "on" });
      expect(await memory.delete("agent:a1")).toBe(2);

      expect(await memory.get("agent:a1")).toBeUndefined();
      expect(await memory.get("agent:a1", 1)).toEqual({ state: "on" });
      const versions = await memory.listVersions("agent:a1");
      expect(versions.map((v) => [v.version, v.tombstone])).toEqual([
        [1, false],
        [2, true],
      ]);
    });

    it("is a no-op for missing or already deleted keys", async () => {
      expect(await memory.delete("agent:none")).toBeUndefined();
      await memory.put("agent:a1", 1);
      await memory.delete("agent:a1");
      expect(await memory.delete("agent:a1")).toBeUndefined();
    });

    it("continues versions after a delete", async () => {
      await memory.put("agent:a1", 1);
      await memory.delete("agent:a1");
      expect(await memory.put("agent:a1", 2)).toBe(3);
      expect(await memory.get("agent:a1")).toBe(2);
    });
  });

  describe("listScopes", () => {
    it("lists live keys under a prefix", async () => {
      await memory.put("workflow:b", 1);
      await memory.put("workflow:a", 1);
      await memory.put("agent:x", 1);
      await memory.put("workflow:c", 1);
      await memory.delete("workflow:c");

      expect(await memory.listScopes("workflow:")).toEqual(["workflow:a", "workflow:b"]);
      expect(await memory.listScopes()).toEqual(["agent:x", "workflow:a", "workflow:b"]);
    });
  });

  describe("compact", () => {
    it("keeps the newest versions of live keys", async () => {
      for (let i = 1; i <= 5; i++) {
        await memory.put("workflow:w1", { i });
      }
      const report = await memory.compact({ retainVersions: 2 });

      expect(report).toEqual({ scopesCompacted: 1, versionsRemoved: 3 });
      expect((await memory.listVersions("workflow:w1")).map((v) => v.version)).toEqual([4, 5]);
      expect(await memory.get("workflow:w1", 2)).toBeUndefined();
      expect(await memory.put("workflow:w1", { i: 6 })).toBe(6);
    });

    it("reduces deleted keys to their tombstone", async () => {
      await memory.put("agent:gone", 1);
      await memory.put("agent:gone", 2);
      await memory.delete("agent:gone");

      const report = await memory.compact({ retainVersions: 10 });
      expect(report.versionsRemoved).toBe(2);
      expect((await memory.listVersions("agent:gone")).map((v) => v.version)).toEqual([3]);
      expect(await memory.put("agent:gone", "back")).toBe(4);
    });
  });
});

describe("SQLiteMemoryBackend", () => {
  it("compresses values above the threshold and reads them back", async () => {
    const backend = new SQLiteMemoryBackend({
      databasePath: ":memory:",
      compressionThresholdBytes: 16,
    });
    const memory = new MemoryManager({ backend });
    const large = { text: "x".repeat(200) };

    await memory.put("global:large", large);
    expect(await memory.get("global:large")).toEqual(large);
    const [info] = await memory.listVersions("global:large");
    expect(info.sizeBytes).toBe(Buffer.byteLength(JSON.stringify(large)));
    memory.close();
  });

  it("turns a duplicate version from another writer into a version conflict", async () => {
    const backend = new SQLiteMemoryBackend({ databasePath: ":memory:" });
    await backend.append({
      scopeKey: "global:x",
      version: 1,
      value: 1,
      writtenAt: 1,
      tombstone: false,
    });
    await expect(
      backend.append({ scopeKey: "global:x", version: 1, value: 2, writtenAt: 2, tombstone: false })
    ).rejects.toThrow(VersionConflictError);
    backend.close();
  });
});

describe("scope keys", () => {
  it("builds and parses each scope kind", () => {
    expect(workflowScope("w1")).toBe("workflow:w1");
    expect(agentScope("a1")).toBe("agent:a1");
    expect(globalScope("workflows")).toBe("global:workflows");
    expect(parseScopeKey("agent:a1:notes")).toEqual({ kind: "agent", name: "a1:notes" });
  });

  it("rejects keys outside the known scopes", () => {
    expect(parseScopeKey("session:1")).toBeUndefined();
    expect(parseScopeKey("workflow:")).toBeUndefined();
    expect(parseScopeKey("nocolon")).toBeUndefined();
    expect(() => assertScopeKey("session:1")).toThrow(
      'Invalid scope key "session:1": expected workflow:<id>, agent:<id> or global:<name>'
    );
  });
});
