import { InvalidGraphError } from "@conclave/agent-engine-core";
import { describe, expect, it } from "vitest";
import { findCycle, validateWorkflowSpec } from "../workflowSpec";

function captureGraphError(spec: unknown): InvalidGraphError {
  try {
    validateWorkflowSpec(spec);
  } catch (error) {
    if (error instanceof InvalidGraphError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected the spec to be rejected");
}

describe("validateWorkflowSpec", () => {
  it("normalizes a valid spec", () => {
    const workflow = validateWorkflowSpec({
      workflowId: "wf-1",
      name: "report",
      tasks: [
        { taskId: "fetch", requiredCapability: "http", input: { url: "https://example.test" } },
        { taskId: "summarize", requiredCapability: "llm", dependsOn: ["fetch", "fetch"] },
      ],
    });

    expect(workflow).toEqual({
      workflowId: "wf-1",
      name: "report",
      metadata: undefined,
      tasks: [
        {
          taskId: "fetch",
          requiredCapability: "http",
          input: { url: "https://example.test" },
          dependsOn: [],
          maxRetries: undefined,
          timeoutMs: undefined,
          preferredAgent: undefined,
        },
        {
          taskId: "summarize",
          requiredCapability: "llm",
          input: null,
          dependsOn: ["fetch"],
          maxRetries: undefined,
          timeoutMs: undefined,
          preferredAgent: undefined,
        },
      ],
    });
  });

  it("rejects specs that do not match the schema", () => {
    const error = captureGraphError({ tasks: [] });
    expect(error.message.startsWith("Invalid workflow spec: tasks:")).toBe(true);
    expect(error.issues).toHaveLength(1);

    expect(() =>
      validateWorkflowSpec({ tasks: [{ taskId: "a", requiredCapability: "x", extra: 1 }] })
    ).toThrow(InvalidGraphError);
    expect(() => validateWorkflowSpec({ tasks: [{ taskId: "a" }] })).toThrow(InvalidGraphError);
  });

  it("reports duplicate ids and unknown dependencies together", () => {
    const error = captureGraphError({
      tasks: [
        { taskId: "a", requiredCapability: "x" },
        { taskId: "a", requiredCapability: "x" },
        { taskId: "b", requiredCapability: "x", dependsOn: ["zzz"] },
      ],
    });

    expect(error.message).toBe(
      'Invalid workflow graph: duplicate task id "a"; task "b" depends on unknown task "zzz"'
    );
    expect(error.issues).toEqual([
      'duplicate task id "a"',
      'task "b" depends on unknown task "zzz"',
    ]);
  });

  it("rejects cycles with the cycle path", () => {
    const error = captureGraphError({
      tasks: [
        { taskId: "a", requiredCapability: "x", dependsOn: ["c"] },
        { taskId: "b", requiredCapability: "x", dependsOn: ["a"] },
        { taskId: "c", requiredCapability: "x", dependsOn: ["b"] },
      ],
    });

    expect(error.code).toBe("INVALID_GRAPH");
    expect(error.message).toBe("Dependency cycle: a -> c -> b -> a");
    expect(error.cycle).toEqual(["a", "c", "b", "a"]);
  });

  it("rejects a task that depends on itself", () => {
    const error = captureGraphError({
      tasks: [{ taskId: "loop", requiredCapability: "x", dependsOn: ["loop"] }],
    });
    expect(error.cycle).toEqual(["loop", "loop"]);
  });
});

describe("findCycle", () => {
  it("returns undefined for a diamond", () => {
    expect(
      findCycle([
        { taskId: "a", dependsOn: [] },
        { taskId: "b", dependsOn: ["a"] },
        { taskId: "c", dependsOn: ["a"] },
        { taskId: "d", dependsOn: ["b", "c"] },
      ])
    ).toBeUndefined();
  });

  it("finds a cycle that does not include the first task", () => {
    expect(
      findCycle([
        { taskId: "root", dependsOn: [] },
        { taskId: "x", dependsOn: ["root", "y"] },
        { taskId: "y", dependsOn: ["x"] },
      ])
    ).toEqual(["x", "y", "x"]);
  });
});
