import type { JsonValue } from "@conclave/agent-engine-core";
import {
  type ConclaveEngine,
  createConclaveEngine,
  type WorkflowStatus,
} from "@conclave/agent-engine-orchestrator";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AgentWorker } from "../agentWorker";
import type { CapabilityExecutor } from "../types";

describe("engine with agent workers", () => {
  let engine: ConclaveEngine;
  let workers: AgentWorker[];

  function addWorker(
    agentId: string,
    capability: string,
    cost: number,
    executor: CapabilityExecutor
  ): AgentWorker {
    const worker = new AgentWorker({
      descriptor: {
        agentId,
        capabilities: [{ name: capability, costEstimate: cost, qualityEstimate: 0.8 }],
      },
      executors: { [capability]: executor },
      bus: engine.bus,
      registry: engine.registry,
    });
    worker.start();
    workers.push(worker);
    return worker;
  }

  async function settle(workflowId: string): Promise<WorkflowStatus> {
    if (engine.orchestrator.status(workflowId).state === "running") {
      await engine.events.waitFor("workflow:settled", {
        filter: (event) => event.payload.workflowId === workflowId,
        timeoutMs: 3_000,
      });
    }
    return engine.orchestrator.status(workflowId);
  }

  beforeEach(async () => {
    engine = createConclaveEngine({
      env: {},
      config: {
        negotiation: { bidDeadlineMs: 100 },
        orchestrator: {
          dispatchTimeoutMs: 2_000,
          backoff: { initialDelayMs: 5, maxDelayMs: 20 },
        },
      },
    });
    workers = [];
    expect(await engine.start()).toEqual([]);
  });

  afterEach(async () => {
    for (const worker of workers) {
      await worker.stop();
    }
    engine.stop();
  });

  it("runs a pipeline on the cheapest bidder", async () => {
    const calls: string[] = [];
    const upper: CapabilityExecutor = (input, context) => {
      calls.push(context.agentId);
      return typeof input === "string" ? input.toUpperCase() : null;
    };
    addWorker("cheap", "summarize", 1, upper);
    addWorker("pricey", "summarize", 5, upper);
    addWorker("writer", "write", 1, (_input, context) => {
      const summary = context.dependencies.t1;
      return typeof summary === "string" ? `report on ${summary}` : null;
    });

    const workflowId = await engine.orchestrator.submit({
      workflowId: "pipeline",
      tasks: [
        { taskId: "t1", requiredCapability: "summarize", input: "source" },
        { taskId: "t2", requiredCapability: "write", dependsOn: ["t1"] },
      ],
    });
    const status = await settle(workflowId);

    expect(status.state).toBe("completed");
    expect(calls).toEqual(["cheap"]);
    expect(engine.orchestrator.results(workflowId)).toEqual({
      t1: "SOURCE",
      t2: "report on SOURCE",
    });
    expect(engine.registry.getAgent("cheap")?.availability).toBe("idle");
    expect(engine.roster.getTeam(workflowId).members.map((member) => member.agentId)).toEqual([
      "cheap",
      "writer",
    ]);

    await engine.orchestrator.archive(workflowId);

    expect(engine.roster.getTeam(workflowId).members).toEqual([]);
    expect(engine.orchestrator.list()).toEqual([]);
  });

  it("moves a failed task to another agent", async () => {
    addWorker("flaky", "summarize", 1, () => {
      throw new Error("model unavailable");
    });
    addWorker("steady", "summarize", 5, (): JsonValue => "summary");

    const workflowId = await engine.orchestrator.submit({
      workflowId: "failover",
      tasks: [{ taskId: "t1", requiredCapability: "summarize" }],
    });
    const status = await settle(workflowId);

    expect(status.state).toBe("completed");
    expect(status.tasks[0]).toMatchObject({
      taskId: "t1",
      state: "succeeded",
      retryCount: 1,
      attempt: 2,
      failedAgents: ["flaky"],
      result: "summary",
    });
  });
});
