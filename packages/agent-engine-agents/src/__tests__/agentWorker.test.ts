import {
  CommunicationBus,
  type DispatchPayload,
  dispatchIdempotencyKey,
  type Message,
  replyIdempotencyKey,
} from "@conclave/agent-engine-bus";
import { ConfigurationError, type JsonValue } from "@conclave/agent-engine-core";
import { AgentRegistry } from "@conclave/agent-engine-negotiation";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AgentWorker, type AgentWorkerOptions } from "../agentWorker";
import type { ExecutionContext } from "../types";

const pause = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function eventually(condition: () => boolean, timeoutMs = 1_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error("Condition not met in time");
    }
    await pause(5);
  }
}

function waitForAbort(_input: JsonValue, context: ExecutionContext): Promise<JsonValue> {
  return new Promise((_resolve, reject) => {
    context.signal.addEventListener("abort", () => reject(context.signal.reason));
  });
}

describe("AgentWorker", () => {
  let clock: number;
  let bus: CommunicationBus;
  let registry: AgentRegistry;
  let workers: AgentWorker[];
  let replies: Message[];
  let bids: Message[];

  function createWorker(
    options: Partial<AgentWorkerOptions> & Pick<AgentWorkerOptions, "executors">
  ): AgentWorker {
    const worker = new AgentWorker({
      descriptor: {
        agentId: "a1",
        capabilities: [{ name: "summarize", costEstimate: 2, qualityEstimate: 0.8 }],
      },
      bus,
      registry,
      now: () => clock,
      ...options,
    });
    worker.start();
    workers.push(worker);
    return worker;
  }

  function dispatch(taskId: string, overrides: Partial<DispatchPayload> = {}): void {
    const payload: DispatchPayload = {
      workflowId: "w1",
      taskId,
      attempt: 1,
      capability: "summarize",
      input: "hello",
      deadlineAt: clock + 5_000,
      dependencies: {},
      ...overrides,
    };
    bus.send({
      from: "orchestrator",
      to: "a1",
      type: "dispatch",
      payload,
      idempotencyKey: dispatchIdempotencyKey(payload.workflowId, taskId, payload.attempt),
    });
  }

  function requestBid(agentId: string, capability = "summarize"): void {
    bus.send({
      from: "negotiator",
      to: agentId,
      type: "bid-request",
      payload: {
        roundId: "r1",
        capability,
        workflowId: "w1",
        taskId: "t1",
        input: "hello",
        deadlineAt: 0,
      },
    });
  }

  const replyTypes = () => replies.map((message) => message.type);

  beforeEach(() => {
    clock = 0;
    bus = new CommunicationBus({ ackTimeoutMs: 1_000 });
    registry = new AgentRegistry({ bus, now: () => clock });
    workers = [];
    replies = [];
    bids = [];
    bus.subscribe("orchestrator", (message, context) => {
      context.ack();
      replies.push(message);
    });
    bus.subscribe("negotiator", (message, context) => {
      context.ack();
      bids.push(message);
    });
  });

  afterEach(async () => {
    for (const worker of workers) {
      await worker.stop();
    }
    registry.stop();
    bus.dispose();
  });

  describe("lifecycle", () => {
    it("refuses capabilities without an executor", () => {
      expect(
        () =>
          new AgentWorker({
            descriptor: {
              agentId: "a1",
              capabilities: [
                { name: "summarize", costEstimate: 1, qualityEstimate: 0.5 },
                { name: "translate", costEstimate: 1, qualityEstimate: 0.5 },
              ],
            },
            executors: { summarize: () => null },
            bus,
            registry,
          })
      ).toThrow(ConfigurationError);
      expect(
        () =>
          new AgentWorker({
            descriptor: {
              agentId: "a1",
              capabilities: [{ name: "translate", costEstimate: 1, qualityEstimate: 0.5 }],
            },
            executors: {},
            bus,
            registry,
          })
      ).toThrow("Agent a1 declares capabilities without an executor: translate");
    });

    it("registers its manifest on start", () => {
      createWorker({ executors: { summarize: () => null } });

      expect(registry.getAgent("a1")).toMatchObject({
        agentId: "a1",
        availability: "idle",
        slots: 1,
        inFlight: 0,
      });
    });

    it("heartbeats through the registry's topic", async () => {
      registry.start();
      const worker = createWorker({ executors: { summarize: () => null } });

      clock = 700;
      worker.heartbeat();

      await eventually(() => registry.getAgent("a1")?.lastHeartbeatAt === 700);
    });

    it("aborts running work and deregisters on stop", async () => {
      const worker = createWorker({ executors: { summarize: waitForAbort } });
      dispatch("t1");
      await eventually(() => replies.length === 1);

      await worker.stop();
      await eventually(() => replies.length === 2);

      expect(replyTypes()).toEqual(["accept", "failure"]);
      expect(replies[1].payload).toMatchObject({
        taskId: "t1",
        error: { code: "EXECUTION_ERROR", message: "Agent worker stopped" },
      });
      expect(registry.getAgent("a1")).toBeUndefined();
      expect(worker.activeTasks).toBe(0);
    });
  });

  describe("bidding", () => {
    it("bids the manifest cost for a declared capability", async () => {
      createWorker({ executors: { summarize: () => null } });

      requestBid("a1");
      await eventually(() => bids.length === 1);

      expect(bids[0].type).toBe("bid");
      expect(bids[0].payload).toEqual({
        roundId: "r1",
        agentId: "a1",
        capability: "summarize",
        cost: 2,
        quality: 0.8,
        decline: false,
      });
    });

    it("declines capabilities it does not declare", async () => {
      createWorker({ executors: { summarize: () => null } });

      requestBid("a1", "translate");
      await eventually(() => bids.length === 1);

      expect(bids[0].payload).toEqual({
        roundId: "r1",
        agentId: "a1",
        capability: "translate",
        cost: 0,
        quality: 0,
        decline: true,
      });
    });

    it("prices with the estimator and falls back to the manifest when it throws", async () => {
      createWorker({ executors: { summarize: () => null }, bidEstimator: () => ({ cost: 7 }) });
      createWorker({
        descriptor: {
          agentId: "a2",
          capabilities: [{ name: "summarize", costEstimate: 3, qualityEstimate: 0.6 }],
        },
        executors: { summarize: () => null },
        bidEstimator: () => {
          throw new Error("estimator offline");
        },
      });

      requestBid("a1");
      requestBid("a2");
      await eventually(() => bids.length === 2);

      const bidFrom = (agentId: string) => bids.find((message) => message.from === agentId);
      expect(bidFrom("a1")?.payload).toMatchObject({ cost: 7, quality: 0.8, decline: false });
      expect(bidFrom("a2")?.payload).toMatchObject({ cost: 3, quality: 0.6, decline: false });
    });
  });

  describe("dispatch", () => {
    it("accepts, executes and reports the result", async () => {
      const worker = createWorker({
        executors: {
          summarize: (input, context) => ({
            summary: typeof input === "string" ? input.toUpperCase() : null,
            attempt: context.attempt,
          }),
        },
      });

      dispatch("t1");
      await eventually(() => replies.length === 2);

      expect(replyTypes()).toEqual(["accept", "result"]);
      expect(replies[0].payload).toEqual({
        workflowId: "w1",
        taskId: "t1",
        attempt: 1,
        agentId: "a1",
      });
      expect(replies[1].payload).toEqual({
        workflowId: "w1",
        taskId: "t1",
        attempt: 1,
        agentId: "a1",
        output: { summary: "HELLO", attempt: 1 },
      });
      expect(replies[1].idempotencyKey).toBe(replyIdempotencyKey("result", "w1", "t1", 1));
      expect(worker.activeTasks).toBe(0);
    });

    it("hands upstream results to the executor", async () => {
      const seen: Array<Record<string, JsonValue>> = [];
      createWorker({
        executors: {
          summarize: (_input, context) => {
            seen.push(context.dependencies);
            return "done";
          },
        },
      });

      dispatch("t2", { dependencies: { t1: { words: 12 } } });
      await eventually(() => replies.length === 2);

      expect(seen).toEqual([{ t1: { words: 12 } }]);
    });

    it("runs a redelivered dispatch once", async () => {
      let calls = 0;
      createWorker({
        executors: {
          summarize: () => {
            calls++;
            return "done";
          },
        },
      });

      dispatch("t1");
      dispatch("t1");
      await eventually(() => replies.length === 2);
      await pause(20);

      expect(calls).toBe(1);
      expect(replyTypes()).toEqual(["accept", "result"]);
    });

    it("reports executor errors as failures", async () => {
      createWorker({
        executors: {
          summarize: () => {
            throw new Error("boom");
          },
        },
      });

      dispatch("t1");
      await eventually(() => replies.length === 2);

      expect(replyTypes()).toEqual(["accept", "failure"]);
      expect(replies[1].payload).toEqual({
        workflowId: "w1",
        taskId: "t1",
        attempt: 1,
        agentId: "a1",
        error: { code: "EXECUTION_ERROR", message: "boom" },
      });
    });

    it("rejects capabilities it does not offer", async () => {
      createWorker({ executors: { summarize: () => null } });

      dispatch("t1", { capability: "translate" });
      await eventually(() => replies.length === 1);

      expect(replies[0].type).toBe("reject");
      expect(replies[0].payload).toMatchObject({ reason: "capability translate is not offered" });
    });

    it("rejects and declines while every slot is busy", async () => {
      let open: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        open = resolve;
      });
      createWorker({
        executors: {
          summarize: async () => {
            await gate;
            return "done";
          },
        },
      });

      dispatch("t1");
      dispatch("t2");
      await eventually(() => replies.length === 2);

      expect(replyTypes()).toEqual(["accept", "reject"]);
      expect(replies[1].payload).toEqual({
        workflowId: "w1",
        taskId: "t2",
        attempt: 1,
        agentId: "a1",
        reason: "no free slot",
      });

      requestBid("a1");
      await eventually(() => bids.length === 1);
      expect(bids[0].payload).toMatchObject({ decline: true });

      open();
      await eventually(() => replies.length === 3);
      expect(replies[2].type).toBe("result");
      expect(replies[2].payload).toMatchObject({ taskId: "t1", output: "done" });
    });

    it("aborts the execution when the deadline passes", async () => {
      createWorker({ executors: { summarize: waitForAbort } });

      dispatch("t1", { deadlineAt: clock + 20 });
      await eventually(() => replies.length === 2);

      expect(replyTypes()).toEqual(["accept", "failure"]);
      expect(replies[1].payload).toMatchObject({
        error: { code: "EXECUTION_ERROR", message: "Deadline exceeded for task w1/t1#1" },
      });
    });
  });
});
