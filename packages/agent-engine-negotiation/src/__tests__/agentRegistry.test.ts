import { CommunicationBus } from "@conclave/agent-engine-bus";
import { ConfigurationError, createEventBus, type EventBus } from "@conclave/agent-engine-core";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AgentRegistry } from "../agentRegistry";

function descriptor(agentId: string, capabilities: string[], slots?: number) {
  return {
    agentId,
    capabilities: capabilities.map((name) => ({ name, costEstimate: 1, qualityEstimate: 0.5 })),
    slots,
  };
}

describe("AgentRegistry", () => {
  let now: number;
  let bus: CommunicationBus;
  let events: EventBus;
  let registry: AgentRegistry;

  beforeEach(() => {
    now = 0;
    bus = new CommunicationBus({ ackTimeoutMs: 1_000 });
    events = createEventBus();
    registry = new AgentRegistry({
      bus,
      events,
      livenessWindowMs: 15_000,
      now: () => now,
    });
  });

  afterEach(() => {
    registry.stop();
    bus.dispose();
  });

  describe("registration", () => {
    it("rejects descriptors without capabilities", () => {
      expect(() => registry.register({ agentId: "a", capabilities: [] })).toThrow(
        ConfigurationError
      );
      expect(registry.listAgents()).toEqual([]);
    });

    it("rejects duplicate capability names", () => {
      expect(() => registry.register(descriptor("a", ["summarize", "summarize"]))).toThrow(
        "Agent a declares a capability twice"
      );
    });

    it("lists idle candidates in agentId order", () => {
      registry.register(descriptor("charlie", ["summarize"]));
      registry.register(descriptor("alpha", ["summarize", "translate"]));
      registry.register(descriptor("bravo", ["translate"]));

      expect(registry.candidatesFor("summarize").map((c) => c.agentId)).toEqual([
        "alpha",
        "charlie",
      ]);
      expect(registry.candidatesFor("unknown")).toEqual([]);
    });

    it("keeps claims and replaces the manifest on re-registration", () => {
      registry.register(descriptor("a", ["summarize"]));
      registry.claim("a", { workflowId: "w1", taskId: "t1" });

      now = 500;
      const snapshot = registry.register(descriptor("a", ["translate"]));

      expect(snapshot.assignedTasks).toEqual([{ workflowId: "w1", taskId: "t1" }]);
      expect(snapshot.lastHeartbeatAt).toBe(500);
      expect(snapshot.registeredAt).toBe(0);
      expect(registry.candidatesFor("summarize")).toEqual([]);
    });

    it("returns held tasks on deregistration", () => {
      registry.register(descriptor("a", ["summarize"]));
      registry.claim("a", { workflowId: "w1", taskId: "t1" });

      expect(registry.deregister("a")).toEqual([{ workflowId: "w1", taskId: "t1" }]);
      expect(registry.getAgent("a")).toBeUndefined();
      expect(registry.deregister("a")).toEqual([]);
      expect(events.getHistory("agent:*").map((event) => event.type)).toEqual([
        "agent:registered",
        "agent:deregistered",
      ]);
    });
  });

  describe("claims", () => {
    it("never books an agent beyond its slots", () => {
      registry.register(descriptor("a", ["summarize"], 2));

      expect(registry.claim("a", { workflowId: "w1", taskId: "t1" })).toBe(true);
      expect(registry.getAgent("a")?.availability).toBe("idle");
      expect(registry.claim("a", { workflowId: "w1", taskId: "t2" })).toBe(true);
      expect(registry.claim("a", { workflowId: "w1", taskId: "t3" })).toBe(false);
      expect(registry.getAgent("a")?.availability).toBe("busy");
      expect(registry.candidatesFor("summarize")).toEqual([]);
    });

    it("treats a repeated claim of the same task as held", () => {
      registry.register(descriptor("a", ["summarize"]));
      expect(registry.claim("a", { workflowId: "w1", taskId: "t1" })).toBe(true);
      expect(registry.claim("a", { workflowId: "w1", taskId: "t1" })).toBe(true);
      expect(registry.getAgent("a")?.inFlight).toBe(1);
    });

    it("frees the slot on release", () => {
      registry.register(descriptor("a", ["summarize"]));
      registry.claim("a", { workflowId: "w1", taskId: "t1" });

      expect(registry.release("a", { workflowId: "w1", taskId: "t1" }, "succeeded")).toBe(true);
      expect(registry.release("a", { workflowId: "w1", taskId: "t1" }, "succeeded")).toBe(false);
      expect(registry.getAgent("a")?.availability).toBe("idle");
      expect(events.getHistory("agent:released")[0]?.payload).toEqual({
        agentId: "a",
        task: { workflowId: "w1", taskId: "t1" },
        outcome: "succeeded",
      });
    });

    it("restores recovered claims past the slot limit", () => {
      registry.register(descriptor("a", ["summarize"]));
      registry.claim("a", { workflowId: "w1", taskId: "t1" });

      expect(registry.restoreClaim("a", { workflowId: "w2", taskId: "t9" })).toBe(true);
      expect(registry.getAgent("a")?.inFlight).toBe(2);
      expect(registry.restoreClaim("ghost", { workflowId: "w2", taskId: "t9" })).toBe(false);
    });
  });

  describe("liveness", () => {
    it("marks silent agents unreachable and reports their tasks", () => {
      bus.subscribe("a", () => {});
      registry.register(descriptor("a", ["summarize"]));
      registry.register(descriptor("b", ["summarize"]));
      registry.claim("a", { workflowId: "w1", taskId: "t1" });

      now = 10_000;
      registry.heartbeat("b");
      now = 15_000;
      expect(registry.sweepLiveness()).toEqual([]);

      now = 15_001;
      expect(registry.sweepLiveness()).toEqual(["a"]);
      expect(registry.getAgent("a")?.availability).toBe("unreachable");
      expect(registry.isAlive("a")).toBe(false);
      expect(bus.isReachable("a")).toBe(false);
      expect(registry.candidatesFor("summarize").map((c) => c.agentId)).toEqual(["b"]);
      expect(events.getHistory("agent:unreachable")[0]?.payload).toEqual({
        agentId: "a",
        tasks: [{ workflowId: "w1", taskId: "t1" }],
      });

      expect(registry.sweepLiveness()).toEqual([]);
    });

    it("restores an unreachable agent on its next heartbeat", () => {
      registry.register(descriptor("a", ["summarize"]));
      now = 20_000;
      registry.sweepLiveness();

      registry.heartbeat("a");

      expect(registry.isAlive("a")).toBe(true);
      expect(events.getHistory("agent:restored")).toHaveLength(1);
    });

    it("rejects heartbeats from unknown agents", () => {
      expect(() => registry.heartbeat("ghost")).toThrow("Agent not found: ghost");
    });

    it("accepts heartbeats broadcast on the bus", async () => {
      registry.register(descriptor("a", ["summarize"]));
      registry.start();
      now = 20_000;
      registry.sweepLiveness();
      expect(registry.isAlive("a")).toBe(false);

      bus.publish({
        from: "a",
        topic: "heartbeat",
        type: "heartbeat",
        payload: { agentId: "a", timestamp: 20_000 },
      });

      await vi.waitFor(() => expect(registry.isAlive("a")).toBe(true));
      expect(registry.getAgent("a")?.lastHeartbeatAt).toBe(20_000);
    });
  });
});
