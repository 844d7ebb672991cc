/**
 * Agent Registry
 *
 * Single owner of agent descriptors and availability. Claim and release are the
 * only paths that change how many slots an agent has in use, so an agent is
 * never booked beyond its slots.
 */

import {
  type AgentAvailability,
  type AgentDescriptor,
  AgentNotFoundError,
  type AssignmentOutcome,
  type Clock,
  ConfigurationError,
  DEFAULT_CONCLAVE_CONFIG,
  type EventBus,
  type RuntimeLogger,
  type TaskRef,
  getLogger,
  taskRefKey,
} from "@conclave/agent-engine-core";
import {
  type BusSubscription,
  type CommunicationBus,
  decodeMessage,
} from "@conclave/agent-engine-bus";
import { z } from "zod";
import type { AgentSnapshot, Candidate } from "./types";

// ============================================================================
// Validation
// ============================================================================

const capabilitySchema = z
  .object({
    name: z.string().min(1),
    costEstimate: z.number().nonnegative(),
    qualityEstimate: z.number().min(0).max(1),
  })
  .strict();

const descriptorSchema = z
  .object({
    agentId: z.string().min(1),
    capabilities: z.array(capabilitySchema).min(1),
    slots: z.number().int().positive().optional(),
    metadata: z.record(z.string(), z.unknown()).optional(),
  })
  .strict();

// ============================================================================
// Types
// ============================================================================

export const HEARTBEAT_TOPIC = "heartbeat";

export interface AgentRegistryOptions {
  bus?: CommunicationBus;
  events?: EventBus;
  /** Endpoint the registry listens on for heartbeat broadcasts */
  endpoint?: string;
  livenessWindowMs?: number;
  livenessCheckIntervalMs?: number;
  now?: Clock;
  logger?: RuntimeLogger;
}

interface AgentRecord {
  descriptor: AgentDescriptor;
  slots: number;
  unreachable: boolean;
  claims: Map<string, TaskRef>;
  registeredAt: number;
  lastHeartbeatAt: number;
}

// ============================================================================
// AgentRegistry
// ============================================================================

export class AgentRegistry {
  private readonly agents = new Map<string, AgentRecord>();
  private readonly capabilityIndex = new Map<string, Set<string>>();
  private readonly bus?: CommunicationBus;
  private readonly events?: EventBus;
  private readonly endpoint: string;
  private readonly livenessWindowMs: number;
  private readonly livenessCheckIntervalMs: number;
  private readonly now: Clock;
  private readonly logger: RuntimeLogger;

  private subscription?: BusSubscription;
  private sweepTimer?: ReturnType<typeof setInterval>;

  constructor(options: AgentRegistryOptions = {}) {
    const defaults = DEFAULT_CONCLAVE_CONFIG.negotiation;
    this.bus = options.bus;
    this.events = options.events;
    this.endpoint = options.endpoint ?? "registry";
    this.livenessWindowMs = options.livenessWindowMs ?? defaults.livenessWindowMs;
    this.livenessCheckIntervalMs =
      options.livenessCheckIntervalMs ?? defaults.livenessCheckIntervalMs;
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger ?? getLogger("agent-registry");
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Listen for heartbeat broadcasts and sweep liveness periodically.
   */
  start(): void {
    if (this.bus && !this.subscription) {
      this.subscription = this.bus.subscribe(
        this.endpoint,
        (message, context) => {
          const decoded = decodeMessage(message);
          if (decoded?.type === "heartbeat" && this.agents.has(decoded.payload.agentId)) {
            this.heartbeat(decoded.payload.agentId);
          }
          context.ack();
        },
        { topics: [HEARTBEAT_TOPIC], predicate: (message) => message.type === "heartbeat" }
      );
    }
    if (!this.sweepTimer) {
      this.sweepTimer = setInterval(() => this.sweepLiveness(), this.livenessCheckIntervalMs);
      this.sweepTimer.unref();
    }
  }

  stop(): void {
    this.subscription?.unsubscribe();
    this.subscription = undefined;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  /**
   * Register or re-register an agent. Re-registration replaces the manifest,
   * keeps existing claims and counts as a heartbeat.
   *
   * @throws ConfigurationError for malformed descriptors
   */
  register(descriptor: AgentDescriptor): AgentSnapshot {
    const parsed = descriptorSchema.safeParse(descriptor);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "descriptor"}: ${issue.message}`
      );
      throw new ConfigurationError(`Invalid agent descriptor: ${issues.join("; ")}`, issues);
    }
    const names = descriptor.capabilities.map((capability) => capability.name);
    if (new Set(names).size !== names.length) {
      throw new ConfigurationError(`Agent ${descriptor.agentId} declares a capability twice`);
    }

    const now = this.now();
    const existing = this.agents.get(descriptor.agentId);
    if (existing) {
      this.unindex(existing);
    }

    const record: AgentRecord = {
      descriptor: { ...descriptor, capabilities: descriptor.capabilities.map((c) => ({ ...c })) },
      slots: descriptor.slots ?? 1,
      unreachable: false,
      claims: existing?.claims ?? new Map(),
      registeredAt: existing?.registeredAt ?? now,
      lastHeartbeatAt: now,
    };
    this.agents.set(descriptor.agentId, record);
    this.index(record);

    if (existing?.unreachable) {
      this.bus?.markReachable(descriptor.agentId);
    }
    this.logger.info("Agent registered", { agentId: descriptor.agentId, capabilities: names });
    this.events?.emit({
      type: "agent:registered",
      payload: { agentId: descriptor.agentId, capabilities: names },
    });
    return this.toSnapshot(record);
  }

  /**
   * Remove an agent. Returns the tasks it still held.
   */
  deregister(agentId: string): TaskRef[] {
    const record = this.agents.get(agentId);
    if (!record) {
      return [];
    }
    this.unindex(record);
    this.agents.delete(agentId);
    const tasks = Array.from(record.claims.values());
    this.logger.info("Agent deregistered", { agentId, openTasks: tasks.length });
    this.events?.emit({ type: "agent:deregistered", payload: { agentId, tasks } });
    return tasks;
  }

  /**
   * @throws AgentNotFoundError for unregistered agents
   */
  heartbeat(agentId: string): void {
    const record = this.agents.get(agentId);
    if (!record) {
      throw new AgentNotFoundError(agentId);
    }
    record.lastHeartbeatAt = this.now();
    if (record.unreachable) {
      record.unreachable = false;
      this.bus?.markReachable(agentId);
      this.logger.info("Agent reachable again", { agentId });
      this.events?.emit({ type: "agent:restored", payload: { agentId } });
    }
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  getAgent(agentId: string): AgentSnapshot | undefined {
    const record = this.agents.get(agentId);
    return record ? this.toSnapshot(record) : undefined;
  }

  listAgents(): AgentSnapshot[] {
    return Array.from(this.agents.values())
      .map((record) => this.toSnapshot(record))
      .sort((a, b) => compareIds(a.agentId, b.agentId));
  }

  /**
   * Idle, reachable agents declaring the capability, ordered by agentId.
   */
  candidatesFor(capability: string): Candidate[] {
    const ids = this.capabilityIndex.get(capability);
    if (!ids) {
      return [];
    }
    const candidates: Candidate[] = [];
    for (const agentId of ids) {
      const record = this.agents.get(agentId);
      if (!record || this.availabilityOf(record) !== "idle") {
        continue;
      }
      const declared = record.descriptor.capabilities.find((c) => c.name === capability);
      if (declared) {
        candidates.push({ agentId, capability: { ...declared } });
      }
    }
    return candidates.sort((a, b) => compareIds(a.agentId, b.agentId));
  }

  /**
   * Whether a reachable agent declares the capability but has no free slot.
   */
  hasBusyCandidate(capability: string): boolean {
    for (const agentId of this.capabilityIndex.get(capability) ?? []) {
      const record = this.agents.get(agentId);
      if (record && this.availabilityOf(record) === "busy") {
        return true;
      }
    }
    return false;
  }

  isAlive(agentId: string): boolean {
    const record = this.agents.get(agentId);
    return record !== undefined && !record.unreachable;
  }

  // ==========================================================================
  // Availability
  // ==========================================================================

  /**
   * Take one slot for the task. Returns false when the agent is unknown,
   * unreachable or full. Claiming a task the agent already holds succeeds.
   */
  claim(agentId: string, task: TaskRef): boolean {
    const record = this.agents.get(agentId);
    if (!record || record.unreachable) {
      return false;
    }
    const key = taskRefKey(task);
    if (record.claims.has(key)) {
      return true;
    }
    if (record.claims.size >= record.slots) {
      return false;
    }
    record.claims.set(key, { ...task });
    this.logger.debug("Agent claimed", { agentId, ...task, inFlight: record.claims.size });
    return true;
  }

  /**
   * Re-attach a task recovered from a checkpoint. Unlike claim, slot capacity
   * is not enforced: the agent is already working on it.
   */
  restoreClaim(agentId: string, task: TaskRef): boolean {
    const record = this.agents.get(agentId);
    if (!record || record.unreachable) {
      return false;
    }
    record.claims.set(taskRefKey(task), { ...task });
    return true;
  }

  /**
   * Give the task's slot back. Returns false when the agent did not hold it.
   */
  release(agentId: string, task: TaskRef, outcome: AssignmentOutcome): boolean {
    const record = this.agents.get(agentId);
    if (!record || !record.claims.delete(taskRefKey(task))) {
      return false;
    }
    this.logger.debug("Agent released", { agentId, ...task, outcome });
    this.events?.emit({ type: "agent:released", payload: { agentId, task, outcome } });
    return true;
  }

  /**
   * Mark every agent whose heartbeat is older than the liveness window as
   * unreachable. Returns the agents that changed state.
   */
  sweepLiveness(now = this.now()): string[] {
    const lapsed: string[] = [];
    for (const [agentId, record] of this.agents) {
      if (record.unreachable || now - record.lastHeartbeatAt <= this.livenessWindowMs) {
        continue;
      }
      record.unreachable = true;
      lapsed.push(agentId);
      const tasks = Array.from(record.claims.values());
      this.bus?.markUnreachable(agentId);
      this.logger.warn("Agent missed its heartbeat window", {
        agentId,
        silentForMs: now - record.lastHeartbeatAt,
        openTasks: tasks.length,
      });
      this.events?.emit({ type: "agent:unreachable", payload: { agentId, tasks } });
    }
    return lapsed;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private availabilityOf(record: AgentRecord): AgentAvailability {
    if (record.unreachable) {
      return "unreachable";
    }
    return record.claims.size >= record.slots ? "busy" : "idle";
  }

  private index(record: AgentRecord): void {
    for (const capability of record.descriptor.capabilities) {
      const ids = this.capabilityIndex.get(capability.name) ?? new Set<string>();
      ids.add(record.descriptor.agentId);
      this.capabilityIndex.set(capability.name, ids);
    }
  }

  private unindex(record: AgentRecord): void {
    for (const capability of record.descriptor.capabilities) {
      const ids = this.capabilityIndex.get(capability.name);
      ids?.delete(record.descriptor.agentId);
      if (ids?.size === 0) {
        this.capabilityIndex.delete(capability.name);
      }
    }
  }

  private toSnapshot(record: AgentRecord): AgentSnapshot {
    return {
      agentId: record.descriptor.agentId,
      capabilities: record.descriptor.capabilities.map((c) => ({ ...c })),
      slots: record.slots,
      availability: this.availabilityOf(record),
      inFlight: record.claims.size,
      assignedTasks: Array.from(record.claims.values()),
      registeredAt: record.registeredAt,
      lastHeartbeatAt: record.lastHeartbeatAt,
      metadata: record.descriptor.metadata,
    };
  }
}

/** Code-unit order, independent of locale. */
export function compareIds(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

export function createAgentRegistry(options?: AgentRegistryOptions): AgentRegistry {
  return new AgentRegistry(options);
}
