/**
 * Agent Worker
 *
 * Executor side of the engine. A worker registers its manifest, answers bid
 * requests, accepts dispatches up to its slot count and reports exactly one
 * result or failure per dispatch. Redelivered dispatches are recognized by
 * idempotency key and run once.
 */

import {
  type AgentDescriptor,
  type CapabilityDescriptor,
  type Clock,
  ConfigurationError,
  DEFAULT_CONCLAVE_CONFIG,
  DeadlineExceededError,
  ExecutionError,
  type RuntimeLogger,
  getLogger,
  taskRefKey,
  toErrorInfo,
} from "@conclave/agent-engine-core";
import {
  type AcceptPayload,
  type BidPayload,
  type BidRequestPayload,
  type BusSubscription,
  type CommunicationBus,
  type DeliveryContext,
  type DispatchPayload,
  decodeMessage,
  type FailurePayload,
  IdempotencyGuard,
  type Message,
  type RejectPayload,
  type ResultPayload,
  replyIdempotencyKey,
} from "@conclave/agent-engine-bus";
import { type AgentRegistry, HEARTBEAT_TOPIC } from "@conclave/agent-engine-negotiation";
import type { BidDecision, BidEstimator, CapabilityExecutor, ExecutionContext } from "./types";

// ============================================================================
// Types
// ============================================================================

export interface AgentWorkerOptions {
  descriptor: AgentDescriptor;
  /** One executor per declared capability */
  executors: Record<string, CapabilityExecutor>;
  bus: CommunicationBus;
  registry: AgentRegistry;
  bidEstimator?: BidEstimator;
  /** Defaults to a third of the default liveness window */
  heartbeatIntervalMs?: number;
  now?: Clock;
  logger?: RuntimeLogger;
}

type ReplyType = "accept" | "reject" | "result" | "failure";

type ReplyPayload = AcceptPayload | RejectPayload | ResultPayload | FailurePayload;

// ============================================================================
// AgentWorker
// ============================================================================

export class AgentWorker {
  readonly agentId: string;

  private readonly descriptor: AgentDescriptor;
  private readonly executors: Map<string, CapabilityExecutor>;
  private readonly bus: CommunicationBus;
  private readonly registry: AgentRegistry;
  private readonly bidEstimator?: BidEstimator;
  private readonly heartbeatIntervalMs: number;
  private readonly slots: number;
  private readonly now: Clock;
  private readonly logger: RuntimeLogger;

  private readonly dispatches = new IdempotencyGuard();
  private readonly running = new Map<string, AbortController>();
  private readonly executions = new Set<Promise<void>>();
  private subscription?: BusSubscription;
  private heartbeatTimer?: ReturnType<typeof setInterval>;

  constructor(options: AgentWorkerOptions) {
    this.descriptor = options.descriptor;
    this.agentId = options.descriptor.agentId;
    this.executors = new Map(Object.entries(options.executors));
    this.bus = options.bus;
    this.registry = options.registry;
    this.bidEstimator = options.bidEstimator;
    this.heartbeatIntervalMs =
      options.heartbeatIntervalMs ??
      Math.floor(DEFAULT_CONCLAVE_CONFIG.negotiation.livenessWindowMs / 3);
    this.slots = options.descriptor.slots ?? 1;
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger ?? getLogger("agent-worker").child({ agentId: this.agentId });

    const missing = this.descriptor.capabilities
      .map((capability) => capability.name)
      .filter((name) => !this.executors.has(name));
    if (missing.length > 0) {
      throw new ConfigurationError(
        `Agent ${this.agentId} declares capabilities without an executor: ${missing.join(", ")}`,
        missing
      );
    }
  }

  /** Tasks currently executing. */
  get activeTasks(): number {
    return this.running.size;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Register with the registry, listen on the agent's endpoint and start
   * heartbeating.
   */
  start(): void {
    if (this.subscription) {
      return;
    }
    this.registry.register(this.descriptor);
    this.subscription = this.bus.subscribe(this.agentId, (message, context) =>
      this.handle(message, context)
    );
    this.heartbeatTimer = setInterval(() => this.heartbeat(), this.heartbeatIntervalMs);
    this.heartbeatTimer.unref();
    this.logger.info("Agent worker started", {
      capabilities: this.descriptor.capabilities.map((capability) => capability.name),
      slots: this.slots,
    });
  }

  /**
   * Abort running executions, wait for their reports and leave the registry.
   */
  async stop(options: { deregister?: boolean } = {}): Promise<void> {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = undefined;
    }
    this.subscription?.unsubscribe();
    this.subscription = undefined;
    for (const controller of this.running.values()) {
      controller.abort(new Error("Agent worker stopped"));
    }
    await Promise.allSettled(this.executions);
    if (options.deregister ?? true) {
      this.registry.deregister(this.agentId);
    }
    this.logger.info("Agent worker stopped");
  }

  /** Broadcast liveness on the heartbeat topic. */
  heartbeat(): void {
    try {
      this.bus.publish({
        from: this.agentId,
        topic: HEARTBEAT_TOPIC,
        type: "heartbeat",
        payload: { agentId: this.agentId, timestamp: this.now() },
      });
    } catch (error) {
      this.logger.warn("Heartbeat not published", { error: toErrorInfo(error) });
    }
  }

  // ==========================================================================
  // Inbound
  // ==========================================================================

  private async handle(message: Message, context: DeliveryContext): Promise<void> {
    context.ack();
    const decoded = decodeMessage(message);
    if (!decoded) {
      this.logger.warn("Malformed message dropped", { messageId: message.id, type: message.type });
      return;
    }
    switch (decoded.type) {
      case "bid-request":
        await this.answerBid(decoded.payload, message.from);
        return;
      case "dispatch":
        this.takeDispatch(decoded.payload, message);
        return;
      default:
        this.logger.debug("Ignoring message", { type: decoded.type, from: message.from });
    }
  }

  private async answerBid(request: BidRequestPayload, replyTo: string): Promise<void> {
    const bid = await this.priceBid(request);
    try {
      this.bus.send({ from: this.agentId, to: replyTo, type: "bid", payload: bid });
    } catch (error) {
      this.logger.warn("Bid not delivered", {
        roundId: request.roundId,
        error: toErrorInfo(error),
      });
    }
  }

  private async priceBid(request: BidRequestPayload): Promise<BidPayload> {
    const declined: BidPayload = {
      roundId: request.roundId,
      agentId: this.agentId,
      capability: request.capability,
      cost: 0,
      quality: 0,
      decline: true,
    };
    const declared = this.declared(request.capability);
    if (!declared || this.running.size >= this.slots) {
      return declined;
    }
    const decision = await this.estimate(request, declared);
    if ("decline" in decision) {
      return declined;
    }
    return {
      ...declined,
      cost: decision.cost,
      quality: decision.quality ?? declared.qualityEstimate,
      decline: false,
    };
  }

  private async estimate(
    request: BidRequestPayload,
    declared: CapabilityDescriptor
  ): Promise<BidDecision> {
    const manifest = { cost: declared.costEstimate, quality: declared.qualityEstimate };
    if (!this.bidEstimator) {
      return manifest;
    }
    try {
      const decision = await this.bidEstimator(request, declared);
      if ("decline" in decision || (Number.isFinite(decision.cost) && decision.cost >= 0)) {
        return decision;
      }
      this.logger.warn("Bid estimator returned an invalid cost", { roundId: request.roundId });
    } catch (error) {
      this.logger.warn("Bid estimator failed, bidding the manifest cost", {
        roundId: request.roundId,
        error: toErrorInfo(error),
      });
    }
    return manifest;
  }

  private takeDispatch(dispatch: DispatchPayload, message: Message): void {
    if (!this.dispatches.claim(message.idempotencyKey)) {
      this.logger.debug("Duplicate dispatch ignored", { key: message.idempotencyKey });
      return;
    }
    const executor = this.executors.get(dispatch.capability);
    if (!executor || !this.declared(dispatch.capability)) {
      this.reply(message.from, "reject", {
        ...this.replyBase(dispatch),
        reason: `capability ${dispatch.capability} is not offered`,
      });
      return;
    }
    if (this.running.size >= this.slots) {
      this.reply(message.from, "reject", { ...this.replyBase(dispatch), reason: "no free slot" });
      return;
    }

    this.reply(message.from, "accept", this.replyBase(dispatch));
    const execution = this.execute(executor, dispatch, message.from);
    this.executions.add(execution);
    void execution.finally(() => this.executions.delete(execution));
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  private async execute(
    executor: CapabilityExecutor,
    dispatch: DispatchPayload,
    replyTo: string
  ): Promise<void> {
    const key = `${taskRefKey(dispatch)}#${dispatch.attempt}`;
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new DeadlineExceededError(`task ${key}`, dispatch.deadlineAt)),
      Math.max(0, dispatch.deadlineAt - this.now())
    );
    timer.unref();
    this.running.set(key, controller);

    const context: ExecutionContext = {
      agentId: this.agentId,
      workflowId: dispatch.workflowId,
      taskId: dispatch.taskId,
      attempt: dispatch.attempt,
      capability: dispatch.capability,
      deadlineAt: dispatch.deadlineAt,
      dependencies: dispatch.dependencies,
      signal: controller.signal,
      logger: this.logger.child({ workflowId: dispatch.workflowId, taskId: dispatch.taskId }),
    };

    try {
      const output = await executor(dispatch.input, context);
      this.reply(replyTo, "result", { ...this.replyBase(dispatch), output });
    } catch (error) {
      const failure =
        error instanceof ExecutionError
          ? error
          : new ExecutionError(toErrorInfo(error).message, this.agentId);
      this.logger.warn("Task execution failed", {
        workflowId: dispatch.workflowId,
        taskId: dispatch.taskId,
        attempt: dispatch.attempt,
        error: failure.message,
      });
      this.reply(replyTo, "failure", { ...this.replyBase(dispatch), error: failure.toInfo() });
    } finally {
      clearTimeout(timer);
      this.running.delete(key);
    }
  }

  private reply(to: string, type: ReplyType, payload: ReplyPayload): void {
    try {
      this.bus.send({
        from: this.agentId,
        to,
        type,
        payload,
        idempotencyKey: replyIdempotencyKey(
          type,
          payload.workflowId,
          payload.taskId,
          payload.attempt
        ),
        correlationId: payload.workflowId,
      });
    } catch (error) {
      this.logger.error("Reply not delivered", error, {
        type,
        workflowId: payload.workflowId,
        taskId: payload.taskId,
      });
    }
  }

  private replyBase(dispatch: DispatchPayload): AcceptPayload {
    return {
      workflowId: dispatch.workflowId,
      taskId: dispatch.taskId,
      attempt: dispatch.attempt,
      agentId: this.agentId,
    };
  }

  private declared(capability: string): CapabilityDescriptor | undefined {
    return this.descriptor.capabilities.find((candidate) => candidate.name === capability);
  }
}

export function createAgentWorker(options: AgentWorkerOptions): AgentWorker {
  return new AgentWorker(options);
}
