/**
 * Orchestrator
 *
 * Drives submitted workflows to a terminal state. Ready tasks are staffed
 * through the role negotiator, dispatched over the bus and settled by the
 * agents' replies or by their deadlines. Every change to a workflow is
 * checkpointed to the memory manager before anything acts on it.
 *
 * Each workflow is mutated under its own lock; the lock is never held while a
 * negotiation is in progress, so tasks of one workflow and of different
 * workflows are staffed concurrently.
 */

import { randomUUID } from "node:crypto";
import {
  type Clock,
  type ConclaveConfigOverrides,
  computeBackoffDelay,
  DeadlineExceededError,
  createEventBus,
  type EventBus,
  type EventHandler,
  type IdFactory,
  InvalidGraphError,
  InvalidTransitionError,
  isTerminalTaskState,
  type JsonValue,
  KeyedMutex,
  NoQualifiedAgentError,
  type OrchestratorConfig,
  RecipientUnavailableError,
  type RuntimeLogger,
  type Subscription,
  type TaskErrorInfo,
  type TaskRef,
  getLogger,
  resolveConclaveConfig,
  retry,
  taskRefKey,
  toErrorInfo,
  VersionConflictError,
  WorkflowNotFoundError,
} from "@conclave/agent-engine-core";
import {
  type BusSubscription,
  type CommunicationBus,
  type DecodedMessage,
  type DeliveryContext,
  type DispatchPayload,
  decodeMessage,
  dispatchIdempotencyKey,
  IdempotencyGuard,
  type Message,
  type MessageType,
} from "@conclave/agent-engine-bus";
import type { MemoryManager } from "@conclave/agent-engine-memory";
import type {
  NegotiationOutcome,
  NegotiationRequest,
  RoleNegotiator,
} from "@conclave/agent-engine-negotiation";
import { type TaskRecord, WorkflowCheckpointStore, type WorkflowRecord } from "./checkpoint";
import type { TaskStatus, WorkflowFilter, WorkflowStatus, WorkflowSummary } from "./types";
import { WorkflowMutation, workflowProgress } from "./workflowState";
import { validateWorkflowSpec, type WorkflowSpec } from "./workflowSpec";

// ============================================================================
// Types
// ============================================================================

export interface OrchestratorOptions {
  memory: MemoryManager;
  bus: CommunicationBus;
  negotiator: RoleNegotiator;
  /** Must be the bus the agent registry reports liveness on */
  events?: EventBus;
  config?: ConclaveConfigOverrides["orchestrator"];
  /** Bus endpoint agents reply to */
  endpoint?: string;
  now?: Clock;
  idFactory?: IdFactory;
  logger?: RuntimeLogger;
}

interface WorkflowRuntime {
  record: WorkflowRecord;
  /** Memory version of the last checkpoint */
  version: number;
}

interface MutationResult<T> {
  value: T | undefined;
  mutation?: WorkflowMutation;
}

type ReplyPayload = { taskId: string; attempt: number; agentId: string };

const REPLY_TYPES: ReadonlySet<MessageType> = new Set(["accept", "reject", "result", "failure"]);

const CONFLICT_BACKOFF = { initialDelayMs: 5, maxDelayMs: 100, multiplier: 2, jitter: true };

const CANCELLED: TaskErrorInfo = { code: "CANCELLED", message: "Workflow cancelled" };

// ============================================================================
// Orchestrator
// ============================================================================

export class Orchestrator {
  private readonly bus: CommunicationBus;
  private readonly negotiator: RoleNegotiator;
  private readonly events: EventBus;
  private readonly store: WorkflowCheckpointStore;
  private readonly config: OrchestratorConfig;
  private readonly endpoint: string;
  private readonly now: Clock;
  private readonly idFactory: IdFactory;
  private readonly logger: RuntimeLogger;

  private readonly workflows = new Map<string, WorkflowRuntime>();
  private readonly locks = new KeyedMutex();
  private readonly deadlines = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly staffingTimers = new Map<string, ReturnType<typeof setTimeout>>();
  /** Ready tasks waiting for a qualified agent to free a slot */
  private readonly parked = new Map<string, TaskRef>();
  private readonly processed = new IdempotencyGuard();

  private subscription?: BusSubscription;
  private eventSubscriptions: Subscription[] = [];

  constructor(options: OrchestratorOptions) {
    this.bus = options.bus;
    this.negotiator = options.negotiator;
    this.events = options.events ?? createEventBus();
    this.config = resolveOrchestratorConfig(options.config);
    this.endpoint = options.endpoint ?? "orchestrator";
    this.now = options.now ?? (() => Date.now());
    this.idFactory = options.idFactory ?? randomUUID;
    this.logger = options.logger ?? getLogger("orchestrator");
    this.store = new WorkflowCheckpointStore(options.memory, {
      conflictRetries: this.config.checkpointConflictRetries,
      logger: this.logger.child({ component: "checkpoints" }),
    });
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Listen for agent replies and liveness events, and start the negotiator.
   */
  start(): void {
    if (this.subscription) {
      return;
    }
    this.negotiator.start();
    this.subscription = this.bus.subscribe(
      this.endpoint,
      (message, context) => this.handleReply(message, context),
      { predicate: (message) => REPLY_TYPES.has(message.type) }
    );
    this.eventSubscriptions = [
      this.events.on("agent:unreachable", (event) =>
        this.onAgentLost(event.payload.agentId, event.payload.tasks, "unreachable")
      ),
      this.events.on("agent:deregistered", (event) =>
        this.onAgentLost(event.payload.agentId, event.payload.tasks, "deregistered")
      ),
      this.events.on("agent:released", () => this.wakeParked()),
      this.events.on("agent:registered", () => this.wakeParked()),
      this.events.on("agent:restored", () => this.wakeParked()),
    ];
    this.logger.info("Orchestrator started", { endpoint: this.endpoint });
  }

  stop(): void {
    this.subscription?.unsubscribe();
    this.subscription = undefined;
    for (const subscription of this.eventSubscriptions) {
      subscription.unsubscribe();
    }
    this.eventSubscriptions = [];
    for (const timer of [...this.deadlines.values(), ...this.staffingTimers.values()]) {
      clearTimeout(timer);
    }
    this.deadlines.clear();
    this.staffingTimers.clear();
    this.parked.clear();
    this.negotiator.stop();
    this.logger.info("Orchestrator stopped");
  }

  // ==========================================================================
  // Submission API
  // ==========================================================================

  /**
   * Validate and persist a workflow, then start staffing its root tasks.
   *
   * @throws InvalidGraphError for malformed or cyclic specs and reused ids
   */
  async submit(spec: WorkflowSpec): Promise<string> {
    const definition = validateWorkflowSpec(spec);
    const workflowId = definition.workflowId ?? this.idFactory();
    if (this.workflows.has(workflowId)) {
      throw duplicateWorkflow(workflowId);
    }

    const now = this.now();
    const record: WorkflowRecord = {
      workflowId,
      name: definition.name ?? null,
      metadata: definition.metadata ?? null,
      state: "running",
      cancelled: false,
      archived: false,
      tasks: definition.tasks.map(
        (task): TaskRecord => ({
          taskId: task.taskId,
          capability: task.requiredCapability,
          input: task.input,
          dependsOn: task.dependsOn,
          state: "pending",
          retryCount: 0,
          maxRetries: task.maxRetries ?? this.config.maxRetries,
          timeoutMs: task.timeoutMs ?? this.config.dispatchTimeoutMs,
          preferredAgent: task.preferredAgent ?? null,
          attempt: 0,
          negotiationAttempts: 0,
          assignedAgent: null,
          accepted: false,
          failedAgents: [],
          deadlineAt: null,
          result: null,
          error: null,
          createdAt: now,
          updatedAt: now,
          settledAt: null,
        })
      ),
      createdAt: now,
      updatedAt: now,
      completedAt: null,
    };
    const mutation = new WorkflowMutation(record, now);
    mutation.finalize();

    let version: number;
    try {
      version = await this.store.create(record);
    } catch (error) {
      if (error instanceof VersionConflictError) {
        throw duplicateWorkflow(workflowId);
      }
      throw error;
    }
    await this.store.addToIndex(workflowId);
    this.workflows.set(workflowId, { record, version });

    this.logger.info("Workflow submitted", { workflowId, taskCount: record.tasks.length });
    this.events.emit(
      { type: "workflow:submitted", payload: { workflowId, taskCount: record.tasks.length } },
      { source: "orchestrator", correlationId: workflowId }
    );
    await this.locks.runExclusive(workflowId, () => this.applyEffects(mutation));
    return workflowId;
  }

  /**
   * @throws WorkflowNotFoundError for unknown or archived workflows
   */
  status(workflowId: string): WorkflowStatus {
    return toWorkflowStatus(this.requireRuntime(workflowId).record);
  }

  list(filter: WorkflowFilter = {}): WorkflowSummary[] {
    const wanted =
      filter.state === undefined
        ? undefined
        : new Set(Array.isArray(filter.state) ? filter.state : [filter.state]);
    return Array.from(this.workflows.values())
      .map(({ record }) => record)
      .filter((record) => !wanted || wanted.has(record.state))
      .sort((a, b) => a.createdAt - b.createdAt || a.workflowId.localeCompare(b.workflowId))
      .map((record) => ({
        workflowId: record.workflowId,
        name: record.name ?? undefined,
        state: record.state,
        progress: workflowProgress(record),
        taskCount: record.tasks.length,
        createdAt: record.createdAt,
        completedAt: record.completedAt ?? undefined,
      }));
  }

  /** Outputs of the tasks that succeeded, keyed by taskId. */
  results(workflowId: string): Record<string, JsonValue> {
    const { record } = this.requireRuntime(workflowId);
    const results: Record<string, JsonValue> = {};
    for (const task of record.tasks) {
      if (task.state === "succeeded") {
        results[task.taskId] = task.result;
      }
    }
    return results;
  }

  /**
   * Abandon every unsettled task. Replies that arrive later are ignored.
   * Cancelling a settled workflow changes nothing.
   */
  async cancel(workflowId: string): Promise<WorkflowStatus> {
    this.requireRuntime(workflowId);
    const abandoned = await this.mutate(workflowId, (m) => {
      if (m.record.state !== "running") {
        return undefined;
      }
      m.record.cancelled = true;
      const taskIds: string[] = [];
      for (const task of m.record.tasks) {
        if (isTerminalTaskState(task.state)) {
          continue;
        }
        m.transition(task, "abandoned", CANCELLED);
        m.release(task, "cancelled");
        taskIds.push(task.taskId);
      }
      return taskIds;
    });

    if (abandoned) {
      this.logger.info("Workflow cancelled", { workflowId, abandonedTasks: abandoned.length });
      this.events.emit(
        { type: "workflow:cancelled", payload: { workflowId, abandonedTasks: abandoned } },
        { source: "orchestrator", correlationId: workflowId }
      );
    }
    return this.status(workflowId);
  }

  /**
   * Retire a settled workflow: its checkpoint is kept, flagged as archived,
   * and it leaves the index and this orchestrator.
   *
   * @throws InvalidTransitionError while the workflow is still running
   */
  async archive(workflowId: string): Promise<void> {
    this.requireRuntime(workflowId);
    await this.mutate(workflowId, (m) => {
      if (m.record.state === "running") {
        throw new InvalidTransitionError(`workflow ${workflowId}`, "running", "archived");
      }
      m.record.archived = true;
      return true;
    });
    await this.store.removeFromIndex(workflowId);
    this.workflows.delete(workflowId);
    this.logger.info("Workflow archived", { workflowId });
    this.events.emit(
      { type: "workflow:archived", payload: { workflowId } },
      { source: "orchestrator", correlationId: workflowId }
    );
  }

  /** Observe lifecycle events, e.g. "task:transition" or "workflow:*". */
  on(pattern: string, handler: EventHandler): Subscription {
    return this.events.subscribe(pattern, handler);
  }

  /**
   * Reload every indexed workflow from its checkpoint and resume the running
   * ones. Returns the ids loaded.
   */
  async recover(): Promise<string[]> {
    const recovered: string[] = [];
    for (const workflowId of await this.store.listIndexed()) {
      if (this.workflows.has(workflowId)) {
        continue;
      }
      const loaded = await this.store.load(workflowId);
      if (!loaded || loaded.record.archived) {
        continue;
      }
      this.workflows.set(workflowId, { record: loaded.record, version: loaded.version });
      recovered.push(workflowId);
      if (loaded.record.state === "running") {
        await this.resume(workflowId);
      }
    }
    this.logger.info("Workflows recovered", { count: recovered.length });
    return recovered;
  }

  // ==========================================================================
  // Staffing & dispatch
  // ==========================================================================

  private async staffTask(workflowId: string, taskId: string): Promise<void> {
    this.parked.delete(taskRefKey({ workflowId, taskId }));
    if (!this.workflows.has(workflowId)) {
      return;
    }
    const request = await this.mutate(workflowId, (m): NegotiationRequest | undefined => {
      const task = m.getTask(taskId);
      if (!task || task.state !== "ready" || m.record.cancelled) {
        return undefined;
      }
      m.transition(task, "negotiating");
      return {
        workflowId,
        taskId,
        capability: task.capability,
        input: task.input,
        avoidAgents: [...task.failedAgents],
        preferredAgent: task.preferredAgent ?? undefined,
      };
    });
    if (!request) {
      return;
    }

    let outcome: NegotiationOutcome;
    try {
      outcome = await this.negotiator.negotiate(request);
    } catch (error) {
      if (error instanceof NoQualifiedAgentError && error.busy) {
        await this.park(workflowId, taskId);
        return;
      }
      this.logger.warn("Staffing failed", { workflowId, taskId, error: toErrorInfo(error) });
      await this.requeue(workflowId, taskId, "negotiating", toErrorInfo(error));
      return;
    }

    const task: TaskRef = { workflowId, taskId };
    let dispatched: true | undefined;
    try {
      dispatched = await this.mutate(workflowId, (m) => {
        const record = m.getTask(taskId);
        if (!record || record.state !== "negotiating") {
          return undefined;
        }
        record.attempt += 1;
        record.assignedAgent = outcome.agentId;
        record.deadlineAt = m.now + record.timeoutMs;
        record.accepted = false;
        record.negotiationAttempts = 0;
        m.transition(record, "dispatched");
        m.dispatches.push(taskId);
        return true;
      });
    } catch (error) {
      this.negotiator.release(outcome.agentId, task, "cancelled");
      throw error;
    }
    if (!dispatched) {
      this.negotiator.release(outcome.agentId, task, "cancelled");
    }
  }

  /**
   * Every qualified agent is busy. Wait in ready for a released slot without
   * counting a staffing attempt; the backoff ceiling doubles as a poll.
   */
  private async park(workflowId: string, taskId: string): Promise<void> {
    const parked = await this.mutate(workflowId, (m) => {
      const task = m.getTask(taskId);
      if (!task || task.state !== "negotiating") {
        return undefined;
      }
      m.transition(task, "ready");
      m.staff(taskId, this.config.backoff.maxDelayMs);
      return true;
    });
    if (parked) {
      this.parked.set(taskRefKey({ workflowId, taskId }), { workflowId, taskId });
      this.logger.debug("Qualified agents busy, task parked", { workflowId, taskId });
    }
  }

  private wakeParked(): void {
    const tasks = [...this.parked.values()];
    this.parked.clear();
    for (const task of tasks) {
      this.scheduleStaffing(task.workflowId, task.taskId, 0);
    }
  }

  private sendDispatch(record: WorkflowRecord, taskId: string): void {
    const task = record.tasks.find((candidate) => candidate.taskId === taskId);
    const agentId = task?.assignedAgent;
    const deadlineAt = task?.deadlineAt;
    if (!task || !agentId || deadlineAt === null || deadlineAt === undefined) {
      return;
    }
    const { workflowId } = record;
    const payload: DispatchPayload = {
      workflowId,
      taskId,
      attempt: task.attempt,
      capability: task.capability,
      input: task.input,
      deadlineAt,
      dependencies: collectDependencyResults(record, task),
    };

    try {
      this.bus.send({
        from: this.endpoint,
        to: agentId,
        type: "dispatch",
        payload,
        idempotencyKey: dispatchIdempotencyKey(workflowId, taskId, task.attempt),
        correlationId: workflowId,
      });
    } catch (error) {
      this.logger.warn("Dispatch not delivered, re-negotiating", {
        workflowId,
        taskId,
        agentId,
        error: toErrorInfo(error),
      });
      this.background(
        this.requeue(workflowId, taskId, "dispatched", toErrorInfo(error), task.attempt),
        { workflowId, taskId, step: "requeue" }
      );
      return;
    }

    this.logger.debug("Task dispatched", { workflowId, taskId, agentId, attempt: task.attempt });
    this.armDeadline(record, taskId);
  }

  private armDeadline(record: WorkflowRecord, taskId: string): void {
    const task = record.tasks.find((candidate) => candidate.taskId === taskId);
    const agentId = task?.assignedAgent;
    const deadlineAt = task?.deadlineAt;
    if (!task || task.state !== "dispatched" || !agentId || typeof deadlineAt !== "number") {
      return;
    }
    const { workflowId } = record;
    const attempt = task.attempt;
    const key = taskRefKey({ workflowId, taskId });
    this.clearTimer(this.deadlines, key);

    const timer = setTimeout(
      () => {
        this.deadlines.delete(key);
        const error = new DeadlineExceededError(`task ${key}`, deadlineAt);
        this.logger.warn("Dispatch deadline exceeded", { workflowId, taskId, agentId, attempt });
        this.background(
          this.failDispatch(workflowId, taskId, attempt, agentId, error.toInfo()),
          { workflowId, taskId, step: "deadline" }
        );
      },
      Math.max(0, deadlineAt - this.now())
    );
    timer.unref();
    this.deadlines.set(key, timer);
  }

  private scheduleStaffing(workflowId: string, taskId: string, delayMs: number): void {
    const key = taskRefKey({ workflowId, taskId });
    this.clearTimer(this.staffingTimers, key);
    const timer = setTimeout(() => {
      this.staffingTimers.delete(key);
      this.background(this.staffTask(workflowId, taskId), { workflowId, taskId, step: "staff" });
    }, delayMs);
    timer.unref();
    this.staffingTimers.set(key, timer);
  }

  // ==========================================================================
  // Failure handling
  // ==========================================================================

  /** Staffing did not produce a working assignment. */
  private async requeue(
    workflowId: string,
    taskId: string,
    expected: "negotiating" | "dispatched",
    error: TaskErrorInfo,
    attempt?: number
  ): Promise<void> {
    await this.mutate(workflowId, (m) => {
      const task = m.getTask(taskId);
      if (!task || task.state !== expected || (attempt !== undefined && task.attempt !== attempt)) {
        return undefined;
      }
      this.requeueTask(m, task, error);
      return true;
    });
  }

  /**
   * Back to ready on a backoff, avoiding the agent involved, until the
   * staffing ceiling is reached.
   */
  private requeueTask(m: WorkflowMutation, task: TaskRecord, error: TaskErrorInfo): void {
    if (task.assignedAgent && !task.failedAgents.includes(task.assignedAgent)) {
      task.failedAgents.push(task.assignedAgent);
    }
    task.negotiationAttempts += 1;
    if (task.negotiationAttempts >= this.config.noAgentRetryCeiling) {
      m.transition(task, "abandoned", error);
      m.release(task, "reassigned");
      return;
    }
    m.transition(task, "ready", error);
    m.release(task, "reassigned");
    m.staff(task.taskId, computeBackoffDelay(task.negotiationAttempts, this.config.backoff));
  }

  /** The agent reported failure, went silent or missed the deadline. */
  private async failDispatch(
    workflowId: string,
    taskId: string,
    attempt: number,
    agentId: string,
    error: TaskErrorInfo
  ): Promise<void> {
    await this.mutate(workflowId, (m) => {
      const task = m.getTask(taskId);
      if (
        !task ||
        task.state !== "dispatched" ||
        task.attempt !== attempt ||
        task.assignedAgent !== agentId
      ) {
        return undefined;
      }
      this.failTask(m, task, error);
      return true;
    });
  }

  private failTask(m: WorkflowMutation, task: TaskRecord, error: TaskErrorInfo): void {
    if (task.assignedAgent && !task.failedAgents.includes(task.assignedAgent)) {
      task.failedAgents.push(task.assignedAgent);
    }
    m.transition(task, "failed", error);
    m.release(task, "failed");
    task.retryCount += 1;
    if (task.retryCount < task.maxRetries) {
      m.transition(task, "ready");
      m.staff(task.taskId);
      return;
    }
    this.logger.warn("Task abandoned after retries", {
      workflowId: m.record.workflowId,
      taskId: task.taskId,
      retryCount: task.retryCount,
    });
    m.transition(task, "abandoned", error);
  }

  private onAgentLost(agentId: string, tasks: TaskRef[], reason: string): void {
    for (const ref of tasks) {
      const task = this.workflows
        .get(ref.workflowId)
        ?.record.tasks.find((candidate) => candidate.taskId === ref.taskId);
      if (!task || task.state !== "dispatched" || task.assignedAgent !== agentId) {
        continue;
      }
      const error = new RecipientUnavailableError(agentId, reason).toInfo();
      this.background(this.failDispatch(ref.workflowId, ref.taskId, task.attempt, agentId, error), {
        ...ref,
        step: "agent-lost",
      });
    }
  }

  private async resume(workflowId: string): Promise<void> {
    await this.mutate(workflowId, (m) => {
      for (const task of m.record.tasks) {
        switch (task.state) {
          case "ready":
            m.staff(task.taskId);
            break;
          case "negotiating":
            m.transition(task, "ready");
            m.staff(task.taskId);
            break;
          case "failed":
            if (task.retryCount < task.maxRetries) {
              m.transition(task, "ready");
              m.staff(task.taskId);
            } else {
              m.transition(task, "abandoned");
            }
            break;
          case "dispatched": {
            const agentId = task.assignedAgent ?? "unassigned";
            const ref = { workflowId, taskId: task.taskId };
            if (this.negotiator.isAlive(agentId) && this.negotiator.restoreClaim(agentId, ref)) {
              m.rearms.push(task.taskId);
            } else {
              const lost = new RecipientUnavailableError(agentId, "lost on restart");
              this.failTask(m, task, lost.toInfo());
            }
            break;
          }
          default:
            break;
        }
      }
      return true;
    });
  }

  // ==========================================================================
  // Agent replies
  // ==========================================================================

  private async handleReply(message: Message, context: DeliveryContext): Promise<void> {
    const decoded = decodeMessage(message);
    if (!decoded) {
      this.logger.warn("Malformed reply dropped", {
        messageId: message.id,
        type: message.type,
        from: message.from,
      });
      context.ack();
      return;
    }
    if (this.processed.has(message.idempotencyKey)) {
      this.logger.debug("Duplicate reply acknowledged", { key: message.idempotencyKey });
      context.ack();
      return;
    }

    try {
      await this.applyReply(decoded);
    } catch (error) {
      if (!(error instanceof WorkflowNotFoundError)) {
        this.logger.error("Reply not applied, awaiting redelivery", error, {
          messageId: message.id,
          type: message.type,
        });
        return;
      }
      this.logger.debug("Reply for unknown workflow acknowledged", { messageId: message.id });
    }
    this.processed.claim(message.idempotencyKey);
    context.ack();
  }

  private async applyReply(decoded: DecodedMessage): Promise<void> {
    switch (decoded.type) {
      case "accept": {
        const payload = decoded.payload;
        await this.mutate(payload.workflowId, (m) => {
          const task = this.matchDispatch(m, payload);
          if (!task || task.accepted) {
            return undefined;
          }
          task.accepted = true;
          task.updatedAt = m.now;
          return true;
        });
        return;
      }
      case "reject": {
        const payload = decoded.payload;
        await this.mutate(payload.workflowId, (m) => {
          const task = this.matchDispatch(m, payload);
          if (!task) {
            return undefined;
          }
          this.requeueTask(m, task, {
            code: "REJECTED",
            message: `Agent ${payload.agentId} rejected the task: ${payload.reason}`,
          });
          return true;
        });
        return;
      }
      case "result": {
        const payload = decoded.payload;
        await this.mutate(payload.workflowId, (m) => {
          const task = this.matchDispatch(m, payload);
          if (!task) {
            return undefined;
          }
          task.result = payload.output;
          task.error = null;
          m.transition(task, "succeeded");
          m.release(task, "succeeded");
          return true;
        });
        return;
      }
      case "failure": {
        const payload = decoded.payload;
        await this.mutate(payload.workflowId, (m) => {
          const task = this.matchDispatch(m, payload);
          if (!task) {
            return undefined;
          }
          this.failTask(m, task, { code: payload.error.code, message: payload.error.message });
          return true;
        });
        return;
      }
      default:
        this.logger.warn("Unexpected message type on orchestrator endpoint", {
          type: decoded.type,
        });
    }
  }

  /** The task only when the reply answers its current dispatch. */
  private matchDispatch(m: WorkflowMutation, reply: ReplyPayload): TaskRecord | undefined {
    const task = m.getTask(reply.taskId);
    if (
      task?.state === "dispatched" &&
      task.attempt === reply.attempt &&
      task.assignedAgent === reply.agentId
    ) {
      return task;
    }
    this.logger.debug("Stale reply ignored", {
      workflowId: m.record.workflowId,
      taskId: reply.taskId,
      attempt: reply.attempt,
      agentId: reply.agentId,
      state: task?.state,
    });
    return undefined;
  }

  // ==========================================================================
  // Checkpointing
  // ==========================================================================

  /**
   * Apply a change to a draft of the workflow, checkpoint it and act on it.
   * `apply` returns undefined to leave the workflow untouched. On a version
   * conflict the workflow is re-read and `apply` runs again.
   */
  private async mutate<T>(
    workflowId: string,
    apply: (mutation: WorkflowMutation) => T | undefined
  ): Promise<T | undefined> {
    return this.locks.runExclusive(workflowId, async () => {
      const outcome = await retry(
        async (attempt): Promise<MutationResult<T>> => {
          const runtime =
            attempt === 1 ? this.requireRuntime(workflowId) : await this.reload(workflowId);
          const mutation = new WorkflowMutation(structuredClone(runtime.record), this.now());
          const value = apply(mutation);
          if (value === undefined) {
            return { value };
          }
          mutation.finalize();
          runtime.version = await this.store.save(mutation.record, runtime.version);
          runtime.record = mutation.record;
          return { value, mutation };
        },
        {
          maxAttempts: this.config.checkpointConflictRetries,
          backoff: CONFLICT_BACKOFF,
          isRetryable: (error) => error instanceof VersionConflictError,
          onRetry: (attempt) =>
            this.logger.warn("Checkpoint conflict, re-reading workflow", { workflowId, attempt }),
        }
      );
      if (!outcome.success || !outcome.result) {
        throw outcome.error;
      }
      if (outcome.result.mutation) {
        this.applyEffects(outcome.result.mutation);
      }
      return outcome.result.value;
    });
  }

  private applyEffects(mutation: WorkflowMutation): void {
    const { workflowId } = mutation.record;
    const meta = { source: "orchestrator", correlationId: workflowId };

    for (const transition of mutation.transitions) {
      const key = taskRefKey({ workflowId, taskId: transition.taskId });
      if (transition.from === "dispatched") {
        this.clearTimer(this.deadlines, key);
      }
      if (isTerminalTaskState(transition.to)) {
        this.clearTimer(this.staffingTimers, key);
      }
      this.logger.debug("Task transition", { workflowId, ...transition });
      this.events.emit({ type: "task:transition", payload: { workflowId, ...transition } }, meta);
    }
    for (const release of mutation.releases) {
      this.negotiator.release(
        release.agentId,
        { workflowId, taskId: release.taskId },
        release.outcome
      );
    }
    for (const taskId of mutation.dispatches) {
      this.sendDispatch(mutation.record, taskId);
    }
    for (const taskId of mutation.rearms) {
      this.armDeadline(mutation.record, taskId);
    }
    for (const request of mutation.staffing) {
      this.scheduleStaffing(workflowId, request.taskId, request.delayMs);
    }
    if (mutation.settled) {
      this.logger.info("Workflow settled", { workflowId, state: mutation.record.state });
      this.events.emit(
        { type: "workflow:settled", payload: { workflowId, state: mutation.record.state } },
        meta
      );
    }
  }

  private async reload(workflowId: string): Promise<WorkflowRuntime> {
    const runtime = this.requireRuntime(workflowId);
    const loaded = await this.store.load(workflowId);
    if (!loaded) {
      throw new WorkflowNotFoundError(workflowId);
    }
    runtime.record = loaded.record;
    runtime.version = loaded.version;
    return runtime;
  }

  private requireRuntime(workflowId: string): WorkflowRuntime {
    const runtime = this.workflows.get(workflowId);
    if (!runtime) {
      throw new WorkflowNotFoundError(workflowId);
    }
    return runtime;
  }

  private clearTimer(timers: Map<string, ReturnType<typeof setTimeout>>, key: string): void {
    const timer = timers.get(key);
    if (timer) {
      clearTimeout(timer);
      timers.delete(key);
    }
  }

  private background(task: Promise<void>, context: Record<string, unknown>): void {
    void task.catch((error: unknown) => {
      this.logger.error("Background orchestration step failed", error, context);
    });
  }
}

// ============================================================================
// Helpers
// ============================================================================

/** Defaults plus overrides; the environment is read by the engine, not here. */
function resolveOrchestratorConfig(
  overrides: ConclaveConfigOverrides["orchestrator"]
): OrchestratorConfig {
  return resolveConclaveConfig({ orchestrator: overrides }, {}).orchestrator;
}

function duplicateWorkflow(workflowId: string): InvalidGraphError {
  return new InvalidGraphError(`Workflow ${workflowId} already exists`, {
    issues: [`duplicate workflow id "${workflowId}"`],
  });
}

/** Outputs of the succeeded upstream tasks, keyed by taskId. */
function collectDependencyResults(
  record: WorkflowRecord,
  task: TaskRecord
): Record<string, JsonValue> {
  const results: Record<string, JsonValue> = {};
  for (const upstream of record.tasks) {
    if (
      task.dependsOn.includes(upstream.taskId) &&
      upstream.state === "succeeded" &&
      upstream.result !== undefined
    ) {
      results[upstream.taskId] = upstream.result;
    }
  }
  return results;
}

function toTaskStatus(task: TaskRecord): TaskStatus {
  return {
    taskId: task.taskId,
    requiredCapability: task.capability,
    state: task.state,
    dependsOn: [...task.dependsOn],
    retryCount: task.retryCount,
    attempt: task.attempt,
    assignedAgent: task.assignedAgent ?? undefined,
    failedAgents: [...task.failedAgents],
    result: task.state === "succeeded" ? task.result : undefined,
    error: task.error ?? undefined,
    settledAt: task.settledAt ?? undefined,
  };
}

export function toWorkflowStatus(record: WorkflowRecord): WorkflowStatus {
  return {
    workflowId: record.workflowId,
    name: record.name ?? undefined,
    metadata: record.metadata ?? undefined,
    state: record.state,
    progress: workflowProgress(record),
    tasks: record.tasks.map(toTaskStatus),
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
    completedAt: record.completedAt ?? undefined,
  };
}

export function createOrchestrator(options: OrchestratorOptions): Orchestrator {
  return new Orchestrator(options);
}
