/**
 * Engine Event Bus
 *
 * In-process lifecycle notifications between engine components (registry
 * liveness, workflow progress, dead letters). Not a delivery channel: agents
 * talk over the communication bus.
 */

import { getLogger } from "./logger";
import type { AssignmentOutcome, TaskErrorInfo, TaskRef, TaskState, WorkflowState } from "./types";

const logger = getLogger("event-bus");

// ============================================================================
// Event Map
// ============================================================================

export interface EngineEventMap {
  "workflow:submitted": { workflowId: string; taskCount: number };
  "workflow:settled": { workflowId: string; state: WorkflowState };
  "workflow:cancelled": { workflowId: string; abandonedTasks: string[] };
  "workflow:archived": { workflowId: string };
  "task:transition": {
    workflowId: string;
    taskId: string;
    from: TaskState;
    to: TaskState;
    attempt: number;
    agentId?: string;
    error?: TaskErrorInfo;
  };
  "agent:registered": { agentId: string; capabilities: string[] };
  "agent:deregistered": { agentId: string; tasks: TaskRef[] };
  "agent:unreachable": { agentId: string; tasks: TaskRef[] };
  "agent:restored": { agentId: string };
  "agent:released": { agentId: string; task: TaskRef; outcome: AssignmentOutcome };
  "bus:dead-letter": { messageId: string; to: string; type: string; reason: string };
}

export type EngineEventType = keyof EngineEventMap;

export interface EventMeta {
  id: string;
  timestamp: number;
  source?: string;
  correlationId?: string;
}

export type EngineEventInput = {
  [K in EngineEventType]: { type: K; payload: EngineEventMap[K] };
}[EngineEventType];

export type EngineEvent = EngineEventInput & { meta: EventMeta };

export type EngineEventOf<K extends EngineEventType> = Extract<EngineEvent, { type: K }>;

export type EventHandler<E = EngineEvent> = (event: E) => void | Promise<void>;

export interface SubscriptionOptions {
  once?: boolean;
  filter?: (event: EngineEvent) => boolean;
}

export interface Subscription {
  id: string;
  pattern: string;
  unsubscribe: () => void;
}

export interface EventBusConfig {
  /** Maximum number of events kept for inspection */
  maxHistorySize?: number;
  now?: () => number;
}

export interface EventBusStats {
  totalEmitted: number;
  totalHandled: number;
  activeSubscriptions: number;
  historySize: number;
}

interface SubscriptionRecord {
  id: string;
  pattern: string;
  handler: EventHandler;
  once: boolean;
  filter?: (event: EngineEvent) => boolean;
}

function isEventOf<K extends EngineEventType>(
  event: EngineEvent,
  type: K
): event is EngineEventOf<K> {
  return event.type === type;
}

// ============================================================================
// Event Bus Implementation
// ============================================================================

/**
 * Typed event bus with wildcard subscriptions.
 *
 * Patterns support:
 * - Exact match: "agent:unreachable"
 * - Wildcard suffix: "agent:*"
 * - Full wildcard: "*"
 */
export class EventBus {
  private readonly subscriptions = new Map<string, SubscriptionRecord[]>();
  private readonly history: EngineEvent[] = [];
  private readonly maxHistorySize: number;
  private readonly now: () => number;

  private subscriptionIdCounter = 0;
  private eventIdCounter = 0;
  private totalEmitted = 0;
  private totalHandled = 0;

  constructor(config: EventBusConfig = {}) {
    this.maxHistorySize = config.maxHistorySize ?? 1000;
    this.now = config.now ?? Date.now;
  }

  emit(
    input: EngineEventInput,
    options: Partial<Pick<EventMeta, "source" | "correlationId">> = {}
  ): EngineEvent {
    const event: EngineEvent = {
      ...input,
      meta: {
        id: `evt_${++this.eventIdCounter}`,
        timestamp: this.now(),
        source: options.source,
        correlationId: options.correlationId,
      },
    };
    this.processEvent(event);
    return event;
  }

  /**
   * Subscribe to one event type with a narrowed payload.
   */
  on<K extends EngineEventType>(
    type: K,
    handler: EventHandler<EngineEventOf<K>>,
    options: SubscriptionOptions = {}
  ): Subscription {
    return this.subscribe(
      type,
      (event) => (isEventOf(event, type) ? handler(event) : undefined),
      options
    );
  }

  subscribe(
    pattern: string,
    handler: EventHandler,
    options: SubscriptionOptions = {}
  ): Subscription {
    const id = `sub_${++this.subscriptionIdCounter}`;
    const record: SubscriptionRecord = {
      id,
      pattern,
      handler,
      once: options.once ?? false,
      filter: options.filter,
    };

    const existing = this.subscriptions.get(pattern) ?? [];
    existing.push(record);
    this.subscriptions.set(pattern, existing);

    return {
      id,
      pattern,
      unsubscribe: () => this.unsubscribe(pattern, id),
    };
  }

  /**
   * Wait for an event to occur.
   */
  waitFor<K extends EngineEventType>(
    type: K,
    options: { timeoutMs?: number; filter?: (event: EngineEventOf<K>) => boolean } = {}
  ): Promise<EngineEventOf<K>> {
    return new Promise((resolve, reject) => {
      const timeoutMs = options.timeoutMs ?? 30_000;

      const subscription = this.on(type, (event) => {
        if (options.filter && !options.filter(event)) {
          return;
        }
        clearTimeout(timeout);
        subscription.unsubscribe();
        resolve(event);
      });

      const timeout = setTimeout(() => {
        subscription.unsubscribe();
        reject(new Error(`Timeout waiting for event: ${type}`));
      }, timeoutMs);
    });
  }

  getHistory(pattern?: string, limit?: number): EngineEvent[] {
    let events = this.history;
    if (pattern) {
      events = events.filter((e) => matchesPattern(e.type, pattern));
    }
    if (limit) {
      events = events.slice(-limit);
    }
    return [...events];
  }

  getStats(): EventBusStats {
    let activeSubscriptions = 0;
    for (const subs of this.subscriptions.values()) {
      activeSubscriptions += subs.length;
    }

    return {
      totalEmitted: this.totalEmitted,
      totalHandled: this.totalHandled,
      activeSubscriptions,
      historySize: this.history.length,
    };
  }

  dispose(): void {
    this.subscriptions.clear();
    this.history.length = 0;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private processEvent(event: EngineEvent): void {
    this.totalEmitted++;

    this.history.push(event);
    if (this.history.length > this.maxHistorySize) {
      this.history.shift();
    }

    const handlers: SubscriptionRecord[] = [];
    for (const [pattern, records] of this.subscriptions) {
      if (!matchesPattern(event.type, pattern)) {
        continue;
      }
      for (const record of records) {
        if (record.filter && !record.filter(event)) {
          continue;
        }
        handlers.push(record);
      }
    }

    for (const record of handlers) {
      this.executeHandler(record, event);
    }
  }

  private executeHandler(record: SubscriptionRecord, event: EngineEvent): void {
    this.totalHandled++;

    if (record.once) {
      this.unsubscribe(record.pattern, record.id);
    }

    try {
      const result = record.handler(event);
      if (result instanceof Promise) {
        result.catch((error: unknown) => {
          logger.error(`Handler error for ${event.type}`, error, { pattern: record.pattern });
        });
      }
    } catch (error) {
      logger.error(`Handler error for ${event.type}`, error, { pattern: record.pattern });
    }
  }

  private unsubscribe(pattern: string, id: string): void {
    const records = this.subscriptions.get(pattern);
    if (!records) {
      return;
    }

    const index = records.findIndex((r) => r.id === id);
    if (index !== -1) {
      records.splice(index, 1);
      if (records.length === 0) {
        this.subscriptions.delete(pattern);
      }
    }
  }
}

function matchesPattern(eventType: string, pattern: string): boolean {
  if (pattern === "*") {
    return true;
  }
  if (pattern.endsWith(":*")) {
    return eventType.startsWith(pattern.slice(0, -1));
  }
  return eventType === pattern;
}

// ============================================================================
// Factory
// ============================================================================

export function createEventBus(config?: EventBusConfig): EventBus {
  return new EventBus(config);
}
