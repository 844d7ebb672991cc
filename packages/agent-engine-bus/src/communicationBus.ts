/**
 * Communication Bus
 *
 * At-least-once, per-pair ordered messaging between agents and the engine.
 *
 * Every (sender, recipient) pair owns a channel with its own sequence counter.
 * A channel hands out only its head delivery; the next one waits until the head
 * is acknowledged or dead-lettered, so a recipient never observes a lower seq
 * after a higher one from the same sender. Unacknowledged deliveries are
 * redelivered after `ackTimeoutMs` until `maxDeliveryAttempts`, then
 * dead-lettered. Deduplication is the recipient's job (see IdempotencyGuard).
 */

import { randomUUID } from "node:crypto";
import {
  type BusConfig,
  type Clock,
  DEFAULT_CONCLAVE_CONFIG,
  type EventBus,
  type IdFactory,
  RecipientUnavailableError,
  type RuntimeLogger,
  getLogger,
} from "@conclave/agent-engine-core";
import { InboundStream } from "./inboundStream";
import type {
  BusSubscription,
  CommunicationBusStats,
  DeadLetter,
  DeadLetterHandler,
  DeadLetterReason,
  DeliveryContext,
  DeliveryReceipt,
  Message,
  MessageHandler,
  PublishInput,
  SendInput,
  SubscribeOptions,
} from "./types";

// ============================================================================
// Types
// ============================================================================

export interface CommunicationBusOptions extends Partial<BusConfig> {
  now?: Clock;
  idFactory?: IdFactory;
  logger?: RuntimeLogger;
  /** Receives bus:dead-letter notifications */
  events?: EventBus;
  /** Capacity of the dead-letter list kept for inspection */
  maxDeadLetters?: number;
}

interface SubscriptionRecord {
  id: string;
  endpoint: string;
  handler: MessageHandler;
  predicate?: (message: Message) => boolean;
  topics: Set<string>;
}

interface EndpointState {
  subscriptions: SubscriptionRecord[];
  /** When the last subscription went away; undefined while subscribed */
  vacantSince?: number;
  unreachable: boolean;
}

interface PendingDelivery {
  id: string;
  message: Message;
  recipient: string;
  attempts: number;
  timer?: ReturnType<typeof setTimeout>;
}

interface Channel {
  recipient: string;
  nextSeq: number;
  queue: PendingDelivery[];
  inFlight: boolean;
}

// ============================================================================
// CommunicationBus
// ============================================================================

export class CommunicationBus {
  private readonly config: BusConfig;
  private readonly now: Clock;
  private readonly idFactory: IdFactory;
  private readonly logger: RuntimeLogger;
  private readonly events?: EventBus;
  private readonly maxDeadLetters: number;

  private readonly endpoints = new Map<string, EndpointState>();
  /** recipient -> sender -> channel */
  private readonly channels = new Map<string, Map<string, Channel>>();
  private readonly deliveries = new Map<string, { channel: Channel; delivery: PendingDelivery }>();
  private readonly deadLetters: DeadLetter[] = [];
  private readonly deadLetterHandlers = new Set<DeadLetterHandler>();

  private subscriptionCounter = 0;
  private deliveryCounter = 0;
  private disposed = false;
  private stats = { sent: 0, delivered: 0, redelivered: 0, acked: 0, deadLettered: 0 };

  constructor(options: CommunicationBusOptions = {}) {
    const defaults = DEFAULT_CONCLAVE_CONFIG.bus;
    this.config = {
      ackTimeoutMs: options.ackTimeoutMs ?? defaults.ackTimeoutMs,
      maxDeliveryAttempts: options.maxDeliveryAttempts ?? defaults.maxDeliveryAttempts,
      livenessWindowMs: options.livenessWindowMs ?? defaults.livenessWindowMs,
    };
    this.now = options.now ?? Date.now;
    this.idFactory = options.idFactory ?? randomUUID;
    this.logger = options.logger ?? getLogger("communication-bus");
    this.events = options.events;
    this.maxDeadLetters = options.maxDeadLetters ?? 1000;
  }

  // ==========================================================================
  // Sending
  // ==========================================================================

  /**
   * Queue a point-to-point message.
   *
   * @throws RecipientUnavailableError when the recipient is marked unreachable,
   * was never subscribed, or has had no subscription for longer than the
   * liveness window
   */
  send(input: SendInput): DeliveryReceipt {
    this.assertOpen();
    this.assertAvailable(input.to);

    const id = this.idFactory();
    const channel = this.getChannel(input.from, input.to);
    const message: Message = {
      id,
      from: input.from,
      to: input.to,
      type: input.type,
      seq: channel.nextSeq++,
      payload: input.payload,
      idempotencyKey: input.idempotencyKey ?? id,
      correlationId: input.correlationId,
      timestamp: this.now(),
    };
    this.stats.sent++;
    return this.enqueue(channel, message);
  }

  /**
   * Fan a message out to every reachable endpoint subscribed to the topic,
   * one tracked delivery per endpoint.
   */
  publish(input: PublishInput): DeliveryReceipt[] {
    this.assertOpen();
    const id = this.idFactory();
    const receipts: DeliveryReceipt[] = [];

    for (const [endpoint, state] of this.endpoints) {
      if (endpoint === input.from || state.unreachable) {
        continue;
      }
      if (!state.subscriptions.some((sub) => sub.topics.has(input.topic))) {
        continue;
      }
      const channel = this.getChannel(input.from, endpoint);
      const message: Message = {
        id,
        from: input.from,
        to: endpoint,
        topic: input.topic,
        type: input.type,
        seq: channel.nextSeq++,
        payload: input.payload,
        idempotencyKey: input.idempotencyKey ?? id,
        correlationId: input.correlationId,
        timestamp: this.now(),
      };
      receipts.push(this.enqueue(channel, message));
    }

    this.stats.sent++;
    return receipts;
  }

  /**
   * Acknowledge a delivery. Returns false for unknown or already settled
   * deliveries.
   */
  ack(receipt: DeliveryReceipt | string): boolean {
    const deliveryId = typeof receipt === "string" ? receipt : receipt.deliveryId;
    const tracked = this.deliveries.get(deliveryId);
    if (!tracked) {
      return false;
    }
    const { channel, delivery } = tracked;
    if (delivery.timer) {
      clearTimeout(delivery.timer);
      delivery.timer = undefined;
    }
    this.deliveries.delete(deliveryId);
    this.stats.acked++;

    const index = channel.queue.indexOf(delivery);
    if (index > 0) {
      // Acked before it reached the head: nothing to deliver any more.
      channel.queue.splice(index, 1);
      return true;
    }
    if (index === 0) {
      channel.queue.shift();
      channel.inFlight = false;
      this.pump(channel);
    }
    return true;
  }

  // ==========================================================================
  // Receiving
  // ==========================================================================

  subscribe(
    endpoint: string,
    handler: MessageHandler,
    options: SubscribeOptions = {}
  ): BusSubscription {
    this.assertOpen();
    this.pruneVacant();
    const record: SubscriptionRecord = {
      id: `sub-${++this.subscriptionCounter}`,
      endpoint,
      handler,
      predicate: options.predicate,
      topics: new Set(options.topics ?? []),
    };

    const state = this.getEndpoint(endpoint);
    state.subscriptions.push(record);
    state.vacantSince = undefined;

    return {
      id: record.id,
      endpoint,
      unsubscribe: () => this.unsubscribe(endpoint, record.id),
    };
  }

  /**
   * Async-iterable subscription; items are acknowledged by the consumer.
   */
  stream(endpoint: string, options?: SubscribeOptions): InboundStream {
    return new InboundStream(this, endpoint, options);
  }

  // ==========================================================================
  // Reachability
  // ==========================================================================

  /**
   * Refuse further sends to the endpoint and dead-letter everything queued
   * for it.
   */
  markUnreachable(endpoint: string): number {
    const state = this.getEndpoint(endpoint);
    state.unreachable = true;

    let dropped = 0;
    for (const channel of this.channels.get(endpoint)?.values() ?? []) {
      dropped += this.drainChannel(channel, "recipient_unavailable");
    }

    this.logger.warn("Endpoint marked unreachable", { endpoint, dropped });
    return dropped;
  }

  markReachable(endpoint: string): void {
    const state = this.endpoints.get(endpoint);
    if (state?.unreachable) {
      state.unreachable = false;
      this.logger.info("Endpoint reachable again", { endpoint });
    }
  }

  isReachable(endpoint: string): boolean {
    return this.availability(endpoint) === undefined;
  }

  // ==========================================================================
  // Dead letters & stats
  // ==========================================================================

  onDeadLetter(handler: DeadLetterHandler): () => void {
    this.deadLetterHandlers.add(handler);
    return () => {
      this.deadLetterHandlers.delete(handler);
    };
  }

  listDeadLetters(): DeadLetter[] {
    return [...this.deadLetters];
  }

  getStats(): CommunicationBusStats {
    let activeSubscriptions = 0;
    for (const state of this.endpoints.values()) {
      activeSubscriptions += state.subscriptions.length;
    }
    let channels = 0;
    for (const inbound of this.channels.values()) {
      channels += inbound.size;
    }
    return {
      ...this.stats,
      pending: this.deliveries.size,
      activeSubscriptions,
      endpoints: this.endpoints.size,
      channels,
    };
  }

  /**
   * Stop all timers and drop queued deliveries.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    for (const inbound of this.channels.values()) {
      for (const channel of inbound.values()) {
        this.drainChannel(channel, "disposed");
      }
    }
    this.disposed = true;
    this.channels.clear();
    this.endpoints.clear();
    this.deadLetterHandlers.clear();
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private enqueue(channel: Channel, message: Message): DeliveryReceipt {
    const delivery: PendingDelivery = {
      id: `dlv-${++this.deliveryCounter}`,
      message,
      recipient: channel.recipient,
      attempts: 0,
    };
    channel.queue.push(delivery);
    this.deliveries.set(delivery.id, { channel, delivery });
    this.pump(channel);
    return this.receiptFor(delivery);
  }

  private pump(channel: Channel): void {
    if (this.disposed || channel.inFlight) {
      return;
    }
    const head = channel.queue[0];
    if (!head) {
      return;
    }
    if (head.attempts >= this.config.maxDeliveryAttempts) {
      channel.queue.shift();
      this.deadLetter(head, "max_attempts");
      this.pump(channel);
      return;
    }

    head.attempts++;
    if (head.attempts > 1) {
      this.stats.redelivered++;
      this.logger.warn("Redelivering message", {
        messageId: head.message.id,
        recipient: head.recipient,
        type: head.message.type,
        attempt: head.attempts,
      });
    }
    channel.inFlight = true;
    head.timer = setTimeout(() => this.onAckTimeout(channel, head), this.config.ackTimeoutMs);
    head.timer.unref();

    const subscription = this.route(head.message);
    if (!subscription) {
      return;
    }
    const attempt = head.attempts;
    queueMicrotask(() => this.invoke(subscription, head, attempt));
  }

  private invoke(
    subscription: SubscriptionRecord,
    delivery: PendingDelivery,
    attempt: number
  ): void {
    if (!this.deliveries.has(delivery.id)) {
      return;
    }
    this.stats.delivered++;
    const context: DeliveryContext = {
      receipt: this.receiptFor(delivery),
      attempt,
      ack: () => this.ack(delivery.id),
    };

    try {
      const result = subscription.handler(delivery.message, context);
      if (result instanceof Promise) {
        result.catch((error: unknown) => this.onHandlerError(delivery, error));
      }
    } catch (error) {
      this.onHandlerError(delivery, error);
    }
  }

  private onHandlerError(delivery: PendingDelivery, error: unknown): void {
    this.logger.error("Message handler failed; delivery stays unacknowledged", error, {
      messageId: delivery.message.id,
      recipient: delivery.recipient,
      type: delivery.message.type,
    });
  }

  private onAckTimeout(channel: Channel, delivery: PendingDelivery): void {
    if (channel.queue[0] !== delivery || !this.deliveries.has(delivery.id)) {
      return;
    }
    delivery.timer = undefined;
    channel.inFlight = false;
    this.pump(channel);
  }

  private route(message: Message): SubscriptionRecord | undefined {
    const state = this.endpoints.get(message.to);
    if (!state) {
      return undefined;
    }
    if (message.topic !== undefined) {
      const topic = message.topic;
      return state.subscriptions.find((sub) => sub.topics.has(topic));
    }
    return state.subscriptions.find((sub) => !sub.predicate || sub.predicate(message));
  }

  private drainChannel(channel: Channel, reason: DeadLetterReason): number {
    const drained = channel.queue.splice(0, channel.queue.length);
    channel.inFlight = false;
    for (const delivery of drained) {
      this.deadLetter(delivery, reason);
    }
    return drained.length;
  }

  private deadLetter(delivery: PendingDelivery, reason: DeadLetterReason): void {
    if (delivery.timer) {
      clearTimeout(delivery.timer);
      delivery.timer = undefined;
    }
    this.deliveries.delete(delivery.id);
    this.stats.deadLettered++;

    const letter: DeadLetter = {
      deliveryId: delivery.id,
      message: delivery.message,
      recipient: delivery.recipient,
      attempts: delivery.attempts,
      reason,
      deadLetteredAt: this.now(),
    };
    this.deadLetters.push(letter);
    if (this.deadLetters.length > this.maxDeadLetters) {
      this.deadLetters.shift();
    }

    if (reason !== "disposed") {
      this.logger.warn("Message dead-lettered", {
        messageId: delivery.message.id,
        recipient: delivery.recipient,
        type: delivery.message.type,
        attempts: delivery.attempts,
        reason,
      });
    }
    this.events?.emit(
      {
        type: "bus:dead-letter",
        payload: {
          messageId: delivery.message.id,
          to: delivery.recipient,
          type: delivery.message.type,
          reason,
        },
      },
      { source: "communication-bus" }
    );
    for (const handler of this.deadLetterHandlers) {
      try {
        handler(letter);
      } catch (error) {
        this.logger.error("Dead-letter handler failed", error);
      }
    }
  }

  private assertAvailable(endpoint: string): void {
    const reason = this.availability(endpoint);
    if (reason) {
      throw new RecipientUnavailableError(endpoint, reason);
    }
  }

  /** Why the endpoint cannot take sends, or undefined when it can. */
  private availability(endpoint: string): string | undefined {
    const state = this.endpoints.get(endpoint);
    if (!state) {
      return "unknown endpoint";
    }
    if (state.unreachable) {
      return "unreachable";
    }
    if (state.subscriptions.length > 0) {
      return undefined;
    }
    if (state.vacantSince === undefined) {
      return "unknown endpoint";
    }
    return this.now() - state.vacantSince > this.config.livenessWindowMs
      ? "no subscriber"
      : undefined;
  }

  private unsubscribe(endpoint: string, subscriptionId: string): void {
    const state = this.endpoints.get(endpoint);
    if (!state) {
      return;
    }
    const index = state.subscriptions.findIndex((sub) => sub.id === subscriptionId);
    if (index === -1) {
      return;
    }
    state.subscriptions.splice(index, 1);
    if (state.subscriptions.length === 0) {
      state.vacantSince = this.now();
    }
    this.pruneVacant();
  }

  /**
   * Forget endpoints vacant for longer than the liveness window, together
   * with their drained channels in either direction. A returning endpoint
   * starts over with fresh channels.
   */
  private pruneVacant(): void {
    const now = this.now();
    for (const [endpoint, state] of this.endpoints) {
      if (
        state.unreachable ||
        state.vacantSince === undefined ||
        now - state.vacantSince <= this.config.livenessWindowMs
      ) {
        continue;
      }
      const inbound = this.channels.get(endpoint);
      if (inbound && [...inbound.values()].some((channel) => !isDrained(channel))) {
        continue;
      }
      this.endpoints.delete(endpoint);
      this.channels.delete(endpoint);
      for (const [recipient, senders] of this.channels) {
        const outbound = senders.get(endpoint);
        if (outbound && isDrained(outbound)) {
          senders.delete(endpoint);
          if (senders.size === 0) {
            this.channels.delete(recipient);
          }
        }
      }
      this.logger.debug("Vacant endpoint forgotten", { endpoint });
    }
  }

  private getEndpoint(endpoint: string): EndpointState {
    let state = this.endpoints.get(endpoint);
    if (!state) {
      state = { subscriptions: [], unreachable: false };
      this.endpoints.set(endpoint, state);
    }
    return state;
  }

  private getChannel(from: string, to: string): Channel {
    let inbound = this.channels.get(to);
    if (!inbound) {
      inbound = new Map();
      this.channels.set(to, inbound);
    }
    let channel = inbound.get(from);
    if (!channel) {
      channel = { recipient: to, nextSeq: 1, queue: [], inFlight: false };
      inbound.set(from, channel);
    }
    return channel;
  }

  private receiptFor(delivery: PendingDelivery): DeliveryReceipt {
    return {
      deliveryId: delivery.id,
      messageId: delivery.message.id,
      recipient: delivery.recipient,
      seq: delivery.message.seq,
    };
  }

  private assertOpen(): void {
    if (this.disposed) {
      throw new Error("Communication bus disposed");
    }
  }
}

function isDrained(channel: Channel): boolean {
  return channel.queue.length === 0 && !channel.inFlight;
}

// ============================================================================
// Factory
// ============================================================================

export function createCommunicationBus(options?: CommunicationBusOptions): CommunicationBus {
  return new CommunicationBus(options);
}
