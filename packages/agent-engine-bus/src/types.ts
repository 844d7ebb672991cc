import type { JsonValue } from "@conclave/agent-engine-core";

// ============================================================================
// Messages
// ============================================================================

export const MESSAGE_TYPES = [
  "dispatch",
  "accept",
  "reject",
  "result",
  "failure",
  "heartbeat",
  "bid",
  "bid-request",
] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

export interface Message {
  id: string;
  from: string;
  /** Recipient endpoint; for topic messages, the subscriber it was fanned out to */
  to: string;
  topic?: string;
  type: MessageType;
  /** Per sender→recipient sequence number, starting at 1 */
  seq: number;
  payload: JsonValue;
  /** Stable across redeliveries; recipients dedupe on it */
  idempotencyKey: string;
  correlationId?: string;
  timestamp: number;
}

export interface SendInput {
  from: string;
  to: string;
  type: MessageType;
  payload: JsonValue;
  idempotencyKey?: string;
  correlationId?: string;
}

export interface PublishInput {
  from: string;
  topic: string;
  type: MessageType;
  payload: JsonValue;
  idempotencyKey?: string;
  correlationId?: string;
}

export interface DeliveryReceipt {
  deliveryId: string;
  messageId: string;
  recipient: string;
  seq: number;
}

/** Passed to handlers alongside each delivered message. */
export interface DeliveryContext {
  receipt: DeliveryReceipt;
  /** 1 on first delivery, incremented on each redelivery */
  attempt: number;
  ack(): boolean;
}

export type MessageHandler = (message: Message, context: DeliveryContext) => void | Promise<void>;

export interface SubscribeOptions {
  /** Point-to-point messages go to the first subscription whose predicate accepts them */
  predicate?: (message: Message) => boolean;
  /** Topics this subscription receives broadcasts for */
  topics?: string[];
}

export interface BusSubscription {
  id: string;
  endpoint: string;
  unsubscribe(): void;
}

// ============================================================================
// Dead letters
// ============================================================================

export type DeadLetterReason = "max_attempts" | "recipient_unavailable" | "disposed";

export interface DeadLetter {
  deliveryId: string;
  message: Message;
  recipient: string;
  attempts: number;
  reason: DeadLetterReason;
  deadLetteredAt: number;
}

export type DeadLetterHandler = (letter: DeadLetter) => void;

export interface CommunicationBusStats {
  sent: number;
  delivered: number;
  redelivered: number;
  acked: number;
  deadLettered: number;
  pending: number;
  activeSubscriptions: number;
  /** Known endpoints, subscribed or within their liveness window */
  endpoints: number;
  /** Sender-recipient channels currently tracked */
  channels: number;
}
