/**
 * Wire payloads for each message type, validated on receipt.
 */

import type { JsonValue } from "@conclave/agent-engine-core";
import { z } from "zod";
import type { Message } from "./types";

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ])
);

const taskAttemptShape = {
  workflowId: z.string().min(1),
  taskId: z.string().min(1),
  attempt: z.number().int().positive(),
};

export const dispatchPayloadSchema = z.object({
  ...taskAttemptShape,
  capability: z.string().min(1),
  input: jsonValueSchema,
  deadlineAt: z.number(),
  /** Results of the upstream tasks, keyed by taskId */
  dependencies: z.record(z.string(), jsonValueSchema).default({}),
});

export const acceptPayloadSchema = z.object({
  ...taskAttemptShape,
  agentId: z.string().min(1),
});

export const rejectPayloadSchema = z.object({
  ...taskAttemptShape,
  agentId: z.string().min(1),
  reason: z.string(),
});

export const resultPayloadSchema = z.object({
  ...taskAttemptShape,
  agentId: z.string().min(1),
  output: jsonValueSchema,
});

export const failurePayloadSchema = z.object({
  ...taskAttemptShape,
  agentId: z.string().min(1),
  error: z.object({ code: z.string(), message: z.string() }),
});

export const heartbeatPayloadSchema = z.object({
  agentId: z.string().min(1),
  timestamp: z.number(),
});

export const bidRequestPayloadSchema = z.object({
  roundId: z.string().min(1),
  capability: z.string().min(1),
  workflowId: z.string(),
  taskId: z.string(),
  input: jsonValueSchema,
  deadlineAt: z.number(),
});

export const bidPayloadSchema = z.object({
  roundId: z.string().min(1),
  agentId: z.string().min(1),
  capability: z.string().min(1),
  cost: z.number(),
  quality: z.number(),
  decline: z.boolean(),
});

export type DispatchPayload = z.infer<typeof dispatchPayloadSchema>;
export type AcceptPayload = z.infer<typeof acceptPayloadSchema>;
export type RejectPayload = z.infer<typeof rejectPayloadSchema>;
export type ResultPayload = z.infer<typeof resultPayloadSchema>;
export type FailurePayload = z.infer<typeof failurePayloadSchema>;
export type HeartbeatPayload = z.infer<typeof heartbeatPayloadSchema>;
export type BidRequestPayload = z.infer<typeof bidRequestPayloadSchema>;
export type BidPayload = z.infer<typeof bidPayloadSchema>;

export type DecodedMessage =
  | { type: "dispatch"; payload: DispatchPayload; message: Message }
  | { type: "accept"; payload: AcceptPayload; message: Message }
  | { type: "reject"; payload: RejectPayload; message: Message }
  | { type: "result"; payload: ResultPayload; message: Message }
  | { type: "failure"; payload: FailurePayload; message: Message }
  | { type: "heartbeat"; payload: HeartbeatPayload; message: Message }
  | { type: "bid-request"; payload: BidRequestPayload; message: Message }
  | { type: "bid"; payload: BidPayload; message: Message };

/**
 * Validate a message payload against its type's schema.
 * Returns undefined for payloads that do not match.
 */
export function decodeMessage(message: Message): DecodedMessage | undefined {
  switch (message.type) {
    case "dispatch": {
      const parsed = dispatchPayloadSchema.safeParse(message.payload);
      return parsed.success ? { type: "dispatch", payload: parsed.data, message } : undefined;
    }
    case "accept": {
      const parsed = acceptPayloadSchema.safeParse(message.payload);
      return parsed.success ? { type: "accept", payload: parsed.data, message } : undefined;
    }
    case "reject": {
      const parsed = rejectPayloadSchema.safeParse(message.payload);
      return parsed.success ? { type: "reject", payload: parsed.data, message } : undefined;
    }
    case "result": {
      const parsed = resultPayloadSchema.safeParse(message.payload);
      return parsed.success ? { type: "result", payload: parsed.data, message } : undefined;
    }
    case "failure": {
      const parsed = failurePayloadSchema.safeParse(message.payload);
      return parsed.success ? { type: "failure", payload: parsed.data, message } : undefined;
    }
    case "heartbeat": {
      const parsed = heartbeatPayloadSchema.safeParse(message.payload);
      return parsed.success ? { type: "heartbeat", payload: parsed.data, message } : undefined;
    }
    case "bid-request": {
      const parsed = bidRequestPayloadSchema.safeParse(message.payload);
      return parsed.success ? { type: "bid-request", payload: parsed.data, message } : undefined;
    }
    case "bid": {
      const parsed = bidPayloadSchema.safeParse(message.payload);
      return parsed.success ? { type: "bid", payload: parsed.data, message } : undefined;
    }
  }
}

/** Idempotency key for the dispatch of one task attempt. */
export function dispatchIdempotencyKey(
  workflowId: string,
  taskId: string,
  attempt: number
): string {
  return `${workflowId}:${taskId}:${attempt}:dispatch`;
}

/** Idempotency key for an agent's reply to a dispatch. */
export function replyIdempotencyKey(
  type: "accept" | "reject" | "result" | "failure",
  workflowId: string,
  taskId: string,
  attempt: number
): string {
  return `${workflowId}:${taskId}:${attempt}:${type}`;
}
