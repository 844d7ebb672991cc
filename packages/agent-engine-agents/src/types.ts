import type {
  CapabilityDescriptor,
  JsonValue,
  RuntimeLogger,
} from "@conclave/agent-engine-core";

// ============================================================================
// Execution
// ============================================================================

export interface ExecutionContext {
  agentId: string;
  workflowId: string;
  taskId: string;
  attempt: number;
  capability: string;
  /** Epoch millis after which the orchestrator stops waiting */
  deadlineAt: number;
  /** Results of the tasks this one depends on, keyed by taskId */
  dependencies: Record<string, JsonValue>;
  /** Aborted when the deadline passes or the worker stops */
  signal: AbortSignal;
  logger: RuntimeLogger;
}

/**
 * Performs one capability. Throwing reports a failure to the orchestrator.
 */
export type CapabilityExecutor = (
  input: JsonValue,
  context: ExecutionContext
) => Promise<JsonValue> | JsonValue;

// ============================================================================
// Bidding
// ============================================================================

export interface BidRequest {
  roundId: string;
  workflowId: string;
  taskId: string;
  capability: string;
  input: JsonValue;
  deadlineAt: number;
}

export type BidDecision = { cost: number; quality?: number } | { decline: true };

/**
 * Prices a bid for a declared capability. The manifest values are the
 * fallback whenever an estimator is absent or fails.
 */
export type BidEstimator = (
  request: BidRequest,
  declared: CapabilityDescriptor
) => Promise<BidDecision> | BidDecision;

// ============================================================================
// Completion providers
// ============================================================================

/**
 * Minimal text completion interface. Implementations signal provider-side
 * failures with ProviderError.
 */
export interface CompletionProvider {
  complete(prompt: string): Promise<string>;
}
