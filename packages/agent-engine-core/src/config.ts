/**
 * Engine configuration.
 *
 * Defaults, then CONCLAVE_* environment variables, then explicit overrides.
 * The merged result is validated before any component sees it.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors";

// ============================================================================
// Types
// ============================================================================

export interface BackoffConfig {
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** Adds up to 25% random delay */
  jitter: boolean;
}

export interface BusConfig {
  /** Redeliver when no ack arrives within this window */
  ackTimeoutMs: number;
  /** Deliveries per message before dead-lettering */
  maxDeliveryAttempts: number;
  /** How long an endpoint may go without a subscription before sends fail */
  livenessWindowMs: number;
}

export interface NegotiationConfig {
  bidDeadlineMs: number;
  /** Heartbeat silence after which an agent is unreachable */
  livenessWindowMs: number;
  livenessCheckIntervalMs: number;
}

export interface OrchestratorConfig {
  /** Dispatches a failing task gets before it is abandoned */
  maxRetries: number;
  dispatchTimeoutMs: number;
  /** Staffing attempts that found no agent before the task is abandoned */
  noAgentRetryCeiling: number;
  checkpointConflictRetries: number;
  backoff: BackoffConfig;
}

export interface MemoryConfig {
  retainVersions: number;
  compressionThresholdBytes: number;
}

export interface ConclaveConfig {
  bus: BusConfig;
  negotiation: NegotiationConfig;
  orchestrator: OrchestratorConfig;
  memory: MemoryConfig;
}

export interface ConclaveConfigOverrides {
  bus?: Partial<BusConfig>;
  negotiation?: Partial<NegotiationConfig>;
  orchestrator?: Partial<Omit<OrchestratorConfig, "backoff">> & {
    backoff?: Partial<BackoffConfig>;
  };
  memory?: Partial<MemoryConfig>;
}

export type EnvSource = Record<string, string | undefined>;

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  initialDelayMs: 500,
  maxDelayMs: 30_000,
  multiplier: 2,
  jitter: false,
};

export const DEFAULT_CONCLAVE_CONFIG: ConclaveConfig = {
  bus: {
    ackTimeoutMs: 5_000,
    maxDeliveryAttempts: 5,
    livenessWindowMs: 30_000,
  },
  negotiation: {
    bidDeadlineMs: 2_000,
    livenessWindowMs: 15_000,
    livenessCheckIntervalMs: 5_000,
  },
  orchestrator: {
    maxRetries: 3,
    dispatchTimeoutMs: 60_000,
    noAgentRetryCeiling: 5,
    checkpointConflictRetries: 5,
    backoff: DEFAULT_BACKOFF_CONFIG,
  },
  memory: {
    retainVersions: 50,
    compressionThresholdBytes: 64 * 1024,
  },
};

// ============================================================================
// Schema
// ============================================================================

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const configSchema = z.object({
  bus: z
    .object({
      ackTimeoutMs: positiveInt,
      maxDeliveryAttempts: positiveInt,
      livenessWindowMs: positiveInt,
    })
    .strict(),
  negotiation: z
    .object({
      bidDeadlineMs: positiveInt,
      livenessWindowMs: positiveInt,
      livenessCheckIntervalMs: positiveInt,
    })
    .strict(),
  orchestrator: z
    .object({
      maxRetries: positiveInt,
      dispatchTimeoutMs: positiveInt,
      noAgentRetryCeiling: nonNegativeInt,
      checkpointConflictRetries: positiveInt,
      backoff: z
        .object({
          initialDelayMs: nonNegativeInt,
          maxDelayMs: nonNegativeInt,
          multiplier: z.number().min(1),
          jitter: z.boolean(),
        })
        .strict(),
    })
    .strict(),
  memory: z
    .object({
      retainVersions: positiveInt,
      compressionThresholdBytes: nonNegativeInt,
    })
    .strict(),
});

// ============================================================================
// Resolution
// ============================================================================

export function readEnvNumber(env: EnvSource, keys: string[]): number | undefined {
  for (const key of keys) {
    const raw = env[key];
    if (!raw) {
      continue;
    }
    const parsed = Number(raw);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return undefined;
}

function readEnvBoolean(env: EnvSource, key: string): boolean | undefined {
  const raw = env[key];
  if (raw === "1" || raw === "true") {
    return true;
  }
  if (raw === "0" || raw === "false") {
    return false;
  }
  return undefined;
}

function envOverrides(env: EnvSource): ConclaveConfigOverrides {
  return {
    bus: {
      ackTimeoutMs: readEnvNumber(env, ["CONCLAVE_ACK_TIMEOUT_MS"]),
      maxDeliveryAttempts: readEnvNumber(env, ["CONCLAVE_MAX_DELIVERY_ATTEMPTS"]),
      livenessWindowMs: readEnvNumber(env, ["CONCLAVE_BUS_LIVENESS_WINDOW_MS"]),
    },
    negotiation: {
      bidDeadlineMs: readEnvNumber(env, ["CONCLAVE_BID_DEADLINE_MS"]),
      livenessWindowMs: readEnvNumber(env, [
        "CONCLAVE_AGENT_LIVENESS_WINDOW_MS",
        "CONCLAVE_HEARTBEAT_TIMEOUT_MS",
      ]),
      livenessCheckIntervalMs: readEnvNumber(env, ["CONCLAVE_LIVENESS_CHECK_INTERVAL_MS"]),
    },
    orchestrator: {
      maxRetries: readEnvNumber(env, ["CONCLAVE_MAX_RETRIES"]),
      dispatchTimeoutMs: readEnvNumber(env, ["CONCLAVE_DISPATCH_TIMEOUT_MS"]),
      noAgentRetryCeiling: readEnvNumber(env, ["CONCLAVE_NO_AGENT_RETRY_CEILING"]),
      checkpointConflictRetries: readEnvNumber(env, ["CONCLAVE_CHECKPOINT_CONFLICT_RETRIES"]),
      backoff: {
        initialDelayMs: readEnvNumber(env, ["CONCLAVE_BACKOFF_INITIAL_MS"]),
        maxDelayMs: readEnvNumber(env, ["CONCLAVE_BACKOFF_MAX_MS"]),
        multiplier: readEnvNumber(env, ["CONCLAVE_BACKOFF_MULTIPLIER"]),
        jitter: readEnvBoolean(env, "CONCLAVE_BACKOFF_JITTER"),
      },
    },
    memory: {
      retainVersions: readEnvNumber(env, ["CONCLAVE_RETAIN_VERSIONS"]),
      compressionThresholdBytes: readEnvNumber(env, ["CONCLAVE_COMPRESSION_THRESHOLD_BYTES"]),
    },
  };
}

function mergeConfig(base: ConclaveConfig, patch: ConclaveConfigOverrides = {}): ConclaveConfig {
  const { bus, negotiation, orchestrator, memory } = base;
  return {
    bus: {
      ackTimeoutMs: patch.bus?.ackTimeoutMs ?? bus.ackTimeoutMs,
      maxDeliveryAttempts: patch.bus?.maxDeliveryAttempts ?? bus.maxDeliveryAttempts,
      livenessWindowMs: patch.bus?.livenessWindowMs ?? bus.livenessWindowMs,
    },
    negotiation: {
      bidDeadlineMs: patch.negotiation?.bidDeadlineMs ?? negotiation.bidDeadlineMs,
      livenessWindowMs: patch.negotiation?.livenessWindowMs ?? negotiation.livenessWindowMs,
      livenessCheckIntervalMs:
        patch.negotiation?.livenessCheckIntervalMs ?? negotiation.livenessCheckIntervalMs,
    },
    orchestrator: {
      maxRetries: patch.orchestrator?.maxRetries ?? orchestrator.maxRetries,
      dispatchTimeoutMs: patch.orchestrator?.dispatchTimeoutMs ?? orchestrator.dispatchTimeoutMs,
      noAgentRetryCeiling:
        patch.orchestrator?.noAgentRetryCeiling ?? orchestrator.noAgentRetryCeiling,
      checkpointConflictRetries:
        patch.orchestrator?.checkpointConflictRetries ?? orchestrator.checkpointConflictRetries,
      backoff: {
        initialDelayMs:
          patch.orchestrator?.backoff?.initialDelayMs ?? orchestrator.backoff.initialDelayMs,
        maxDelayMs: patch.orchestrator?.backoff?.maxDelayMs ?? orchestrator.backoff.maxDelayMs,
        multiplier: patch.orchestrator?.backoff?.multiplier ?? orchestrator.backoff.multiplier,
        jitter: patch.orchestrator?.backoff?.jitter ?? orchestrator.backoff.jitter,
      },
    },
    memory: {
      retainVersions: patch.memory?.retainVersions ?? memory.retainVersions,
      compressionThresholdBytes:
        patch.memory?.compressionThresholdBytes ?? memory.compressionThresholdBytes,
    },
  };
}

/**
 * Resolve the effective configuration.
 *
 * @throws ConfigurationError when the merged values fail validation
 */
export function resolveConclaveConfig(
  overrides?: ConclaveConfigOverrides,
  env: EnvSource = process.env
): ConclaveConfig {
  const merged = mergeConfig(mergeConfig(DEFAULT_CONCLAVE_CONFIG, envOverrides(env)), overrides);
  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid engine configuration: ${issues.join("; ")}`, issues);
  }
  return merged;
}
