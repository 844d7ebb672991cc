/**
 * Engine error taxonomy.
 *
 * Every component-level failure is a ConclaveError with a stable code so that
 * callers branch on `code` instead of message text.
 */

import type { TaskErrorInfo } from "./types";

export type ConclaveErrorCode =
  | "INVALID_GRAPH"
  | "NO_QUALIFIED_AGENT"
  | "RECIPIENT_UNAVAILABLE"
  | "EXECUTION_ERROR"
  | "VERSION_CONFLICT"
  | "DEADLINE_EXCEEDED"
  | "WORKFLOW_NOT_FOUND"
  | "AGENT_NOT_FOUND"
  | "INVALID_TRANSITION"
  | "PROVIDER_ERROR"
  | "CONFIGURATION_ERROR"
  | "INVALID_SCOPE_KEY";

export class ConclaveError extends Error {
  readonly code: ConclaveErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: ConclaveErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "ConclaveError";
    this.code = code;
    this.details = details;
  }

  toInfo(): TaskErrorInfo {
    return { code: this.code, message: this.message };
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, code: this.code, message: this.message, details: this.details };
  }
}

/** Workflow spec is malformed or cyclic. Never retried. */
export class InvalidGraphError extends ConclaveError {
  readonly issues: string[];
  readonly cycle?: string[];

  constructor(message: string, options: { issues?: string[]; cycle?: string[] } = {}) {
    super("INVALID_GRAPH", message, { issues: options.issues ?? [], cycle: options.cycle });
    this.name = "InvalidGraphError";
    this.issues = options.issues ?? [];
    this.cycle = options.cycle;
  }
}

export class NoQualifiedAgentError extends ConclaveError {
  readonly capability: string;
  /** Qualified agents exist but none has a free slot right now */
  readonly busy: boolean;

  constructor(
    capability: string,
    reason = "no idle agent declares the capability",
    options: { busy?: boolean } = {}
  ) {
    const busy = options.busy ?? false;
    super("NO_QUALIFIED_AGENT", `No qualified agent for "${capability}": ${reason}`, {
      capability,
      busy,
    });
    this.name = "NoQualifiedAgentError";
    this.capability = capability;
    this.busy = busy;
  }
}

export class RecipientUnavailableError extends ConclaveError {
  readonly recipient: string;

  constructor(recipient: string, reason = "unreachable") {
    super("RECIPIENT_UNAVAILABLE", `Recipient ${recipient} is unavailable (${reason})`, {
      recipient,
      reason,
    });
    this.name = "RecipientUnavailableError";
    this.recipient = recipient;
  }
}

/** An agent reported failure while executing a task. */
export class ExecutionError extends ConclaveError {
  readonly agentId?: string;

  constructor(message: string, agentId?: string) {
    super("EXECUTION_ERROR", message, { agentId });
    this.name = "ExecutionError";
    this.agentId = agentId;
  }
}

export class VersionConflictError extends ConclaveError {
  readonly scopeKey: string;
  readonly expectedVersion: number;
  readonly actualVersion: number;

  constructor(scopeKey: string, expectedVersion: number, actualVersion: number) {
    super(
      "VERSION_CONFLICT",
      `Version conflict on ${scopeKey}: expected ${expectedVersion}, found ${actualVersion}`,
      { scopeKey, expectedVersion, actualVersion }
    );
    this.name = "VersionConflictError";
    this.scopeKey = scopeKey;
    this.expectedVersion = expectedVersion;
    this.actualVersion = actualVersion;
  }
}

export class DeadlineExceededError extends ConclaveError {
  readonly deadlineAt: number;

  constructor(subject: string, deadlineAt: number) {
    super("DEADLINE_EXCEEDED", `Deadline exceeded for ${subject}`, { subject, deadlineAt });
    this.name = "DeadlineExceededError";
    this.deadlineAt = deadlineAt;
  }
}

export class WorkflowNotFoundError extends ConclaveError {
  readonly workflowId: string;

  constructor(workflowId: string) {
    super("WORKFLOW_NOT_FOUND", `Workflow not found: ${workflowId}`, { workflowId });
    this.name = "WorkflowNotFoundError";
    this.workflowId = workflowId;
  }
}

export class AgentNotFoundError extends ConclaveError {
  readonly agentId: string;

  constructor(agentId: string) {
    super("AGENT_NOT_FOUND", `Agent not found: ${agentId}`, { agentId });
    this.name = "AgentNotFoundError";
    this.agentId = agentId;
  }
}

export class InvalidTransitionError extends ConclaveError {
  constructor(subject: string, from: string, to: string) {
    super("INVALID_TRANSITION", `Invalid transition for ${subject}: ${from} -> ${to}`, {
      subject,
      from,
      to,
    });
    this.name = "InvalidTransitionError";
  }
}

/** A completion provider call failed. */
export class ProviderError extends ConclaveError {
  constructor(message: string, cause?: unknown) {
    super("PROVIDER_ERROR", message, {
      cause: cause instanceof Error ? cause.message : cause,
    });
    this.name = "ProviderError";
  }
}

export class ConfigurationError extends ConclaveError {
  constructor(message: string, issues: string[] = []) {
    super("CONFIGURATION_ERROR", message, { issues });
    this.name = "ConfigurationError";
  }
}

export class InvalidScopeKeyError extends ConclaveError {
  readonly scopeKey: string;

  constructor(scopeKey: string) {
    super(
      "INVALID_SCOPE_KEY",
      `Invalid scope key "${scopeKey}": expected workflow:<id>, agent:<id> or global:<name>`,
      { scopeKey }
    );
    this.name = "InvalidScopeKeyError";
    this.scopeKey = scopeKey;
  }
}

export function isConclaveError(error: unknown): error is ConclaveError {
  return error instanceof ConclaveError;
}

/** Normalizes any thrown value to the `{ code, message }` shape reported in status. */
export function toErrorInfo(error: unknown): TaskErrorInfo {
  if (error instanceof ConclaveError) {
    return error.toInfo();
  }
  if (error instanceof Error) {
    return { code: "EXECUTION_ERROR", message: error.message };
  }
  return { code: "EXECUTION_ERROR", message: String(error) };
}
