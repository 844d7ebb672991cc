/**
 * Shared engine types.
 *
 * Domain vocabulary used by every engine package: JSON payloads, agent
 * descriptors, task and workflow states.
 */

// ============================================================================
// Values
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** Millisecond clock, injectable for deterministic tests. */
export type Clock = () => number;

export type IdFactory = () => string;

// ============================================================================
// Agents
// ============================================================================

export type AgentAvailability = "idle" | "busy" | "unreachable";

export interface CapabilityDescriptor {
  /** Capability name, e.g. "summarize" */
  name: string;
  /** Lower is cheaper */
  costEstimate: number;
  /** 0..1, higher is better */
  qualityEstimate: number;
}

export interface AgentDescriptor {
  agentId: string;
  capabilities: CapabilityDescriptor[];
  /** Concurrent task capacity */
  slots?: number;
  metadata?: Record<string, JsonValue>;
}

/** Identifies a task within a workflow. */
export interface TaskRef {
  workflowId: string;
  taskId: string;
}

export function taskRefKey(ref: TaskRef): string {
  return `${ref.workflowId}/${ref.taskId}`;
}

// ============================================================================
// Tasks & Workflows
// ============================================================================

export type TaskState =
  | "pending"
  | "ready"
  | "negotiating"
  | "dispatched"
  | "succeeded"
  | "failed"
  | "abandoned";

export const TERMINAL_TASK_STATES: readonly TaskState[] = ["succeeded", "abandoned"];

export function isTerminalTaskState(state: TaskState): boolean {
  return TERMINAL_TASK_STATES.includes(state);
}

export type WorkflowState = "running" | "completed" | "partially-failed" | "failed" | "cancelled";

export interface TaskErrorInfo {
  code: string;
  message: string;
}

/** How a settled assignment ended, reported back to the registry. */
export type AssignmentOutcome = "succeeded" | "failed" | "cancelled" | "reassigned";
