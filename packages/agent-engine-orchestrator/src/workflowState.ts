/**
 * Task state machine and workflow state derivation.
 *
 * A WorkflowMutation wraps a draft copy of a workflow record. Transitions are
 * validated and collected on it so the orchestrator can checkpoint the draft
 * first and act on the collected changes afterwards.
 */

import {
  type AssignmentOutcome,
  InvalidTransitionError,
  isTerminalTaskState,
  type TaskErrorInfo,
  type TaskState,
  type WorkflowState,
} from "@conclave/agent-engine-core";
import type { TaskRecord, WorkflowRecord } from "./checkpoint";

// ============================================================================
// Transitions
// ============================================================================

export const TASK_TRANSITIONS: Readonly<Record<TaskState, readonly TaskState[]>> = {
  pending: ["ready", "abandoned"],
  ready: ["negotiating", "abandoned"],
  negotiating: ["dispatched", "ready", "abandoned"],
  dispatched: ["succeeded", "failed", "ready", "abandoned"],
  succeeded: [],
  failed: ["ready", "abandoned"],
  abandoned: [],
} as const;

export function canTransition(from: TaskState, to: TaskState): boolean {
  return TASK_TRANSITIONS[from].includes(to);
}

export function deriveWorkflowState(record: WorkflowRecord): WorkflowState {
  if (record.cancelled) {
    return "cancelled";
  }
  if (record.tasks.some((task) => !isTerminalTaskState(task.state))) {
    return "running";
  }
  if (record.tasks.every((task) => task.state === "succeeded")) {
    return "completed";
  }
  return record.tasks.some((task) => task.state === "succeeded") ? "partially-failed" : "failed";
}

/** Fraction of tasks that reached a terminal state. */
export function workflowProgress(record: WorkflowRecord): number {
  if (record.tasks.length === 0) {
    return 1;
  }
  const settled = record.tasks.filter((task) => isTerminalTaskState(task.state)).length;
  return settled / record.tasks.length;
}

// ============================================================================
// Mutation
// ============================================================================

export interface TaskTransition {
  taskId: string;
  from: TaskState;
  to: TaskState;
  attempt: number;
  agentId?: string;
  error?: TaskErrorInfo;
}

export interface AgentRelease {
  agentId: string;
  taskId: string;
  outcome: AssignmentOutcome;
}

export interface StaffingRequest {
  taskId: string;
  delayMs: number;
}

export class WorkflowMutation {
  readonly transitions: TaskTransition[] = [];
  readonly releases: AgentRelease[] = [];
  /** Tasks to send a dispatch for and arm a deadline */
  readonly dispatches: string[] = [];
  /** Dispatched tasks whose deadline must be re-armed without a new send */
  readonly rearms: string[] = [];
  readonly staffing: StaffingRequest[] = [];
  readonly previousState: WorkflowState;

  constructor(
    readonly record: WorkflowRecord,
    readonly now: number
  ) {
    this.previousState = record.state;
  }

  getTask(taskId: string): TaskRecord | undefined {
    return this.record.tasks.find((task) => task.taskId === taskId);
  }

  /**
   * @throws InvalidTransitionError for moves the state machine does not allow
   */
  transition(task: TaskRecord, to: TaskState, error?: TaskErrorInfo): void {
    const from = task.state;
    if (!canTransition(from, to)) {
      throw new InvalidTransitionError(`task ${this.record.workflowId}/${task.taskId}`, from, to);
    }
    task.state = to;
    task.updatedAt = this.now;
    if (error) {
      task.error = error;
    }
    if (isTerminalTaskState(to)) {
      task.settledAt = this.now;
    }
    this.transitions.push({
      taskId: task.taskId,
      from,
      to,
      attempt: task.attempt,
      agentId: task.assignedAgent ?? undefined,
      error,
    });
  }

  /** Detach the assigned agent and hand its slot back after the checkpoint. */
  release(task: TaskRecord, outcome: AssignmentOutcome): void {
    if (task.assignedAgent) {
      this.releases.push({ agentId: task.assignedAgent, taskId: task.taskId, outcome });
    }
    task.assignedAgent = null;
    task.deadlineAt = null;
    task.accepted = false;
  }

  staff(taskId: string, delayMs = 0): void {
    this.staffing.push({ taskId, delayMs });
  }

  /**
   * Promote pending tasks whose dependencies all succeeded, abandon pending
   * tasks with an abandoned dependency, then re-derive the workflow state.
   */
  finalize(): void {
    const byId = new Map(this.record.tasks.map((task) => [task.taskId, task]));
    let changed = true;
    while (changed) {
      changed = false;
      for (const task of this.record.tasks) {
        if (task.state !== "pending") {
          continue;
        }
        const dependencies = task.dependsOn.map((id) => byId.get(id));
        const abandoned = dependencies.find((dependency) => dependency?.state === "abandoned");
        if (abandoned) {
          this.transition(task, "abandoned", {
            code: "DEPENDENCY_ABANDONED",
            message: `Dependency ${abandoned.taskId} was abandoned`,
          });
          changed = true;
        } else if (dependencies.every((dependency) => dependency?.state === "succeeded")) {
          this.transition(task, "ready");
          if (!this.record.cancelled) {
            this.staff(task.taskId);
          }
          changed = true;
        }
      }
    }

    this.record.state = deriveWorkflowState(this.record);
    this.record.updatedAt = this.now;
    if (this.record.state !== "running" && this.record.completedAt === null) {
      this.record.completedAt = this.now;
    }
  }

  /** True when this mutation moved the workflow out of "running". */
  get settled(): boolean {
    return this.previousState === "running" && this.record.state !== "running";
  }
}
