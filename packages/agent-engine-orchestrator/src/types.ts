import type {
  JsonValue,
  TaskErrorInfo,
  TaskState,
  WorkflowState,
} from "@conclave/agent-engine-core";

export interface TaskStatus {
  taskId: string;
  requiredCapability: string;
  state: TaskState;
  dependsOn: string[];
  retryCount: number;
  /** Dispatches so far */
  attempt: number;
  assignedAgent?: string;
  /** Agents that failed or rejected this task */
  failedAgents: string[];
  result?: JsonValue;
  error?: TaskErrorInfo;
  settledAt?: number;
}

export interface WorkflowStatus {
  workflowId: string;
  name?: string;
  metadata?: Record<string, JsonValue>;
  state: WorkflowState;
  /** Settled fraction of tasks, 0..1 */
  progress: number;
  tasks: TaskStatus[];
  createdAt: number;
  updatedAt: number;
  completedAt?: number;
}

export interface WorkflowSummary {
  workflowId: string;
  name?: string;
  state: WorkflowState;
  progress: number;
  taskCount: number;
  createdAt: number;
  completedAt?: number;
}

export interface WorkflowFilter {
  state?: WorkflowState | WorkflowState[];
}
