export {
  type LoadedWorkflow,
  type TaskRecord,
  WORKFLOW_INDEX_KEY,
  WorkflowCheckpointStore,
  type WorkflowCheckpointStoreOptions,
  type WorkflowRecord,
} from "./checkpoint";
export { type ConclaveEngine, type ConclaveEngineOptions, createConclaveEngine } from "./engine";
export {
  createOrchestrator,
  Orchestrator,
  type OrchestratorOptions,
  toWorkflowStatus,
} from "./orchestrator";
export type { TaskStatus, WorkflowFilter, WorkflowStatus, WorkflowSummary } from "./types";
export {
  canTransition,
  deriveWorkflowState,
  TASK_TRANSITIONS,
  WorkflowMutation,
  workflowProgress,
} from "./workflowState";
export {
  findCycle,
  type TaskSpec,
  taskSpecSchema,
  validateWorkflowSpec,
  type ValidatedTask,
  type ValidatedWorkflow,
  type WorkflowSpec,
  workflowSpecSchema,
} from "./workflowSpec";
