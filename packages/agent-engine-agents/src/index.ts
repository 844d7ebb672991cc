/**
 * @conclave/agent-engine-agents
 *
 * Executor-side runtime: agent workers and bid estimators.
 */

export { AgentWorker, type AgentWorkerOptions, createAgentWorker } from "./agentWorker";
export {
  type CompletionBidEstimatorOptions,
  createCompletionBidEstimator,
  defaultBidPrompt,
  parseCostEstimate,
} from "./completionBidEstimator";
export * from "./types";
