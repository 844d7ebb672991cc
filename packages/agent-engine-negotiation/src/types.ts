import type {
  AgentAvailability,
  AssignmentOutcome,
  CapabilityDescriptor,
  JsonValue,
  TaskRef,
} from "@conclave/agent-engine-core";

// ============================================================================
// Registry
// ============================================================================

export interface AgentSnapshot {
  agentId: string;
  capabilities: CapabilityDescriptor[];
  slots: number;
  availability: AgentAvailability;
  inFlight: number;
  assignedTasks: TaskRef[];
  registeredAt: number;
  lastHeartbeatAt: number;
  metadata?: Record<string, JsonValue>;
}

export interface Candidate {
  agentId: string;
  capability: CapabilityDescriptor;
}

// ============================================================================
// Negotiation
// ============================================================================

export interface NegotiationRequest {
  workflowId: string;
  taskId: string;
  capability: string;
  input?: JsonValue;
  /** Agents that already failed this task; used only when nobody else qualifies */
  avoidAgents?: string[];
  /** Assigned without a bid round when idle and qualified */
  preferredAgent?: string;
  bidDeadlineMs?: number;
}

export type AssignmentMethod = "preferred" | "sole-candidate" | "bid";

export interface BidRecord {
  agentId: string;
  cost: number;
  quality: number;
  decline: boolean;
}

export interface NegotiationOutcome {
  agentId: string;
  capability: string;
  cost: number;
  quality: number;
  method: AssignmentMethod;
  roundId?: string;
  /** Every bid received in the round, in arrival order */
  bids: BidRecord[];
}

// ============================================================================
// Team roster
// ============================================================================

export interface AssignmentRecord {
  workflowId: string;
  taskId: string;
  agentId: string;
  capability: string;
  cost: number;
  quality: number;
  method: AssignmentMethod;
  assignedAt: number;
  outcome?: AssignmentOutcome;
  settledAt?: number;
}

export interface TeamMember {
  agentId: string;
  /** Capabilities the agent was staffed for in this workflow */
  roles: string[];
  taskIds: string[];
}

export interface TeamView {
  workflowId: string;
  members: TeamMember[];
  assignments: AssignmentRecord[];
}

export interface TeamEvaluation {
  workflowId: string;
  memberCount: number;
  assignments: number;
  succeeded: number;
  failed: number;
  open: number;
  /** succeeded / settled assignments, 0 when nothing settled */
  successRate: number;
  totalCost: number;
}
