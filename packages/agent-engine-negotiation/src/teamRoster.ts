/**
 * Team Roster
 *
 * Records who was staffed on what. A workflow's team is the set of agents that
 * won at least one of its tasks.
 */

import type { AssignmentOutcome, Clock, TaskRef } from "@conclave/agent-engine-core";
import type { AssignmentRecord, NegotiationOutcome, TeamEvaluation, TeamView } from "./types";

export interface TeamRosterOptions {
  now?: Clock;
}

export class TeamRoster {
  private readonly byWorkflow = new Map<string, AssignmentRecord[]>();
  private readonly now: Clock;

  constructor(options: TeamRosterOptions = {}) {
    this.now = options.now ?? (() => Date.now());
  }

  recordAssignment(task: TaskRef, outcome: NegotiationOutcome): AssignmentRecord {
    const record: AssignmentRecord = {
      workflowId: task.workflowId,
      taskId: task.taskId,
      agentId: outcome.agentId,
      capability: outcome.capability,
      cost: outcome.cost,
      quality: outcome.quality,
      method: outcome.method,
      assignedAt: this.now(),
    };
    const records = this.byWorkflow.get(task.workflowId) ?? [];
    records.push(record);
    this.byWorkflow.set(task.workflowId, records);
    return { ...record };
  }

  /**
   * Close the most recent open assignment of the task to the agent.
   */
  settle(agentId: string, task: TaskRef, outcome: AssignmentOutcome): boolean {
    const records = this.byWorkflow.get(task.workflowId) ?? [];
    for (let i = records.length - 1; i >= 0; i--) {
      const record = records[i];
      if (
        record.taskId === task.taskId &&
        record.agentId === agentId &&
        record.outcome === undefined
      ) {
        record.outcome = outcome;
        record.settledAt = this.now();
        return true;
      }
    }
    return false;
  }

  getTeam(workflowId: string): TeamView {
    const assignments = (this.byWorkflow.get(workflowId) ?? []).map((record) => ({ ...record }));
    const members = new Map<string, { agentId: string; roles: string[]; taskIds: string[] }>();
    for (const record of assignments) {
      const member = members.get(record.agentId) ?? {
        agentId: record.agentId,
        roles: [],
        taskIds: [],
      };
      if (!member.roles.includes(record.capability)) {
        member.roles.push(record.capability);
      }
      if (!member.taskIds.includes(record.taskId)) {
        member.taskIds.push(record.taskId);
      }
      members.set(record.agentId, member);
    }
    return { workflowId, members: Array.from(members.values()), assignments };
  }

  getAgentHistory(agentId: string): AssignmentRecord[] {
    const history: AssignmentRecord[] = [];
    for (const records of this.byWorkflow.values()) {
      for (const record of records) {
        if (record.agentId === agentId) {
          history.push({ ...record });
        }
      }
    }
    return history.sort((a, b) => a.assignedAt - b.assignedAt);
  }

  evaluateTeam(workflowId: string): TeamEvaluation {
    const { members, assignments } = this.getTeam(workflowId);
    let succeeded = 0;
    let failed = 0;
    let open = 0;
    let totalCost = 0;
    for (const record of assignments) {
      totalCost += record.cost;
      if (record.outcome === undefined) {
        open++;
      } else if (record.outcome === "succeeded") {
        succeeded++;
      } else if (record.outcome === "failed") {
        failed++;
      }
    }
    const settled = succeeded + failed;
    return {
      workflowId,
      memberCount: members.length,
      assignments: assignments.length,
      succeeded,
      failed,
      open,
      successRate: settled === 0 ? 0 : succeeded / settled,
      totalCost,
    };
  }

  forgetWorkflow(workflowId: string): void {
    this.byWorkflow.delete(workflowId);
  }
}
