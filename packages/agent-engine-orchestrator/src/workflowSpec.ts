/**
 * Workflow spec validation.
 *
 * A spec is accepted only when it parses, task ids are unique, every
 * dependency names a task in the same spec and the dependency graph is acyclic.
 */

import { InvalidGraphError, type JsonValue } from "@conclave/agent-engine-core";
import { jsonValueSchema } from "@conclave/agent-engine-bus";
import { z } from "zod";

// ============================================================================
// Schema
// ============================================================================

export const taskSpecSchema = z
  .object({
    taskId: z.string().min(1),
    requiredCapability: z.string().min(1),
    input: jsonValueSchema.optional(),
    dependsOn: z.array(z.string().min(1)).optional(),
    maxRetries: z.number().int().positive().optional(),
    timeoutMs: z.number().int().positive().optional(),
    preferredAgent: z.string().min(1).optional(),
  })
  .strict();

export const workflowSpecSchema = z
  .object({
    workflowId: z.string().min(1).optional(),
    name: z.string().optional(),
    metadata: z.record(z.string(), jsonValueSchema).optional(),
    tasks: z.array(taskSpecSchema).min(1),
  })
  .strict();

export type TaskSpec = z.infer<typeof taskSpecSchema>;
export type WorkflowSpec = z.infer<typeof workflowSpecSchema>;

export interface ValidatedTask {
  taskId: string;
  requiredCapability: string;
  input: JsonValue;
  dependsOn: string[];
  maxRetries?: number;
  timeoutMs?: number;
  preferredAgent?: string;
}

export interface ValidatedWorkflow {
  workflowId?: string;
  name?: string;
  metadata?: Record<string, JsonValue>;
  tasks: ValidatedTask[];
}

// ============================================================================
// Validation
// ============================================================================

/**
 * @throws InvalidGraphError for malformed specs, unknown or duplicate ids and cycles
 */
export function validateWorkflowSpec(spec: unknown): ValidatedWorkflow {
  const parsed = workflowSpecSchema.safeParse(spec);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "spec"}: ${issue.message}`
    );
    throw new InvalidGraphError(`Invalid workflow spec: ${issues.join("; ")}`, { issues });
  }

  const issues: string[] = [];
  const ids = new Set<string>();
  for (const task of parsed.data.tasks) {
    if (ids.has(task.taskId)) {
      issues.push(`duplicate task id "${task.taskId}"`);
    }
    ids.add(task.taskId);
  }

  const tasks: ValidatedTask[] = parsed.data.tasks.map((task) => {
    const dependsOn = Array.from(new Set(task.dependsOn ?? []));
    for (const dependency of dependsOn) {
      if (!ids.has(dependency)) {
        issues.push(`task "${task.taskId}" depends on unknown task "${dependency}"`);
      }
    }
    return {
      taskId: task.taskId,
      requiredCapability: task.requiredCapability,
      input: task.input ?? null,
      dependsOn,
      maxRetries: task.maxRetries,
      timeoutMs: task.timeoutMs,
      preferredAgent: task.preferredAgent,
    };
  });

  if (issues.length > 0) {
    throw new InvalidGraphError(`Invalid workflow graph: ${issues.join("; ")}`, { issues });
  }

  const cycle = findCycle(tasks);
  if (cycle) {
    throw new InvalidGraphError(`Dependency cycle: ${cycle.join(" -> ")}`, { cycle });
  }

  return {
    workflowId: parsed.data.workflowId,
    name: parsed.data.name,
    metadata: parsed.data.metadata,
    tasks,
  };
}

/**
 * First dependency cycle found by depth-first search, as a closed path
 * (the first id repeated at the end), or undefined for a DAG.
 */
export function findCycle(
  tasks: ReadonlyArray<{ taskId: string; dependsOn: readonly string[] }>
): string[] | undefined {
  const edges = new Map(tasks.map((task) => [task.taskId, task.dependsOn]));
  const visited = new Set<string>();
  const onStack = new Set<string>();
  const path: string[] = [];

  const visit = (node: string): string[] | undefined => {
    visited.add(node);
    onStack.add(node);
    path.push(node);

    for (const dependency of edges.get(node) ?? []) {
      if (onStack.has(dependency)) {
        return [...path.slice(path.indexOf(dependency)), dependency];
      }
      if (!visited.has(dependency)) {
        const cycle = visit(dependency);
        if (cycle) {
          return cycle;
        }
      }
    }

    path.pop();
    onStack.delete(node);
    return undefined;
  };

  for (const task of tasks) {
    if (!visited.has(task.taskId)) {
      const cycle = visit(task.taskId);
      if (cycle) {
        return cycle;
      }
    }
  }
  return undefined;
}
