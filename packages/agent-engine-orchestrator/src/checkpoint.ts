/**
 * Workflow checkpoints.
 *
 * A workflow is persisted as one compound value under `workflow:<id>`; the ids
 * of all known workflows live under `global:workflows`. Both are written with
 * optimistic concurrency.
 */

import {
  type RuntimeLogger,
  type TaskState,
  VersionConflictError,
  type WorkflowState,
  getLogger,
  retry,
} from "@conclave/agent-engine-core";
import { jsonValueSchema } from "@conclave/agent-engine-bus";
import { globalScope, type MemoryManager, workflowScope } from "@conclave/agent-engine-memory";
import { z } from "zod";

// ============================================================================
// Persisted shape
// ============================================================================

const taskStateSchema = z.enum([
  "pending",
  "ready",
  "negotiating",
  "dispatched",
  "succeeded",
  "failed",
  "abandoned",
]) satisfies z.ZodType<TaskState>;

const workflowStateSchema = z.enum([
  "running",
  "completed",
  "partially-failed",
  "failed",
  "cancelled",
]) satisfies z.ZodType<WorkflowState>;

const errorInfoSchema = z.object({ code: z.string(), message: z.string() });

export const taskRecordSchema = z.object({
  taskId: z.string(),
  capability: z.string(),
  input: jsonValueSchema,
  dependsOn: z.array(z.string()),
  state: taskStateSchema,
  retryCount: z.number().int().nonnegative(),
  maxRetries: z.number().int().positive(),
  timeoutMs: z.number().positive(),
  preferredAgent: z.string().nullable(),
  /** Dispatch attempt counter; 0 until first dispatched */
  attempt: z.number().int().nonnegative(),
  /** Consecutive staffing failures since the last dispatch */
  negotiationAttempts: z.number().int().nonnegative(),
  assignedAgent: z.string().nullable(),
  accepted: z.boolean(),
  failedAgents: z.array(z.string()),
  deadlineAt: z.number().nullable(),
  /** Output of the successful attempt; null until succeeded */
  result: jsonValueSchema,
  error: errorInfoSchema.nullable(),
  createdAt: z.number(),
  updatedAt: z.number(),
  settledAt: z.number().nullable(),
});

export const workflowRecordSchema = z.object({
  workflowId: z.string(),
  name: z.string().nullable(),
  metadata: z.record(z.string(), jsonValueSchema).nullable(),
  state: workflowStateSchema,
  cancelled: z.boolean(),
  archived: z.boolean(),
  tasks: z.array(taskRecordSchema),
  createdAt: z.number(),
  updatedAt: z.number(),
  completedAt: z.number().nullable(),
});

export type TaskRecord = z.infer<typeof taskRecordSchema>;
export type WorkflowRecord = z.infer<typeof workflowRecordSchema>;

export interface LoadedWorkflow {
  record: WorkflowRecord;
  version: number;
}

// ============================================================================
// Store
// ============================================================================

export const WORKFLOW_INDEX_KEY = globalScope("workflows");

const indexSchema = z.array(z.string());

export interface WorkflowCheckpointStoreOptions {
  conflictRetries?: number;
  logger?: RuntimeLogger;
}

export class WorkflowCheckpointStore {
  private readonly conflictRetries: number;
  private readonly logger: RuntimeLogger;

  constructor(
    private readonly memory: MemoryManager,
    options: WorkflowCheckpointStoreOptions = {}
  ) {
    this.conflictRetries = options.conflictRetries ?? 5;
    this.logger = options.logger ?? getLogger("workflow-checkpoints");
  }

  /**
   * Latest checkpoint, or undefined when missing, deleted or unreadable.
   */
  async load(workflowId: string): Promise<LoadedWorkflow | undefined> {
    const entry = await this.memory.getEntry(workflowScope(workflowId));
    if (!entry || entry.tombstone) {
      return undefined;
    }
    const parsed = workflowRecordSchema.safeParse(entry.value);
    if (!parsed.success) {
      this.logger.error("Unreadable workflow checkpoint", parsed.error, {
        workflowId,
        version: entry.version,
      });
      return undefined;
    }
    return { record: parsed.data, version: entry.version };
  }

  /**
   * Write the first checkpoint of a new workflow.
   *
   * @throws VersionConflictError when the key already holds a version
   */
  async create(record: WorkflowRecord): Promise<number> {
    return this.memory.put(workflowScope(record.workflowId), record, { expectedVersion: 0 });
  }

  /**
   * @throws VersionConflictError when another writer got there first
   */
  async save(record: WorkflowRecord, expectedVersion: number): Promise<number> {
    return this.memory.put(workflowScope(record.workflowId), record, { expectedVersion });
  }

  async listIndexed(): Promise<string[]> {
    const value = await this.memory.get(WORKFLOW_INDEX_KEY);
    const parsed = indexSchema.safeParse(value ?? []);
    return parsed.success ? parsed.data : [];
  }

  async addToIndex(workflowId: string): Promise<void> {
    await this.updateIndex((ids) => (ids.includes(workflowId) ? ids : [...ids, workflowId]));
  }

  async removeFromIndex(workflowId: string): Promise<void> {
    await this.updateIndex((ids) => ids.filter((id) => id !== workflowId));
  }

  private async updateIndex(update: (ids: string[]) => string[]): Promise<void> {
    const outcome = await retry(
      async () => {
        const entry = await this.memory.getEntry(WORKFLOW_INDEX_KEY);
        const parsed = indexSchema.safeParse(entry?.tombstone ? [] : (entry?.value ?? []));
        const ids = parsed.success ? parsed.data : [];
        await this.memory.put(WORKFLOW_INDEX_KEY, update(ids), {
          expectedVersion: entry?.version ?? 0,
        });
      },
      {
        maxAttempts: this.conflictRetries,
        backoff: { initialDelayMs: 5, maxDelayMs: 100 },
        isRetryable: (error) => error instanceof VersionConflictError,
        onRetry: (attempt) => this.logger.warn("Workflow index conflict, retrying", { attempt }),
      }
    );
    if (!outcome.success) {
      throw outcome.error;
    }
  }
}
