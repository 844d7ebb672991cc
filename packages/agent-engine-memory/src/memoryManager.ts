/**
 * Memory Manager
 *
 * Versioned key/value store partitioned by scope key. Every write appends a
 * new version; deletes append a tombstone. Writes to one key are linearized
 * through a keyed mutex, so concurrent writers observe unique, strictly
 * increasing versions. There are no cross-key transactions.
 */

import {
  type Clock,
  DEFAULT_CONCLAVE_CONFIG,
  type JsonValue,
  KeyedMutex,
  type RuntimeLogger,
  VersionConflictError,
  getLogger,
} from "@conclave/agent-engine-core";
import { InMemoryMemoryBackend } from "./inMemoryBackend";
import { assertScopeKey } from "./scope";
import type {
  CompactOptions,
  CompactionReport,
  MemoryBackend,
  MemoryEntry,
  MemoryVersionInfo,
  PutOptions,
} from "./types";

export interface MemoryManagerOptions {
  backend?: MemoryBackend;
  /** Default for compact() */
  retainVersions?: number;
  now?: Clock;
  logger?: RuntimeLogger;
}

export class MemoryManager {
  private readonly backend: MemoryBackend;
  private readonly retainVersions: number;
  private readonly now: Clock;
  private readonly logger: RuntimeLogger;
  private readonly locks = new KeyedMutex();

  constructor(options: MemoryManagerOptions = {}) {
    this.backend = options.backend ?? new InMemoryMemoryBackend();
    this.retainVersions = options.retainVersions ?? DEFAULT_CONCLAVE_CONFIG.memory.retainVersions;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? getLogger("memory");
  }

  /**
   * Append a new version.
   *
   * @returns the version written
   * @throws VersionConflictError when `expectedVersion` is stale
   */
  async put(scopeKey: string, value: JsonValue, options: PutOptions = {}): Promise<number> {
    assertScopeKey(scopeKey);
    return this.locks.runExclusive(scopeKey, () =>
      this.appendLocked(scopeKey, value, false, options.expectedVersion)
    );
  }

  /**
   * Latest value, or the value at `version`. Undefined for missing keys,
   * missing versions and tombstones.
   */
  async get(scopeKey: string, version?: number): Promise<JsonValue | undefined> {
    const entry = await this.getEntry(scopeKey, version);
    return entry?.tombstone ? undefined : entry?.value;
  }

  async getEntry(scopeKey: string, version?: number): Promise<MemoryEntry | undefined> {
    assertScopeKey(scopeKey);
    return this.backend.read(scopeKey, version);
  }

  async listVersions(scopeKey: string): Promise<MemoryVersionInfo[]> {
    assertScopeKey(scopeKey);
    return this.backend.listVersions(scopeKey);
  }

  /**
   * Logical delete. History stays queryable until compaction.
   *
   * @returns the tombstone version, or undefined when there was nothing live to delete
   */
  async delete(scopeKey: string, options: PutOptions = {}): Promise<number | undefined> {
    assertScopeKey(scopeKey);
    return this.locks.runExclusive(scopeKey, async () => {
      const latest = await this.backend.read(scopeKey);
      if (!latest || latest.tombstone) {
        if (options.expectedVersion !== undefined) {
          const actual = latest?.version ?? 0;
          if (actual !== options.expectedVersion) {
            throw new VersionConflictError(scopeKey, options.expectedVersion, actual);
          }
        }
        return undefined;
      }
      return this.appendLocked(scopeKey, undefined, true, options.expectedVersion);
    });
  }

  /** Live (non-deleted) keys, optionally under a prefix such as "workflow:". */
  async listScopes(prefix?: string): Promise<string[]> {
    const heads = await this.backend.listHeads(prefix);
    return heads.filter((head) => !head.tombstone).map((head) => head.scopeKey);
  }

  /**
   * Drop old versions: live keys keep their newest `retainVersions`, deleted
   * keys keep only their tombstone so versions never restart.
   */
  async compact(options: CompactOptions = {}): Promise<CompactionReport> {
    const retain = Math.max(1, options.retainVersions ?? this.retainVersions);
    const heads = await this.backend.listHeads(options.prefix);
    let scopesCompacted = 0;
    let versionsRemoved = 0;

    for (const head of heads) {
      const removed = await this.locks.runExclusive(head.scopeKey, async () => {
        const latest = await this.backend.latestVersion(head.scopeKey);
        const entry = await this.backend.read(head.scopeKey, latest);
        const keepFrom = entry?.tombstone ? latest : latest - retain + 1;
        return keepFrom > 1 ? this.backend.prune(head.scopeKey, keepFrom) : 0;
      });
      if (removed > 0) {
        scopesCompacted++;
        versionsRemoved += removed;
      }
    }

    this.logger.debug("Memory compacted", { scopesCompacted, versionsRemoved, retain });
    return { scopesCompacted, versionsRemoved };
  }

  close(): void {
    this.backend.close?.();
  }

  private async appendLocked(
    scopeKey: string,
    value: JsonValue | undefined,
    tombstone: boolean,
    expectedVersion: number | undefined
  ): Promise<number> {
    const current = await this.backend.latestVersion(scopeKey);
    if (expectedVersion !== undefined && expectedVersion !== current) {
      throw new VersionConflictError(scopeKey, expectedVersion, current);
    }
    const version = current + 1;
    await this.backend.append({ scopeKey, version, value, writtenAt: this.now(), tombstone });
    this.logger.trace("Memory write", { scopeKey, version, tombstone });
    return version;
  }
}

export function createMemoryManager(options?: MemoryManagerOptions): MemoryManager {
  return new MemoryManager(options);
}
