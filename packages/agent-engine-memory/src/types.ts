import type { JsonValue } from "@conclave/agent-engine-core";

// ============================================================================
// Entries
// ============================================================================

export interface MemoryEntry {
  scopeKey: string;
  /** Strictly increasing per key, starting at 1 */
  version: number;
  /** Undefined only for tombstones */
  value?: JsonValue;
  writtenAt: number;
  tombstone: boolean;
}

export interface MemoryVersionInfo {
  version: number;
  writtenAt: number;
  tombstone: boolean;
  sizeBytes: number;
}

export interface MemoryScopeHead {
  scopeKey: string;
  version: number;
  tombstone: boolean;
}

export interface PutOptions {
  /**
   * Latest version the writer last observed (0 when the key must not exist).
   * A mismatch fails with VersionConflictError.
   */
  expectedVersion?: number;
}

export interface CompactOptions {
  /** Newest versions kept per live key */
  retainVersions?: number;
  /** Restrict compaction to keys with this prefix */
  prefix?: string;
}

export interface CompactionReport {
  scopesCompacted: number;
  versionsRemoved: number;
}

// ============================================================================
// Backend
// ============================================================================

/**
 * Storage behind the memory manager. Appends are single-writer per key; the
 * manager serializes writers before calling into the backend.
 */
export interface MemoryBackend {
  /** Latest version for a key, 0 when the key has never been written */
  latestVersion(scopeKey: string): Promise<number>;
  append(entry: MemoryEntry): Promise<void>;
  /** Latest entry when `version` is omitted */
  read(scopeKey: string, version?: number): Promise<MemoryEntry | undefined>;
  listVersions(scopeKey: string): Promise<MemoryVersionInfo[]>;
  listHeads(prefix?: string): Promise<MemoryScopeHead[]>;
  /** Physically removes versions older than `keepFromVersion`; returns the count */
  prune(scopeKey: string, keepFromVersion: number): Promise<number>;
  close?(): void;
}
