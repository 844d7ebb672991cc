import { gunzipSync, gzipSync } from "node:zlib";
import { type JsonValue, VersionConflictError } from "@conclave/agent-engine-core";
import type { Database as DatabaseInstance } from "better-sqlite3";
import Database from "better-sqlite3";
import type { MemoryBackend, MemoryEntry, MemoryScopeHead, MemoryVersionInfo } from "./types";

export interface SQLiteMemoryBackendConfig {
  databasePath?: string;
  database?: DatabaseInstance;
  compressionThresholdBytes?: number;
}

const DEFAULT_COMPRESSION_THRESHOLD = 64 * 1024;

interface EntryRow {
  scope_key: string;
  version: number;
  value: Buffer | null;
  value_encoding: string;
  size_bytes: number;
  written_at: number;
  tombstone: number;
}

interface VersionRow {
  version: number;
  written_at: number;
  tombstone: number;
  size_bytes: number;
}

interface HeadRow {
  scope_key: string;
  version: number;
  tombstone: number;
}

type PreparedStatements = {
  latestVersion: Database.Statement<[string], { version: number | null }>;
  insertEntry: Database.Statement<
    [string, number, Buffer | null, string, number, number, number]
  >;
  getLatest: Database.Statement<[string], EntryRow>;
  getVersion: Database.Statement<[string, number], EntryRow>;
  listVersions: Database.Statement<[string], VersionRow>;
  listHeads: Database.Statement<[], HeadRow>;
  prune: Database.Statement<[string, number]>;
};

/**
 * better-sqlite3 backend. The (scope_key, version) primary key rejects a
 * duplicate version even when several processes share one database file.
 */
export class SQLiteMemoryBackend implements MemoryBackend {
  private readonly db: DatabaseInstance;
  private readonly compressionThreshold: number;
  private readonly statements: PreparedStatements;

  constructor(config: SQLiteMemoryBackendConfig) {
    this.db = config.database ?? this.createDatabase(config.databasePath);
    this.compressionThreshold = config.compressionThresholdBytes ?? DEFAULT_COMPRESSION_THRESHOLD;
    this.initSchema();
    this.statements = this.prepareStatements();
  }

  async latestVersion(scopeKey: string): Promise<number> {
    return this.statements.latestVersion.get(scopeKey)?.version ?? 0;
  }

  async append(entry: MemoryEntry): Promise<void> {
    const encoded = encodeValue(entry.value, this.compressionThreshold);
    try {
      this.statements.insertEntry.run(
        entry.scopeKey,
        entry.version,
        encoded.payload,
        encoded.encoding,
        encoded.sizeBytes,
        entry.writtenAt,
        entry.tombstone ? 1 : 0
      );
    } catch (error) {
      if (isPrimaryKeyViolation(error)) {
        const actual = await this.latestVersion(entry.scopeKey);
        throw new VersionConflictError(entry.scopeKey, entry.version - 1, actual);
      }
      throw error;
    }
  }

  async read(scopeKey: string, version?: number): Promise<MemoryEntry | undefined> {
    const row =
      version === undefined
        ? this.statements.getLatest.get(scopeKey)
        : this.statements.getVersion.get(scopeKey, version);
    return row ? mapEntry(row) : undefined;
  }

  async listVersions(scopeKey: string): Promise<MemoryVersionInfo[]> {
    return this.statements.listVersions.all(scopeKey).map((row) => ({
      version: row.version,
      writtenAt: row.written_at,
      tombstone: row.tombstone === 1,
      sizeBytes: row.size_bytes,
    }));
  }

  async listHeads(prefix?: string): Promise<MemoryScopeHead[]> {
    return this.statements.listHeads
      .all()
      .filter((row) => !prefix || row.scope_key.startsWith(prefix))
      .map((row) => ({
        scopeKey: row.scope_key,
        version: row.version,
        tombstone: row.tombstone === 1,
      }));
  }

  async prune(scopeKey: string, keepFromVersion: number): Promise<number> {
    return this.statements.prune.run(scopeKey, keepFromVersion).changes;
  }

  close(): void {
    this.db.close();
  }

  private createDatabase(path?: string): DatabaseInstance {
    if (!path) {
      throw new Error("SQLiteMemoryBackend requires databasePath or database instance");
    }
    return new Database(path);
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS memory_entries (
        scope_key TEXT NOT NULL,
        version INTEGER NOT NULL,
        value BLOB,
        value_encoding TEXT NOT NULL,
        size_bytes INTEGER NOT NULL,
        written_at INTEGER NOT NULL,
        tombstone INTEGER NOT NULL DEFAULT 0,
        PRIMARY KEY (scope_key, version)
      )
    `);
  }

  private prepareStatements(): PreparedStatements {
    return {
      latestVersion: this.db.prepare<[string], { version: number | null }>(
        "SELECT MAX(version) AS version FROM memory_entries WHERE scope_key = ?"
      ),
      insertEntry: this.db.prepare<
        [string, number, Buffer | null, string, number, number, number]
      >(`
        INSERT INTO memory_entries (
          scope_key,
          version,
          value,
          value_encoding,
          size_bytes,
          written_at,
          tombstone
        ) VALUES (?, ?, ?, ?, ?, ?, ?)
      `),
      getLatest: this.db.prepare<[string], EntryRow>(
        "SELECT * FROM memory_entries WHERE scope_key = ? ORDER BY version DESC LIMIT 1"
      ),
      getVersion: this.db.prepare<[string, number], EntryRow>(
        "SELECT * FROM memory_entries WHERE scope_key = ? AND version = ?"
      ),
      listVersions: this.db.prepare<[string], VersionRow>(
        `SELECT version, written_at, tombstone, size_bytes
         FROM memory_entries WHERE scope_key = ? ORDER BY version ASC`
      ),
      // SQLite takes bare columns from the row holding MAX(version).
      listHeads: this.db.prepare<[], HeadRow>(
        `SELECT scope_key, MAX(version) AS version, tombstone
         FROM memory_entries GROUP BY scope_key ORDER BY scope_key ASC`
      ),
      prune: this.db.prepare<[string, number]>(
        "DELETE FROM memory_entries WHERE scope_key = ? AND version < ?"
      ),
    };
  }
}

function mapEntry(row: EntryRow): MemoryEntry {
  const tombstone = row.tombstone === 1;
  return {
    scopeKey: row.scope_key,
    version: row.version,
    value: tombstone || !row.value ? undefined : decodeValue(row.value, row.value_encoding),
    writtenAt: row.written_at,
    tombstone,
  };
}

function encodeValue(
  value: JsonValue | undefined,
  compressionThreshold: number
): { payload: Buffer | null; encoding: string; sizeBytes: number } {
  if (value === undefined) {
    return { payload: null, encoding: "none", sizeBytes: 0 };
  }
  const json = JSON.stringify(value);
  const sizeBytes = Buffer.byteLength(json);
  if (sizeBytes >= compressionThreshold) {
    return { payload: gzipSync(json), encoding: "gzip", sizeBytes };
  }
  return { payload: Buffer.from(json), encoding: "json", sizeBytes };
}

function decodeValue(buffer: Buffer, encoding: string): JsonValue {
  const json = encoding === "gzip" ? gunzipSync(buffer).toString("utf8") : buffer.toString("utf8");
  return JSON.parse(json);
}

function isPrimaryKeyViolation(error: unknown): boolean {
  return error instanceof Database.SqliteError && error.code === "SQLITE_CONSTRAINT_PRIMARYKEY";
}
