/**
 * In-memory backend. Values are cloned on the way in and out so callers cannot
 * mutate stored history.
 */

import type { MemoryBackend, MemoryEntry, MemoryScopeHead, MemoryVersionInfo } from "./types";

export class InMemoryMemoryBackend implements MemoryBackend {
  private readonly entries = new Map<string, MemoryEntry[]>();

  async latestVersion(scopeKey: string): Promise<number> {
    const versions = this.entries.get(scopeKey) ?? [];
    return versions.length > 0 ? versions[versions.length - 1].version : 0;
  }

  async append(entry: MemoryEntry): Promise<void> {
    const versions = this.entries.get(entry.scopeKey) ?? [];
    versions.push(cloneEntry(entry));
    this.entries.set(entry.scopeKey, versions);
  }

  async read(key: string, version?: number): Promise<MemoryEntry | undefined> {
    const versions = this.entries.get(key);
    if (!versions || versions.length === 0) {
      return undefined;
    }
    const entry =
      version === undefined
        ? versions[versions.length - 1]
        : versions.find((candidate) => candidate.version === version);
    return entry ? cloneEntry(entry) : undefined;
  }

  async listVersions(key: string): Promise<MemoryVersionInfo[]> {
    return (this.entries.get(key) ?? []).map((entry) => ({
      version: entry.version,
      writtenAt: entry.writtenAt,
      tombstone: entry.tombstone,
      sizeBytes: entry.value === undefined ? 0 : Buffer.byteLength(JSON.stringify(entry.value)),
    }));
  }

  async listHeads(prefix?: string): Promise<MemoryScopeHead[]> {
    const heads: MemoryScopeHead[] = [];
    for (const [key, versions] of this.entries) {
      const latest = versions[versions.length - 1];
      if (!latest || (prefix && !key.startsWith(prefix))) {
        continue;
      }
      heads.push({ scopeKey: key, version: latest.version, tombstone: latest.tombstone });
    }
    return heads.sort((a, b) => (a.scopeKey < b.scopeKey ? -1 : a.scopeKey > b.scopeKey ? 1 : 0));
  }

  async prune(key: string, keepFromVersion: number): Promise<number> {
    const versions = this.entries.get(key);
    if (!versions) {
      return 0;
    }
    const kept = versions.filter((entry) => entry.version >= keepFromVersion);
    this.entries.set(key, kept);
    return versions.length - kept.length;
  }
}

function cloneEntry(entry: MemoryEntry): MemoryEntry {
  if (entry.value === undefined) {
    return { ...entry };
  }
  return { ...entry, value: structuredClone(entry.value) };
}
