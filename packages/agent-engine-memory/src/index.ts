export { InMemoryMemoryBackend } from "./inMemoryBackend";
export { createMemoryManager, MemoryManager, type MemoryManagerOptions } from "./memoryManager";
export {
  agentScope,
  assertScopeKey,
  globalScope,
  type ParsedScopeKey,
  parseScopeKey,
  type ScopeKind,
  workflowScope,
} from "./scope";
export { SQLiteMemoryBackend, type SQLiteMemoryBackendConfig } from "./sqliteBackend";
export type {
  CompactionReport,
  CompactOptions,
  MemoryBackend,
  MemoryEntry,
  MemoryScopeHead,
  MemoryVersionInfo,
  PutOptions,
} from "./types";
