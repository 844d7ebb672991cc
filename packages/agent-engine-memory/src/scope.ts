/**
 * Scope keys partition the store: workflow:<id>, agent:<id>, global:<name>.
 */

import { InvalidScopeKeyError } from "@conclave/agent-engine-core";

export type ScopeKind = "workflow" | "agent" | "global";

export interface ParsedScopeKey {
  kind: ScopeKind;
  name: string;
}

const SCOPE_KINDS: readonly ScopeKind[] = ["workflow", "agent", "global"];

export function workflowScope(workflowId: string): string {
  return `workflow:${workflowId}`;
}

export function agentScope(agentId: string): string {
  return `agent:${agentId}`;
}

export function globalScope(name: string): string {
  return `global:${name}`;
}

export function parseScopeKey(scopeKey: string): ParsedScopeKey | undefined {
  const separator = scopeKey.indexOf(":");
  if (separator <= 0) {
    return undefined;
  }
  const prefix = scopeKey.slice(0, separator);
  const name = scopeKey.slice(separator + 1);
  const kind = SCOPE_KINDS.find((candidate) => candidate === prefix);
  if (!kind || name.length === 0) {
    return undefined;
  }
  return { kind, name };
}

export function assertScopeKey(scopeKey: string): ParsedScopeKey {
  const parsed = parseScopeKey(scopeKey);
  if (!parsed) {
    throw new InvalidScopeKeyError(scopeKey);
  }
  return parsed;
}
