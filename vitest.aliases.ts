/**
 * Vitest alias configuration for workspace packages.
 *
 * Each alias points at the package's TypeScript entry so tests run without a build.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export type AliasEntry = { find: string; replacement: string };

const PACKAGES = ["core", "memory", "bus", "negotiation", "orchestrator", "agents"] as const;

export const aliases: AliasEntry[] = PACKAGES.map((name) => ({
  find: `@conclave/agent-engine-${name}`,
  replacement: path.resolve(__dirname, `packages/agent-engine-${name}/src/index.ts`),
}));
