/**
 * @conclave/agent-engine-core
 *
 * Shared vocabulary and ambient services for the engine packages.
 */

export * from "./config";
export * from "./errors";
export * from "./eventBus";
export * from "./logger";
export * from "./mutex";
export * from "./retry";
export * from "./types";
