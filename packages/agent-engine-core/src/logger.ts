/**
 * Pino Logger Factory
 *
 * Structured logging for every engine component, with module-scoped children.
 */

import pino, { type Logger, type LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

export interface LoggerConfig {
  level?: LogLevel;
  /** Pretty-print through pino-pretty (development only) */
  pretty?: boolean;
  /** Bindings included in every line */
  base?: Record<string, unknown>;
  transport?: LoggerOptions["transport"];
}

function readLevel(raw: string | undefined): LogLevel {
  const match = LOG_LEVELS.find((level) => level === raw);
  return match ?? "info";
}

function defaultConfig(): LoggerConfig {
  return {
    level: readLevel(process.env.LOG_LEVEL),
    pretty: process.env.LOG_PRETTY === "1",
    base: { service: "conclave" },
  };
}

/**
 * Create a pino logger instance
 */
export function createLogger(config?: LoggerConfig): Logger {
  const mergedConfig = { ...defaultConfig(), ...config };

  const options: LoggerOptions = {
    level: mergedConfig.level,
    base: mergedConfig.base,
  };

  if (mergedConfig.transport) {
    options.transport = mergedConfig.transport;
  } else if (mergedConfig.pretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  return pino(options);
}

export interface RuntimeLogger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: unknown, data?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): RuntimeLogger;
}

export function createRuntimeLogger(config?: LoggerConfig & { module?: string }): RuntimeLogger {
  const base = createLogger(config);
  const logger = config?.module ? base.child({ module: config.module }) : base;
  return wrapLogger(logger);
}

export function wrapLogger(logger: Logger): RuntimeLogger {
  return {
    trace: (msg, data) => (data ? logger.trace(data, msg) : logger.trace(msg)),
    debug: (msg, data) => (data ? logger.debug(data, msg) : logger.debug(msg)),
    info: (msg, data) => (data ? logger.info(data, msg) : logger.info(msg)),
    warn: (msg, data) => (data ? logger.warn(data, msg) : logger.warn(msg)),
    error: (msg, err, data) => {
      if (err !== undefined) {
        logger.error({ ...data, err }, msg);
      } else if (data) {
        logger.error(data, msg);
      } else {
        logger.error(msg);
      }
    },
    child: (bindings) => wrapLogger(logger.child(bindings)),
  };
}

export type { Logger } from "pino";

let defaultLogger: RuntimeLogger | null = null;

/**
 * Get the shared runtime logger, optionally scoped to a module.
 */
export function getLogger(module?: string): RuntimeLogger {
  if (!defaultLogger) {
    defaultLogger = createRuntimeLogger();
  }
  return module ? defaultLogger.child({ module }) : defaultLogger;
}

/** Replace the shared logger (tests, embedding hosts). */
export function setLogger(logger: RuntimeLogger | null): void {
  defaultLogger = logger;
}
