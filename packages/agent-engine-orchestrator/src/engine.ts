/**
 * Engine wiring: one resolved configuration, one runtime event bus and one
 * communication bus shared by the registry, negotiator and orchestrator.
 */

import {
  type Clock,
  type ConclaveConfig,
  type ConclaveConfigOverrides,
  createEventBus,
  type EnvSource,
  type EventBus,
  resolveConclaveConfig,
  type RuntimeLogger,
  getLogger,
} from "@conclave/agent-engine-core";
import { CommunicationBus } from "@conclave/agent-engine-bus";
import {
  InMemoryMemoryBackend,
  type MemoryBackend,
  MemoryManager,
  SQLiteMemoryBackend,
} from "@conclave/agent-engine-memory";
import { AgentRegistry, RoleNegotiator, TeamRoster } from "@conclave/agent-engine-negotiation";
import { Orchestrator } from "./orchestrator";

export interface ConclaveEngineOptions {
  config?: ConclaveConfigOverrides;
  /** Defaults to process.env */
  env?: EnvSource;
  /** Takes precedence over `databasePath` */
  memoryBackend?: MemoryBackend;
  /** SQLite file for durable checkpoints; in-memory storage when omitted */
  databasePath?: string;
  now?: Clock;
  logger?: RuntimeLogger;
}

export interface ConclaveEngine {
  readonly config: ConclaveConfig;
  readonly events: EventBus;
  readonly bus: CommunicationBus;
  readonly memory: MemoryManager;
  readonly registry: AgentRegistry;
  readonly roster: TeamRoster;
  readonly negotiator: RoleNegotiator;
  readonly orchestrator: Orchestrator;
  /** Start listening and resume checkpointed workflows; returns the ids recovered. */
  start(): Promise<string[]>;
  stop(): void;
}

export function createConclaveEngine(options: ConclaveEngineOptions = {}): ConclaveEngine {
  const config = resolveConclaveConfig(options.config, options.env);
  const logger = options.logger ?? getLogger();
  const now = options.now ?? (() => Date.now());

  const events = createEventBus({ now });
  const bus = new CommunicationBus({
    ...config.bus,
    events,
    now,
    logger: logger.child({ module: "communication-bus" }),
  });
  const backend =
    options.memoryBackend ??
    (options.databasePath
      ? new SQLiteMemoryBackend({
          databasePath: options.databasePath,
          compressionThresholdBytes: config.memory.compressionThresholdBytes,
        })
      : new InMemoryMemoryBackend());
  const memory = new MemoryManager({
    backend,
    retainVersions: config.memory.retainVersions,
    now,
    logger: logger.child({ module: "memory" }),
  });
  const registry = new AgentRegistry({
    bus,
    events,
    livenessWindowMs: config.negotiation.livenessWindowMs,
    livenessCheckIntervalMs: config.negotiation.livenessCheckIntervalMs,
    now,
    logger: logger.child({ module: "agent-registry" }),
  });
  const roster = new TeamRoster({ now });
  const negotiator = new RoleNegotiator({
    registry,
    bus,
    roster,
    bidDeadlineMs: config.negotiation.bidDeadlineMs,
    now,
    logger: logger.child({ module: "role-negotiator" }),
  });
  events.on("workflow:archived", (event) => {
    roster.forgetWorkflow(event.payload.workflowId);
  });
  const orchestrator = new Orchestrator({
    memory,
    bus,
    negotiator,
    events,
    config: config.orchestrator,
    now,
    logger: logger.child({ module: "orchestrator" }),
  });

  return {
    config,
    events,
    bus,
    memory,
    registry,
    roster,
    negotiator,
    orchestrator,
    async start() {
      orchestrator.start();
      return orchestrator.recover();
    },
    stop() {
      orchestrator.stop();
      bus.dispose();
      memory.close();
    },
  };
}
