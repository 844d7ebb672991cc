/**
 * Role Negotiator
 *
 * Staffs a task with one agent. A lone candidate is assigned directly; several
 * candidates are asked for bids over the bus and the cheapest bid wins, ties
 * going to the smallest agentId. Bid values come from the agents; the choice
 * itself is deterministic.
 */

import { randomUUID } from "node:crypto";
import {
  type AssignmentOutcome,
  type Clock,
  DEFAULT_CONCLAVE_CONFIG,
  type IdFactory,
  NoQualifiedAgentError,
  RecipientUnavailableError,
  type RuntimeLogger,
  type TaskRef,
  getLogger,
} from "@conclave/agent-engine-core";
import {
  type BidPayload,
  type BidRequestPayload,
  type BusSubscription,
  type CommunicationBus,
  decodeMessage,
} from "@conclave/agent-engine-bus";
import { type AgentRegistry, compareIds } from "./agentRegistry";
import type { TeamRoster } from "./teamRoster";
import type { BidRecord, Candidate, NegotiationOutcome, NegotiationRequest } from "./types";

// ============================================================================
// Types
// ============================================================================

export interface RoleNegotiatorOptions {
  registry: AgentRegistry;
  bus: CommunicationBus;
  roster?: TeamRoster;
  /** Endpoint bids are addressed to */
  endpoint?: string;
  bidDeadlineMs?: number;
  now?: Clock;
  idFactory?: IdFactory;
  logger?: RuntimeLogger;
}

interface BidRound {
  roundId: string;
  capability: string;
  invited: Set<string>;
  bids: BidRecord[];
  resolve: () => void;
}

// ============================================================================
// RoleNegotiator
// ============================================================================

export class RoleNegotiator {
  private readonly registry: AgentRegistry;
  private readonly bus: CommunicationBus;
  private readonly roster?: TeamRoster;
  private readonly endpoint: string;
  private readonly bidDeadlineMs: number;
  private readonly now: Clock;
  private readonly idFactory: IdFactory;
  private readonly logger: RuntimeLogger;

  private readonly rounds = new Map<string, BidRound>();
  private subscription?: BusSubscription;

  constructor(options: RoleNegotiatorOptions) {
    this.registry = options.registry;
    this.bus = options.bus;
    this.roster = options.roster;
    this.endpoint = options.endpoint ?? "negotiator";
    this.bidDeadlineMs =
      options.bidDeadlineMs ?? DEFAULT_CONCLAVE_CONFIG.negotiation.bidDeadlineMs;
    this.now = options.now ?? (() => Date.now());
    this.idFactory = options.idFactory ?? randomUUID;
    this.logger = options.logger ?? getLogger("role-negotiator");
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  start(): void {
    this.registry.start();
    this.ensureSubscribed();
  }

  stop(): void {
    this.registry.stop();
    this.subscription?.unsubscribe();
    this.subscription = undefined;
    for (const round of this.rounds.values()) {
      round.resolve();
    }
  }

  // ==========================================================================
  // Negotiation
  // ==========================================================================

  /**
   * Pick and claim an agent for the task.
   *
   * @throws NoQualifiedAgentError when no idle agent declares the capability,
   * every candidate declines, or every bidder became unavailable. The error is
   * marked `busy` when qualified agents exist but none has a free slot.
   */
  async negotiate(request: NegotiationRequest): Promise<NegotiationOutcome> {
    const task: TaskRef = { workflowId: request.workflowId, taskId: request.taskId };
    const avoid = new Set(request.avoidAgents ?? []);
    const all = this.registry.candidatesFor(request.capability);

    const preferred = all.find(
      (candidate) =>
        candidate.agentId === request.preferredAgent && !avoid.has(candidate.agentId)
    );
    if (preferred && this.registry.claim(preferred.agentId, task)) {
      return this.assigned(task, {
        agentId: preferred.agentId,
        capability: request.capability,
        cost: preferred.capability.costEstimate,
        quality: preferred.capability.qualityEstimate,
        method: "preferred",
        bids: [],
      });
    }

    const fresh = all.filter((candidate) => !avoid.has(candidate.agentId));
    const candidates = fresh.length > 0 ? fresh : all;
    if (candidates.length === 0) {
      if (this.registry.hasBusyCandidate(request.capability)) {
        throw new NoQualifiedAgentError(request.capability, "every qualified agent is busy", {
          busy: true,
        });
      }
      throw new NoQualifiedAgentError(request.capability);
    }

    if (candidates.length === 1) {
      const [only] = candidates;
      if (!this.registry.claim(only.agentId, task)) {
        throw new NoQualifiedAgentError(request.capability, "the only candidate became busy", {
          busy: true,
        });
      }
      return this.assigned(task, {
        agentId: only.agentId,
        capability: request.capability,
        cost: only.capability.costEstimate,
        quality: only.capability.qualityEstimate,
        method: "sole-candidate",
        bids: [],
      });
    }

    return this.runBidRound(request, task, candidates);
  }

  /**
   * Hand the agent's slot back once the task settles.
   */
  release(agentId: string, task: TaskRef, outcome: AssignmentOutcome): boolean {
    this.roster?.settle(agentId, task, outcome);
    return this.registry.release(agentId, task, outcome);
  }

  restoreClaim(agentId: string, task: TaskRef): boolean {
    return this.registry.restoreClaim(agentId, task);
  }

  isAlive(agentId: string): boolean {
    return this.registry.isAlive(agentId);
  }

  get activeRounds(): number {
    return this.rounds.size;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async runBidRound(
    request: NegotiationRequest,
    task: TaskRef,
    candidates: Candidate[]
  ): Promise<NegotiationOutcome> {
    this.ensureSubscribed();
    const roundId = `round-${this.idFactory()}`;
    const deadlineMs = request.bidDeadlineMs ?? this.bidDeadlineMs;
    const deadlineAt = this.now() + deadlineMs;

    let close: () => void = () => {};
    const closed = new Promise<void>((resolve) => {
      close = resolve;
    });
    const round: BidRound = {
      roundId,
      capability: request.capability,
      invited: new Set(),
      bids: [],
      resolve: () => close(),
    };
    this.rounds.set(roundId, round);
    const timer = setTimeout(round.resolve, deadlineMs);

    const payload: BidRequestPayload = {
      roundId,
      capability: request.capability,
      workflowId: request.workflowId,
      taskId: request.taskId,
      input: request.input ?? null,
      deadlineAt,
    };
    try {
      for (const candidate of candidates) {
        try {
          this.bus.send({
            from: this.endpoint,
            to: candidate.agentId,
            type: "bid-request",
            payload,
            idempotencyKey: `${roundId}:${candidate.agentId}`,
            correlationId: roundId,
          });
          round.invited.add(candidate.agentId);
        } catch (error) {
          if (!(error instanceof RecipientUnavailableError)) {
            throw error;
          }
          this.logger.debug("Bid request not delivered; counted as decline", {
            roundId,
            agentId: candidate.agentId,
          });
        }
      }

      if (round.invited.size > 0) {
        await closed;
      }
    } finally {
      clearTimeout(timer);
      this.rounds.delete(roundId);
    }

    const ranked = round.bids
      .filter((bid) => !bid.decline)
      .sort((a, b) => a.cost - b.cost || compareIds(a.agentId, b.agentId));
    this.logger.debug("Bid round closed", {
      roundId,
      capability: request.capability,
      invited: round.invited.size,
      received: round.bids.length,
      ranked: ranked.map((bid) => bid.agentId),
    });

    if (ranked.length === 0) {
      throw new NoQualifiedAgentError(request.capability, "every candidate declined");
    }
    for (const bid of ranked) {
      if (this.registry.claim(bid.agentId, task)) {
        return this.assigned(task, {
          agentId: bid.agentId,
          capability: request.capability,
          cost: bid.cost,
          quality: bid.quality,
          method: "bid",
          roundId,
          bids: round.bids,
        });
      }
    }
    throw new NoQualifiedAgentError(request.capability, "every bidder became unavailable", {
      busy: true,
    });
  }

  private ensureSubscribed(): void {
    if (this.subscription) {
      return;
    }
    this.subscription = this.bus.subscribe(
      this.endpoint,
      (message, context) => {
        const decoded = decodeMessage(message);
        if (decoded?.type === "bid") {
          this.acceptBid(decoded.payload, message.from);
        }
        context.ack();
      },
      { predicate: (message) => message.type === "bid" }
    );
  }

  private acceptBid(bid: BidPayload, sender: string): void {
    const round = this.rounds.get(bid.roundId);
    if (!round) {
      this.logger.debug("Bid for a closed round ignored", { roundId: bid.roundId, sender });
      return;
    }
    const valid =
      bid.agentId === sender &&
      round.invited.has(bid.agentId) &&
      bid.capability === round.capability &&
      Number.isFinite(bid.cost) &&
      bid.cost >= 0;
    if (!valid) {
      this.logger.warn("Malformed bid ignored", { roundId: bid.roundId, sender });
      return;
    }
    if (round.bids.some((existing) => existing.agentId === bid.agentId)) {
      return;
    }
    round.bids.push({
      agentId: bid.agentId,
      cost: bid.cost,
      quality: bid.quality,
      decline: bid.decline,
    });
    if (round.bids.length === round.invited.size) {
      round.resolve();
    }
  }

  private assigned(task: TaskRef, outcome: NegotiationOutcome): NegotiationOutcome {
    this.roster?.recordAssignment(task, outcome);
    this.logger.info("Task staffed", {
      ...task,
      agentId: outcome.agentId,
      capability: outcome.capability,
      method: outcome.method,
      cost: outcome.cost,
    });
    return outcome;
  }
}

export function createRoleNegotiator(options: RoleNegotiatorOptions): RoleNegotiator {
  return new RoleNegotiator(options);
}
