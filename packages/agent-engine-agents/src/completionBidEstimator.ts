import {
  type CapabilityDescriptor,
  ProviderError,
  type RuntimeLogger,
  getLogger,
} from "@conclave/agent-engine-core";
import type { BidEstimator, BidRequest, CompletionProvider } from "./types";

export interface CompletionBidEstimatorOptions {
  buildPrompt?: (request: BidRequest, declared: CapabilityDescriptor) => string;
  logger?: RuntimeLogger;
}

const NUMBER_PATTERN = /-?\d+(?:\.\d+)?/;

export function defaultBidPrompt(request: BidRequest, declared: CapabilityDescriptor): string {
  return [
    `Estimate the cost of performing the capability "${request.capability}".`,
    `The declared baseline cost is ${declared.costEstimate}.`,
    `Task input: ${JSON.stringify(request.input)}`,
    "Reply with a single non-negative number.",
  ].join("\n");
}

/**
 * First number in a completion, if it is a usable cost.
 */
export function parseCostEstimate(text: string): number | undefined {
  const match = NUMBER_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  const value = Number(match[0]);
  return Number.isFinite(value) && value >= 0 ? value : undefined;
}

/**
 * Bid estimator that asks a completion provider for the cost. Provider
 * failures and unparseable answers bid the manifest cost instead.
 */
export function createCompletionBidEstimator(
  provider: CompletionProvider,
  options: CompletionBidEstimatorOptions = {}
): BidEstimator {
  const buildPrompt = options.buildPrompt ?? defaultBidPrompt;
  const logger = options.logger ?? getLogger("completion-bid-estimator");

  return async (request, declared) => {
    const manifest = { cost: declared.costEstimate, quality: declared.qualityEstimate };
    let text: string;
    try {
      text = await provider.complete(buildPrompt(request, declared));
    } catch (error) {
      if (!(error instanceof ProviderError)) {
        throw error;
      }
      logger.warn("Completion provider failed, bidding the manifest cost", {
        capability: request.capability,
        error: error.message,
      });
      return manifest;
    }

    const cost = parseCostEstimate(text);
    if (cost === undefined) {
      logger.warn("No cost in completion, bidding the manifest cost", {
        capability: request.capability,
      });
      return manifest;
    }
    return { cost, quality: declared.qualityEstimate };
  };
}
