import { type CapabilityDescriptor, ProviderError } from "@conclave/agent-engine-core";
import { describe, expect, it, vi } from "vitest";
import {
  createCompletionBidEstimator,
  defaultBidPrompt,
  parseCostEstimate,
} from "../completionBidEstimator";
import type { BidRequest, CompletionProvider } from "../types";

const declared: CapabilityDescriptor = { name: "summarize", costEstimate: 4, qualityEstimate: 0.7 };

const request: BidRequest = {
  roundId: "r1",
  workflowId: "w1",
  taskId: "t1",
  capability: "summarize",
  input: { text: "hello" },
  deadlineAt: 0,
};

function provider(complete: (prompt: string) => Promise<string>): CompletionProvider {
  return { complete };
}

describe("parseCostEstimate", () => {
  it("takes the first number in the text", () => {
    expect(parseCostEstimate("About 2.5 credits, maybe 3")).toBe(2.5);
    expect(parseCostEstimate("12")).toBe(12);
  });

  it("rejects text without a usable cost", () => {
    expect(parseCostEstimate("cheap")).toBeUndefined();
    expect(parseCostEstimate("-3")).toBeUndefined();
  });
});

describe("createCompletionBidEstimator", () => {
  it("bids the cost the provider names", async () => {
    const complete = vi.fn(async () => "Estimated cost: 1.5");
    const estimate = createCompletionBidEstimator(provider(complete));

    await expect(estimate(request, declared)).resolves.toEqual({ cost: 1.5, quality: 0.7 });
    expect(complete).toHaveBeenCalledWith(defaultBidPrompt(request, declared));
  });

  it("builds the default prompt from the request and the manifest", () => {
    expect(defaultBidPrompt(request, declared)).toBe(
      [
        'Estimate the cost of performing the capability "summarize".',
        "The declared baseline cost is 4.",
        'Task input: {"text":"hello"}',
        "Reply with a single non-negative number.",
      ].join("\n")
    );
  });

  it("uses a custom prompt builder", async () => {
    const complete = vi.fn(async () => "2");
    const estimate = createCompletionBidEstimator(provider(complete), {
      buildPrompt: (bid) => `price ${bid.capability}`,
    });

    await estimate(request, declared);

    expect(complete).toHaveBeenCalledWith("price summarize");
  });

  it("bids the manifest cost when the provider fails", async () => {
    const estimate = createCompletionBidEstimator(
      provider(async () => {
        throw new ProviderError("rate limited");
      })
    );

    await expect(estimate(request, declared)).resolves.toEqual({ cost: 4, quality: 0.7 });
  });

  it("bids the manifest cost when the answer has no number", async () => {
    const estimate = createCompletionBidEstimator(provider(async () => "hard to say"));

    await expect(estimate(request, declared)).resolves.toEqual({ cost: 4, quality: 0.7 });
  });

  it("propagates errors that are not provider failures", async () => {
    const estimate = createCompletionBidEstimator(
      provider(async () => {
        throw new TypeError("bad prompt");
      })
    );

    await expect(estimate(request, declared)).rejects.toThrow("bad prompt");
  });
});
