import { afterEach, describe, expect, it, vi } from "vitest";
import {
  ConclaveError,
  isConclaveError,
  NoQualifiedAgentError,
  ProviderError,
  RecipientUnavailableError,
  toErrorInfo,
  VersionConflictError,
} from "../errors";
import { getLogger, type RuntimeLogger, setLogger } from "../logger";

describe("ConclaveError", () => {
  it("carries a stable code, message and details", () => {
    const error = new VersionConflictError("workflow:w1", 2, 3);

    expect(error).toBeInstanceOf(ConclaveError);
    expect(error.name).toBe("VersionConflictError");
    expect(error.toInfo()).toEqual({
      code: "VERSION_CONFLICT",
      message: "Version conflict on workflow:w1: expected 2, found 3",
    });
    expect(error.toJSON()).toEqual({
      name: "VersionConflictError",
      code: "VERSION_CONFLICT",
      message: "Version conflict on workflow:w1: expected 2, found 3",
      details: { scopeKey: "workflow:w1", expectedVersion: 2, actualVersion: 3 },
    });
  });

  it("formats recipient and negotiation failures", () => {
    expect(new RecipientUnavailableError("a1").message).toBe(
      "Recipient a1 is unavailable (unreachable)"
    );
    expect(new NoQualifiedAgentError("translate").message).toBe(
      'No qualified agent for "translate": no idle agent declares the capability'
    );
    expect(new NoQualifiedAgentError("translate").busy).toBe(false);
    expect(
      new NoQualifiedAgentError("translate", "every qualified agent is busy", { busy: true })
        .details
    ).toEqual({ capability: "translate", busy: true });
    expect(new ProviderError("rate limited", new Error("429")).details).toEqual({ cause: "429" });
  });

  it("normalizes any thrown value to error info", () => {
    expect(isConclaveError(new ProviderError("down"))).toBe(true);
    expect(isConclaveError(new Error("plain"))).toBe(false);

    expect(toErrorInfo(new ProviderError("down"))).toEqual({
      code: "PROVIDER_ERROR",
      message: "down",
    });
    expect(toErrorInfo(new Error("plain"))).toEqual({ code: "EXECUTION_ERROR", message: "plain" });
    expect(toErrorInfo("text")).toEqual({ code: "EXECUTION_ERROR", message: "text" });
  });
});

describe("getLogger", () => {
  afterEach(() => {
    setLogger(null);
  });

  it("scopes the shared logger to a module", () => {
    const scoped: RuntimeLogger = {
      trace: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      child: vi.fn(),
    };
    const root: RuntimeLogger = { ...scoped, child: vi.fn(() => scoped) };
    setLogger(root);

    getLogger("memory").info("ready");

    expect(root.child).toHaveBeenCalledWith({ module: "memory" });
    expect(scoped.info).toHaveBeenCalledWith("ready");
    expect(getLogger()).toBe(root);
  });
});
