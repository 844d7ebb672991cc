import { describe, expect, it, vi } from "vitest";
import { VersionConflictError } from "../errors";
import { computeBackoffDelay, retry, sleep } from "../retry";

describe("computeBackoffDelay", () => {
  it("grows exponentially and caps at maxDelayMs", () => {
    const config = { initialDelayMs: 100, maxDelayMs: 1000, multiplier: 2, jitter: false };
    expect(computeBackoffDelay(1, config)).toBe(100);
    expect(computeBackoffDelay(2, config)).toBe(200);
    expect(computeBackoffDelay(4, config)).toBe(800);
    expect(computeBackoffDelay(5, config)).toBe(1000);
  });

  it("adds at most 25% jitter", () => {
    const config = { initialDelayMs: 100, maxDelayMs: 1000, multiplier: 2, jitter: true };
    expect(computeBackoffDelay(1, config, () => 1)).toBe(125);
    expect(computeBackoffDelay(1, config, () => 0)).toBe(100);
  });
});

describe("retry", () => {
  it("retries retryable errors until success", async () => {
    let calls = 0;
    const onRetry = vi.fn();
    const result = await retry(
      async () => {
        calls++;
        if (calls < 3) {
          throw new VersionConflictError("workflow:w1", calls, calls + 1);
        }
        return "ok";
      },
      {
        maxAttempts: 5,
        backoff: { initialDelayMs: 1 },
        isRetryable: (error) => error instanceof VersionConflictError,
        onRetry,
      }
    );

    expect(result.success).toBe(true);
    expect(result.result).toBe("ok");
    expect(result.attempts).toBe(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it("stops immediately on non-retryable errors", async () => {
    const error = new Error("boom");
    const result = await retry(
      async () => {
        throw error;
      },
      { maxAttempts: 4, isRetryable: () => false }
    );
    expect(result.success).toBe(false);
    expect(result.error).toBe(error);
    expect(result.attempts).toBe(1);
  });

  it("reports the attempts made when exhausted", async () => {
    const result = await retry(
      async () => {
        throw new Error("always");
      },
      { maxAttempts: 2, backoff: { initialDelayMs: 0 } }
    );
    expect(result.success).toBe(false);
    expect(result.attempts).toBe(2);
  });
});

describe("sleep", () => {
  it("detaches its abort listener once the delay elapses", async () => {
    const controller = new AbortController();
    const add = vi.spyOn(controller.signal, "addEventListener");
    const remove = vi.spyOn(controller.signal, "removeEventListener");

    await sleep(5, controller.signal);

    expect(remove).toHaveBeenCalledTimes(1);
    expect(remove.mock.calls[0][0]).toBe("abort");
    expect(remove.mock.calls[0][1]).toBe(add.mock.calls[0][1]);
  });

  it("rejects when the signal aborts first", async () => {
    const controller = new AbortController();
    const pending = sleep(1_000, controller.signal);

    controller.abort();

    await expect(pending).rejects.toThrow("Aborted");
  });
});
