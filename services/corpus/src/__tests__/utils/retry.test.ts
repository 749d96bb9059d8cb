import { describe, it, expect, vi } from "vitest";
import { isTransientError, withRetry } from "../../utils/retry.js";

describe("withRetry", () => {
  it("returns the result immediately on success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");
    const result = await withRetry(fn, { maxAttempts: 3 });
    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries on a retryable error and eventually succeeds", async () => {
    let calls = 0;
    const fn = vi.fn().mockImplementation(async () => {
      calls++;
      if (calls < 3) throw new Error("500 Internal Server Error");
      return "recovered";
    });

    const result = await withRetry(fn, {
      maxAttempts: 5,
      minDelayMs: 0,
      maxDelayMs: 0,
    });

    expect(result).toBe("recovered");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry on a non-retryable error", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("Validation failed"));

    await expect(
      withRetry(fn, { maxAttempts: 5, minDelayMs: 0, maxDelayMs: 0 })
    ).rejects.toThrow("Validation failed");

    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("throws after exhausting all attempts", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("503 Service Unavailable"));

    await expect(
      withRetry(fn, { maxAttempts: 3, minDelayMs: 0, maxDelayMs: 0 })
    ).rejects.toThrow("503 Service Unavailable");

    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("respects a custom retryable predicate", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("CUSTOM_RETRYABLE"));

    await expect(
      withRetry(fn, {
        maxAttempts: 3,
        minDelayMs: 0,
        maxDelayMs: 0,
        retryable: (err) => err instanceof Error && err.message === "CUSTOM_RETRYABLE",
      })
    ).rejects.toThrow("CUSTOM_RETRYABLE");

    // All 3 attempts were made because the error was retryable
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("passes the 1-based attempt number to the function", async () => {
    const attempts: number[] = [];
    await withRetry(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 3) throw new Error("ECONNRESET");
        return attempt;
      },
      { maxAttempts: 3, minDelayMs: 0, maxDelayMs: 0 },
    );
    expect(attempts).toEqual([1, 2, 3]);
  });

  it("reports each retry before waiting", async () => {
    const onRetry = vi.fn();
    const fn = vi.fn().mockRejectedValueOnce(new Error("429 Too Many Requests")).mockResolvedValue("ok");

    await withRetry(fn, { maxAttempts: 3, minDelayMs: 0, maxDelayMs: 0, onRetry });

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith(expect.any(Error), 1, 0);
  });
});

describe("isTransientError", () => {
  it("accepts timeouts and aborts by name", () => {
    const timeout = new Error("The operation was aborted due to timeout");
    timeout.name = "TimeoutError";
    const abort = new Error("This operation was aborted");
    abort.name = "AbortError";
    expect(isTransientError(timeout)).toBe(true);
    expect(isTransientError(abort)).toBe(true);
  });

  it("accepts retryable HTTP statuses and socket errors in the message", () => {
    expect(isTransientError(new Error("HTTP 503 Service Unavailable"))).toBe(true);
    expect(isTransientError(new Error("connect ECONNREFUSED 127.0.0.1:80"))).toBe(true);
    expect(isTransientError(new TypeError("fetch failed"))).toBe(true);
  });

  it("rejects client errors and non-errors", () => {
    expect(isTransientError(new Error("HTTP 404 Not Found"))).toBe(false);
    expect(isTransientError("503")).toBe(false);
    expect(isTransientError(undefined)).toBe(false);
  });
});
