import { describe, expect, it, vi } from "vitest";

import {
  computeExponentialBackoffMs,
  createRetryPolicy,
  parseRetryAfterMs
} from "../src/api/retryPolicy";

class RetryableError extends Error {}

describe("parseRetryAfterMs", () => {
  it("parses numeric seconds", () => {
    expect(parseRetryAfterMs("5", Date.parse("2026-01-01T00:00:00.000Z"))).toBe(
      5000
    );
  });

  it("parses HTTP-date", () => {
    const now = Date.parse("2026-01-01T00:00:00.000Z");
    const value = "Thu, 01 Jan 2026 00:00:03 GMT";

    expect(parseRetryAfterMs(value, now)).toBe(3000);
  });

  it("returns null for invalid values", () => {
    expect(parseRetryAfterMs(null, Date.now())).toBeNull();
    expect(parseRetryAfterMs("", Date.now())).toBeNull();
    expect(parseRetryAfterMs("abc", Date.now())).toBeNull();
  });
});

describe("computeExponentialBackoffMs", () => {
  it("doubles the delay per attempt", () => {
    expect(computeExponentialBackoffMs(1, 2000, 60000, () => 0)).toBe(2000);
    expect(computeExponentialBackoffMs(2, 2000, 60000, () => 0)).toBe(4000);
    expect(computeExponentialBackoffMs(4, 2000, 60000, () => 0)).toBe(16000);
  });

  it("adds at most 20% jitter", () => {
    expect(computeExponentialBackoffMs(1, 1000, 60000, () => 0.999)).toBe(1200);
  });

  it("caps delay at max", () => {
    const delay = computeExponentialBackoffMs(10, 100, 500, () => 0.99);
    expect(delay).toBe(500);
  });
});

describe("createRetryPolicy", () => {
  const classify = (error: unknown) =>
    error instanceof RetryableError
      ? { retry: true as const, minDelayMs: 0 }
      : { retry: false as const };

  it("retries retryable failures and returns the eventual result", async () => {
    const sleep = vi.fn(async () => undefined);
    const policy = createRetryPolicy({
      maxAttempts: 5,
      baseDelayMs: 2000,
      maxDelayMs: 60000,
      sleep,
      random: () => 0
    });
    const operation = vi
      .fn<[number], Promise<string>>()
      .mockRejectedValueOnce(new RetryableError("busy"))
      .mockRejectedValueOnce(new RetryableError("busy"))
      .mockResolvedValueOnce("ok");

    await expect(policy.execute(operation, classify)).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(3);
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(sleep.mock.calls).toEqual([[2000], [4000]]);
  });

  it("rethrows after the last attempt", async () => {
    const sleep = vi.fn(async () => undefined);
    const policy = createRetryPolicy({
      maxAttempts: 3,
      baseDelayMs: 10,
      maxDelayMs: 100,
      sleep,
      random: () => 0
    });
    const operation = vi.fn(async () => {
      throw new RetryableError("still busy");
    });

    await expect(policy.execute(operation, classify)).rejects.toThrow("still busy");
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("does not retry failures classified as fatal", async () => {
    const sleep = vi.fn(async () => undefined);
    const policy = createRetryPolicy({
      maxAttempts: 5,
      baseDelayMs: 10,
      maxDelayMs: 100,
      sleep
    });
    const operation = vi.fn(async () => {
      throw new Error("bad request");
    });

    await expect(policy.execute(operation, classify)).rejects.toThrow("bad request");
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("waits at least the classified minimum delay", async () => {
    const sleep = vi.fn(async () => undefined);
    const onRetry = vi.fn();
    const policy = createRetryPolicy({
      maxAttempts: 2,
      baseDelayMs: 100,
      maxDelayMs: 1000,
      sleep,
      random: () => 0,
      onRetry
    });
    const operation = vi
      .fn<[number], Promise<number>>()
      .mockRejectedValueOnce(new RetryableError("busy"))
      .mockResolvedValueOnce(7);

    await policy.execute(operation, () => ({ retry: true, minDelayMs: 3000 }));

    expect(sleep).toHaveBeenCalledWith(3000);
    expect(onRetry).toHaveBeenCalledWith(
      expect.objectContaining({ attempt: 1, delayMs: 3000 })
    );
  });
});
