import { describe, expect, it, vi } from "vitest";

import { createRateGovernor, unlimitedRateGovernor } from "../src/api/rateGovernor";

describe("createRateGovernor", () => {
  it("lets the first call through immediately", async () => {
    const sleep = vi.fn(async () => undefined);
    const governor = createRateGovernor({ minIntervalMs: 1000, now: () => 5000, sleep });

    await governor.waitForTurn();

    expect(sleep).not.toHaveBeenCalled();
  });

  it("spaces consecutive calls by the minimum interval", async () => {
    let nowMs = 10_000;
    const sleep = vi.fn(async (ms: number) => {
      nowMs += ms;
    });
    const governor = createRateGovernor({ minIntervalMs: 1000, now: () => nowMs, sleep });

    await governor.waitForTurn();
    nowMs += 250;
    await governor.waitForTurn();
    await governor.waitForTurn();

    expect(sleep.mock.calls).toEqual([[750], [1000]]);
    expect(nowMs).toBe(12_000);
  });

  it("does not wait once the interval has passed", async () => {
    let nowMs = 0;
    const sleep = vi.fn(async () => undefined);
    const governor = createRateGovernor({ minIntervalMs: 1000, now: () => nowMs, sleep });

    await governor.waitForTurn();
    nowMs = 1500;
    await governor.waitForTurn();

    expect(sleep).not.toHaveBeenCalled();
  });
});

describe("unlimitedRateGovernor", () => {
  it("never waits", async () => {
    await expect(unlimitedRateGovernor.waitForTurn()).resolves.toBeUndefined();
  });
});
