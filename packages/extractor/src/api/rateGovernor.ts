type SleepLike = (ms: number) => Promise<void>;

export interface RateGovernor {
  waitForTurn: () => Promise<void>;
}

export interface RateGovernorOptions {
  minIntervalMs: number;
  now?: () => number;
  sleep?: SleepLike;
}

async function sleepFor(ms: number): Promise<void> {
  await new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Spaces calls at least `minIntervalMs` apart. One instance is shared by every
 * stream of a run, so pacing holds across streams.
 */
export function createRateGovernor(options: RateGovernorOptions): RateGovernor {
  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? sleepFor;
  const minIntervalMs = Math.max(0, options.minIntervalMs);
  let nextRequestAllowedAtMs = 0;

  return {
    async waitForTurn(): Promise<void> {
      const waitMs = Math.max(0, nextRequestAllowedAtMs - now());
      if (waitMs > 0) {
        await sleep(waitMs);
      }

      nextRequestAllowedAtMs = now() + minIntervalMs;
    }
  };
}

export const unlimitedRateGovernor: RateGovernor = {
  async waitForTurn(): Promise<void> {
    return;
  }
};
