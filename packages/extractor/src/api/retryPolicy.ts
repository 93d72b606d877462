type SleepLike = (ms: number) => Promise<void>;

export type RetryDecision = { retry: false } | { retry: true; minDelayMs: number };

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  sleep?: SleepLike;
  random?: () => number;
  onRetry?: (details: { attempt: number; delayMs: number; error: unknown }) => void;
}

export interface RetryPolicy {
  readonly maxAttempts: number;
  execute: <T>(
    operation: (attempt: number) => Promise<T>,
    classify: (error: unknown) => RetryDecision
  ) => Promise<T>;
}

export function parseRetryAfterMs(
  retryAfterHeader: string | null,
  nowMs: number
): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  const trimmed = retryAfterHeader.trim();

  if (trimmed.length === 0) {
    return null;
  }

  if (/^\d+$/.test(trimmed)) {
    const seconds = Number.parseInt(trimmed, 10);
    return Math.max(0, seconds * 1000);
  }

  const retryDateMs = Date.parse(trimmed);
  if (Number.isNaN(retryDateMs)) {
    return null;
  }

  return Math.max(0, retryDateMs - nowMs);
}

export function computeExponentialBackoffMs(
  retryAttempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  randomFn: () => number
): number {
  const base = Math.max(1, baseDelayMs);
  const max = Math.max(base, maxDelayMs);
  const exponential = Math.min(max, base * 2 ** Math.max(0, retryAttempt - 1));
  const jitterWindow = Math.floor(exponential * 0.2);
  const jitter = Math.floor(randomFn() * (jitterWindow + 1));

  return Math.min(max, exponential + jitter);
}

async function sleepFor(ms: number): Promise<void> {
  await new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
}

export function createRetryPolicy(options: RetryPolicyOptions): RetryPolicy {
  const sleep = options.sleep ?? sleepFor;
  const random = options.random ?? Math.random;
  const maxAttempts = Math.max(1, options.maxAttempts);

  return {
    maxAttempts,
    async execute<T>(
      operation: (attempt: number) => Promise<T>,
      classify: (error: unknown) => RetryDecision
    ): Promise<T> {
      let attempt = 1;

      while (true) {
        try {
          return await operation(attempt);
        } catch (error) {
          const decision = classify(error);

          if (!decision.retry || attempt >= maxAttempts) {
            throw error;
          }

          const backoffDelayMs = computeExponentialBackoffMs(
            attempt,
            options.baseDelayMs,
            options.maxDelayMs,
            random
          );
          const delayMs = Math.max(decision.minDelayMs, backoffDelayMs);

          options.onRetry?.({ attempt, delayMs, error });
          attempt += 1;
          await sleep(delayMs);
        }
      }
    }
  };
}
