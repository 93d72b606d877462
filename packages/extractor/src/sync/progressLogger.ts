export interface ProgressLoggerOptions {
  streamId: string;
  intervalMs: number;
  now?: () => number;
  log?: (message: string) => void;
}

export interface ProgressLogger {
  onBatch: (recordCount: number, queriedDate: string | null) => void;
  onCommit: (bookmark: string) => void;
  flush: () => void;
}

export function createProgressLogger(
  options: ProgressLoggerOptions
): ProgressLogger {
  const now = options.now ?? Date.now;
  const log = options.log ?? console.error;
  const intervalMs = Math.max(1, options.intervalMs);

  const startedAtMs = now();
  let lastLoggedAtMs = startedAtMs;
  let requests = 0;
  let records = 0;
  let commits = 0;
  let latestDate: string | null = null;
  let latestBookmark: string | null = null;

  const maybeLog = (force: boolean): void => {
    const currentMs = now();

    if (!force && currentMs - lastLoggedAtMs < intervalMs) {
      return;
    }

    const elapsedSeconds = Math.max(0.001, (currentMs - startedAtMs) / 1000);
    const recordsPerSecond = records / elapsedSeconds;

    log(
      `sync progress (stream=${options.streamId}, requests=${requests}, records=${records}, rps=${recordsPerSecond.toFixed(1)}, commits=${commits}, date=${latestDate ?? "null"}, bookmark=${latestBookmark ?? "null"})`
    );

    lastLoggedAtMs = currentMs;
  };

  return {
    onBatch(recordCount: number, queriedDate: string | null): void {
      requests += 1;
      records += recordCount;
      latestDate = queriedDate;
      maybeLog(false);
    },
    onCommit(bookmark: string): void {
      commits += 1;
      latestBookmark = bookmark;
      maybeLog(false);
    },
    flush(): void {
      maybeLog(true);
    }
  };
}
