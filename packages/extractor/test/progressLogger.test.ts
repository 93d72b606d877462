import { describe, expect, it } from "vitest";

import { createProgressLogger } from "../src/sync/progressLogger";

describe("createProgressLogger", () => {
  it("logs at configured intervals using aggregated counters", () => {
    let nowMs = 0;
    const messages: string[] = [];

    const logger = createProgressLogger({
      streamId: "ads_reports",
      intervalMs: 1000,
      now: () => nowMs,
      log: (message) => messages.push(message)
    });

    logger.onBatch(40, "2024-01-01");
    logger.onCommit("2024-01-01");
    expect(messages).toHaveLength(0);

    nowMs = 2000;
    logger.onBatch(0, "2024-01-02");

    expect(messages).toEqual([
      "sync progress (stream=ads_reports, requests=2, records=40, rps=20.0, commits=1, date=2024-01-02, bookmark=2024-01-01)"
    ]);
  });

  it("flushes a final progress line on demand", () => {
    let nowMs = 0;
    const messages: string[] = [];

    const logger = createProgressLogger({
      streamId: "campaigns",
      intervalMs: 5000,
      now: () => nowMs,
      log: (message) => messages.push(message)
    });

    logger.onBatch(12, null);
    expect(messages).toHaveLength(0);

    nowMs = 4000;
    logger.flush();

    expect(messages).toEqual([
      "sync progress (stream=campaigns, requests=1, records=12, rps=3.0, commits=0, date=null, bookmark=null)"
    ]);
  });
});
