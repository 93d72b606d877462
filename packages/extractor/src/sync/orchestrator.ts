import type { CatalogStream, SyncState } from "../types";
import { createProgressLogger } from "./progressLogger";
import {
  syncFullTableStream,
  syncIncrementalStream,
  type IncrementalSyncOptions,
  type StreamSyncContext,
  type StreamSyncResult
} from "./streamSyncer";

export interface SyncRunOptions extends IncrementalSyncOptions {
  progressLogIntervalMs?: number;
}

export interface SyncRunResult {
  streams: StreamSyncResult[];
  state: SyncState;
}

function syncStream(
  stream: CatalogStream,
  state: SyncState,
  options: SyncRunOptions,
  context: StreamSyncContext
): Promise<StreamSyncResult> {
  switch (stream.kind) {
    case "incremental":
      return syncIncrementalStream(stream, state, options, context);
    case "full_table":
      return syncFullTableStream(stream, state, context);
  }
}

/**
 * Syncs the given streams one after another, in catalog order. Each stream's
 * bookmark commits are durable before the next stream starts.
 */
export async function runSync(
  streams: CatalogStream[],
  state: SyncState,
  options: SyncRunOptions,
  context: StreamSyncContext
): Promise<SyncRunResult> {
  const results: StreamSyncResult[] = [];
  let currentState = state;

  for (const stream of streams) {
    context.logger?.info(
      `syncing stream (stream=${stream.streamId}, replication=${stream.replicationMethod})`
    );

    const progress =
      context.progress ??
      createProgressLogger({
        streamId: stream.streamId,
        intervalMs: options.progressLogIntervalMs ?? 5000,
        now: context.now,
        log: context.logger?.info
      });

    const result = await syncStream(stream, currentState, options, {
      ...context,
      progress
    });

    currentState = result.state;
    results.push(result);

    context.logger?.info(
      `stream complete (stream=${stream.streamId}, records=${result.recordCount}, requests=${result.requestCount}, bookmark=${result.bookmark ?? "null"})`
    );
  }

  return {
    streams: results,
    state: currentState
  };
}
