import type { AdsClient } from "../api/adsClient";
import { conformRecord } from "../catalog/conform";
import type { Logger } from "../logger";
import type { MessageWriter } from "../output/messageWriter";
import { getBookmark, maxBookmark, writeBookmark } from "../state/bookmarks";
import type { StateStore } from "../state/stateStore";
import type {
  AdsRecord,
  FetchWindow,
  FullTableStream,
  IncrementalReportStream,
  JsonSchema,
  RequestHeaders,
  SyncState
} from "../types";
import { advanceCursor, normalizeDate, validStartDate } from "./dateWindow";
import type { ProgressLogger } from "./progressLogger";

export interface StreamSyncContext {
  client: AdsClient;
  writer: MessageWriter;
  stateStore?: StateStore;
  conform?: (schema: JsonSchema, record: AdsRecord) => AdsRecord;
  now?: () => number;
  logger?: Logger;
  progress?: ProgressLogger;
}

export interface IncrementalSyncOptions {
  startsAt: string;
  conversionWindowDays: number;
}

export interface StreamSyncResult {
  streamId: string;
  recordCount: number;
  requestCount: number;
  bookmark: string | null;
  state: SyncState;
}

function readReplicationValue(
  record: AdsRecord,
  stream: IncrementalReportStream
): string {
  const value = record[stream.replicationKey];

  if (typeof value !== "string" || value.length === 0) {
    throw new Error(
      `${stream.streamId} record is missing replication key ${stream.replicationKey}`
    );
  }

  return normalizeDate(value);
}

/**
 * Walks the report stream one day per request, from the stored bookmark (or
 * `startsAt`) pulled back out of the conversion window, up to today.
 */
export async function syncIncrementalStream(
  stream: IncrementalReportStream,
  state: SyncState,
  options: IncrementalSyncOptions,
  context: StreamSyncContext
): Promise<StreamSyncResult> {
  const now = context.now ?? Date.now;
  const conform = context.conform ?? conformRecord;
  const headers: RequestHeaders = {};

  context.writer.writeSchema(stream);

  const storedBookmark = getBookmark(state, stream.streamId, stream.replicationKey);
  let cursor = validStartDate(
    storedBookmark ?? options.startsAt,
    options.conversionWindowDays,
    now()
  );

  let runState = state;
  let committed: string | null = null;
  let recordCount = 0;
  let requestCount = 0;

  context.logger?.info(
    `incremental sync starting (stream=${stream.streamId}, storedBookmark=${storedBookmark ?? "null"}, startDate=${cursor})`
  );

  while (true) {
    const window: FetchWindow = { starts_at: cursor, ends_at: cursor };
    context.logger?.info(`querying date (stream=${stream.streamId}, date=${cursor})`);

    const rows = await context.client.fetchRecords(stream.endpoint, window, headers);
    requestCount += 1;

    let observed = cursor;
    for (const row of rows) {
      const rowDate = readReplicationValue(row, stream);
      context.writer.writeRecord(stream.streamId, conform(stream.schema, row));
      observed = maxBookmark(observed, rowDate);
    }
    recordCount += rows.length;
    context.progress?.onBatch(rows.length, cursor);

    // empty days are walked past without moving the bookmark
    if (rows.length > 0) {
      committed = maxBookmark(committed, observed);
      runState = writeBookmark(runState, stream.streamId, stream.replicationKey, committed);
      context.writer.writeState(runState);
      await context.stateStore?.commit(runState, {
        streamId: stream.streamId,
        replicationKey: stream.replicationKey,
        value: committed
      });
      context.progress?.onCommit(committed);
    }

    const step = advanceCursor(cursor, observed, now());
    if (step.done) {
      break;
    }

    cursor = step.nextDate;
  }

  context.progress?.flush();

  return {
    streamId: stream.streamId,
    recordCount,
    requestCount,
    bookmark: committed,
    state: runState
  };
}

export async function syncFullTableStream(
  stream: FullTableStream,
  state: SyncState,
  context: StreamSyncContext
): Promise<StreamSyncResult> {
  const conform = context.conform ?? conformRecord;

  context.writer.writeSchema(stream);

  const rows = await context.client.fetchRecords(stream.endpoint, {}, {});
  for (const row of rows) {
    context.writer.writeRecord(stream.streamId, conform(stream.schema, row));
  }

  context.progress?.onBatch(rows.length, null);
  context.progress?.flush();

  return {
    streamId: stream.streamId,
    recordCount: rows.length,
    requestCount: 1,
    bookmark: null,
    state
  };
}
