import type { Pool } from "pg";

import type { BookmarkChange, StateStore } from "../state/stateStore";
import type { SyncState } from "../types";

interface BookmarkRow {
  stream_id: string;
  replication_key: string;
  value: string;
  updated_at: Date;
}

interface BookmarkQueryResult {
  rowCount: number | null;
  rows: BookmarkRow[];
}

interface Queryable {
  query: (text: string, values?: unknown[]) => Promise<BookmarkQueryResult>;
}

export interface StoredBookmark extends BookmarkChange {
  updatedAt: string;
}

const SELECT_BOOKMARKS_SQL = `
SELECT stream_id, replication_key, value, updated_at
FROM stream_bookmarks
ORDER BY stream_id, replication_key;
`;

const UPSERT_BOOKMARK_SQL = `
INSERT INTO stream_bookmarks (stream_id, replication_key, value, updated_at)
VALUES ($1, $2, $3, NOW())
ON CONFLICT (stream_id, replication_key)
DO UPDATE SET value = EXCLUDED.value, updated_at = NOW()
RETURNING stream_id, replication_key, value, updated_at;
`;

function rowToStoredBookmark(row: BookmarkRow): StoredBookmark {
  return {
    streamId: row.stream_id,
    replicationKey: row.replication_key,
    value: row.value,
    updatedAt: row.updated_at.toISOString()
  };
}

export async function loadBookmarkState(runner: Queryable): Promise<SyncState> {
  const result = await runner.query(SELECT_BOOKMARKS_SQL);
  const bookmarks: Record<string, Record<string, string>> = {};

  for (const row of result.rows) {
    bookmarks[row.stream_id] = {
      ...bookmarks[row.stream_id],
      [row.replication_key]: row.value
    };
  }

  return { bookmarks };
}

export async function saveBookmark(
  runner: Queryable,
  change: BookmarkChange
): Promise<StoredBookmark> {
  const result = await runner.query(UPSERT_BOOKMARK_SQL, [
    change.streamId,
    change.replicationKey,
    change.value
  ]);

  if (result.rowCount !== 1) {
    throw new Error(
      `failed to save bookmark (stream=${change.streamId}, key=${change.replicationKey})`
    );
  }

  return rowToStoredBookmark(result.rows[0]);
}

export function createPostgresStateStore(pool: Pool): StateStore {
  return {
    load(): Promise<SyncState> {
      return loadBookmarkState(pool);
    },
    async commit(_state: SyncState, change: BookmarkChange): Promise<void> {
      await saveBookmark(pool, change);
    },
    async close(): Promise<void> {
      await pool.end();
    }
  };
}
