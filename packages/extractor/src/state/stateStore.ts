import type { SyncState } from "../types";

export interface BookmarkChange {
  streamId: string;
  replicationKey: string;
  value: string;
}

export interface StateStore {
  load: () => Promise<SyncState>;
  commit: (state: SyncState, change: BookmarkChange) => Promise<void>;
  close?: () => Promise<void>;
}

interface RecordLike {
  [key: string]: unknown;
}

function isRecordLike(value: unknown): value is RecordLike {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseSyncState(payload: unknown): SyncState {
  if (!isRecordLike(payload)) {
    throw new Error("Invalid state: expected object");
  }

  const rawBookmarks = payload.bookmarks;

  if (rawBookmarks === undefined || rawBookmarks === null) {
    return { ...payload, bookmarks: {} };
  }

  if (!isRecordLike(rawBookmarks)) {
    throw new Error("Invalid state: bookmarks must be an object");
  }

  const bookmarks: Record<string, Record<string, string>> = {};

  for (const [streamId, streamBookmarks] of Object.entries(rawBookmarks)) {
    if (!isRecordLike(streamBookmarks)) {
      throw new Error(`Invalid state: bookmarks.${streamId} must be an object`);
    }

    const values: Record<string, string> = {};
    for (const [key, value] of Object.entries(streamBookmarks)) {
      if (typeof value !== "string") {
        throw new Error(`Invalid state: bookmarks.${streamId}.${key} must be a string`);
      }
      values[key] = value;
    }

    bookmarks[streamId] = values;
  }

  return { ...payload, bookmarks };
}
