import type { SyncState } from "../types";

export function getBookmark(
  state: SyncState,
  streamId: string,
  replicationKey: string
): string | null {
  return state.bookmarks?.[streamId]?.[replicationKey] ?? null;
}

export function writeBookmark(
  state: SyncState,
  streamId: string,
  replicationKey: string,
  value: string
): SyncState {
  const bookmarks = state.bookmarks ?? {};

  return {
    ...state,
    bookmarks: {
      ...bookmarks,
      [streamId]: {
        ...bookmarks[streamId],
        [replicationKey]: value
      }
    }
  };
}

export function maxBookmark(current: string | null, candidate: string): string {
  if (current === null) {
    return candidate;
  }

  return candidate > current ? candidate : current;
}
