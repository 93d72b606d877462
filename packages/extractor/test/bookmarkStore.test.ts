import { describe, expect, it, vi } from "vitest";

import { loadBookmarkState, saveBookmark } from "../src/db/bookmarkStore";

describe("loadBookmarkState", () => {
  it("groups stored rows by stream", async () => {
    const query = vi.fn(async () => ({
      rowCount: 2,
      rows: [
        {
          stream_id: "ads_reports",
          replication_key: "date",
          value: "2024-01-10",
          updated_at: new Date("2024-01-11T00:00:00.000Z")
        },
        {
          stream_id: "ads_reports",
          replication_key: "updated_at",
          value: "2024-01-09",
          updated_at: new Date("2024-01-11T00:00:00.000Z")
        }
      ]
    }));

    const state = await loadBookmarkState({ query });

    expect(state).toEqual({
      bookmarks: { ads_reports: { date: "2024-01-10", updated_at: "2024-01-09" } }
    });
    expect(query).toHaveBeenCalledWith(expect.stringContaining("FROM stream_bookmarks"));
  });

  it("returns empty bookmarks for an empty table", async () => {
    const query = vi.fn(async () => ({ rowCount: 0, rows: [] }));

    await expect(loadBookmarkState({ query })).resolves.toEqual({ bookmarks: {} });
  });
});

describe("saveBookmark", () => {
  it("upserts the bookmark and maps the stored row", async () => {
    const query = vi.fn(async () => ({
      rowCount: 1,
      rows: [
        {
          stream_id: "ads_reports",
          replication_key: "date",
          value: "2024-01-12",
          updated_at: new Date("2024-01-12T03:00:00.000Z")
        }
      ]
    }));

    const stored = await saveBookmark(
      { query },
      { streamId: "ads_reports", replicationKey: "date", value: "2024-01-12" }
    );

    expect(query).toHaveBeenCalledWith(
      expect.stringContaining("ON CONFLICT (stream_id, replication_key)"),
      ["ads_reports", "date", "2024-01-12"]
    );
    expect(stored).toEqual({
      streamId: "ads_reports",
      replicationKey: "date",
      value: "2024-01-12",
      updatedAt: "2024-01-12T03:00:00.000Z"
    });
  });

  it("throws when no row comes back", async () => {
    const query = vi.fn(async () => ({ rowCount: 0, rows: [] }));

    await expect(
      saveBookmark({ query }, { streamId: "ads_reports", replicationKey: "date", value: "2024-01-12" })
    ).rejects.toThrow("failed to save bookmark (stream=ads_reports, key=date)");
  });
});
