import { describe, expect, it } from "vitest";

import { getBookmark, maxBookmark, writeBookmark } from "../src/state/bookmarks";
import { parseSyncState } from "../src/state/stateStore";

describe("getBookmark", () => {
  it("reads a nested bookmark value", () => {
    const state = { bookmarks: { ads_reports: { date: "2024-01-03" } } };

    expect(getBookmark(state, "ads_reports", "date")).toBe("2024-01-03");
  });

  it("returns null when the stream or key is absent", () => {
    expect(getBookmark({}, "ads_reports", "date")).toBeNull();
    expect(getBookmark({ bookmarks: { ads: {} } }, "ads", "date")).toBeNull();
  });
});

describe("writeBookmark", () => {
  it("returns a new state without touching the input", () => {
    const state = { bookmarks: { other: { date: "2023-12-01" } }, currently_syncing: null };

    const next = writeBookmark(state, "ads_reports", "date", "2024-01-02");

    expect(next).toEqual({
      bookmarks: {
        other: { date: "2023-12-01" },
        ads_reports: { date: "2024-01-02" }
      },
      currently_syncing: null
    });
    expect(state.bookmarks).toEqual({ other: { date: "2023-12-01" } });
  });
});

describe("maxBookmark", () => {
  it("never moves backwards", () => {
    expect(maxBookmark(null, "2024-01-02")).toBe("2024-01-02");
    expect(maxBookmark("2024-01-02", "2024-01-01")).toBe("2024-01-02");
    expect(maxBookmark("2024-01-02", "2024-01-03")).toBe("2024-01-03");
  });
});

describe("parseSyncState", () => {
  it("accepts the nested bookmark shape", () => {
    expect(
      parseSyncState({ bookmarks: { ads_reports: { date: "2024-01-03" } } })
    ).toEqual({ bookmarks: { ads_reports: { date: "2024-01-03" } } });
  });

  it("fills in missing bookmarks", () => {
    expect(parseSyncState({})).toEqual({ bookmarks: {} });
  });

  it("rejects malformed bookmark values", () => {
    expect(() => parseSyncState({ bookmarks: { ads_reports: { date: 3 } } })).toThrow(
      "Invalid state: bookmarks.ads_reports.date must be a string"
    );
    expect(() => parseSyncState({ bookmarks: [] })).toThrow(
      "Invalid state: bookmarks must be an object"
    );
    expect(() => parseSyncState("state")).toThrow("Invalid state: expected object");
  });
});
