import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { buildCatalog, catalogToJson, selectStreams } from "../src/catalog/catalog";
import { parseCatalogSelection, readCatalogSelection } from "../src/catalog/catalogFile";
import { loadSchemas } from "../src/catalog/schemas";

function catalogEntry(streamId: string, selected: boolean | undefined) {
  return {
    tap_stream_id: streamId,
    metadata: [
      { breadcrumb: [], metadata: selected === undefined ? {} : { selected } },
      { breadcrumb: ["properties", "id"], metadata: { selected: true } }
    ]
  };
}

describe("parseCatalogSelection", () => {
  it("returns streams whose root metadata is selected", () => {
    expect(
      parseCatalogSelection({
        streams: [
          catalogEntry("campaigns", true),
          catalogEntry("ads", false),
          catalogEntry("accounts", undefined),
          catalogEntry("ads_reports", true)
        ]
      })
    ).toEqual(["campaigns", "ads_reports"]);
  });

  it("selects nothing from a discovered catalog no one has edited", async () => {
    const discovered = catalogToJson(buildCatalog(await loadSchemas()));

    expect(parseCatalogSelection(JSON.parse(JSON.stringify(discovered)))).toEqual([]);
  });

  it("rejects a payload without a streams array", () => {
    expect(() => parseCatalogSelection({ stream: [] })).toThrow(
      "Invalid catalog: expected an object with a streams array"
    );
  });

  it("rejects a stream without a tap_stream_id", () => {
    expect(() => parseCatalogSelection({ streams: [{ metadata: [] }] })).toThrow(
      "Invalid catalog: streams[0] has no tap_stream_id"
    );
  });
});

describe("readCatalogSelection", () => {
  const cleanupDirs: string[] = [];

  afterEach(async () => {
    await Promise.all(cleanupDirs.map((dir) => rm(dir, { recursive: true, force: true })));
    cleanupDirs.length = 0;
  });

  it("reads the selection from a catalog file and drives stream selection", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "reddit-ads-catalog-"));
    cleanupDirs.push(dir);
    const filePath = path.join(dir, "catalog.json");
    await writeFile(
      filePath,
      JSON.stringify({
        streams: [catalogEntry("accounts", true), catalogEntry("ads_reports", true)]
      })
    );

    const selected = await readCatalogSelection(filePath);
    const streams = selectStreams(buildCatalog(await loadSchemas()), selected);

    expect(selected).toEqual(["accounts", "ads_reports"]);
    expect(streams.map((stream) => stream.streamId)).toEqual(["ads_reports", "accounts"]);
  });
});
