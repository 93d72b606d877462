import { describe, expect, it } from "vitest";

import { buildCatalogStream } from "../src/catalog/catalog";
import { createMessageWriter, schemaMessageFor } from "../src/output/messageWriter";

describe("schemaMessageFor", () => {
  it("adds bookmark properties only for incremental streams", () => {
    const schema = { type: "object" as const, properties: { id: { type: "string" as const } } };

    expect(schemaMessageFor(buildCatalogStream("ads_reports", schema))).toMatchObject({
      stream: "ads_reports",
      bookmark_properties: ["date"]
    });
    expect(schemaMessageFor(buildCatalogStream("ads", schema))).not.toHaveProperty(
      "bookmark_properties"
    );
  });
});

describe("createMessageWriter", () => {
  it("writes one JSON message per line", () => {
    const lines: string[] = [];
    const writer = createMessageWriter((line) => lines.push(line));

    writer.writeRecord("ads", { id: "ad-1", name: "Spring" });
    writer.writeState({ bookmarks: { ads_reports: { date: "2024-01-05" } } });

    expect(lines).toEqual([
      '{"type":"RECORD","stream":"ads","record":{"id":"ad-1","name":"Spring"}}',
      '{"type":"STATE","value":{"bookmarks":{"ads_reports":{"date":"2024-01-05"}}}}'
    ]);
  });
});
