import { describe, expect, it } from "vitest";

import { ConformError, conformRecord, conformValue } from "../src/catalog/conform";
import type { JsonSchema } from "../src/types";

const reportSchema: JsonSchema = {
  type: ["null", "object"],
  properties: {
    date: { type: ["string"] },
    impressions: { type: ["null", "integer"] },
    ctr: { type: ["null", "number"] },
    ad_id: { type: ["null", "string"] },
    is_processing: { type: ["null", "boolean"] },
    start_time: { type: ["null", "string"], format: "date-time" }
  }
};

describe("conformRecord", () => {
  it("coerces values to the declared types", () => {
    expect(
      conformRecord(reportSchema, {
        date: "2024-01-01",
        impressions: "120",
        ctr: "0.25",
        ad_id: 42,
        is_processing: "false",
        start_time: "2024-01-01T10:00:00Z"
      })
    ).toEqual({
      date: "2024-01-01",
      impressions: 120,
      ctr: 0.25,
      ad_id: "42",
      is_processing: false,
      start_time: "2024-01-01T10:00:00.000Z"
    });
  });

  it("drops fields the schema does not declare", () => {
    expect(
      conformRecord(reportSchema, { date: "2024-01-01", unknown_metric: 7 })
    ).toEqual({ date: "2024-01-01" });
  });

  it("keeps explicit nulls for nullable fields", () => {
    expect(conformRecord(reportSchema, { date: "2024-01-01", ctr: null })).toEqual({
      date: "2024-01-01",
      ctr: null
    });
  });

  it("conforms nested objects and arrays", () => {
    const schema: JsonSchema = {
      type: "object",
      properties: {
        targeting: {
          type: ["null", "object"],
          properties: {
            devices: { type: ["null", "array"], items: { type: ["string"] } }
          }
        }
      }
    };

    expect(
      conformRecord(schema, { targeting: { devices: ["MOBILE", 1], extra: true } })
    ).toEqual({ targeting: { devices: ["MOBILE", "1"] } });
  });

  it("reports the path of a value that fits no declared type", () => {
    expect(() => conformRecord(reportSchema, { date: "2024-01-01", impressions: "1.5" })).toThrow(
      ConformError
    );
    expect(() => conformRecord(reportSchema, { date: null })).toThrow(
      "Cannot conform $.date to [string] (got null)"
    );
  });
});

describe("conformValue", () => {
  it("passes values through when no type is declared", () => {
    expect(conformValue({}, { any: "thing" })).toEqual({ any: "thing" });
  });

  it("accepts integers for number fields", () => {
    expect(conformValue({ type: "number" }, 3)).toBe(3);
  });

  it("maps 1 and 0 to booleans", () => {
    expect(conformValue({ type: "boolean" }, 1)).toBe(true);
    expect(conformValue({ type: "boolean" }, 0)).toBe(false);
  });
});
