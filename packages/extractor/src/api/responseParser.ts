import type { AdsRecord } from "../types";

interface RecordLike {
  [key: string]: unknown;
}

function isRecordLike(value: unknown): value is RecordLike {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseRecord(value: unknown, index: number): AdsRecord {
  if (!isRecordLike(value)) {
    throw new Error(`Invalid ads response: data[${index}] must be an object`);
  }

  return value;
}

/**
 * Reads the `data` field of an ads API response. A single object is treated as
 * a one-element list and a missing or null `data` as an empty one.
 */
export function parseDataField(payload: unknown): AdsRecord[] {
  if (!isRecordLike(payload)) {
    throw new Error("Invalid ads response: expected object");
  }

  const data = payload.data;

  if (data === undefined || data === null) {
    return [];
  }

  if (Array.isArray(data)) {
    return data.map((item, index) => parseRecord(item, index));
  }

  if (isRecordLike(data)) {
    return [data];
  }

  throw new Error(`Invalid ads response: unexpected data of type ${typeof data}`);
}
