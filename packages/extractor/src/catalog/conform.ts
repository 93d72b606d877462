import type { AdsRecord, JsonSchema, JsonSchemaType } from "../types";
import { schemaTypes } from "./schemas";

export class ConformError extends Error {
  readonly path: string;

  constructor(path: string, expected: JsonSchemaType[], value: unknown) {
    super(
      `Cannot conform ${path} to [${expected.join(", ")}] (got ${JSON.stringify(value)})`
    );
    this.name = "ConformError";
    this.path = path;
  }
}

type Attempt = { ok: true; value: unknown } | { ok: false };

const FAILED: Attempt = { ok: false };

interface RecordLike {
  [key: string]: unknown;
}

function isRecordLike(value: unknown): value is RecordLike {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function coerceBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") {
    return value;
  }

  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true") {
      return true;
    }
    if (normalized === "false") {
      return false;
    }
  }

  if (typeof value === "number") {
    if (value === 1) {
      return true;
    }
    if (value === 0) {
      return false;
    }
  }

  return undefined;
}

function toDateTime(value: unknown): string | undefined {
  if (typeof value !== "string" && typeof value !== "number") {
    return undefined;
  }

  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return undefined;
  }

  return date.toISOString();
}

function conformString(schema: JsonSchema, value: unknown): Attempt {
  if (schema.format === "date-time") {
    const dateTime = toDateTime(value);
    return dateTime === undefined ? FAILED : { ok: true, value: dateTime };
  }

  if (typeof value === "string") {
    return { ok: true, value };
  }

  if (typeof value === "number" || typeof value === "boolean") {
    return { ok: true, value: String(value) };
  }

  return FAILED;
}

function conformInteger(value: unknown): Attempt {
  if (typeof value === "number" && Number.isInteger(value)) {
    return { ok: true, value };
  }

  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) {
    return { ok: true, value: Number.parseInt(value.trim(), 10) };
  }

  return FAILED;
}

function conformNumber(value: unknown): Attempt {
  if (typeof value === "number" && Number.isFinite(value)) {
    return { ok: true, value };
  }

  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? { ok: true, value: parsed } : FAILED;
  }

  return FAILED;
}

function conformObject(schema: JsonSchema, value: RecordLike, at: string): RecordLike {
  if (!schema.properties) {
    return { ...value };
  }

  const output: RecordLike = {};

  for (const [name, propertySchema] of Object.entries(schema.properties)) {
    if (value[name] === undefined) {
      continue;
    }

    output[name] = conformValue(propertySchema, value[name], `${at}.${name}`);
  }

  return output;
}

function attempt(
  type: JsonSchemaType,
  schema: JsonSchema,
  value: unknown,
  at: string
): Attempt {
  switch (type) {
    case "null":
      return FAILED;
    case "string":
      return conformString(schema, value);
    case "integer":
      return conformInteger(value);
    case "number":
      return conformNumber(value);
    case "boolean": {
      const coerced = coerceBoolean(value);
      return coerced === undefined ? FAILED : { ok: true, value: coerced };
    }
    case "object":
      return isRecordLike(value)
        ? { ok: true, value: conformObject(schema, value, at) }
        : FAILED;
    case "array": {
      if (!Array.isArray(value)) {
        return FAILED;
      }

      const items = schema.items;
      return {
        ok: true,
        value: items
          ? value.map((item, index) => conformValue(items, item, `${at}[${index}]`))
          : [...value]
      };
    }
  }
}

export function conformValue(schema: JsonSchema, value: unknown, at = "$"): unknown {
  const types = schemaTypes(schema);

  if (types.length === 0) {
    return value;
  }

  if (value === null || value === undefined) {
    if (types.includes("null")) {
      return null;
    }

    throw new ConformError(at, types, value ?? null);
  }

  for (const type of types) {
    const result = attempt(type, schema, value, at);
    if (result.ok) {
      return result.value;
    }
  }

  throw new ConformError(at, types, value);
}

/**
 * Coerces a raw API record to its stream schema. Fields the schema does not
 * declare are dropped.
 */
export function conformRecord(schema: JsonSchema, record: AdsRecord): AdsRecord {
  return conformObject(schema, record, "$");
}
