import { readFile } from "node:fs/promises";
import path from "node:path";

import type { JsonSchema, JsonSchemaType, StreamId } from "../types";

export const DEFAULT_SCHEMAS_DIR = path.resolve(__dirname, "../../schemas");

const SCHEMA_TYPES: readonly JsonSchemaType[] = [
  "null",
  "boolean",
  "integer",
  "number",
  "string",
  "object",
  "array"
];

interface RecordLike {
  [key: string]: unknown;
}

function isRecordLike(value: unknown): value is RecordLike {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSchemaType(value: unknown): value is JsonSchemaType {
  return typeof value === "string" && SCHEMA_TYPES.some((type) => type === value);
}

function parseSchemaType(value: unknown, at: string): JsonSchemaType | JsonSchemaType[] {
  if (isSchemaType(value)) {
    return value;
  }

  if (Array.isArray(value) && value.length > 0) {
    return value.map((item, index) => {
      if (!isSchemaType(item)) {
        throw new Error(`Invalid schema: unknown type at ${at}.type[${index}]`);
      }
      return item;
    });
  }

  throw new Error(`Invalid schema: unknown type at ${at}.type`);
}

export function parseJsonSchema(value: unknown, at = "$"): JsonSchema {
  if (!isRecordLike(value)) {
    throw new Error(`Invalid schema: expected object at ${at}`);
  }

  const schema: JsonSchema = {};

  if (value.type !== undefined) {
    schema.type = parseSchemaType(value.type, at);
  }

  if (typeof value.format === "string") {
    schema.format = value.format;
  }

  if (typeof value.additionalProperties === "boolean") {
    schema.additionalProperties = value.additionalProperties;
  }

  if (value.properties !== undefined) {
    if (!isRecordLike(value.properties)) {
      throw new Error(`Invalid schema: properties must be an object at ${at}`);
    }

    const properties: Record<string, JsonSchema> = {};
    for (const [name, property] of Object.entries(value.properties)) {
      properties[name] = parseJsonSchema(property, `${at}.properties.${name}`);
    }
    schema.properties = properties;
  }

  if (value.items !== undefined) {
    schema.items = parseJsonSchema(value.items, `${at}.items`);
  }

  return schema;
}

export function schemaTypes(schema: JsonSchema): JsonSchemaType[] {
  if (schema.type === undefined) {
    return [];
  }

  return Array.isArray(schema.type) ? schema.type : [schema.type];
}

export async function readSchemaFile(filePath: string): Promise<JsonSchema> {
  const raw = await readFile(filePath, "utf8");
  return parseJsonSchema(JSON.parse(raw), path.basename(filePath));
}

export async function loadSchemas(
  schemasDir: string = DEFAULT_SCHEMAS_DIR
): Promise<Record<StreamId, JsonSchema>> {
  const load = (streamId: StreamId): Promise<JsonSchema> =>
    readSchemaFile(path.join(schemasDir, `${streamId}.json`));

  return {
    ads_reports: await load("ads_reports"),
    ads: await load("ads"),
    campaigns: await load("campaigns"),
    ad_groups: await load("ad_groups"),
    accounts: await load("accounts")
  };
}
