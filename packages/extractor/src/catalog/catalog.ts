import type {
  CatalogStream,
  JsonSchema,
  MetadataEntry,
  ReplicationMethod,
  StreamId
} from "../types";
import { schemaTypes } from "./schemas";

export const STREAM_IDS: readonly StreamId[] = [
  "ads_reports",
  "ads",
  "campaigns",
  "ad_groups",
  "accounts"
];

export const REPORT_KEY_PROPERTIES = [
  "date",
  "account_id",
  "campaign_id",
  "ad_group_id",
  "ad_id"
];

const ENDPOINTS: Record<StreamId, string> = {
  ads_reports: "/reports",
  ads: "/ads",
  campaigns: "/campaigns",
  ad_groups: "/ad_groups",
  accounts: ""
};

function keyPropertiesFor(streamId: StreamId): string[] {
  return streamId === "ads_reports" ? [...REPORT_KEY_PROPERTIES] : ["id"];
}

export function buildStreamMetadata(
  streamId: StreamId,
  schema: JsonSchema,
  keyProperties: string[]
): MetadataEntry[] {
  const root: Record<string, unknown> = {
    inclusion: "available",
    "forced-replication-method": streamId === "ads_reports" ? "INCREMENTAL" : "FULL_TABLE"
  };

  if (keyProperties.length > 0) {
    root["table-key-properties"] = keyProperties;
  }

  if (streamId === "ads_reports") {
    root["valid-replication-keys"] = ["date"];
  }

  const entries: MetadataEntry[] = [{ breadcrumb: [], metadata: root }];

  for (const [name, property] of Object.entries(schema.properties ?? {})) {
    if (schemaTypes(property).includes("object")) {
      // nested properties are listed individually, the object itself is not
      for (const nested of Object.keys(property.properties ?? {})) {
        entries.push({
          breadcrumb: ["properties", name, "properties", nested],
          metadata: { inclusion: "available" }
        });
      }
      continue;
    }

    entries.push({
      breadcrumb: ["properties", name],
      metadata: { inclusion: keyProperties.includes(name) ? "automatic" : "available" }
    });
  }

  return entries;
}

export function buildCatalogStream(streamId: StreamId, schema: JsonSchema): CatalogStream {
  const keyProperties = keyPropertiesFor(streamId);
  const base = {
    streamId,
    endpoint: ENDPOINTS[streamId],
    keyProperties,
    schema,
    metadata: buildStreamMetadata(streamId, schema, keyProperties)
  };

  if (streamId === "ads_reports") {
    return {
      ...base,
      kind: "incremental",
      replicationMethod: "INCREMENTAL",
      replicationKey: "date"
    };
  }

  return {
    ...base,
    kind: "full_table",
    replicationMethod: "FULL_TABLE"
  };
}

export function buildCatalog(schemas: Record<StreamId, JsonSchema>): CatalogStream[] {
  return STREAM_IDS.map((streamId) => buildCatalogStream(streamId, schemas[streamId]));
}

/** Keeps catalog order; a null selection keeps every stream. */
export function selectStreams(
  catalog: CatalogStream[],
  selected: string[] | null
): CatalogStream[] {
  if (selected === null) {
    return catalog;
  }

  const unknown = selected.filter(
    (streamId) => !catalog.some((stream) => stream.streamId === streamId)
  );
  if (unknown.length > 0) {
    throw new Error(`Unknown streams selected: ${unknown.join(", ")}`);
  }

  return catalog.filter((stream) => selected.includes(stream.streamId));
}

export interface CatalogEntryJson {
  tap_stream_id: StreamId;
  stream: StreamId;
  key_properties: string[];
  replication_method: ReplicationMethod;
  replication_key?: string;
  schema: JsonSchema;
  metadata: MetadataEntry[];
}

export function catalogToJson(catalog: CatalogStream[]): { streams: CatalogEntryJson[] } {
  return {
    streams: catalog.map((stream) => ({
      tap_stream_id: stream.streamId,
      stream: stream.streamId,
      key_properties: stream.keyProperties,
      replication_method: stream.replicationMethod,
      ...(stream.kind === "incremental"
        ? { replication_key: stream.replicationKey }
        : {}),
      schema: stream.schema,
      metadata: stream.metadata
    }))
  };
}
