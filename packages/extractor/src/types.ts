export type StreamId =
  | "ads_reports"
  | "ads"
  | "campaigns"
  | "ad_groups"
  | "accounts";

export type ReplicationMethod = "FULL_TABLE" | "INCREMENTAL";

export type JsonSchemaType =
  | "null"
  | "boolean"
  | "integer"
  | "number"
  | "string"
  | "object"
  | "array";

export interface JsonSchema {
  type?: JsonSchemaType | JsonSchemaType[];
  format?: string;
  properties?: Record<string, JsonSchema>;
  items?: JsonSchema;
  additionalProperties?: boolean;
}

export type AdsRecord = Record<string, unknown>;

export interface MetadataEntry {
  breadcrumb: string[];
  metadata: Record<string, unknown>;
}

interface BaseCatalogStream {
  streamId: StreamId;
  endpoint: string;
  keyProperties: string[];
  schema: JsonSchema;
  metadata: MetadataEntry[];
}

export interface IncrementalReportStream extends BaseCatalogStream {
  kind: "incremental";
  replicationMethod: "INCREMENTAL";
  replicationKey: "date";
}

export interface FullTableStream extends BaseCatalogStream {
  kind: "full_table";
  replicationMethod: "FULL_TABLE";
}

export type CatalogStream = IncrementalReportStream | FullTableStream;

export type StreamBookmarks = Record<string, Record<string, string>>;

export interface SyncState {
  bookmarks?: StreamBookmarks;
  [key: string]: unknown;
}

export type FetchWindow = {
  starts_at: string;
  ends_at: string;
};

export type QueryParams = Record<string, string>;

export type RequestHeaders = Record<string, string>;

export interface Credentials {
  accountId: string;
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  accessToken: string | null;
  expiresAt: number | null;
}

export interface ExtractorConfig {
  startsAt: string;
  accountId: string;
  refreshToken: string;
  clientId: string;
  clientSecret: string;
  userAgent: string;
  conversionWindowDays: number;
  accessToken: string | null;
  expiresAt: number | null;
  apiBaseUrl: string;
  authUrl: string;
  apiTimeoutMs: number;
  apiMaxAttempts: number;
  apiRetryBaseMs: number;
  apiRetryMaxMs: number;
  minRequestIntervalMs: number;
  selectedStreams: string[] | null;
  catalogPath: string | null;
  statePath: string | null;
  databaseUrl: string | null;
  progressLogIntervalMs: number;
}
