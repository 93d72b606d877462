import { normalizeDate } from "./sync/dateWindow";
import type { ExtractorConfig } from "./types";

type Env = Record<string, string | undefined>;

export const DEFAULT_CONVERSION_WINDOW_DAYS = 14;
export const DEFAULT_API_BASE_URL = "https://ads-api.reddit.com/api/v2.0";
export const DEFAULT_AUTH_URL = "https://www.reddit.com/api/v1/access_token";

const REQUIRED_KEYS = [
  "STARTS_AT",
  "ACCOUNT_ID",
  "REFRESH_TOKEN",
  "CLIENT_ID",
  "CLIENT_SECRET",
  "USER_AGENT"
] as const;

type RequiredKey = (typeof REQUIRED_KEYS)[number];

function readRequired(env: Env, name: RequiredKey): string {
  const raw = env[name]?.trim();

  if (!raw) {
    throw new Error(`Missing required config: ${name}`);
  }

  return raw;
}

function readOptional(env: Env, name: string): string | null {
  const raw = env[name]?.trim();
  return raw ? raw : null;
}

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];

  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid integer for ${name}: ${raw}`);
  }

  return parsed;
}

function readTimestamp(env: Env, name: string): number | null {
  const raw = readOptional(env, name);

  if (raw === null) {
    return null;
  }

  const parsed = Date.parse(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid timestamp for ${name}: ${raw}`);
  }

  return parsed;
}

function readStartDate(env: Env): string {
  const raw = readRequired(env, "STARTS_AT");

  try {
    return normalizeDate(raw);
  } catch (error) {
    throw new Error(`Invalid date for STARTS_AT: ${raw}`, { cause: error });
  }
}

function readList(env: Env, name: string): string[] | null {
  const raw = readOptional(env, name);

  if (raw === null) {
    return null;
  }

  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  return items.length > 0 ? items : null;
}

export function loadConfig(env: Env = process.env): ExtractorConfig {
  const conversionWindowDays = readInt(
    env,
    "CONVERSION_WINDOW",
    DEFAULT_CONVERSION_WINDOW_DAYS
  );

  if (conversionWindowDays < 0) {
    throw new Error(`CONVERSION_WINDOW cannot be negative: ${conversionWindowDays}`);
  }

  const selectedStreams = readList(env, "STREAMS");
  const catalogPath = readOptional(env, "CATALOG_PATH");

  if (selectedStreams !== null && catalogPath !== null) {
    throw new Error("Set either STREAMS or CATALOG_PATH, not both");
  }

  return {
    startsAt: readStartDate(env),
    accountId: readRequired(env, "ACCOUNT_ID"),
    refreshToken: readRequired(env, "REFRESH_TOKEN"),
    clientId: readRequired(env, "CLIENT_ID"),
    clientSecret: readRequired(env, "CLIENT_SECRET"),
    userAgent: readRequired(env, "USER_AGENT"),
    conversionWindowDays,
    accessToken: readOptional(env, "ACCESS_TOKEN"),
    expiresAt: readTimestamp(env, "EXPIRES_AT"),
    apiBaseUrl: env.API_BASE_URL ?? DEFAULT_API_BASE_URL,
    authUrl: env.AUTH_URL ?? DEFAULT_AUTH_URL,
    apiTimeoutMs: readInt(env, "API_TIMEOUT_MS", 30000),
    apiMaxAttempts: Math.max(1, readInt(env, "API_MAX_ATTEMPTS", 5)),
    apiRetryBaseMs: readInt(env, "API_RETRY_BASE_MS", 2000),
    apiRetryMaxMs: readInt(env, "API_RETRY_MAX_MS", 60000),
    minRequestIntervalMs: readInt(env, "MIN_REQUEST_INTERVAL_MS", 1000),
    selectedStreams,
    catalogPath,
    statePath: readOptional(env, "STATE_PATH"),
    databaseUrl: readOptional(env, "DATABASE_URL"),
    progressLogIntervalMs: readInt(env, "PROGRESS_LOG_INTERVAL_MS", 5000)
  };
}
