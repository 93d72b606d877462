import type { Logger } from "../logger";
import type {
  AdsRecord,
  ExtractorConfig,
  QueryParams,
  RequestHeaders
} from "../types";
import type { CredentialStore } from "./credentialStore";
import { RateLimitedError, RequestFailedError, RequestTimeoutError } from "./errors";
import { createRateGovernor, type RateGovernor } from "./rateGovernor";
import { parseDataField } from "./responseParser";
import {
  createRetryPolicy,
  parseRetryAfterMs,
  type RetryDecision,
  type RetryPolicy
} from "./retryPolicy";
import type { TokenManager } from "./tokenManager";

export interface AdsClient {
  fetchRecords: (
    endpoint: string,
    query: QueryParams,
    headers: RequestHeaders
  ) => Promise<AdsRecord[]>;
}

type FetchLike = typeof fetch;

export interface AdsClientDependencies {
  fetchImpl?: FetchLike;
  now?: () => number;
  governor?: RateGovernor;
  retryPolicy?: RetryPolicy;
  logger?: Logger;
}

function trimTrailingSlash(value: string): string {
  return value.endsWith("/") ? value.slice(0, -1) : value;
}

/**
 * Joins the query map as `k=v&k=v`. Keys and values are percent-encoded; the
 * date strings the report stream sends are unchanged by this.
 */
export function buildQueryString(query: QueryParams): string {
  return Object.entries(query)
    .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`)
    .join("&");
}

export function buildRequestUrl(
  apiBaseUrl: string,
  accountId: string,
  endpoint: string,
  query: QueryParams
): string {
  const url = `${trimTrailingSlash(apiBaseUrl)}/accounts/${encodeURIComponent(accountId)}${endpoint}`;
  const queryString = buildQueryString(query);

  return queryString ? `${url}?${queryString}` : url;
}

async function fetchWithTimeout(
  fetchImpl: FetchLike,
  requestUrl: string,
  requestInit: RequestInit,
  timeoutMs: number
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, timeoutMs);

  try {
    return await fetchImpl(requestUrl, {
      ...requestInit,
      signal: controller.signal
    });
  } catch (error) {
    if (controller.signal.aborted) {
      throw new RequestTimeoutError(timeoutMs);
    }

    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

function classifyFetchError(error: unknown): RetryDecision {
  if (error instanceof RateLimitedError) {
    return { retry: true, minDelayMs: error.retryAfterMs ?? 0 };
  }

  return { retry: false };
}

export function createAdsClient(
  config: ExtractorConfig,
  credentials: CredentialStore,
  tokenManager: TokenManager,
  dependencies: AdsClientDependencies = {}
): AdsClient {
  const fetchImpl = dependencies.fetchImpl ?? fetch;
  const now = dependencies.now ?? Date.now;
  const logger = dependencies.logger;
  const governor =
    dependencies.governor ??
    createRateGovernor({ minIntervalMs: config.minRequestIntervalMs, now });
  const retryPolicy =
    dependencies.retryPolicy ??
    createRetryPolicy({
      maxAttempts: config.apiMaxAttempts,
      baseDelayMs: config.apiRetryBaseMs,
      maxDelayMs: config.apiRetryMaxMs,
      onRetry({ attempt, delayMs }) {
        logger?.warn(
          `rate limited, backing off (attempt=${attempt}, delayMs=${delayMs})`
        );
      }
    });

  const sendOnce = async (
    url: string,
    headers: RequestHeaders
  ): Promise<AdsRecord[]> => {
    await governor.waitForTurn();

    const refreshed = await tokenManager.ensureFreshToken();
    if (refreshed || !headers.Authorization) {
      headers.Authorization = credentials.getAuthorizationHeader();
    }

    const response = await fetchWithTimeout(
      fetchImpl,
      url,
      {
        method: "GET",
        headers: {
          Accept: "application/json",
          "User-Agent": config.userAgent,
          ...headers
        }
      },
      config.apiTimeoutMs
    );

    if (response.status === 429) {
      const body = await response.text();
      throw new RateLimitedError(
        body,
        parseRetryAfterMs(response.headers.get("Retry-After"), now())
      );
    }

    if (response.status !== 200) {
      throw new RequestFailedError(response.status, await response.text());
    }

    const text = await response.text();
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      throw new Error(`Invalid ads response: body is not JSON (url=${url})`);
    }

    return parseDataField(payload);
  };

  return {
    async fetchRecords(
      endpoint: string,
      query: QueryParams,
      headers: RequestHeaders
    ): Promise<AdsRecord[]> {
      const url = buildRequestUrl(
        config.apiBaseUrl,
        credentials.accountId,
        endpoint,
        query
      );

      logger?.debug(`requesting ${url}`);

      return retryPolicy.execute(() => sendOnce(url, headers), classifyFetchError);
    }
  };
}
