import { buildReportRowsForRange, isIsoDate, type MockDataset } from "./mockData";

export interface MockApiState {
  dataset: MockDataset;
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  rateLimitEvery: number;
  issuedTokens: Set<string>;
  dataRequests: number;
}

export interface MockRequest {
  method: string;
  url: URL;
  authorization: string | null;
  body: string;
}

export interface MockResponse {
  statusCode: number;
  payload: unknown;
}

const ACCOUNT_PATH = /^\/api\/v2\.0\/accounts\/([^/]+)(\/reports|\/ads|\/campaigns|\/ad_groups)?\/?$/;

export function createMockApiState(
  dataset: MockDataset,
  options: Pick<MockApiState, "clientId" | "clientSecret" | "refreshToken" | "rateLimitEvery">
): MockApiState {
  return {
    dataset,
    ...options,
    issuedTokens: new Set<string>(),
    dataRequests: 0
  };
}

function handleTokenRequest(state: MockApiState, request: MockRequest): MockResponse {
  const expected = `Basic ${Buffer.from(`${state.clientId}:${state.clientSecret}`, "utf8").toString("base64")}`;
  if (request.authorization !== expected) {
    return { statusCode: 401, payload: { message: "Unauthorized", error: 401 } };
  }

  const form = new URLSearchParams(request.body);
  if (
    form.get("grant_type") !== "refresh_token" ||
    form.get("refresh_token") !== state.refreshToken
  ) {
    return { statusCode: 400, payload: { error: "invalid_grant" } };
  }

  const accessToken = `mock-access-${state.issuedTokens.size + 1}`;
  state.issuedTokens.add(accessToken);

  return {
    statusCode: 200,
    payload: {
      access_token: accessToken,
      token_type: "bearer",
      expires_in: 3600,
      refresh_token: state.refreshToken,
      scope: "adsread"
    }
  };
}

function isAuthorized(state: MockApiState, authorization: string | null): boolean {
  if (!authorization) {
    return false;
  }

  const [scheme, token] = authorization.split(" ");
  return scheme.toLowerCase() === "bearer" && state.issuedTokens.has(token ?? "");
}

function handleDataRequest(
  state: MockApiState,
  request: MockRequest,
  accountId: string,
  resource: string | undefined
): MockResponse {
  if (!isAuthorized(state, request.authorization)) {
    return { statusCode: 401, payload: { message: "Unauthorized" } };
  }

  state.dataRequests += 1;
  if (state.rateLimitEvery > 0 && state.dataRequests % state.rateLimitEvery === 0) {
    return { statusCode: 429, payload: { message: "Too Many Requests" } };
  }

  const { dataset } = state;
  if (accountId !== dataset.account.id) {
    return { statusCode: 404, payload: { message: "Account not found" } };
  }

  switch (resource) {
    case undefined:
      return { statusCode: 200, payload: { data: dataset.account } };
    case "/campaigns":
      return { statusCode: 200, payload: { data: dataset.campaigns } };
    case "/ad_groups":
      return { statusCode: 200, payload: { data: dataset.adGroups } };
    case "/ads":
      return { statusCode: 200, payload: { data: dataset.ads } };
    case "/reports": {
      const startsAt = request.url.searchParams.get("starts_at") ?? "";
      const endsAt = request.url.searchParams.get("ends_at") ?? "";

      if (!isIsoDate(startsAt) || !isIsoDate(endsAt) || startsAt > endsAt) {
        return {
          statusCode: 400,
          payload: { message: "starts_at and ends_at must be YYYY-MM-DD dates" }
        };
      }

      return {
        statusCode: 200,
        payload: { data: buildReportRowsForRange(dataset, startsAt, endsAt) }
      };
    }
    default:
      return { statusCode: 404, payload: { message: "Not Found" } };
  }
}

export function routeRequest(state: MockApiState, request: MockRequest): MockResponse {
  const { pathname } = request.url;

  if (pathname === "/health") {
    return { statusCode: 200, payload: { status: "ok" } };
  }

  if (pathname === "/api/v1/access_token") {
    return request.method === "POST"
      ? handleTokenRequest(state, request)
      : { statusCode: 405, payload: { message: "Method Not Allowed" } };
  }

  const match = ACCOUNT_PATH.exec(pathname);
  if (!match) {
    return { statusCode: 404, payload: { message: "Not Found" } };
  }

  if (request.method !== "GET") {
    return { statusCode: 405, payload: { message: "Method Not Allowed" } };
  }

  return handleDataRequest(state, request, match[1], match[2]);
}
