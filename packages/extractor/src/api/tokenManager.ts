import type { CredentialStore, TokenGrant } from "./credentialStore";
import { AuthFailureError } from "./errors";

type FetchLike = typeof fetch;

export interface TokenManager {
  ensureFreshToken: () => Promise<boolean>;
}

export interface TokenManagerOptions {
  authUrl: string;
  userAgent: string;
  fetchImpl?: FetchLike;
  now?: () => number;
}

interface RecordLike {
  [key: string]: unknown;
}

function isRecordLike(value: unknown): value is RecordLike {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function encodeBasicAuth(clientId: string, clientSecret: string): string {
  return Buffer.from(`${clientId}:${clientSecret}`, "utf8").toString("base64");
}

export function parseTokenGrant(payload: unknown): TokenGrant {
  if (!isRecordLike(payload)) {
    throw new AuthFailureError("Invalid token response: expected object");
  }

  const { access_token: accessToken, refresh_token: refreshToken, expires_in: expiresIn } =
    payload;

  if (typeof accessToken !== "string" || accessToken.length === 0) {
    throw new AuthFailureError("Invalid token response: missing access_token");
  }

  if (typeof expiresIn !== "number" || !Number.isFinite(expiresIn)) {
    throw new AuthFailureError("Invalid token response: missing expires_in");
  }

  return {
    accessToken,
    refreshToken:
      typeof refreshToken === "string" && refreshToken.length > 0
        ? refreshToken
        : null,
    expiresInSeconds: expiresIn
  };
}

export function createTokenManager(
  store: CredentialStore,
  options: TokenManagerOptions
): TokenManager {
  const fetchImpl = options.fetchImpl ?? fetch;
  const now = options.now ?? Date.now;

  const requestGrant = async (): Promise<TokenGrant> => {
    const body = new URLSearchParams({
      grant_type: "refresh_token",
      refresh_token: store.getRefreshToken()
    });

    const response = await fetchImpl(options.authUrl, {
      method: "POST",
      headers: {
        Authorization: `Basic ${encodeBasicAuth(store.clientId, store.clientSecret)}`,
        "Content-Type": "application/x-www-form-urlencoded",
        "User-Agent": options.userAgent
      },
      body: body.toString()
    });

    const text = await response.text();

    if (!response.ok) {
      throw new AuthFailureError(
        text
          ? `Token refresh failed with status ${response.status}: ${text}`
          : `Token refresh failed with status ${response.status}`
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      throw new AuthFailureError("Invalid token response: body is not JSON");
    }

    return parseTokenGrant(payload);
  };

  return {
    async ensureFreshToken(): Promise<boolean> {
      if (!store.needsRefresh(now())) {
        return false;
      }

      const grant = await requestGrant();
      store.applyGrant(grant, now());
      return true;
    }
  };
}
