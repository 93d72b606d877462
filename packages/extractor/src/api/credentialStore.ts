import type { Credentials, ExtractorConfig } from "../types";

export interface TokenGrant {
  accessToken: string;
  refreshToken: string | null;
  expiresInSeconds: number;
}

export interface CredentialStore {
  readonly accountId: string;
  readonly clientId: string;
  readonly clientSecret: string;
  needsRefresh: (nowMs: number) => boolean;
  applyGrant: (grant: TokenGrant, nowMs: number) => void;
  getRefreshToken: () => string;
  getAuthorizationHeader: () => string;
  snapshot: () => Credentials;
}

export function credentialsFromConfig(config: ExtractorConfig): Credentials {
  return {
    accountId: config.accountId,
    clientId: config.clientId,
    clientSecret: config.clientSecret,
    refreshToken: config.refreshToken,
    accessToken: config.accessToken,
    expiresAt: config.expiresAt
  };
}

export function createCredentialStore(initial: Credentials): CredentialStore {
  const credentials: Credentials = { ...initial };

  return {
    accountId: credentials.accountId,
    clientId: credentials.clientId,
    clientSecret: credentials.clientSecret,
    needsRefresh(nowMs: number): boolean {
      return (
        credentials.accessToken === null ||
        credentials.expiresAt === null ||
        credentials.expiresAt < nowMs
      );
    },
    applyGrant(grant: TokenGrant, nowMs: number): void {
      credentials.accessToken = grant.accessToken;
      if (grant.refreshToken !== null) {
        credentials.refreshToken = grant.refreshToken;
      }
      credentials.expiresAt = nowMs + grant.expiresInSeconds * 1000;
    },
    getRefreshToken(): string {
      return credentials.refreshToken;
    },
    getAuthorizationHeader(): string {
      if (credentials.accessToken === null) {
        throw new Error("No access token available; refresh the token first");
      }

      return `bearer ${credentials.accessToken}`;
    },
    snapshot(): Credentials {
      return { ...credentials };
    }
  };
}
