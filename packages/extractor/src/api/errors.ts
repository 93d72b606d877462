export class AuthFailureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AuthFailureError";
  }
}

export class RateLimitedError extends Error {
  readonly retryAfterMs: number | null;

  constructor(body: string, retryAfterMs: number | null) {
    super(
      body
        ? `Ads API request was rate limited (status 429): ${body}`
        : "Ads API request was rate limited (status 429)"
    );
    this.name = "RateLimitedError";
    this.retryAfterMs = retryAfterMs;
  }
}

export class RequestFailedError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(
      body
        ? `Ads API request failed with status ${status}: ${body}`
        : `Ads API request failed with status ${status}`
    );
    this.name = "RequestFailedError";
    this.status = status;
    this.body = body;
  }
}

export class RequestTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Ads API request timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}
