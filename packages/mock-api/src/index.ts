import { createServer, type IncomingMessage, type ServerResponse } from "node:http";

import { buildMockDataset } from "./mockData";
import { createMockApiState, routeRequest } from "./routes";

const port = Number.parseInt(process.env.PORT ?? "3100", 10);

const state = createMockApiState(
  buildMockDataset(
    process.env.MOCK_ACCOUNT_ID ?? "t2_mockaccount",
    Number.parseInt(process.env.MOCK_CAMPAIGNS ?? "3", 10)
  ),
  {
    clientId: process.env.MOCK_CLIENT_ID ?? "mock-client",
    clientSecret: process.env.MOCK_CLIENT_SECRET ?? "mock-secret",
    refreshToken: process.env.MOCK_REFRESH_TOKEN ?? "mock-refresh-token",
    rateLimitEvery: Number.parseInt(process.env.MOCK_RATE_LIMIT_EVERY ?? "0", 10)
  }
);

function writeJson(
  response: ServerResponse,
  statusCode: number,
  payload: unknown
): void {
  response.statusCode = statusCode;
  response.setHeader("Content-Type", "application/json");
  response.end(JSON.stringify(payload));
}

async function readBody(request: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];

  for await (const chunk of request) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }

  return Buffer.concat(chunks).toString("utf8");
}

const server = createServer((request, response) => {
  if (!request.url) {
    writeJson(response, 400, { error: "Missing URL" });
    return;
  }

  const url = new URL(request.url, `http://localhost:${port}`);

  readBody(request)
    .then((body) => {
      const result = routeRequest(state, {
        method: request.method ?? "GET",
        url,
        authorization: request.headers.authorization ?? null,
        body
      });
      writeJson(response, result.statusCode, result.payload);
    })
    .catch((error: unknown) => {
      writeJson(response, 500, {
        error: "Internal Server Error",
        message: error instanceof Error ? error.message : "unknown error"
      });
    });
});

server.listen(port, "0.0.0.0", () => {
  console.log(
    `mock ads api listening on port ${port} (account=${state.dataset.account.id}, ads=${state.dataset.ads.length})`
  );
});
