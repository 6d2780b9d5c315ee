import type { Server } from "node:http";
import { http, passthrough } from "msw";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { StaticCredentialProvider } from "../src/auth/credentials.js";
import { createToolDeps } from "../src/server.js";
import { MAX_BODY_BYTES, MCP_PATH, startHttpServer } from "../src/transports/http.js";
import { testConfig } from "./helpers/mcp-test-client.js";
import { server as mswServer } from "./mocks/server.js";

describe("HTTP transport", () => {
  let httpServer: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const config = { ...testConfig, server: { ...testConfig.server, host: "127.0.0.1", port: 0 } };
    httpServer = await startHttpServer(
      config,
      createToolDeps(config, new StaticCredentialProvider({})),
    );
    const address = httpServer.address();
    const port = typeof address === "object" && address !== null ? address.port : 0;
    baseUrl = `http://127.0.0.1:${port}`;
  });

  beforeEach(() => {
    // Loopback requests reach the real listener instead of the vendor mocks.
    mswServer.use(http.all(/^http:\/\/127\.0\.0\.1:\d+\//, () => passthrough()));
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => (error ? reject(error) : resolve()));
    });
  });

  it("should answer 404 outside the MCP path", async () => {
    const response = await fetch(`${baseUrl}/health`, { method: "POST", body: "{}" });
    expect(response.status).toBe(404);
  });

  it("should answer 405 for non-POST requests", async () => {
    const response = await fetch(`${baseUrl}${MCP_PATH}`);
    expect(response.status).toBe(405);
    expect(response.headers.get("Allow")).toBe("POST");
  });

  it("should answer a JSON-RPC parse error for malformed bodies", async () => {
    const response = await fetch(`${baseUrl}${MCP_PATH}`, { method: "POST", body: "{not json" });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      jsonrpc: "2.0",
      error: { code: -32700, message: "Parse error" },
      id: null,
    });
  });

  it("should answer 413 for bodies over the size limit", async () => {
    const response = await fetch(`${baseUrl}${MCP_PATH}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: `"${"x".repeat(MAX_BODY_BYTES)}"`,
    });
    expect(response.status).toBe(413);
    expect(await response.json()).toEqual({
      jsonrpc: "2.0",
      error: { code: -32600, message: "Request body too large" },
      id: null,
    });
  });
});
