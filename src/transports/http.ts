import { type IncomingMessage, type Server, type ServerResponse, createServer } from "node:http";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { Config } from "../config.js";
import { createMcpServer } from "../server.js";
import type { ToolDeps } from "../types/tools.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("transport:http");

export const MCP_PATH = "/mcp";

function writeJsonRpcError(res: ServerResponse, status: number, code: number, message: string) {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify({ jsonrpc: "2.0", error: { code, message }, id: null }));
}

/** Largest accepted JSON-RPC request body. */
export const MAX_BODY_BYTES = 4 * 1024 * 1024;

class BodyTooLargeError extends Error {
  readonly receivedBytes: number;

  constructor(receivedBytes: number) {
    super(`Request body exceeds ${MAX_BODY_BYTES} bytes`);
    this.name = "BodyTooLargeError";
    this.receivedBytes = receivedBytes;
  }
}

/**
 * Reads and parses the request body. Bytes past MAX_BODY_BYTES are drained
 * but not kept, so the connection can still carry the 413 answer.
 */
async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let received = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    received += buffer.length;
    if (received <= MAX_BODY_BYTES) {
      chunks.push(buffer);
    }
  }
  if (received > MAX_BODY_BYTES) {
    throw new BodyTooLargeError(received);
  }
  return JSON.parse(Buffer.concat(chunks).toString("utf8"));
}

/**
 * Stateless streamable HTTP: every POST gets its own server and transport,
 * so no session state outlives a request.
 */
async function handleMcpRequest(
  req: IncomingMessage,
  res: ServerResponse,
  config: Config,
  deps: ToolDeps,
): Promise<void> {
  let body: unknown;
  try {
    body = await readJsonBody(req);
  } catch (error) {
    if (error instanceof BodyTooLargeError) {
      logger.warn({ receivedBytes: error.receivedBytes }, "Rejected oversized MCP request");
      writeJsonRpcError(res, 413, -32600, "Request body too large");
      return;
    }
    if (error instanceof SyntaxError) {
      writeJsonRpcError(res, 400, -32700, "Parse error");
      return;
    }
    throw error;
  }

  const server = createMcpServer(config, deps);
  const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
  res.on("close", () => {
    Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
      logger.warn({ error }, "Failed to close MCP request scope");
    });
  });

  await server.connect(transport);
  await transport.handleRequest(req, res, body);
}

export function startHttpServer(config: Config, deps: ToolDeps): Promise<Server> {
  const httpServer = createServer((req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    if (url.pathname !== MCP_PATH) {
      writeJsonRpcError(res, 404, -32601, "Not found");
      return;
    }
    if (req.method !== "POST") {
      res.setHeader("Allow", "POST");
      writeJsonRpcError(res, 405, -32000, "Method not allowed");
      return;
    }

    handleMcpRequest(req, res, config, deps).catch((error: unknown) => {
      logger.error({ error }, "Failed to handle MCP request");
      if (!res.headersSent) {
        writeJsonRpcError(res, 500, -32603, "Internal server error");
      }
    });
  });

  return new Promise((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(config.server.port, config.server.host, () => {
      httpServer.off("error", reject);
      logger.info(
        { host: config.server.host, port: config.server.port, path: MCP_PATH },
        "HTTP transport listening",
      );
      resolve(httpServer);
    });
  });
}
