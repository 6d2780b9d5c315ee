#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { type Config, loadConfig } from "./config.js";
import { SERVER_NAME, createMcpServer, createToolDeps } from "./server.js";
import { startHttpServer } from "./transports/http.js";
import { createLogger } from "./utils/logger.js";

const logger = createLogger("server");

async function main() {
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    logger.error({ error }, "Failed to load config. Check MCP_TRANSPORT, PORT and API base URLs.");
    process.exit(1);
  }

  const deps = createToolDeps(config);

  if (!deps.credentials.getGoogleAccessToken()) {
    logger.warn("GOOGLE_ACCESS_TOKEN is not set; calendar tools will fail until it is.");
  }
  if (!deps.credentials.getTicketmasterApiKey()) {
    logger.warn("TICKETMASTER_API_KEY is not set; Ticketmaster tools will report an error.");
  }

  if (config.server.transport === "http") {
    await startHttpServer(config, deps);
    return;
  }

  const server = createMcpServer(config, deps);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`${SERVER_NAME} started on stdio`);
}

main().catch((error) => {
  logger.error({ error }, "Fatal error starting server");
  process.exit(1);
});
