import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { type CredentialProvider, EnvCredentialProvider } from "./auth/credentials.js";
import { GoogleCalendarClient } from "./clients/google-calendar.js";
import { TicketmasterClient } from "./clients/ticketmaster.js";
import type { Config } from "./config.js";
import { registerCalendarCreateTools } from "./tools/calendar-create.js";
import { registerCalendarDeleteTools } from "./tools/calendar-delete.js";
import { registerCalendarEventTools } from "./tools/calendar-events.js";
import { registerCalendarUpdateTools } from "./tools/calendar-update.js";
import { registerTicketmasterConcertTools } from "./tools/ticketmaster-concerts.js";
import { registerTicketmasterSearchTools } from "./tools/ticketmaster-search.js";
import type { ToolDeps, ToolRegistrationFn } from "./types/tools.js";

export const SERVER_NAME = "calendar-tickets-mcp";
export const SERVER_VERSION = "0.1.0";

const registrations: ToolRegistrationFn[] = [
  registerCalendarEventTools,
  registerCalendarCreateTools,
  registerCalendarUpdateTools,
  registerCalendarDeleteTools,
  registerTicketmasterSearchTools,
  registerTicketmasterConcertTools,
];

/**
 * Creates the vendor clients from config. Credentials default to the
 * environment, read at call time.
 */
export function createToolDeps(
  config: Config,
  credentials: CredentialProvider = new EnvCredentialProvider(),
): ToolDeps {
  return {
    calendar: new GoogleCalendarClient({
      baseUrl: config.calendar.apiBase,
      calendarId: config.calendar.calendarId,
    }),
    ticketmaster: new TicketmasterClient({ baseUrl: config.ticketmaster.apiBase }),
    credentials,
  };
}

/** Builds an MCP server with every tool registered. */
export function createMcpServer(config: Config, deps: ToolDeps = createToolDeps(config)): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  for (const register of registrations) {
    register(server, deps, config);
  }
  return server;
}
