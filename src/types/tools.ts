import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CredentialProvider } from "../auth/credentials.js";
import type { GoogleCalendarClient } from "../clients/google-calendar.js";
import type { TicketmasterClient } from "../clients/ticketmaster.js";
import type { Config } from "../config.js";

/** Collaborators shared by all tool handlers. None of them hold per-call state. */
export interface ToolDeps {
  readonly calendar: GoogleCalendarClient;
  readonly ticketmaster: TicketmasterClient;
  readonly credentials: CredentialProvider;
}

/** Signature for tool registration functions. */
export type ToolRegistrationFn = (server: McpServer, deps: ToolDeps, config: Config) => void;

/** Standard MCP tool result shape returned by all tool handlers. */
export type ToolResult = { content: Array<{ type: "text"; text: string }>; isError?: boolean };
