import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { MISSING_TICKETMASTER_KEY_MESSAGE } from "../auth/credentials.js";
import type { EventSearchQuery, TicketmasterClient } from "../clients/ticketmaster.js";
import type { Config } from "../config.js";
import {
  SearchTicketmasterEventsParams,
  type SearchTicketmasterEventsParamsType,
} from "../schemas/ticketmaster.js";
import type { ToolDeps } from "../types/tools.js";
import { McpToolError, formatErrorForUser } from "../utils/errors.js";
import { type EventSummary, extractEventSummary } from "../utils/event-details.js";
import { createLogger } from "../utils/logger.js";
import { jsonResult } from "../utils/tool-result.js";

const logger = createLogger("tools:ticketmaster-search");

/** Discovery API page size limit. */
export const MAX_SEARCH_SIZE = 200;

export type TicketmasterSearchResult =
  | { events: EventSummary[]; totalReturned: number; totalAvailable: number }
  | { error: string };

/**
 * Maps tool parameters to Discovery API query parameters. Empty strings
 * count as absent; dates become whole-day UTC bounds.
 */
export function buildSearchQuery(params: SearchTicketmasterEventsParamsType): EventSearchQuery {
  return {
    size: Math.min(params.size, MAX_SEARCH_SIZE),
    countryCode: params.country_code,
    keyword: params.keyword || undefined,
    city: params.city || undefined,
    stateCode: params.state || undefined,
    postalCode: params.postal_code || undefined,
    classificationName: params.category || undefined,
    genreName: params.genre || undefined,
    startDateTime: params.start_date ? `${params.start_date}T00:00:00Z` : undefined,
    endDateTime: params.end_date ? `${params.end_date}T23:59:59Z` : undefined,
  };
}

/**
 * Searches listings by filters. Failures are reported in the result's
 * `error` field instead of being thrown.
 */
export async function searchTicketmasterEvents(
  client: TicketmasterClient,
  apiKey: string | undefined,
  params: SearchTicketmasterEventsParamsType,
): Promise<TicketmasterSearchResult> {
  if (!apiKey) {
    return { error: MISSING_TICKETMASTER_KEY_MESSAGE };
  }

  try {
    const result = await client.searchEvents(apiKey, buildSearchQuery(params));
    const events = result.events.map(extractEventSummary);
    return {
      events,
      totalReturned: events.length,
      totalAvailable: result.totalElements ?? 0,
    };
  } catch (error) {
    if (error instanceof McpToolError) {
      return { error: `Failed to search Ticketmaster events: ${formatErrorForUser(error)}` };
    }
    throw error;
  }
}

export function registerTicketmasterSearchTools(
  server: McpServer,
  deps: ToolDeps,
  _config: Config,
): void {
  server.tool(
    "search_ticketmaster_events",
    "Search Ticketmaster events by keyword, location, category, genre and date range. Returns name, date, venue, classification and price range for each match. Problems are reported in an 'error' field.",
    SearchTicketmasterEventsParams.shape,
    async (params) => {
      const parsed = SearchTicketmasterEventsParams.parse(params);

      const result = await searchTicketmasterEvents(
        deps.ticketmaster,
        deps.credentials.getTicketmasterApiKey(),
        parsed,
      );

      if ("error" in result) {
        logger.warn({ tool: "search_ticketmaster_events", reason: result.error }, "search failed");
      } else {
        logger.info(
          {
            tool: "search_ticketmaster_events",
            eventCount: result.totalReturned,
            totalAvailable: result.totalAvailable,
          },
          "search_ticketmaster_events completed",
        );
      }

      return jsonResult(result);
    },
  );
}
