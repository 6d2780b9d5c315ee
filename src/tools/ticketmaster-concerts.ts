import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { requireTicketmasterApiKey } from "../auth/credentials.js";
import type { TicketmasterClient } from "../clients/ticketmaster.js";
import type { Config } from "../config.js";
import { FindConcertsParams, GetConcertsParams } from "../schemas/ticketmaster.js";
import type { ToolDeps } from "../types/tools.js";
import {
  type TimeRange,
  coveringWindow,
  formatUtcTimestamp,
  isFullyContained,
} from "../utils/date-range.js";
import { type EventDetail, extractEventDetails } from "../utils/event-details.js";
import { createLogger } from "../utils/logger.js";
import { jsonResult } from "../utils/tool-result.js";

const logger = createLogger("tools:ticketmaster-concerts");

/** Page size of the single upstream query. */
export const CONCERT_SEARCH_SIZE = 30;

export interface ConcertSearchParams {
  readonly city: string;
  readonly stateCode: string;
  readonly ranges: readonly TimeRange[];
  readonly genre?: string;
}

/**
 * Finds music events in a city that fit entirely inside at least one of
 * `ranges`.
 *
 * Issues one query over the window covering all ranges, then filters the
 * listings against each individual range. Listings keep vendor order.
 * Any failure is logged and yields an empty list.
 */
export async function searchConcerts(
  client: TicketmasterClient,
  apiKey: string | undefined,
  params: ConcertSearchParams,
): Promise<EventDetail[]> {
  const window = coveringWindow(params.ranges);
  if (!window) return [];

  try {
    const { events } = await client.searchEvents(requireTicketmasterApiKey(apiKey), {
      city: params.city,
      stateCode: params.stateCode,
      classificationName: "Music",
      genreName: params.genre || undefined,
      startDateTime: formatUtcTimestamp(window.start),
      endDateTime: formatUtcTimestamp(window.end),
      sort: "relevance,desc",
      size: CONCERT_SEARCH_SIZE,
    });

    return events
      .filter((event) => isFullyContained(event, params.ranges))
      .map(extractEventDetails);
  } catch (error) {
    logger.error(
      { error, city: params.city, stateCode: params.stateCode, rangeCount: params.ranges.length },
      "Concert search failed; returning no concerts",
    );
    return [];
  }
}

function toTimeRange(start: string, end: string): TimeRange {
  return { start: new Date(start), end: new Date(end) };
}

export function registerTicketmasterConcertTools(
  server: McpServer,
  deps: ToolDeps,
  _config: Config,
): void {
  server.tool(
    "get_concerts",
    "Find concerts on Ticketmaster that start and end within the given time window, with venue, price and public ticket sale times. Defaults to Toronto, ON. Returns an empty list when the search fails.",
    GetConcertsParams.shape,
    async (params) => {
      const parsed = GetConcertsParams.parse(params);

      const concerts = await searchConcerts(
        deps.ticketmaster,
        deps.credentials.getTicketmasterApiKey(),
        {
          city: parsed.city,
          stateCode: parsed.state_code,
          ranges: [toTimeRange(parsed.start_time, parsed.end_time)],
          genre: parsed.genre,
        },
      );

      logger.info(
        { tool: "get_concerts", concertCount: concerts.length },
        "get_concerts completed",
      );

      return jsonResult({ concerts, totalReturned: concerts.length });
    },
  );

  server.tool(
    "find_concerts_in_time_ranges",
    "Find concerts in a city that fit entirely inside at least one of several time windows (e.g. free evenings), with venue, price and public ticket sale times. Returns an empty list when the search fails.",
    FindConcertsParams.shape,
    async (params) => {
      const parsed = FindConcertsParams.parse(params);

      const concerts = await searchConcerts(
        deps.ticketmaster,
        deps.credentials.getTicketmasterApiKey(),
        {
          city: parsed.city,
          stateCode: parsed.state_code,
          ranges: parsed.time_ranges.map((range) => toTimeRange(range.start, range.end)),
          genre: parsed.genre,
        },
      );

      logger.info(
        {
          tool: "find_concerts_in_time_ranges",
          rangeCount: parsed.time_ranges.length,
          concertCount: concerts.length,
        },
        "find_concerts_in_time_ranges completed",
      );

      return jsonResult({ concerts, totalReturned: concerts.length });
    },
  );
}
