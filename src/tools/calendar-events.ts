import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { requireGoogleAccessToken } from "../auth/credentials.js";
import type { GoogleCalendarClient } from "../clients/google-calendar.js";
import type { Config } from "../config.js";
import {
  GetCalendarEventParams,
  type GetCalendarEventParamsType,
  ListCalendarEventsParams,
  type ListCalendarEventsParamsType,
} from "../schemas/calendar.js";
import type { ToolDeps } from "../types/tools.js";
import { type FormattedDocument, formatEventToDocument } from "../utils/calendar-format.js";
import { McpToolError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { errorResult, jsonResult } from "../utils/tool-result.js";

const logger = createLogger("tools:calendar-events");

export interface CalendarEventPage {
  events: FormattedDocument[];
  totalReturned: number;
  /** Present only when the calendar has more events than were returned. */
  nextPageToken?: string;
  hasMore?: true;
}

/**
 * Fetches one page of events. Never follows `nextPageToken`; the caller
 * passes it back as `page_token` to continue.
 */
export async function listCalendarEvents(
  client: GoogleCalendarClient,
  accessToken: string,
  params: ListCalendarEventsParamsType,
): Promise<CalendarEventPage> {
  const response = await client.listEvents(accessToken, {
    maxResults: params.max_results,
    timeMin: params.time_min,
    timeMax: params.time_max,
    q: params.search_query,
    pageToken: params.page_token,
  });

  const events = response.items.map(formatEventToDocument);
  const page: CalendarEventPage = { events, totalReturned: events.length };
  if (response.nextPageToken) {
    page.nextPageToken = response.nextPageToken;
    page.hasMore = true;
  }
  return page;
}

export async function getCalendarEvent(
  client: GoogleCalendarClient,
  accessToken: string,
  params: GetCalendarEventParamsType,
): Promise<FormattedDocument> {
  return formatEventToDocument(await client.getEvent(accessToken, params.event_id));
}

export function registerCalendarEventTools(
  server: McpServer,
  deps: ToolDeps,
  _config: Config,
): void {
  server.tool(
    "list_calendar_events",
    "List events from the calendar, ordered by start time, with optional time window and free-text filtering. Returns at most one page; when more events exist the result carries nextPageToken, which can be passed back as page_token.",
    ListCalendarEventsParams.shape,
    async (params) => {
      try {
        const parsed = ListCalendarEventsParams.parse(params);
        const accessToken = requireGoogleAccessToken(deps.credentials);

        const page = await listCalendarEvents(deps.calendar, accessToken, parsed);

        logger.info(
          { tool: "list_calendar_events", eventCount: page.totalReturned, hasMore: !!page.hasMore },
          "list_calendar_events completed",
        );

        return jsonResult(page);
      } catch (error) {
        if (error instanceof McpToolError) {
          return errorResult(error);
        }
        throw error;
      }
    },
  );

  server.tool(
    "get_calendar_event",
    "Get full details of a single calendar event, including description, attendees with response status, video conference link and a Markdown rendering.",
    GetCalendarEventParams.shape,
    async (params) => {
      try {
        const parsed = GetCalendarEventParams.parse(params);
        const accessToken = requireGoogleAccessToken(deps.credentials);

        const document = await getCalendarEvent(deps.calendar, accessToken, parsed);

        logger.info(
          { tool: "get_calendar_event", eventId: parsed.event_id },
          "get_calendar_event completed",
        );

        return jsonResult(document);
      } catch (error) {
        if (error instanceof McpToolError) {
          return errorResult(error);
        }
        throw error;
      }
    },
  );
}
