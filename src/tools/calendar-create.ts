import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { requireGoogleAccessToken } from "../auth/credentials.js";
import type { GoogleCalendarClient } from "../clients/google-calendar.js";
import type { Config } from "../config.js";
import {
  CreateCalendarEventParams,
  type CreateCalendarEventParamsType,
} from "../schemas/calendar-write.js";
import type { CalendarEventInput } from "../schemas/google-calendar-api.js";
import type { ToolDeps } from "../types/tools.js";
import {
  type FormattedDocument,
  formatEventToDocument,
  toEventDateTimeInput,
} from "../utils/calendar-format.js";
import { McpToolError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { toAttendees } from "../utils/recipients.js";
import { errorResult, jsonResult } from "../utils/tool-result.js";

const logger = createLogger("tools:calendar-create");

export function buildCreateBody(
  params: CreateCalendarEventParamsType,
  defaultTimeZone: string,
): CalendarEventInput {
  const timeZone = params.timezone ?? defaultTimeZone;
  const body: CalendarEventInput = {
    summary: params.title,
    description: params.description,
    start: toEventDateTimeInput(params.start_time, timeZone),
    end: toEventDateTimeInput(params.end_time, timeZone),
  };
  if (params.location) body.location = params.location;
  if (params.attendees) body.attendees = toAttendees(params.attendees);
  return body;
}

export async function createCalendarEvent(
  client: GoogleCalendarClient,
  accessToken: string,
  params: CreateCalendarEventParamsType,
  defaultTimeZone: string,
): Promise<FormattedDocument> {
  const created = await client.insertEvent(accessToken, buildCreateBody(params, defaultTimeZone));
  return formatEventToDocument(created);
}

export function registerCalendarCreateTools(
  server: McpServer,
  deps: ToolDeps,
  config: Config,
): void {
  server.tool(
    "create_calendar_event",
    `Create a new calendar event with optional description, location and attendees. Times are wall-clock times in the given timezone (default: ${config.calendar.defaultTimeZone}).`,
    CreateCalendarEventParams.shape,
    { destructiveHint: true },
    async (params) => {
      const startTime = Date.now();
      try {
        const parsed = CreateCalendarEventParams.parse(params);
        const accessToken = requireGoogleAccessToken(deps.credentials);

        const document = await createCalendarEvent(
          deps.calendar,
          accessToken,
          parsed,
          config.calendar.defaultTimeZone,
        );

        logger.info(
          {
            tool: "create_calendar_event",
            attendeeCount: document.attendeesCount,
            duration_ms: Date.now() - startTime,
          },
          "create_calendar_event completed",
        );

        return jsonResult(document);
      } catch (error) {
        if (error instanceof McpToolError) {
          logger.warn(
            {
              tool: "create_calendar_event",
              status: error.httpStatus,
              code: error.code,
              duration_ms: Date.now() - startTime,
            },
            "create_calendar_event failed",
          );
          return errorResult(error);
        }
        throw error;
      }
    },
  );
}
