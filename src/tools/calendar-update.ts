import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { requireGoogleAccessToken } from "../auth/credentials.js";
import type { GoogleCalendarClient } from "../clients/google-calendar.js";
import type { Config } from "../config.js";
import {
  UpdateCalendarEventParams,
  type UpdateCalendarEventParamsType,
} from "../schemas/calendar-write.js";
import type { CalendarEvent, CalendarEventInput } from "../schemas/google-calendar-api.js";
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

const logger = createLogger("tools:calendar-update");

const UPDATABLE_FIELDS = [
  "title",
  "start_time",
  "end_time",
  "description",
  "location",
  "attendees",
] as const;

export function countChangedFields(params: UpdateCalendarEventParamsType): number {
  return UPDATABLE_FIELDS.filter((field) => params[field] !== undefined).length;
}

/**
 * Overlays the supplied fields on the stored event. Everything else in
 * `current`, including fields this server does not model, is carried over.
 */
export function applyEventChanges(
  current: CalendarEvent,
  params: UpdateCalendarEventParamsType,
  defaultTimeZone: string,
): CalendarEventInput {
  const timeZone = params.timezone ?? defaultTimeZone;
  const next: CalendarEventInput = { ...current };

  if (params.title !== undefined) next.summary = params.title;
  if (params.description !== undefined) next.description = params.description;
  if (params.location !== undefined) next.location = params.location;
  if (params.start_time !== undefined) {
    next.start = toEventDateTimeInput(params.start_time, timeZone);
  }
  if (params.end_time !== undefined) {
    next.end = toEventDateTimeInput(params.end_time, timeZone);
  }
  if (params.attendees !== undefined) next.attendees = toAttendees(params.attendees);

  return next;
}

/**
 * Read-modify-write: fetches the event, applies the changes and replaces the
 * whole document. A concurrent edit between the two calls is overwritten.
 */
export async function updateCalendarEvent(
  client: GoogleCalendarClient,
  accessToken: string,
  params: UpdateCalendarEventParamsType,
  defaultTimeZone: string,
): Promise<FormattedDocument> {
  const current = await client.getEvent(accessToken, params.event_id);
  const next = applyEventChanges(current, params, defaultTimeZone);
  const updated = await client.updateEvent(accessToken, params.event_id, next);
  return formatEventToDocument(updated);
}

export function registerCalendarUpdateTools(
  server: McpServer,
  deps: ToolDeps,
  config: Config,
): void {
  server.tool(
    "update_calendar_event",
    "Update an existing calendar event. Only the fields provided are changed; all other fields keep their current values. attendees replaces the whole attendee list.",
    UpdateCalendarEventParams.shape,
    { destructiveHint: true },
    async (params) => {
      const startTime = Date.now();
      try {
        const parsed = UpdateCalendarEventParams.parse(params);
        const accessToken = requireGoogleAccessToken(deps.credentials);

        const document = await updateCalendarEvent(
          deps.calendar,
          accessToken,
          parsed,
          config.calendar.defaultTimeZone,
        );

        logger.info(
          {
            tool: "update_calendar_event",
            fieldCount: countChangedFields(parsed),
            duration_ms: Date.now() - startTime,
          },
          "update_calendar_event completed",
        );

        return jsonResult(document);
      } catch (error) {
        if (error instanceof McpToolError) {
          logger.warn(
            {
              tool: "update_calendar_event",
              status: error.httpStatus,
              code: error.code,
              duration_ms: Date.now() - startTime,
            },
            "update_calendar_event failed",
          );
          return errorResult(error);
        }
        throw error;
      }
    },
  );
}
