import { z } from "zod";
import { CalendarDateTime, EventIdParams, TimeZoneName } from "./common.js";

const attendeesDescription = "Comma-separated attendee emails, e.g. 'a@example.com, b@example.com'";

/**
 * Parameters for create_calendar_event tool.
 */
export const CreateCalendarEventParams = z.object({
  title: z.string().min(1).describe("Event title"),
  start_time: CalendarDateTime.describe("Start, e.g. '2026-01-15T10:00:00'"),
  end_time: CalendarDateTime.describe("End, e.g. '2026-01-15T11:00:00'"),
  description: z.string().default("").describe("Event description"),
  location: z.string().default("").describe("Event location"),
  attendees: z.string().optional().describe(attendeesDescription),
  timezone: TimeZoneName.optional().describe(
    "IANA time zone of start/end. Default: server's configured time zone",
  ),
});

export type CreateCalendarEventParamsType = z.infer<typeof CreateCalendarEventParams>;

/**
 * Parameters for update_calendar_event tool.
 * Omitted fields keep their stored values.
 */
export const UpdateCalendarEventParams = EventIdParams.extend({
  title: z.string().optional().describe("New title"),
  start_time: CalendarDateTime.optional().describe("New start"),
  end_time: CalendarDateTime.optional().describe("New end"),
  description: z.string().optional().describe("New description"),
  location: z.string().optional().describe("New location"),
  attendees: z.string().optional().describe(`Replaces all attendees. ${attendeesDescription}`),
  timezone: TimeZoneName.optional().describe(
    "IANA time zone applied to a new start/end. Default: server's configured time zone",
  ),
});

export type UpdateCalendarEventParamsType = z.infer<typeof UpdateCalendarEventParams>;

/**
 * Parameters for delete_calendar_event tool.
 */
export const DeleteCalendarEventParams = EventIdParams.extend({});

export type DeleteCalendarEventParamsType = z.infer<typeof DeleteCalendarEventParams>;
