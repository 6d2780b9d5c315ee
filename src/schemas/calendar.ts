import { z } from "zod";
import { EventIdParams, IsoInstant } from "./common.js";

/**
 * Parameters for list_calendar_events tool.
 */
export const ListCalendarEventsParams = z.object({
  max_results: z
    .number()
    .int()
    .positive()
    .max(2500)
    .default(10)
    .describe("Maximum number of events to return (default: 10)"),
  time_min: IsoInstant.optional().describe(
    "Lower bound for event end time, RFC 3339, e.g. '2026-01-15T00:00:00Z'",
  ),
  time_max: IsoInstant.optional().describe("Upper bound for event start time, RFC 3339"),
  search_query: z.string().optional().describe("Free text search across event fields"),
  page_token: z
    .string()
    .optional()
    .describe("Continuation token from a previous call's nextPageToken"),
});

export type ListCalendarEventsParamsType = z.infer<typeof ListCalendarEventsParams>;

/**
 * Parameters for get_calendar_event tool.
 */
export const GetCalendarEventParams = EventIdParams.extend({});

export type GetCalendarEventParamsType = z.infer<typeof GetCalendarEventParams>;
