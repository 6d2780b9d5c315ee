import { z } from "zod";

/**
 * RFC 3339 instant with a mandatory `Z` or numeric offset,
 * e.g. "2026-01-15T10:00:00Z" or "2026-01-15T10:00:00-05:00".
 */
export const IsoInstant = z.string().datetime({ offset: true });

/**
 * Calendar wall-clock time. The offset is optional; a trailing `Z` is
 * stripped before sending and the event's time zone label applies instead.
 */
export const CalendarDateTime = z
  .string()
  .regex(
    /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?$/,
    "Expected an ISO 8601 date-time, e.g. 2026-01-15T10:00:00",
  );

/** Calendar date without time, e.g. "2026-01-15". */
export const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

/** IANA time zone name, e.g. "America/New_York". */
export const TimeZoneName = z.string().min(1);

/**
 * Base parameters for tools addressing a single calendar event.
 */
export const EventIdParams = z.object({
  event_id: z.string().min(1).describe("ID of the calendar event"),
});

export type EventIdParamsType = z.infer<typeof EventIdParams>;
