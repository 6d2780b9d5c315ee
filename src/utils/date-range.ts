import type { TicketmasterEvent } from "../schemas/ticketmaster-api.js";
import { FormatError } from "./errors.js";

/** Closed interval of instants. `start <= end` is assumed, not enforced. */
export interface TimeRange {
  readonly start: Date;
  readonly end: Date;
}

/** Length assumed for a listing that publishes no end. */
export const DEFAULT_EVENT_DURATION_MS = 3 * 60 * 60 * 1000;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?$/;

/**
 * Parses a vendor wall-clock date and time as a UTC instant.
 *
 * The vendor's `localDate`/`localTime` are venue-local, but they are read as
 * UTC; `dates.timezone` is ignored.
 *
 * @throws FormatError when either part is malformed or names a non-existent
 * calendar date or clock time.
 */
export function parseUtcWallClock(date: string, time = "00:00:00"): Date {
  const dateMatch = DATE_PATTERN.exec(date);
  if (!dateMatch) throw new FormatError(date, "date (expected YYYY-MM-DD)");
  const timeMatch = TIME_PATTERN.exec(time);
  if (!timeMatch) throw new FormatError(time, "time (expected HH:MM[:SS])");

  const year = Number(dateMatch[1]);
  const month = Number(dateMatch[2]);
  const day = Number(dateMatch[3]);
  const hours = Number(timeMatch[1]);
  const minutes = Number(timeMatch[2]);
  const seconds = Number(timeMatch[3] ?? "0");
  const millis = Math.floor(Number(`0.${timeMatch[4] ?? "0"}`) * 1000);

  if (hours > 23 || minutes > 59 || seconds > 59) {
    throw new FormatError(time, "time (out of range)");
  }

  const instant = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds, millis));
  // Date.UTC rolls over (Feb 30 -> Mar 2); a rollover means the date does not exist.
  if (
    instant.getUTCFullYear() !== year ||
    instant.getUTCMonth() !== month - 1 ||
    instant.getUTCDate() !== day
  ) {
    throw new FormatError(date, "date (no such calendar day)");
  }
  return instant;
}

/**
 * Reads the start/end interval of a Ticketmaster listing.
 *
 * Returns `undefined` when the listing has no start date. A missing start
 * time means midnight. The end is used only when both its date and time are
 * present; otherwise the listing is assumed to last three hours.
 *
 * @throws FormatError on malformed date or time strings.
 */
export function parseEventInterval(event: TicketmasterEvent): TimeRange | undefined {
  const start = event.dates?.start;
  if (!start?.localDate) return undefined;

  const startInstant = parseUtcWallClock(start.localDate, start.localTime ?? undefined);

  const end = event.dates?.end;
  const endInstant =
    end?.localDate && end.localTime
      ? parseUtcWallClock(end.localDate, end.localTime)
      : new Date(startInstant.getTime() + DEFAULT_EVENT_DURATION_MS);

  return { start: startInstant, end: endInstant };
}

/**
 * Like `parseEventInterval`, but treats a malformed listing as having no
 * interval at all.
 */
export function tryParseEventInterval(event: TicketmasterEvent): TimeRange | undefined {
  try {
    return parseEventInterval(event);
  } catch (error) {
    if (error instanceof FormatError) return undefined;
    throw error;
  }
}

/**
 * True iff the listing's whole interval lies inside at least one of `ranges`,
 * boundaries included. Partial overlap never counts. Listings without a
 * parseable interval are never contained.
 */
export function isFullyContained(event: TicketmasterEvent, ranges: readonly TimeRange[]): boolean {
  const interval = tryParseEventInterval(event);
  if (!interval) return false;

  const start = interval.start.getTime();
  const end = interval.end.getTime();
  return ranges.some((range) => range.start.getTime() <= start && end <= range.end.getTime());
}

/**
 * Smallest single range spanning every range in `ranges`, or `undefined`
 * for an empty list.
 */
export function coveringWindow(ranges: readonly TimeRange[]): TimeRange | undefined {
  if (ranges.length === 0) return undefined;

  let start = ranges[0].start.getTime();
  let end = ranges[0].end.getTime();
  for (const range of ranges) {
    start = Math.min(start, range.start.getTime());
    end = Math.max(end, range.end.getTime());
  }
  return { start: new Date(start), end: new Date(end) };
}

/** Renders an instant as `YYYY-MM-DDTHH:MM:SSZ` (second precision, UTC). */
export function formatUtcTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}
