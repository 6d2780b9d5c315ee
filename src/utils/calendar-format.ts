import type {
  Attendee,
  CalendarEvent,
  EventDateTime,
} from "../schemas/google-calendar-api.js";

/** Rendered view of a Google Calendar event, as returned by the calendar tools. */
export interface FormattedDocument {
  id: string | null;
  kind: string;
  title: string;
  url: string;
  /** Markdown rendering of the whole event. */
  content: string;
  startTime: string;
  endTime: string;
  location: string;
  attendeesCount: number;
}

/**
 * Start or end of an event in tagged form. Google sends `dateTime` for timed
 * events and `date` for all-day events.
 */
export type EventTime =
  | { kind: "timed"; dateTime: string; timeZone?: string }
  | { kind: "allDay"; date: string }
  | { kind: "unspecified" };

export function toEventTime(value: EventDateTime | undefined): EventTime {
  if (value?.dateTime !== undefined) {
    return { kind: "timed", dateTime: value.dateTime, timeZone: value.timeZone };
  }
  if (value?.date !== undefined) {
    return { kind: "allDay", date: value.date };
  }
  return { kind: "unspecified" };
}

export function formatEventTime(time: EventTime): string {
  switch (time.kind) {
    case "timed":
      return time.dateTime;
    case "allDay":
      return time.date;
    case "unspecified":
      return "Not specified";
  }
}

/** "Name - status (Organizer)", falling back to the email for the name. */
export function formatAttendee(attendee: Attendee): string {
  const name = attendee.displayName ?? attendee.email ?? "Unknown";
  const status = attendee.responseStatus ?? "needsAction";
  const organizer = attendee.organizer ? " (Organizer)" : "";
  return `${name} - ${status}${organizer}`;
}

/** URI of the first video entry point (Meet, Zoom, ...), or "". */
export function getVideoConferenceLink(event: CalendarEvent): string {
  const entry = event.conferenceData?.entryPoints?.find((e) => e.entryPointType === "video");
  return entry?.uri ?? "";
}

export function formatEventToDocument(event: CalendarEvent): FormattedDocument {
  const title = event.summary ?? "(No title)";
  const description = event.description ?? "";
  const location = event.location ?? "";
  const htmlLink = event.htmlLink ?? "";
  const startTime = formatEventTime(toEventTime(event.start));
  const endTime = formatEventTime(toEventTime(event.end));
  const attendees = event.attendees ?? [];
  const conferenceLink = getVideoConferenceLink(event);

  let content = `# ${title}\n\n`;
  if (description) content += `**Description:** ${description}\n\n`;
  content += `**Start:** ${startTime}\n`;
  content += `**End:** ${endTime}\n\n`;
  if (location) content += `**Location:** ${location}\n\n`;
  if (attendees.length > 0) {
    content += `**Attendees (${attendees.length}):**\n`;
    for (const attendee of attendees) {
      content += `  - ${formatAttendee(attendee)}\n`;
    }
    content += "\n";
  }
  if (conferenceLink) content += `**Video Conference:** ${conferenceLink}\n\n`;
  content += `**Status:** ${event.status ?? "confirmed"}\n`;
  if (htmlLink) content += `**Link:** ${htmlLink}\n`;

  return {
    id: event.id ?? null,
    kind: event.kind ?? "calendar#event",
    title,
    url: htmlLink,
    content: content.trim(),
    startTime,
    endTime,
    location,
    attendeesCount: attendees.length,
  };
}

/**
 * Builds a timed start/end for a write request. A trailing `Z` is dropped so
 * that Google reads the wall-clock time in `timeZone` rather than in UTC.
 */
export function toEventDateTimeInput(dateTime: string, timeZone: string): EventDateTime {
  return { dateTime: dateTime.replace(/Z$/, ""), timeZone };
}
