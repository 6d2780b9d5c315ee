import {
  type CalendarEvent,
  type CalendarEventInput,
  type CalendarEventList,
  CalendarEventListSchema,
  CalendarEventSchema,
} from "../schemas/google-calendar-api.js";
import { createLogger } from "../utils/logger.js";
import { HttpClient } from "./http-client.js";

const logger = createLogger("google-calendar");

export const GOOGLE_CALENDAR_API_BASE = "https://www.googleapis.com/calendar/v3";

export interface GoogleCalendarClientOptions {
  readonly baseUrl?: string;
  /** Calendar addressed by every call. Default: "primary". */
  readonly calendarId?: string;
}

export interface ListEventsQuery {
  readonly maxResults: number;
  readonly timeMin?: string;
  readonly timeMax?: string;
  readonly q?: string;
  /** Opaque continuation token from a previous `nextPageToken`. */
  readonly pageToken?: string;
}

/**
 * Google Calendar v3 events resource.
 *
 * Every method takes the OAuth access token explicitly; the client itself
 * holds no credentials. Calls use the transport's default timeout and are
 * never retried.
 */
export class GoogleCalendarClient {
  private readonly http: HttpClient;
  readonly calendarId: string;

  constructor(options: GoogleCalendarClientOptions = {}) {
    this.http = new HttpClient({
      service: "Google Calendar",
      baseUrl: options.baseUrl ?? GOOGLE_CALENDAR_API_BASE,
    });
    this.calendarId = options.calendarId ?? "primary";
  }

  private eventsPath(eventId?: string): string {
    const base = `/calendars/${encodeURIComponent(this.calendarId)}/events`;
    return eventId === undefined ? base : `${base}/${encodeURIComponent(eventId)}`;
  }

  listEvents(accessToken: string, query: ListEventsQuery): Promise<CalendarEventList> {
    return this.http.requestJson(
      {
        method: "GET",
        path: this.eventsPath(),
        headers: authorization(accessToken),
        query: {
          maxResults: query.maxResults,
          // Expands recurring events into instances; required for orderBy=startTime.
          singleEvents: true,
          orderBy: "startTime",
          timeMin: query.timeMin,
          timeMax: query.timeMax,
          q: query.q,
          pageToken: query.pageToken,
        },
        resource: { type: "calendar", id: this.calendarId },
      },
      CalendarEventListSchema,
    );
  }

  getEvent(accessToken: string, eventId: string): Promise<CalendarEvent> {
    return this.http.requestJson(
      {
        method: "GET",
        path: this.eventsPath(eventId),
        headers: authorization(accessToken),
        resource: { type: "event", id: eventId },
      },
      CalendarEventSchema,
    );
  }

  insertEvent(accessToken: string, event: CalendarEventInput): Promise<CalendarEvent> {
    return this.http.requestJson(
      {
        method: "POST",
        path: this.eventsPath(),
        headers: authorization(accessToken),
        body: event,
        resource: { type: "calendar", id: this.calendarId },
      },
      CalendarEventSchema,
    );
  }

  /** Replaces the stored event with `event` (full-document PUT). */
  updateEvent(
    accessToken: string,
    eventId: string,
    event: CalendarEventInput,
  ): Promise<CalendarEvent> {
    return this.http.requestJson(
      {
        method: "PUT",
        path: this.eventsPath(eventId),
        headers: authorization(accessToken),
        body: event,
        resource: { type: "event", id: eventId },
      },
      CalendarEventSchema,
    );
  }

  async deleteEvent(accessToken: string, eventId: string): Promise<void> {
    const response = await this.http.send({
      method: "DELETE",
      path: this.eventsPath(eventId),
      headers: authorization(accessToken),
      resource: { type: "event", id: eventId },
    });
    if (response.status !== 204) {
      logger.debug({ status: response.status }, "delete returned a body; ignoring it");
    }
  }
}

function authorization(accessToken: string): Record<string, string> {
  return { Authorization: `Bearer ${accessToken}` };
}
