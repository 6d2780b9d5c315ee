import { z } from "zod";

/**
 * Response shapes of the Google Calendar v3 REST API.
 *
 * Every object uses `.passthrough()` so that fields this server does not read
 * survive the read-modify-write cycle of update_calendar_event.
 */

/**
 * Start or end of an event. Timed events carry `dateTime`, all-day events
 * carry `date`; see `toEventTime` for the tagged form.
 */
export const EventDateTimeSchema = z
  .object({
    dateTime: z.string().optional(),
    date: z.string().optional(),
    timeZone: z.string().optional(),
  })
  .passthrough();

export const AttendeeSchema = z
  .object({
    email: z.string().optional(),
    displayName: z.string().optional(),
    responseStatus: z.string().optional(),
    organizer: z.boolean().optional(),
  })
  .passthrough();

const EntryPointSchema = z
  .object({
    entryPointType: z.string().optional(),
    uri: z.string().optional(),
  })
  .passthrough();

export const CalendarEventSchema = z
  .object({
    id: z.string().optional(),
    kind: z.string().optional(),
    status: z.string().optional(),
    htmlLink: z.string().optional(),
    summary: z.string().optional(),
    description: z.string().optional(),
    location: z.string().optional(),
    start: EventDateTimeSchema.optional(),
    end: EventDateTimeSchema.optional(),
    attendees: z.array(AttendeeSchema).optional(),
    conferenceData: z
      .object({ entryPoints: z.array(EntryPointSchema).optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const CalendarEventListSchema = z
  .object({
    items: z.array(CalendarEventSchema).default([]),
    nextPageToken: z.string().optional(),
  })
  .passthrough();

export type EventDateTime = z.infer<typeof EventDateTimeSchema>;
export type Attendee = z.infer<typeof AttendeeSchema>;
export type CalendarEvent = z.infer<typeof CalendarEventSchema>;
export type CalendarEventList = z.infer<typeof CalendarEventListSchema>;

/** Body accepted by events.insert and events.update. */
export type CalendarEventInput = CalendarEvent;
