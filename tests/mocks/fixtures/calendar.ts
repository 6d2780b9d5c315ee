import type { CalendarEvent } from "../../../src/schemas/google-calendar-api.js";

export const TEST_ACCESS_TOKEN = "test-token";

export const standupEvent: CalendarEvent = {
  id: "evt-standup",
  kind: "calendar#event",
  status: "confirmed",
  htmlLink: "https://calendar.example.com/event?eid=standup",
  summary: "Team Standup",
  description: "Daily sync",
  location: "Room 4",
  start: { dateTime: "2026-01-15T09:00:00-05:00", timeZone: "America/New_York" },
  end: { dateTime: "2026-01-15T09:15:00-05:00", timeZone: "America/New_York" },
  attendees: [
    {
      email: "lead@example.com",
      displayName: "Team Lead",
      responseStatus: "accepted",
      organizer: true,
    },
    { email: "dev@example.com", responseStatus: "tentative" },
  ],
  conferenceData: {
    entryPoints: [
      { entryPointType: "phone", uri: "tel:+1-555-0100" },
      { entryPointType: "video", uri: "https://meet.example.com/abc-defg-hij" },
    ],
  },
  reminders: { useDefault: true },
};

export const holidayEvent: CalendarEvent = {
  id: "evt-holiday",
  kind: "calendar#event",
  summary: "Company Holiday",
  start: { date: "2026-01-19" },
  end: { date: "2026-01-20" },
};

export const retroEvent: CalendarEvent = {
  id: "evt-retro",
  summary: "Sprint Retro",
  start: { dateTime: "2026-01-16T14:00:00-05:00", timeZone: "America/New_York" },
  end: { dateTime: "2026-01-16T15:00:00-05:00", timeZone: "America/New_York" },
};
