#!/usr/bin/env node --import tsx/esm
/**
 * E2E smoke test against the real vendor APIs (read-only).
 *
 * Requires TICKETMASTER_API_KEY; GOOGLE_ACCESS_TOKEN is optional and enables
 * the calendar checks. Nothing is created, changed or deleted.
 *
 * Tools tested:
 * - search_ticketmaster_events
 * - find_concerts_in_time_ranges
 * - list_calendar_events, get_calendar_event
 */

import { EnvCredentialProvider } from "../src/auth/credentials.js";
import { loadConfig } from "../src/config.js";
import { ListCalendarEventsParams } from "../src/schemas/calendar.js";
import { SearchTicketmasterEventsParams } from "../src/schemas/ticketmaster.js";
import { createToolDeps } from "../src/server.js";
import { getCalendarEvent, listCalendarEvents } from "../src/tools/calendar-events.js";
import { searchConcerts } from "../src/tools/ticketmaster-concerts.js";
import { searchTicketmasterEvents } from "../src/tools/ticketmaster-search.js";
import { McpToolError, formatErrorForUser } from "../src/utils/errors.js";

const DAY_MS = 24 * 60 * 60 * 1000;

function describeError(error: unknown): string {
  if (error instanceof McpToolError) return formatErrorForUser(error);
  return error instanceof Error ? error.message : String(error);
}

async function main() {
  console.log("E2E: live vendor APIs\n");

  const config = loadConfig();
  const deps = createToolDeps(config, new EnvCredentialProvider());
  const apiKey = deps.credentials.getTicketmasterApiKey();

  // Test 1: generic search
  console.log("1. search_ticketmaster_events...");
  const search = await searchTicketmasterEvents(
    deps.ticketmaster,
    apiKey,
    SearchTicketmasterEventsParams.parse({ city: "Toronto", category: "Music", size: 5 }),
  );
  if ("error" in search) {
    console.error(`   FAILED: ${search.error}\n`);
  } else {
    console.log(`   OK: ${search.totalReturned} of ${search.totalAvailable} events`);
    for (const event of search.events.slice(0, 3)) {
      console.log(`      - ${event.date} ${event.time} ${event.name ?? "(no name)"}`);
    }
    console.log();
  }

  // Test 2: concerts in the next two weekend-style evenings
  console.log("2. find_concerts_in_time_ranges...");
  const now = Date.now();
  const ranges = [1, 2].map((offset) => {
    const day = new Date(now + offset * DAY_MS);
    day.setUTCHours(18, 0, 0, 0);
    return { start: day, end: new Date(day.getTime() + 6 * 60 * 60 * 1000) };
  });
  const concerts = await searchConcerts(deps.ticketmaster, apiKey, {
    city: "Toronto",
    stateCode: "ON",
    ranges,
  });
  console.log(`   OK: ${concerts.length} concerts fit the windows`);
  for (const concert of concerts.slice(0, 3)) {
    console.log(`      - ${concert.concertStart} ${concert.name} @ ${concert.venueName}`);
  }
  console.log();

  // Test 3/4: calendar (read-only)
  const token = deps.credentials.getGoogleAccessToken();
  if (!token) {
    console.log("3. list_calendar_events...\n   Skipped: GOOGLE_ACCESS_TOKEN not set\n");
    return;
  }

  console.log("3. list_calendar_events...");
  try {
    const page = await listCalendarEvents(
      deps.calendar,
      token,
      ListCalendarEventsParams.parse({ max_results: 5, time_min: new Date().toISOString() }),
    );
    console.log(`   OK: ${page.totalReturned} upcoming events${page.hasMore ? " (more available)" : ""}`);

    const first = page.events[0];
    console.log("4. get_calendar_event...");
    if (!first?.id) {
      console.log("   Skipped: no upcoming events\n");
      return;
    }
    const document = await getCalendarEvent(deps.calendar, token, { event_id: first.id });
    console.log(`   OK: "${document.title}" starts ${document.startTime}\n`);
  } catch (error) {
    console.error(`   FAILED: ${describeError(error)}\n`);
  }
}

main().catch((error: unknown) => {
  console.error("E2E run failed:", describeError(error));
  process.exit(1);
});
