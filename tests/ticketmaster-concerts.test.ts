import { http, HttpResponse } from "msw";
import { afterEach, describe, expect, it, vi } from "vitest";
import { TICKETMASTER_API_BASE, TicketmasterClient } from "../src/clients/ticketmaster.js";
import { FindConcertsParams, GetConcertsParams } from "../src/schemas/ticketmaster.js";
import { CONCERT_SEARCH_SIZE, searchConcerts } from "../src/tools/ticketmaster-concerts.js";
import type { TimeRange } from "../src/utils/date-range.js";
import { callTool } from "./helpers/mcp-test-client.js";
import { TEST_ACCESS_TOKEN } from "./mocks/fixtures/calendar.js";
import { TEST_API_KEY, concertListings, searchPage } from "./mocks/fixtures/ticketmaster.js";
import { server } from "./mocks/server.js";

const R1: TimeRange = {
  start: new Date("2026-01-01T10:00:00Z"),
  end: new Date("2026-01-01T12:00:00Z"),
};
const R2: TimeRange = {
  start: new Date("2026-01-05T18:00:00Z"),
  end: new Date("2026-01-05T20:00:00Z"),
};

/** Captures the query of the next /events request and serves the fixtures. */
function captureSearchQuery(): { params?: URLSearchParams } {
  const captured: { params?: URLSearchParams } = {};
  server.use(
    http.get(`${TICKETMASTER_API_BASE}/events`, ({ request }) => {
      captured.params = new URL(request.url).searchParams;
      return HttpResponse.json(searchPage(concertListings));
    }),
  );
  return captured;
}

describe("ticketmaster concerts", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("GetConcertsParams schema", () => {
    it("should default to Toronto, ON", () => {
      const result = GetConcertsParams.parse({
        start_time: "2026-01-01T10:00:00Z",
        end_time: "2026-01-01T12:00:00Z",
      });
      expect(result.city).toBe("Toronto");
      expect(result.state_code).toBe("ON");
    });

    it("should reject times without an offset", () => {
      expect(
        GetConcertsParams.safeParse({
          start_time: "2026-01-01T10:00:00",
          end_time: "2026-01-01T12:00:00Z",
        }).success,
      ).toBe(false);
    });
  });

  describe("FindConcertsParams schema", () => {
    it("should require city and state_code", () => {
      expect(FindConcertsParams.safeParse({ time_ranges: [] }).success).toBe(false);
    });

    it("should accept an empty range list", () => {
      const result = FindConcertsParams.parse({ city: "Austin", state_code: "TX", time_ranges: [] });
      expect(result.time_ranges).toEqual([]);
    });
  });

  describe("searchConcerts", () => {
    it("should keep only listings fully inside one of the ranges, in vendor order", async () => {
      const concerts = await searchConcerts(new TicketmasterClient(), TEST_API_KEY, {
        city: "Austin",
        stateCode: "TX",
        ranges: [R1, R2],
      });

      expect(concerts.map((c) => c.name)).toEqual(["Morning Strings Quartet", "Sunset Synth Set"]);
      expect(concerts[1]).toMatchObject({
        concertStart: "2026-01-05T18:00:00Z",
        concertEnd: "2026-01-05T20:00:00Z",
        venueName: "N/A",
        currency: "USD",
      });
    });

    it("should query the window covering all ranges", async () => {
      const captured = captureSearchQuery();

      await searchConcerts(new TicketmasterClient(), TEST_API_KEY, {
        city: "Austin",
        stateCode: "TX",
        ranges: [R2, R1],
      });

      const params = captured.params;
      expect(params?.get("apikey")).toBe(TEST_API_KEY);
      expect(params?.get("city")).toBe("Austin");
      expect(params?.get("stateCode")).toBe("TX");
      expect(params?.get("classificationName")).toBe("Music");
      expect(params?.get("startDateTime")).toBe("2026-01-01T10:00:00Z");
      expect(params?.get("endDateTime")).toBe("2026-01-05T20:00:00Z");
      expect(params?.get("sort")).toBe("relevance,desc");
      expect(params?.get("size")).toBe(String(CONCERT_SEARCH_SIZE));
      expect(params?.has("genreName")).toBe(false);
    });

    it("should pass the genre filter when given", async () => {
      const captured = captureSearchQuery();

      await searchConcerts(new TicketmasterClient(), TEST_API_KEY, {
        city: "Austin",
        stateCode: "TX",
        ranges: [R1],
        genre: "Jazz",
      });

      expect(captured.params?.get("genreName")).toBe("Jazz");
    });

    it("should not call the API for an empty range list", async () => {
      const client = new TicketmasterClient();
      const spy = vi.spyOn(client, "searchEvents");

      const concerts = await searchConcerts(client, TEST_API_KEY, {
        city: "Austin",
        stateCode: "TX",
        ranges: [],
      });

      expect(concerts).toEqual([]);
      expect(spy).not.toHaveBeenCalled();
    });

    it("should return an empty list without an API key", async () => {
      const client = new TicketmasterClient();
      const spy = vi.spyOn(client, "searchEvents");

      const concerts = await searchConcerts(client, undefined, {
        city: "Austin",
        stateCode: "TX",
        ranges: [R1],
      });

      expect(concerts).toEqual([]);
      expect(spy).not.toHaveBeenCalled();
    });

    it("should return an empty list on vendor errors", async () => {
      server.use(
        http.get(`${TICKETMASTER_API_BASE}/events`, () =>
          HttpResponse.json({ errors: [{ detail: "Internal error" }] }, { status: 500 }),
        ),
      );

      const concerts = await searchConcerts(new TicketmasterClient(), TEST_API_KEY, {
        city: "Austin",
        stateCode: "TX",
        ranges: [R1],
      });

      expect(concerts).toEqual([]);
    });

    it("should return an empty list when the body is not JSON", async () => {
      server.use(
        http.get(
          `${TICKETMASTER_API_BASE}/events`,
          () =>
            new HttpResponse("<html>upstream maintenance</html>", {
              status: 200,
              headers: { "Content-Type": "text/html" },
            }),
        ),
      );

      const concerts = await searchConcerts(new TicketmasterClient(), TEST_API_KEY, {
        city: "Austin",
        stateCode: "TX",
        ranges: [R1],
      });

      expect(concerts).toEqual([]);
    });

    it("should return an empty list for a rejected key", async () => {
      const concerts = await searchConcerts(new TicketmasterClient(), "wrong-key", {
        city: "Austin",
        stateCode: "TX",
        ranges: [R1],
      });

      expect(concerts).toEqual([]);
    });

    it("should return an empty list when the page has no events", async () => {
      server.use(
        http.get(`${TICKETMASTER_API_BASE}/events`, () =>
          HttpResponse.json({ page: { size: 30, totalElements: 0, totalPages: 0, number: 0 } }),
        ),
      );

      const concerts = await searchConcerts(new TicketmasterClient(), TEST_API_KEY, {
        city: "Austin",
        stateCode: "TX",
        ranges: [R1],
      });

      expect(concerts).toEqual([]);
    });
  });

  describe("MCP tools", () => {
    it("get_concerts should return concerts inside the window", async () => {
      const result = await callTool("get_concerts", {
        start_time: "2026-01-01T10:00:00Z",
        end_time: "2026-01-01T12:00:00Z",
      });

      expect(result.isError).toBe(false);
      const body: unknown = JSON.parse(result.text);
      expect(body).toMatchObject({
        totalReturned: 1,
        concerts: [{ name: "Morning Strings Quartet", venueName: "Riverside Hall" }],
      });
    });

    it("find_concerts_in_time_ranges should combine ranges", async () => {
      const result = await callTool("find_concerts_in_time_ranges", {
        city: "Austin",
        state_code: "TX",
        time_ranges: [
          { start: "2026-01-01T10:00:00Z", end: "2026-01-01T12:00:00Z" },
          { start: "2026-01-05T18:00:00Z", end: "2026-01-05T20:00:00Z" },
        ],
      });

      expect(result.isError).toBe(false);
      const body: unknown = JSON.parse(result.text);
      expect(body).toMatchObject({
        totalReturned: 2,
        concerts: [{ name: "Morning Strings Quartet" }, { name: "Sunset Synth Set" }],
      });
    });

    it("should degrade to an empty list without an API key", async () => {
      const result = await callTool(
        "find_concerts_in_time_ranges",
        {
          city: "Austin",
          state_code: "TX",
          time_ranges: [{ start: "2026-01-01T10:00:00Z", end: "2026-01-01T12:00:00Z" }],
        },
        { googleAccessToken: TEST_ACCESS_TOKEN },
      );

      expect(result.isError).toBe(false);
      expect(JSON.parse(result.text)).toEqual({ concerts: [], totalReturned: 0 });
    });
  });
});
