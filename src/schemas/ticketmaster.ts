import { z } from "zod";
import { IsoDate, IsoInstant } from "./common.js";

/**
 * Parameters for search_ticketmaster_events tool.
 */
export const SearchTicketmasterEventsParams = z.object({
  keyword: z.string().optional().describe("Search keyword for event name or artist"),
  city: z.string().optional().describe("City name, e.g. 'Los Angeles'"),
  state: z.string().optional().describe("State code, e.g. 'CA'"),
  postal_code: z.string().optional().describe("Postal/ZIP code"),
  country_code: z.string().default("US").describe("Country code (default: US)"),
  category: z
    .string()
    .optional()
    .describe("Music, Sports, Arts & Theatre, Film or Miscellaneous"),
  genre: z.string().optional().describe("Genre, e.g. Rock, Pop, Jazz, Classical"),
  start_date: IsoDate.optional().describe("First day of events, YYYY-MM-DD"),
  end_date: IsoDate.optional().describe("Last day of events, YYYY-MM-DD"),
  size: z
    .number()
    .int()
    .positive()
    .default(10)
    .describe("Number of results (default: 10; values above 200 are capped)"),
});

export type SearchTicketmasterEventsParamsType = z.infer<typeof SearchTicketmasterEventsParams>;

/**
 * Parameters for get_concerts tool (single time range).
 */
export const GetConcertsParams = z.object({
  start_time: IsoInstant.describe("Start of the window, e.g. '2026-03-01T18:00:00Z'"),
  end_time: IsoInstant.describe("End of the window"),
  city: z.string().min(1).default("Toronto").describe("City name (default: Toronto)"),
  state_code: z.string().min(1).default("ON").describe("State/province code (default: ON)"),
  genre: z.string().optional().describe("Optional genre filter, e.g. Rock"),
});

export type GetConcertsParamsType = z.infer<typeof GetConcertsParams>;

export const TimeRangeInput = z.object({
  start: IsoInstant.describe("Start of the window"),
  end: IsoInstant.describe("End of the window"),
});

/**
 * Parameters for find_concerts_in_time_ranges tool.
 */
export const FindConcertsParams = z.object({
  city: z.string().min(1).describe("City name, e.g. 'San Francisco'"),
  state_code: z.string().min(1).describe("Two-letter state code, e.g. 'CA'"),
  time_ranges: z
    .array(TimeRangeInput)
    .describe("Windows the concert must fit in entirely; any one window suffices"),
  genre: z.string().optional().describe("Optional genre filter, e.g. Rock"),
});

export type FindConcertsParamsType = z.infer<typeof FindConcertsParams>;
