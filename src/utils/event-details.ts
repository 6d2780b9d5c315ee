import type { TicketmasterEvent, Venue } from "../schemas/ticketmaster-api.js";
import { formatUtcTimestamp, tryParseEventInterval } from "./date-range.js";

/** Placeholder for values the vendor did not provide. */
export const NOT_AVAILABLE = "N/A";

type NotAvailable = typeof NOT_AVAILABLE;

/** Flat view of a concert listing, as returned by the concert tools. */
export interface EventDetail {
  name: string;
  url: string;
  concertStart: string;
  concertEnd: string;
  venueName: string;
  venueAddress: string;
  category: string;
  genre: string;
  subgenre: string;
  priceMin: number | NotAvailable;
  priceMax: number | NotAvailable;
  currency: string;
  onsaleStart: string;
  onsaleEnd: string;
  /** The public onsale start has not been announced yet. */
  onsaleStartTbd: boolean;
}

export interface VenueSummary {
  name: string | null;
  city: string | null;
  state: string | null;
  country: string | null;
  address: string | null;
}

export interface PriceInfo {
  min: number | null;
  max: number | null;
  currency: string;
}

/** Lightweight listing returned by search_ticketmaster_events. */
export interface EventSummary {
  id: string | null;
  name: string | null;
  url: string | null;
  date: string;
  time: string;
  category: string | null;
  genre: string | null;
  status: string | null;
  priceInfo: PriceInfo | null;
  venue?: VenueSummary;
}

function firstVenue(event: TicketmasterEvent): Venue | undefined {
  return event._embedded?.venues?.[0];
}

/**
 * Joins the present parts of a venue's street address with ", ".
 * Missing parts are left out entirely; no parts at all gives "N/A".
 */
export function formatVenueAddress(venue: Venue): string {
  const parts = [
    venue.address?.line1,
    venue.city?.name,
    venue.state?.stateCode,
    venue.postalCode,
    venue.country?.countryCode,
  ].filter((part): part is string => typeof part === "string" && part.length > 0);

  return parts.length > 0 ? parts.join(", ") : NOT_AVAILABLE;
}

/**
 * Extracts concert times, venue, classification, price and public onsale
 * window from a listing. Only the first venue, classification and price range
 * are considered.
 */
export function extractEventDetails(event: TicketmasterEvent): EventDetail {
  const interval = tryParseEventInterval(event);
  const venue = firstVenue(event);
  const classification = event.classifications?.[0];
  const priceRange = event.priceRanges?.[0];
  const publicSale = event.sales?.public;

  return {
    name: event.name ?? NOT_AVAILABLE,
    url: event.url ?? NOT_AVAILABLE,
    concertStart: interval ? formatUtcTimestamp(interval.start) : NOT_AVAILABLE,
    concertEnd: interval ? formatUtcTimestamp(interval.end) : NOT_AVAILABLE,
    venueName: venue ? (venue.name ?? NOT_AVAILABLE) : NOT_AVAILABLE,
    venueAddress: venue ? formatVenueAddress(venue) : NOT_AVAILABLE,
    category: classification?.segment?.name ?? NOT_AVAILABLE,
    genre: classification?.genre?.name ?? NOT_AVAILABLE,
    subgenre: classification?.subGenre?.name ?? NOT_AVAILABLE,
    priceMin: priceRange?.min ?? NOT_AVAILABLE,
    priceMax: priceRange?.max ?? NOT_AVAILABLE,
    // USD only stands in when a price range exists without a currency.
    currency: priceRange ? (priceRange.currency ?? "USD") : NOT_AVAILABLE,
    onsaleStart: publicSale?.startDateTime ?? NOT_AVAILABLE,
    onsaleEnd: publicSale?.endDateTime ?? NOT_AVAILABLE,
    onsaleStartTbd: publicSale?.startTBD ?? false,
  };
}

function summarizeVenue(venue: Venue): VenueSummary {
  return {
    name: venue.name ?? null,
    city: venue.city?.name ?? null,
    state: venue.state?.stateCode ?? null,
    country: venue.country?.countryCode ?? null,
    address: venue.address?.line1 ?? null,
  };
}

export function extractEventSummary(event: TicketmasterEvent): EventSummary {
  const classification = event.classifications?.[0];
  const priceRange = event.priceRanges?.[0];
  const venue = firstVenue(event);

  const summary: EventSummary = {
    id: event.id ?? null,
    name: event.name ?? null,
    url: event.url ?? null,
    date: event.dates?.start?.localDate ?? NOT_AVAILABLE,
    time: event.dates?.start?.localTime ?? "",
    category: classification?.segment?.name ?? null,
    genre: classification?.genre?.name ?? null,
    status: event.dates?.status?.code ?? null,
    priceInfo: priceRange
      ? {
          min: priceRange.min ?? null,
          max: priceRange.max ?? null,
          currency: priceRange.currency ?? "USD",
        }
      : null,
  };

  if (venue) {
    summary.venue = summarizeVenue(venue);
  }
  return summary;
}
