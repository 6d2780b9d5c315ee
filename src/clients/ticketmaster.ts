import {
  EventSearchPageSchema,
  type TicketmasterEvent,
  TicketmasterEventSchema,
} from "../schemas/ticketmaster-api.js";
import { createLogger } from "../utils/logger.js";
import { HttpClient } from "./http-client.js";

const logger = createLogger("ticketmaster");

export const TICKETMASTER_API_BASE = "https://app.ticketmaster.com/discovery/v2";

/** Fixed per-request timeout for every Discovery API call. */
export const TICKETMASTER_TIMEOUT_MS = 10_000;

/** Query parameters of GET /events, named as the vendor names them. */
export interface EventSearchQuery {
  readonly keyword?: string;
  readonly city?: string;
  readonly stateCode?: string;
  readonly postalCode?: string;
  readonly countryCode?: string;
  readonly classificationName?: string;
  readonly genreName?: string;
  /** `YYYY-MM-DDTHH:MM:SSZ` */
  readonly startDateTime?: string;
  /** `YYYY-MM-DDTHH:MM:SSZ` */
  readonly endDateTime?: string;
  readonly size?: number;
  readonly sort?: string;
}

export interface EventSearchResult {
  /** Listings in vendor order; entries that fail validation are dropped. */
  readonly events: TicketmasterEvent[];
  /** `page.totalElements`, when the vendor reports it. */
  readonly totalElements?: number;
}

export interface TicketmasterClientOptions {
  readonly baseUrl?: string;
}

/**
 * Ticketmaster Discovery v2 client. The API key is passed per call and sent
 * as the `apikey` query parameter.
 */
export class TicketmasterClient {
  private readonly http: HttpClient;

  constructor(options: TicketmasterClientOptions = {}) {
    this.http = new HttpClient({
      service: "Ticketmaster",
      baseUrl: options.baseUrl ?? TICKETMASTER_API_BASE,
    });
  }

  async searchEvents(apiKey: string, query: EventSearchQuery): Promise<EventSearchResult> {
    const page = await this.http.requestJson(
      {
        method: "GET",
        path: "/events",
        query: { apikey: apiKey, ...query },
        timeoutMs: TICKETMASTER_TIMEOUT_MS,
      },
      EventSearchPageSchema,
    );

    const events: TicketmasterEvent[] = [];
    for (const [index, raw] of (page._embedded?.events ?? []).entries()) {
      const parsed = TicketmasterEventSchema.safeParse(raw);
      if (parsed.success) {
        events.push(parsed.data);
      } else {
        logger.warn({ index, issues: parsed.error.issues.length }, "Skipping malformed listing");
      }
    }

    return { events, totalElements: page.page?.totalElements };
  }
}
