import { http, HttpResponse } from "msw";
import { TICKETMASTER_API_BASE } from "../../../src/clients/ticketmaster.js";
import { TEST_API_KEY, concertListings, searchPage } from "../fixtures/ticketmaster.js";

export const ticketmasterHandlers = [
  // GET /events returns every fixture listing regardless of filters
  http.get(`${TICKETMASTER_API_BASE}/events`, ({ request }) => {
    const apiKey = new URL(request.url).searchParams.get("apikey");
    if (apiKey !== TEST_API_KEY) {
      return HttpResponse.json(
        {
          fault: {
            faultstring: "Invalid ApiKey",
            detail: { errorcode: "oauth.v2.InvalidApiKey" },
          },
        },
        { status: 401 },
      );
    }
    return HttpResponse.json(searchPage(concertListings, 57));
  }),
];
