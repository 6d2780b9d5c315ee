import { http, HttpResponse } from "msw";
import { describe, expect, it } from "vitest";
import { z } from "zod";
import { HttpClient } from "../src/clients/http-client.js";
import { InvalidResponseError, ServiceError } from "../src/utils/errors.js";
import { buildUrl, parseRetryAfterMs } from "../src/utils/http-helpers.js";
import { server } from "./mocks/server.js";

const BASE = "https://api.example.test/v1";

const ThingSchema = z.object({ id: z.string(), count: z.number() });

function createClient(): HttpClient {
  return new HttpClient({ service: "Example", baseUrl: BASE });
}

describe("buildUrl", () => {
  it("should join base and path and drop undefined query values", () => {
    const url = buildUrl(`${BASE}/`, "/things", { size: 10, q: undefined, flag: true });
    expect(url.toString()).toBe("https://api.example.test/v1/things?size=10&flag=true");
  });
});

describe("parseRetryAfterMs", () => {
  it("should read delta seconds and fall back to the default", () => {
    expect(parseRetryAfterMs(new Response(null, { headers: { "Retry-After": "3" } }))).toBe(3000);
    expect(parseRetryAfterMs(new Response(null), 2500)).toBe(2500);
    expect(parseRetryAfterMs(new Response(null, { headers: { "Retry-After": "soon" } }))).toBe(
      1000,
    );
  });
});

describe("HttpClient", () => {
  it("should send JSON bodies and validate the response", async () => {
    let received: { contentType: string | null; accept: string | null; body: unknown } | undefined;
    server.use(
      http.post(`${BASE}/things`, async ({ request }) => {
        received = {
          contentType: request.headers.get("Content-Type"),
          accept: request.headers.get("Accept"),
          body: await request.json(),
        };
        return HttpResponse.json({ id: "t-1", count: 2 });
      }),
    );

    const result = await createClient().requestJson(
      { method: "POST", path: "/things", body: { name: "widget" } },
      ThingSchema,
    );

    expect(result).toEqual({ id: "t-1", count: 2 });
    expect(received).toEqual({
      contentType: "application/json",
      accept: "application/json",
      body: { name: "widget" },
    });
  });

  it("should reject a body that is not JSON", async () => {
    server.use(http.get(`${BASE}/things/t-1`, () => new HttpResponse("<html>", { status: 200 })));

    await expect(
      createClient().requestJson({ method: "GET", path: "/things/t-1" }, ThingSchema),
    ).rejects.toBeInstanceOf(InvalidResponseError);
  });

  it("should reject a body of the wrong shape with the failing path", async () => {
    server.use(http.get(`${BASE}/things/t-1`, () => HttpResponse.json({ id: "t-1", count: "2" })));

    await expect(
      createClient().requestJson({ method: "GET", path: "/things/t-1" }, ThingSchema),
    ).rejects.toThrow("Unexpected response from Example: Expected number, received string at count");
  });

  it("should map vendor failures to typed errors", async () => {
    server.use(http.get(`${BASE}/things`, () => new HttpResponse(null, { status: 503 })));

    await expect(createClient().send({ method: "GET", path: "/things" })).rejects.toBeInstanceOf(
      ServiceError,
    );
  });
});
