import type { z } from "zod";
import { ErrorMappingMiddleware } from "../middleware/error-mapping.js";
import { FetchHandler } from "../middleware/fetch-handler.js";
import { LoggingMiddleware } from "../middleware/logging.js";
import type { Middleware, RequestContext } from "../middleware/types.js";
import { InvalidResponseError } from "../utils/errors.js";
import { type QueryValue, buildUrl } from "../utils/http-helpers.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("http-client");

export interface HttpClientOptions {
  /** Vendor name used in logs and error messages, e.g. "Google Calendar". */
  readonly service: string;
  readonly baseUrl: string;
}

export interface HttpRequest {
  readonly method: "GET" | "POST" | "PUT" | "DELETE";
  readonly path: string;
  readonly query?: Record<string, QueryValue>;
  readonly headers?: Record<string, string>;
  readonly body?: unknown;
  readonly timeoutMs?: number;
  readonly resource?: { type: string; id: string };
}

/**
 * Builds the middleware chain used by every vendor client.
 *
 * Order: Logging -> ErrorMapping -> FetchHandler
 *
 * - LoggingMiddleware records structured request/response metadata.
 * - ErrorMappingMiddleware converts HTTP error responses to typed errors.
 * - FetchHandler performs the actual network fetch.
 *
 * Requests are never retried or cached.
 */
function buildMiddlewareChain(): Middleware {
  const loggingMiddleware = new LoggingMiddleware();
  const errorMappingMiddleware = new ErrorMappingMiddleware();
  loggingMiddleware.setNext(errorMappingMiddleware);
  errorMappingMiddleware.setNext(new FetchHandler());
  return loggingMiddleware;
}

/**
 * Thin JSON-over-HTTP client. One instance per vendor; holds no per-call state.
 */
export class HttpClient {
  readonly service: string;
  private readonly baseUrl: string;
  private readonly chain: Middleware;

  constructor(options: HttpClientOptions) {
    this.service = options.service;
    this.baseUrl = options.baseUrl;
    this.chain = buildMiddlewareChain();
    logger.debug({ service: this.service }, "HTTP client created");
  }

  /**
   * Sends a request and returns the successful response.
   * Non-2xx statuses and network failures reject with typed errors.
   */
  async send(request: HttpRequest): Promise<Response> {
    const headers: Record<string, string> = { Accept: "application/json", ...request.headers };
    let body: string | undefined;
    if (request.body !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(request.body);
    }

    const context: RequestContext = {
      service: this.service,
      url: buildUrl(this.baseUrl, request.path, request.query),
      init: { method: request.method, headers, body },
      timeoutMs: request.timeoutMs,
      resource: request.resource,
    };

    await this.chain.execute(context);

    if (!context.response) {
      throw new InvalidResponseError(this.service, "no response received");
    }
    return context.response;
  }

  /**
   * Sends a request and validates the JSON body against `schema`.
   */
  async requestJson<T>(
    request: HttpRequest,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const response = await this.send(request);

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new InvalidResponseError(
        this.service,
        error instanceof Error ? error.message : "body is not valid JSON",
      );
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw new InvalidResponseError(this.service, `${issue?.message ?? "invalid body"}${where}`);
    }
    return parsed.data;
  }
}
