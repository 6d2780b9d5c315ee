/**
 * Error-mapping middleware.
 *
 * Catches HTTP error responses from downstream middleware and maps them
 * to the typed error hierarchy defined in `src/utils/errors.ts`.
 *
 * Also catches network-level failures thrown by fetch (connection refused,
 * DNS failures, timeouts) and wraps them in NetworkError.
 */

import {
  ApiError,
  AuthError,
  NetworkError,
  NotFoundError,
  RateLimitError,
  ServiceError,
} from "../utils/errors.js";
import { parseRetryAfterMs } from "../utils/http-helpers.js";
import type { Middleware, RequestContext } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Safely parse the response body as JSON.
 * Returns undefined if the body cannot be parsed.
 */
async function tryParseErrorBody(response: Response): Promise<unknown> {
  try {
    // Clone so the body remains available for downstream consumers.
    return await response.clone().json();
  } catch {
    return undefined;
  }
}

/**
 * Pulls a human-readable message out of the vendor error bodies:
 * - Google: `{ error: { code, message } }`
 * - Ticketmaster gateway: `{ fault: { faultstring } }`
 * - Ticketmaster API: `{ errors: [{ detail }] }`
 */
export function extractErrorMessage(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;

  if (isRecord(body.error) && typeof body.error.message === "string") {
    return body.error.message;
  }
  if (isRecord(body.fault) && typeof body.fault.faultstring === "string") {
    return body.fault.faultstring;
  }
  if (Array.isArray(body.errors)) {
    const first: unknown = body.errors[0];
    if (isRecord(first) && typeof first.detail === "string") {
      return first.detail;
    }
  }
  return undefined;
}

/**
 * Reads the `code` of the underlying system error, if any.
 * Node's fetch reports e.g. ECONNREFUSED as `TypeError("fetch failed", { cause })`.
 */
function getCauseCode(error: Error): string | undefined {
  const cause: unknown = error.cause;
  if (isRecord(cause) && typeof cause.code === "string") {
    return cause.code;
  }
  return undefined;
}

function toNetworkError(context: RequestContext, error: unknown): NetworkError | undefined {
  if (!(error instanceof Error)) return undefined;

  if (error.name === "TimeoutError") {
    return new NetworkError(
      context.service,
      `Request timed out after ${context.timeoutMs ?? 0}ms`,
    );
  }
  if (error.name === "AbortError") {
    return new NetworkError(context.service, "Request was aborted");
  }
  if (error instanceof TypeError) {
    const code = getCauseCode(error);
    return new NetworkError(context.service, code ? `${error.message} (${code})` : error.message);
  }
  return undefined;
}

/**
 * Map an HTTP status + body to the appropriate typed error.
 */
export function mapResponseToError(
  context: RequestContext,
  response: Response,
  body: unknown,
): Error {
  const status = response.status;
  const message = extractErrorMessage(body) ?? `HTTP ${status} ${response.statusText}`.trim();

  switch (status) {
    case 401:
    case 403:
      return new AuthError(context.service, message, status);
    case 404:
      return context.resource
        ? new NotFoundError(context.resource.type, context.resource.id)
        : new NotFoundError("resource", context.url.pathname);
    case 429:
      return new RateLimitError(parseRetryAfterMs(response));
    default:
      if (status >= 500 && status <= 599) {
        return new ServiceError(context.service, message, status);
      }
      return new ApiError(context.service, message, status);
  }
}

/**
 * Middleware that maps HTTP errors to the typed error hierarchy.
 */
export class ErrorMappingMiddleware implements Middleware {
  private nextMiddleware?: Middleware;

  async execute(context: RequestContext): Promise<void> {
    try {
      if (this.nextMiddleware) {
        await this.nextMiddleware.execute(context);
      }
    } catch (error: unknown) {
      throw toNetworkError(context, error) ?? error;
    }

    // After successful execution, check the response status.
    const response = context.response;
    if (!response || response.ok) {
      return;
    }

    const body = await tryParseErrorBody(response);
    throw mapResponseToError(context, response, body);
  }

  setNext(next: Middleware): void {
    this.nextMiddleware = next;
  }
}
