/**
 * HTTP logging middleware.
 *
 * Logs structured request/response metadata via pino.
 * NEVER logs query strings (the Ticketmaster key travels there), headers or bodies.
 */

import { randomUUID } from "node:crypto";
import { createLogger } from "../utils/logger.js";
import type { Middleware, RequestContext } from "./types.js";

const logger = createLogger("http");

/**
 * Middleware that logs vendor request/response metadata.
 *
 * Logged fields (safe, no secrets):
 * - request_id
 * - service, method, host, endpoint
 * - status, duration_ms
 */
export class LoggingMiddleware implements Middleware {
  private nextMiddleware?: Middleware;

  async execute(context: RequestContext): Promise<void> {
    const requestId = randomUUID();
    const method = context.init.method?.toUpperCase() ?? "GET";
    const host = context.url.host;
    const endpoint = context.url.pathname;
    const startTime = performance.now();

    logger.debug({
      event: "http_request",
      request_id: requestId,
      service: context.service,
      method,
      host,
      endpoint,
    });

    try {
      if (this.nextMiddleware) {
        await this.nextMiddleware.execute(context);
      }

      logger.info({
        event: "http_response",
        request_id: requestId,
        service: context.service,
        method,
        endpoint,
        status: context.response?.status,
        duration_ms: Math.round(performance.now() - startTime),
      });
    } catch (error: unknown) {
      logger.warn({
        event: "http_error",
        request_id: requestId,
        service: context.service,
        method,
        endpoint,
        duration_ms: Math.round(performance.now() - startTime),
        error_name: error instanceof Error ? error.name : "UnknownError",
        error_code: isErrorWithCode(error) ? error.code : undefined,
      });

      throw error;
    }
  }

  setNext(next: Middleware): void {
    this.nextMiddleware = next;
  }
}

/**
 * Type guard: check if an unknown value is an Error-like object with a string `code`.
 */
function isErrorWithCode(value: unknown): value is Error & { code: string } {
  return value instanceof Error && "code" in value && typeof value.code === "string";
}
