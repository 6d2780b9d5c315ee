/**
 * Error class hierarchy for the calendar and ticket tools.
 *
 * Vendor HTTP failures, malformed vendor data and missing credentials are all
 * mapped to typed errors so that tool handlers can decide per tool whether to
 * surface, degrade or rethrow them.
 */

// ---------------------------------------------------------------------------
// Base error
// ---------------------------------------------------------------------------

export class McpToolError extends Error {
  readonly code: string;
  readonly httpStatus?: number;

  constructor(message: string, code: string, httpStatus?: number) {
    super(message);
    this.name = "McpToolError";
    this.code = code;
    this.httpStatus = httpStatus;
  }
}

// ---------------------------------------------------------------------------
// API error (generic non-2xx response)
// ---------------------------------------------------------------------------

export class ApiError extends McpToolError {
  readonly service: string;

  constructor(service: string, message: string, httpStatus: number) {
    super(message, "API_ERROR", httpStatus);
    this.name = "ApiError";
    this.service = service;
  }
}

// ---------------------------------------------------------------------------
// Auth error (401 / 403)
// ---------------------------------------------------------------------------

export class AuthError extends McpToolError {
  readonly service: string;

  constructor(service: string, message: string, httpStatus: number) {
    super(message, "AUTH_ERROR", httpStatus);
    this.name = "AuthError";
    this.service = service;
  }
}

// ---------------------------------------------------------------------------
// Not found error (404)
// ---------------------------------------------------------------------------

export class NotFoundError extends McpToolError {
  readonly resourceType: string;
  readonly resourceId: string;

  constructor(resourceType: string, resourceId: string) {
    super(`Resource not found: ${resourceType} with ID ${resourceId}`, "NOT_FOUND_ERROR", 404);
    this.name = "NotFoundError";
    this.resourceType = resourceType;
    this.resourceId = resourceId;
  }
}

// ---------------------------------------------------------------------------
// Rate limit error (429)
// ---------------------------------------------------------------------------

export class RateLimitError extends McpToolError {
  readonly retryAfterMs: number;

  constructor(retryAfterMs: number) {
    super(
      `Rate limit exceeded. Retry after ${Math.ceil(retryAfterMs / 1000)}s`,
      "RATE_LIMIT_ERROR",
      429,
    );
    this.name = "RateLimitError";
    this.retryAfterMs = retryAfterMs;
  }
}

// ---------------------------------------------------------------------------
// Service error (5xx)
// ---------------------------------------------------------------------------

export class ServiceError extends McpToolError {
  readonly service: string;

  constructor(service: string, message: string, httpStatus: number) {
    super(message, "SERVICE_ERROR", httpStatus);
    this.name = "ServiceError";
    this.service = service;
  }
}

// ---------------------------------------------------------------------------
// Network error (ECONNREFUSED, timeouts, etc.)
// ---------------------------------------------------------------------------

export class NetworkError extends McpToolError {
  readonly service: string;

  constructor(service: string, message: string) {
    super(message, "NETWORK_ERROR");
    this.name = "NetworkError";
    this.service = service;
  }
}

// ---------------------------------------------------------------------------
// Invalid response (body is not JSON or not the expected shape)
// ---------------------------------------------------------------------------

export class InvalidResponseError extends McpToolError {
  readonly service: string;

  constructor(service: string, details: string) {
    super(`Unexpected response from ${service}: ${details}`, "INVALID_RESPONSE_ERROR");
    this.name = "InvalidResponseError";
    this.service = service;
  }
}

// ---------------------------------------------------------------------------
// Format error (malformed date/time in vendor data)
// ---------------------------------------------------------------------------

export class FormatError extends McpToolError {
  readonly value: string;

  constructor(value: string, expected: string) {
    super(`Malformed ${expected}: "${value}"`, "FORMAT_ERROR");
    this.name = "FormatError";
    this.value = value;
  }
}

// ---------------------------------------------------------------------------
// Configuration error (missing credential)
// ---------------------------------------------------------------------------

export class ConfigurationError extends McpToolError {
  readonly setting: string;

  constructor(setting: string, message: string) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
    this.setting = setting;
  }
}

// ---------------------------------------------------------------------------
// Helper: format error for user
// ---------------------------------------------------------------------------

export function formatErrorForUser(error: McpToolError): string {
  if (error instanceof AuthError) {
    if (error.httpStatus === 403) {
      return `Access denied by ${error.service}: ${error.message}`;
    }
    return `Authentication with ${error.service} failed. Please refresh your credentials.`;
  }

  if (error instanceof NotFoundError) {
    return `Resource not found: ${error.resourceType} with ID ${error.resourceId}`;
  }

  if (error instanceof RateLimitError) {
    const seconds = Math.ceil(error.retryAfterMs / 1000);
    return `Rate limit reached. Try again in ${seconds} seconds.`;
  }

  if (error instanceof ServiceError) {
    return `${error.service} is temporarily unavailable (HTTP ${error.httpStatus}).`;
  }

  if (error instanceof NetworkError) {
    return `No connection to ${error.service}: ${error.message}`;
  }

  // ApiError, InvalidResponseError, FormatError, ConfigurationError
  return error.message;
}
