import pino from "pino";

// The level comes from LOG_LEVEL once, at load time. Child loggers copy it when
// created and do not follow later changes to the parent.
const BASE_LOGGER = pino(
  {
    level: process.env.LOG_LEVEL ?? "info",
    redact: {
      paths: ["headers.authorization", "authorization", "accessToken", "token", "apikey", "apiKey"],
      censor: "[REDACTED]",
    },
    serializers: {
      error: pino.stdSerializers.err,
    },
  },
  // stdout carries the MCP stdio protocol, so logs go to stderr.
  pino.destination(2),
);

export function createLogger(module: string): pino.Logger {
  return BASE_LOGGER.child({ module });
}

export { BASE_LOGGER as logger };
