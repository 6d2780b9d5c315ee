import { z } from "zod";
import { GOOGLE_CALENDAR_API_BASE } from "./clients/google-calendar.js";
import { TICKETMASTER_API_BASE } from "./clients/ticketmaster.js";

const Transport = z.enum(["stdio", "http"]);
type Transport = z.infer<typeof Transport>;

const ConfigSchema = z.object({
  server: z.object({
    logLevel: z
      .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
      .default("info"),
    transport: Transport.default("stdio"),
    host: z.string().min(1).default("0.0.0.0"),
    port: z.number().int().min(1).max(65535).default(3002),
  }),
  calendar: z.object({
    apiBase: z.string().url().default(GOOGLE_CALENDAR_API_BASE),
    calendarId: z.string().min(1).default("primary"),
    defaultTimeZone: z.string().min(1).default("America/New_York"),
  }),
  ticketmaster: z.object({
    apiBase: z.string().url().default(TICKETMASTER_API_BASE),
  }),
});

type Config = z.infer<typeof ConfigSchema>;

/**
 * Loads server settings from the environment. Credentials are not part of
 * the config: they are read per call through a CredentialProvider.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return ConfigSchema.parse({
    server: {
      logLevel: env.LOG_LEVEL ?? "info",
      transport: env.MCP_TRANSPORT ?? "stdio",
      host: env.HOST ?? "0.0.0.0",
      port: env.PORT ? Number.parseInt(env.PORT, 10) : 3002,
    },
    calendar: {
      apiBase: env.GOOGLE_CALENDAR_API_BASE ?? GOOGLE_CALENDAR_API_BASE,
      calendarId: env.CALENDAR_ID ?? "primary",
      defaultTimeZone: env.DEFAULT_TIMEZONE ?? "America/New_York",
    },
    ticketmaster: {
      apiBase: env.TICKETMASTER_API_BASE ?? TICKETMASTER_API_BASE,
    },
  });
}

type CalendarConfig = Config["calendar"];

export { type CalendarConfig, type Config, ConfigSchema, type Transport };
