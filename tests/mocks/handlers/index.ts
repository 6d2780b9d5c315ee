import type { HttpHandler } from "msw";
import { googleCalendarHandlers } from "./google-calendar.js";
import { ticketmasterHandlers } from "./ticketmaster.js";

/**
 * MSW handler order matters: more specific routes must come before generic ones.
 * Both vendor hosts are distinct, so the groups never shadow each other.
 */
export const handlers: HttpHandler[] = [...googleCalendarHandlers, ...ticketmasterHandlers];
