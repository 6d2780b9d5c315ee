import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { requireGoogleAccessToken } from "../auth/credentials.js";
import type { GoogleCalendarClient } from "../clients/google-calendar.js";
import type { Config } from "../config.js";
import {
  DeleteCalendarEventParams,
  type DeleteCalendarEventParamsType,
} from "../schemas/calendar-write.js";
import type { ToolDeps } from "../types/tools.js";
import { McpToolError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { errorResult, jsonResult } from "../utils/tool-result.js";

const logger = createLogger("tools:calendar-delete");

export interface DeleteConfirmation {
  success: true;
  message: string;
}

export async function deleteCalendarEvent(
  client: GoogleCalendarClient,
  accessToken: string,
  params: DeleteCalendarEventParamsType,
): Promise<DeleteConfirmation> {
  await client.deleteEvent(accessToken, params.event_id);
  return { success: true, message: `Event ${params.event_id} deleted successfully` };
}

export function registerCalendarDeleteTools(
  server: McpServer,
  deps: ToolDeps,
  _config: Config,
): void {
  server.tool(
    "delete_calendar_event",
    "Delete a calendar event by ID. This cannot be undone.",
    DeleteCalendarEventParams.shape,
    { destructiveHint: true },
    async (params) => {
      const startTime = Date.now();
      try {
        const parsed = DeleteCalendarEventParams.parse(params);
        const accessToken = requireGoogleAccessToken(deps.credentials);

        const result = await deleteCalendarEvent(deps.calendar, accessToken, parsed);

        logger.info(
          { tool: "delete_calendar_event", status: 204, duration_ms: Date.now() - startTime },
          "delete_calendar_event completed",
        );

        return jsonResult(result);
      } catch (error) {
        if (error instanceof McpToolError) {
          logger.warn(
            {
              tool: "delete_calendar_event",
              status: error.httpStatus,
              code: error.code,
              duration_ms: Date.now() - startTime,
            },
            "delete_calendar_event failed",
          );
          return errorResult(error);
        }
        throw error;
      }
    },
  );
}
