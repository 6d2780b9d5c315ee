import { describe, expect, it } from "vitest";
import { GoogleCalendarClient } from "../src/clients/google-calendar.js";
import { DeleteCalendarEventParams } from "../src/schemas/calendar-write.js";
import { deleteCalendarEvent } from "../src/tools/calendar-delete.js";
import { callTool } from "./helpers/mcp-test-client.js";
import { calendarStore } from "./mocks/calendar-store.js";
import { TEST_ACCESS_TOKEN, retroEvent, standupEvent } from "./mocks/fixtures/calendar.js";

describe("delete_calendar_event", () => {
  it("should reject an empty event_id", () => {
    expect(DeleteCalendarEventParams.safeParse({ event_id: "" }).success).toBe(false);
  });

  it("should delete the event and confirm", async () => {
    calendarStore.seed([standupEvent, retroEvent]);

    const result = await deleteCalendarEvent(new GoogleCalendarClient(), TEST_ACCESS_TOKEN, {
      event_id: "evt-standup",
    });

    expect(result).toEqual({ success: true, message: "Event evt-standup deleted successfully" });
    expect(calendarStore.get("evt-standup")).toBeUndefined();
    expect(calendarStore.get("evt-retro")).toBeDefined();
  });

  it("should return the confirmation through MCP", async () => {
    calendarStore.seed([retroEvent]);

    const result = await callTool("delete_calendar_event", { event_id: "evt-retro" });

    expect(result.isError).toBe(false);
    expect(JSON.parse(result.text)).toEqual({
      success: true,
      message: "Event evt-retro deleted successfully",
    });
  });

  it("should report an event that is already gone", async () => {
    const result = await callTool("delete_calendar_event", { event_id: "evt-retro" });

    expect(result).toEqual({
      isError: true,
      text: "Resource not found: event with ID evt-retro",
    });
  });
});
