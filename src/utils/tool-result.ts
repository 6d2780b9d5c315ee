import type { ToolResult } from "../types/tools.js";
import { type McpToolError, formatErrorForUser } from "./errors.js";

/** Wraps a structured value as pretty-printed JSON text content. */
export function jsonResult(value: unknown): ToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
}

/** MCP error result carrying the user-facing message for `error`. */
export function errorResult(error: McpToolError): ToolResult {
  return { content: [{ type: "text", text: formatErrorForUser(error) }], isError: true };
}
