/**
 * MCP (Model Context Protocol) response helpers shared by tool handlers.
 */

import type { Result } from "./result.js";

export type TextContent = {
  type: "text";
  text: string;
};

/**
 * Tool handler return shape. The index signature keeps it assignable to the
 * SDK's `CallToolResult`.
 */
export type ToolResponse<T extends Record<string, unknown> = Record<string, unknown>> = {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: T;
};

export type ErrorPayload = { success: false; error: string };

export function textResponse(text: string): ToolResponse {
  return { content: [{ type: "text", text }] };
}

export function errorResponse(message: string): ToolResponse<ErrorPayload> {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: { success: false, error: message },
  };
}

/**
 * Convert a Result into a tool response. On success the formatter supplies
 * the text and the structured payload; `success: true` is added to it.
 */
export function resultToStructuredResponse<T, E extends string | Error, S extends Record<string, unknown>>(
  result: Result<T, E>,
  formatter: (value: T) => { text: string; data: S }
): ToolResponse<(S & { success: true }) | ErrorPayload> {
  if (result.ok) {
    const { text, data } = formatter(result.value);
    return {
      content: [{ type: "text", text }],
      structuredContent: { ...data, success: true },
    };
  }
  return errorResponse(errorMessage(result.error));
}

function errorMessage(error: string | Error): string {
  return typeof error === "string" ? error : error.message;
}
