/**
 * MCP (Model Context Protocol) response utilities.
 * Helpers for building tool responses with text and structured content.
 */

import type { Result } from "./result.js";

/**
 * MCP text content block.
 */
export interface TextContent {
  type: "text";
  text: string;
}

/**
 * MCP tool response structure.
 */
export type ToolResponse<T extends Record<string, unknown> = Record<string, unknown>> = {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: T;
  isError?: boolean;
};

export type ErrorPayload = { success: false; error: string };

/**
 * Create a plain text response.
 */
export function textResponse(text: string): ToolResponse {
  return { content: [{ type: "text", text }] };
}

/**
 * Create an error response from a message.
 */
export function errorResponse(message: string): ToolResponse<ErrorPayload> {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: { success: false, error: message },
    isError: true,
  };
}

/**
 * Create a success response carrying structured data next to the text.
 */
export function successResponse<T extends Record<string, unknown>>(
  text: string,
  data: T
): ToolResponse<T & { success: true }> {
  return {
    content: [{ type: "text", text }],
    structuredContent: { ...data, success: true },
  };
}

/**
 * Convert a Result to a tool response.
 * On success the formatter supplies text and data; on failure an error response is returned.
 */
export function resultToResponse<T, S extends Record<string, unknown>>(
  result: Result<T, Error>,
  formatter: (value: T) => { text: string; data: S }
): ToolResponse<(S & { success: true }) | ErrorPayload> {
  if (!result.ok) {
    return errorResponse(result.error.message);
  }
  const { text, data } = formatter(result.value);
  return successResponse(text, data);
}
