import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

/**
 * Creates a structured JSON response for MCP tools: a pretty-printed text
 * block for clients that only read content, plus structuredContent.
 */
export function createStructuredResponse<T extends Record<string, unknown>>(data: T): CallToolResult {
  return {
    content: [{
      type: "text",
      text: JSON.stringify(data, null, 2)
    }],
    structuredContent: data
  };
}

/**
 * Tool-level error result; the message reaches the caller as written.
 */
export function createToolErrorResponse(message: string): CallToolResult {
  return {
    content: [{
      type: "text",
      text: message
    }],
    isError: true
  };
}
