import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { describeError } from "../domain/errors.js";

export function jsonResult(payload: unknown): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

export function errorResult(tool: string, error: unknown): CallToolResult {
  console.error(`[server] ${tool} failed: ${describeError(error)}`);
  return {
    isError: true,
    content: [
      {
        type: "text",
        text: JSON.stringify({ error: describeError(error) }, null, 2),
      },
    ],
  };
}
