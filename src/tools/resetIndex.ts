import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { IngestionService } from "../services/ingestionService.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerResetIndexTool(server: McpServer, ingestion: IngestionService) {
  server.registerTool(
    "reset_index",
    {
      title: "Reset Index",
      description: "Deletes every indexed entry and recreates an empty collection.",
      inputSchema: {
        confirm: z.literal(true).describe("Must be true"),
      },
    },
    async () => {
      try {
        return jsonResult(await ingestion.resetIndex());
      } catch (error) {
        return errorResult("reset_index", error);
      }
    },
  );
}
