import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { IngestionService } from "../services/ingestionService.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerListSourcesTool(server: McpServer, ingestion: IngestionService) {
  server.registerTool(
    "list_sources",
    {
      title: "List Sources",
      description: "Lists indexed sources with their chunk counts and pages.",
      inputSchema: {},
    },
    async () => {
      try {
        const sources = await ingestion.listSources();
        return jsonResult({ count: sources.length, sources });
      } catch (error) {
        return errorResult("list_sources", error);
      }
    },
  );
}
