import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { Retriever } from "../pipelines/retriever.js";
import { snippet } from "../utils/text.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerSearchChunksTool(
  server: McpServer,
  retriever: Retriever,
  defaultTopK: number,
) {
  server.registerTool(
    "search_chunks",
    {
      title: "Search Chunks",
      description: "Retrieves the nearest indexed chunks for a query, closest first.",
      inputSchema: {
        query: z.string().min(1).describe("Search query"),
        top_k: z.number().int().min(1).max(50).optional().describe("Max hits"),
      },
    },
    async ({ query, top_k }) => {
      try {
        const outcome = await retriever.query(query, top_k ?? defaultTopK);
        return jsonResult({
          query,
          status: outcome.status,
          ...(outcome.status === "degraded" ? { reason: outcome.reason } : {}),
          hits: outcome.hits.map((hit) => ({
            id: hit.id,
            source: hit.source,
            page: hit.page,
            distance: Number(hit.distance.toFixed(6)),
            snippet: snippet(hit.chunkText, 240),
          })),
        });
      } catch (error) {
        return errorResult("search_chunks", error);
      }
    },
  );
}
