import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { getSupportedDocumentExtensions } from "../infra/parsers/documentLoader.js";
import { IngestionService, IngestionSummary } from "../services/ingestionService.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerIngestDocumentsTool(server: McpServer, ingestion: IngestionService) {
  server.registerTool(
    "ingest_documents",
    {
      title: "Ingest Documents",
      description: `Extracts, chunks, embeds and indexes documents (${getSupportedDocumentExtensions().join(", ")}). Re-ingesting a source replaces its entries.`,
      inputSchema: {
        paths: z.array(z.string()).optional().describe("Local file paths to ingest"),
        uploads: z
          .array(
            z.object({
              source: z.string().describe("File name, extension included"),
              content_base64: z.string().describe("File bytes as base64"),
            }),
          )
          .optional()
          .describe("Files sent inline"),
      },
    },
    async ({ paths, uploads }) => {
      if ((paths?.length ?? 0) === 0 && (uploads?.length ?? 0) === 0) {
        return errorResult("ingest_documents", new Error("Provide at least one path or upload."));
      }

      try {
        const summaries: IngestionSummary[] = [];
        if (paths && paths.length > 0) {
          summaries.push(await ingestion.ingestFiles(paths));
        }
        if (uploads && uploads.length > 0) {
          summaries.push(
            await ingestion.ingestUploads(
              uploads.map((upload) => ({
                source: upload.source,
                contentBase64: upload.content_base64,
              })),
            ),
          );
        }

        const files = summaries.flatMap((summary) => summary.files);
        return jsonResult({
          succeeded: files.filter((file) => file.status !== "failed").length,
          failed: files.filter((file) => file.status === "failed").length,
          total_chunks: sum(summaries, (summary) => summary.totalChunks),
          embedding_failures: sum(summaries, (summary) => summary.embeddingFailures),
          failed_batches: summaries.flatMap((summary) => summary.failedBatches),
          files,
        });
      } catch (error) {
        return errorResult("ingest_documents", error);
      }
    },
  );
}

function sum<T>(items: readonly T[], pick: (item: T) => number): number {
  return items.reduce((total, item) => total + pick(item), 0);
}
