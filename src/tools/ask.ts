import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { ChatSession } from "../services/chatService.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerAskTool(server: McpServer, session: ChatSession) {
  server.registerTool(
    "ask",
    {
      title: "Ask",
      description:
        "Answers a question from the indexed documents. Keeps the conversation history of this session.",
      inputSchema: {
        question: z.string().min(1).describe("Question for the indexed documents"),
      },
    },
    async ({ question }) => {
      const startedAt = Date.now();
      try {
        const result = await session.ask(question);
        return jsonResult({
          status: result.status,
          answer: result.answer,
          reasoning: result.reasoning,
          suggestions: result.suggestions,
          sources: result.sources,
          ...(result.notice ? { notice: result.notice } : {}),
          latency_ms: Date.now() - startedAt,
        });
      } catch (error) {
        return errorResult("ask", error);
      }
    },
  );
}
