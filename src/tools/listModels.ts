import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { GenerationProvider } from "../infra/ai/types.js";
import { listAvailableModels } from "../services/chatService.js";
import { jsonResult } from "./toolResult.js";

export function registerListModelsTool(server: McpServer, generation: GenerationProvider) {
  server.registerTool(
    "list_models",
    {
      title: "List Models",
      description: "Lists the chat models installed on the generation service.",
      inputSchema: {},
    },
    async () => {
      const models = await listAvailableModels(generation);
      return jsonResult({ active: generation.modelName, models });
    },
  );
}
