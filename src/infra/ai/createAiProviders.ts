import { AppConfig } from "../../config/env.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import { EmbeddingProvider, GenerationProvider } from "./types.js";

export interface AiProviders {
  embedding: EmbeddingProvider;
  generation: GenerationProvider;
}

export function createAiProviders(config: AppConfig): AiProviders {
  const ollama = new OllamaClient({
    baseUrl: config.ollamaBaseUrl,
    chatModel: config.ollamaChatModel,
    embeddingModel: config.ollamaEmbeddingModel,
  });

  const embedding =
    config.embeddingProvider === "openai"
      ? new OpenAiClient({
          apiKey: config.openaiApiKey,
          embeddingModel: config.openaiEmbeddingModel,
          dimension: config.embeddingDimension,
        })
      : ollama.embeddingProvider();

  return { embedding, generation: ollama };
}
