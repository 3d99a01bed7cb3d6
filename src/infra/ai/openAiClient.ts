import { isFiniteVector } from "../../utils/vector.js";
import { EmbeddingProvider, EmbeddingResult } from "./types.js";

interface OpenAiClientOptions {
  apiKey: string | null;
  embeddingModel: string;
  dimension: number;
}

interface EmbeddingResponse {
  data?: Array<{
    embedding?: unknown;
    index?: number;
  }>;
}

export class OpenAiClient implements EmbeddingProvider {
  constructor(private readonly options: OpenAiClientOptions) {}

  get modelName(): string {
    return this.options.embeddingModel;
  }

  async embed(text: string, signal?: AbortSignal): Promise<EmbeddingResult> {
    if (!this.options.apiKey) {
      return { ok: false, kind: "unreachable", message: "OPENAI_API_KEY is not configured." };
    }

    let response: Response;
    try {
      response = await fetch("https://api.openai.com/v1/embeddings", {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.options.embeddingModel,
          input: text,
          dimensions: this.options.dimension,
        }),
        signal,
      });
    } catch (error) {
      return {
        ok: false,
        kind: "unreachable",
        message: `OpenAI embeddings request failed: ${error instanceof Error ? error.message : String(error)}`,
      };
    }

    if (!response.ok) {
      return {
        ok: false,
        kind: "unreachable",
        message: `OpenAI embeddings failed (${response.status}): ${await response.text()}`,
      };
    }

    let data: EmbeddingResponse;
    try {
      data = (await response.json()) as EmbeddingResponse;
    } catch {
      return { ok: false, kind: "malformed", message: "OpenAI embeddings returned invalid JSON." };
    }

    const embedding = data.data?.[0]?.embedding;
    if (!isFiniteVector(embedding)) {
      return { ok: false, kind: "malformed", message: "OpenAI embeddings returned no vector." };
    }
    return { ok: true, vector: embedding };
  }
}
