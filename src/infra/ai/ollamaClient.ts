import { GenerationStreamError } from "../../domain/errors.js";
import { isFiniteVector } from "../../utils/vector.js";
import {
  EmbeddingProvider,
  EmbeddingResult,
  GenerateOptions,
  GenerationProvider,
  ModelListResult,
} from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
}

export class OllamaClient implements GenerationProvider {
  constructor(private readonly options: OllamaClientOptions) {}

  get modelName(): string {
    return this.options.chatModel;
  }

  /** Chat model and embedding model share a client but not a name. */
  embeddingProvider(): EmbeddingProvider {
    return {
      modelName: this.options.embeddingModel,
      embed: (text, signal) => this.embed(text, signal),
    };
  }

  async embed(text: string, signal?: AbortSignal): Promise<EmbeddingResult> {
    let response: Response;
    try {
      response = await fetch(`${this.options.baseUrl}/api/embeddings`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.options.embeddingModel,
          prompt: text,
        }),
        signal,
      });
    } catch (error) {
      return {
        ok: false,
        kind: "unreachable",
        message: `Ollama embeddings request failed: ${errorMessage(error)}`,
      };
    }

    if (!response.ok) {
      return {
        ok: false,
        kind: "unreachable",
        message: `Ollama embeddings failed (${response.status}): ${await safeText(response)}`,
      };
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch {
      return { ok: false, kind: "malformed", message: "Ollama embeddings returned invalid JSON." };
    }

    const embedding = readField(data, "embedding");
    if (!isFiniteVector(embedding)) {
      return {
        ok: false,
        kind: "malformed",
        message: "Ollama embeddings returned an empty or non-numeric vector.",
      };
    }
    return { ok: true, vector: embedding };
  }

  async *generate(prompt: string, options: GenerateOptions = {}): AsyncGenerator<string> {
    let response: Response;
    try {
      response = await fetch(`${this.options.baseUrl}/api/generate`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.options.chatModel,
          prompt,
          stream: true,
          keep_alive: "30m",
          options: {
            temperature: options.temperature ?? 0.2,
          },
        }),
        signal: options.signal,
      });
    } catch (error) {
      throw new GenerationStreamError(`Ollama generate request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new GenerationStreamError(
        `Ollama generate failed (${response.status}): ${await safeText(response)}`,
      );
    }

    if (!response.body) {
      throw new GenerationStreamError("Ollama generate returned empty body.");
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = "";
    let settled = false;

    try {
      while (true) {
        let chunk: Awaited<ReturnType<typeof reader.read>>;
        try {
          chunk = await reader.read();
        } catch (error) {
          settled = true;
          throw error;
        }
        const { value, done } = chunk;
        if (done) {
          settled = true;
          break;
        }

        buffer += decoder.decode(value, { stream: true });
        const lines = buffer.split("\n");
        buffer = lines.pop() ?? "";

        for (const line of lines) {
          const token = parseStreamLine(line);
          if (token) {
            yield token;
          }
        }
      }

      buffer += decoder.decode();
      const token = parseStreamLine(buffer);
      if (token) {
        yield token;
      }
    } finally {
      // Consumer stopped early or a line was malformed: close the body.
      if (!settled) {
        await reader.cancel();
      }
      reader.releaseLock();
    }
  }

  async listModels(): Promise<ModelListResult> {
    let response: Response;
    try {
      response = await fetch(`${this.options.baseUrl}/api/tags`);
    } catch (error) {
      return {
        ok: false,
        kind: "unreachable",
        message: `Ollama tags request failed: ${errorMessage(error)}`,
      };
    }
    if (!response.ok) {
      return {
        ok: false,
        kind: "unreachable",
        message: `Ollama tags failed (${response.status}): ${await safeText(response)}`,
      };
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch {
      return { ok: false, kind: "malformed", message: "Ollama tags returned invalid JSON." };
    }

    const models = readField(data, "models");
    if (!Array.isArray(models)) {
      return { ok: false, kind: "malformed", message: "Ollama tags response has no model list." };
    }

    const names: string[] = [];
    for (const entry of models) {
      const name = readField(entry, "model") ?? readField(entry, "name");
      if (typeof name === "string" && name) {
        names.push(name);
      }
    }
    return { ok: true, models: names };
  }
}

function parseStreamLine(line: string): string {
  const trimmed = line.trim();
  if (!trimmed) {
    return "";
  }

  let data: unknown;
  try {
    data = JSON.parse(trimmed);
  } catch (error) {
    throw new GenerationStreamError("Ollama generate stream sent a malformed line.", {
      cause: error,
    });
  }

  const failure = readField(data, "error");
  if (typeof failure === "string") {
    throw new GenerationStreamError(`Ollama generate stream error: ${failure}`);
  }
  const token = readField(data, "response");
  return typeof token === "string" ? token : "";
}

function readField(value: unknown, key: string): unknown {
  if (!value || typeof value !== "object" || !(key in value)) {
    return undefined;
  }
  return (value as Record<string, unknown>)[key];
}

async function safeText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return "";
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
