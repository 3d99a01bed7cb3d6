import { z } from "zod";
import { ConfigurationError } from "../domain/errors.js";

const envSchema = z.object({
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("llama3.2"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("all-minilm"),
  EMBEDDING_PROVIDER: z.enum(["ollama", "openai"]).default("ollama"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(384),
  EMBEDDING_CONCURRENCY: z.coerce.number().int().positive().default(4),
  CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
  BATCH_SIZE: z.coerce.number().int().positive().default(50),
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(5),
  HISTORY_TURNS: z.coerce.number().int().nonnegative().default(6),
  GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  SYSTEM_PROMPT_FILE: z.string().default("assistant_config.txt"),
  CONVERSATION_LOG_PATH: z.string().default(".data/conversation.log"),
  VECTOR_STORE: z.enum(["memory", "file", "pgvector"]).default("file"),
  VECTOR_STORE_PATH: z.string().default(".data/vector-store.json"),
  MAX_VECTOR_STORE_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(50 * 1024 * 1024),
  DATABASE_URL: z.string().optional(),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),
});

export type EmbeddingProviderName = "ollama" | "openai";
export type VectorStoreBackend = "memory" | "file" | "pgvector";

export interface AppConfig {
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;
  embeddingProvider: EmbeddingProviderName;
  openaiApiKey: string | null;
  openaiEmbeddingModel: string;
  embeddingDimension: number;
  embeddingConcurrency: number;
  chunkSize: number;
  chunkOverlap: number;
  batchSize: number;
  retrievalTopK: number;
  historyTurns: number;
  generationTemperature: number;
  systemPromptFile: string;
  conversationLogPath: string;
  vectorStore: VectorStoreBackend;
  vectorStorePath: string;
  maxVectorStoreBytes: number;
  databaseUrl: string | null;
  transport: "stdio" | "http";
  host: string;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment: ${details}`);
  }
  const parsed = result.data;

  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new ConfigurationError(
      `CHUNK_OVERLAP (${parsed.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${parsed.CHUNK_SIZE}).`,
    );
  }

  if (parsed.VECTOR_STORE === "pgvector" && !parsed.DATABASE_URL) {
    throw new ConfigurationError("VECTOR_STORE=pgvector requires DATABASE_URL.");
  }

  const openaiApiKey = parsed.OPENAI_API_KEY?.trim() || null;
  if (parsed.EMBEDDING_PROVIDER === "openai" && !openaiApiKey) {
    throw new ConfigurationError("EMBEDDING_PROVIDER=openai requires OPENAI_API_KEY.");
  }

  return {
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL.replace(/\/+$/, ""),
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    embeddingProvider: parsed.EMBEDDING_PROVIDER,
    openaiApiKey,
    openaiEmbeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    embeddingDimension: parsed.EMBEDDING_DIMENSION,
    embeddingConcurrency: parsed.EMBEDDING_CONCURRENCY,
    chunkSize: parsed.CHUNK_SIZE,
    chunkOverlap: parsed.CHUNK_OVERLAP,
    batchSize: parsed.BATCH_SIZE,
    retrievalTopK: parsed.RETRIEVAL_TOP_K,
    historyTurns: parsed.HISTORY_TURNS,
    generationTemperature: parsed.GENERATION_TEMPERATURE,
    systemPromptFile: parsed.SYSTEM_PROMPT_FILE,
    conversationLogPath: parsed.CONVERSATION_LOG_PATH,
    vectorStore: parsed.VECTOR_STORE,
    vectorStorePath: parsed.VECTOR_STORE_PATH,
    maxVectorStoreBytes: parsed.MAX_VECTOR_STORE_BYTES,
    databaseUrl: parsed.DATABASE_URL ?? null,
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
  };
}
