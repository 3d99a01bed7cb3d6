import { Pool } from "pg";
import { AppConfig } from "../../config/env.js";
import { ConfigurationError } from "../../domain/errors.js";
import { VectorStore } from "../../domain/vectorStore.js";
import { InMemoryVectorStore } from "./inMemoryVectorStore.js";
import { PersistentInMemoryVectorStore } from "./persistentInMemoryVectorStore.js";
import { PgVectorStore } from "./pgVectorStore.js";

export interface VectorStoreBootstrapResult {
  store: VectorStore;
  close: () => Promise<void>;
}

export async function createVectorStore(
  config: AppConfig,
): Promise<VectorStoreBootstrapResult> {
  if (config.vectorStore === "memory") {
    return {
      store: new InMemoryVectorStore(config.embeddingDimension),
      close: async () => {},
    };
  }

  if (config.vectorStore === "file") {
    const store = new PersistentInMemoryVectorStore(config.vectorStorePath, {
      dimension: config.embeddingDimension,
      maxBytes: config.maxVectorStoreBytes,
    });
    await store.initialize();
    return {
      store,
      close: async () => {
        await store.close();
      },
    };
  }

  if (!config.databaseUrl) {
    throw new ConfigurationError("DATABASE_URL is required when VECTOR_STORE=pgvector.");
  }

  const pool = new Pool({ connectionString: config.databaseUrl });
  const store = new PgVectorStore(pool, config.embeddingDimension);
  await store.initialize();

  return {
    store,
    close: async () => {
      await pool.end();
    },
  };
}
