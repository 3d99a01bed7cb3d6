import { EmbeddingFailureKind, EmbeddingProvider, EmbeddingResult } from "../infra/ai/types.js";
import { zeroVector } from "../utils/vector.js";

export interface EmbeddingGatewayOptions {
  dimension: number;
  concurrency?: number;
}

export interface EmbeddingStats {
  requests: number;
  failures: number;
  unreachable: number;
  malformed: number;
}

export type QueryEmbedding =
  | { degraded: false; vector: number[] }
  | { degraded: true; vector: number[]; kind: EmbeddingFailureKind; reason: string };

const DEFAULT_CONCURRENCY = 4;

/**
 * Per-item failure isolation around an embedding provider. A failed document
 * embedding becomes a zero vector of the index dimension and is counted; a
 * failed query embedding is returned flagged as degraded.
 */
export class EmbeddingGateway {
  private readonly counters: EmbeddingStats = {
    requests: 0,
    failures: 0,
    unreachable: 0,
    malformed: 0,
  };

  private readonly concurrency: number;

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly options: EmbeddingGatewayOptions,
  ) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
  }

  get dimension(): number {
    return this.options.dimension;
  }

  stats(): EmbeddingStats {
    return { ...this.counters };
  }

  async embed(text: string): Promise<number[]> {
    const result = await this.request(text);
    if (result.ok) {
      return result.vector;
    }
    console.error(`[embed] ${result.kind}: ${result.message} (zero-vector fallback)`);
    return zeroVector(this.options.dimension);
  }

  async embedMany(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const workers = Math.min(this.concurrency, texts.length);
    const vectors: number[][] = new Array(texts.length);
    let cursor = 0;

    const runWorker = async () => {
      while (true) {
        const index = cursor;
        cursor += 1;
        if (index >= texts.length) {
          return;
        }
        vectors[index] = await this.embed(texts[index]);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => runWorker()));
    return vectors;
  }

  async embedQuery(text: string): Promise<QueryEmbedding> {
    const result = await this.request(text);
    if (result.ok) {
      return { degraded: false, vector: result.vector };
    }
    console.error(`[embed] query ${result.kind}: ${result.message}`);
    return {
      degraded: true,
      vector: zeroVector(this.options.dimension),
      kind: result.kind,
      reason: result.message,
    };
  }

  private async request(text: string): Promise<EmbeddingResult> {
    this.counters.requests += 1;

    let result: EmbeddingResult;
    try {
      result = await this.provider.embed(text);
    } catch (error) {
      result = {
        ok: false,
        kind: "unreachable",
        message: error instanceof Error ? error.message : String(error),
      };
    }

    if (result.ok && result.vector.length !== this.options.dimension) {
      result = {
        ok: false,
        kind: "malformed",
        message: `Embedding dimension ${result.vector.length} does not match index dimension ${this.options.dimension}.`,
      };
    }

    if (!result.ok) {
      this.counters.failures += 1;
      this.counters[result.kind] += 1;
    }
    return result;
  }
}
