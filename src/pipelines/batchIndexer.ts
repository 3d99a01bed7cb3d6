import { ConfigurationError, describeError } from "../domain/errors.js";
import { Chunk, EntryMetadata } from "../domain/types.js";
import { VectorStore } from "../domain/vectorStore.js";
import { EmbeddingGateway } from "./embeddingGateway.js";

export const DEFAULT_BATCH_SIZE = 50;

export interface BatchIndexerInsertOptions {
  batchSize?: number;
  /** Fraction in [0, 1], called once after every batch. */
  onProgress?: (progress: number) => void;
}

export interface FailedBatch {
  batch: number;
  ids: string[];
  reason: string;
}

export interface BatchInsertResult {
  total: number;
  indexed: number;
  batches: number;
  failedBatches: FailedBatch[];
  embeddingFailures: number;
}

export function chunkId(source: string, offset: number): string {
  return `${source}_${offset}`;
}

export function clampProgress(processed: number, total: number): number {
  if (total <= 0) {
    return 1;
  }
  return Math.min(processed / total, 1);
}

/**
 * Embeds and writes chunks in contiguous batches. Each batch is one upsert; a
 * rejected batch is reported and does not roll back batches already written.
 */
export class BatchIndexer {
  constructor(
    private readonly store: VectorStore,
    private readonly gateway: EmbeddingGateway,
  ) {}

  async insert(
    chunks: readonly Chunk[],
    options: BatchIndexerInsertOptions = {},
  ): Promise<BatchInsertResult> {
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ConfigurationError(`batchSize must be a positive integer (got ${batchSize}).`);
    }

    const total = chunks.length;
    const failuresBefore = this.gateway.stats().failures;
    const failedBatches: FailedBatch[] = [];
    let indexed = 0;
    let batches = 0;
    let lastProgress = 0;

    for (let offset = 0; offset < total; offset += batchSize) {
      const batch = chunks.slice(offset, offset + batchSize);
      const ids = batch.map((chunk, idx) => chunkId(chunk.source, offset + idx));
      const documents = batch.map((chunk) => chunk.text);
      const metadatas: EntryMetadata[] = batch.map((chunk) => ({
        source: chunk.source,
        page: chunk.page,
        char_start: chunk.charStart,
      }));

      const vectors = await this.gateway.embedMany(documents);
      batches += 1;

      try {
        await this.store.upsert({ ids, vectors, documents, metadatas });
        indexed += batch.length;
      } catch (error) {
        const reason = describeError(error);
        failedBatches.push({ batch: batches, ids, reason });
        console.error(
          `[ingest] batch ${batches} (${ids[0]}..${ids[ids.length - 1]}) failed: ${reason}`,
        );
      }

      lastProgress = Math.max(lastProgress, clampProgress(offset + batch.length, total));
      options.onProgress?.(lastProgress);
    }

    return {
      total,
      indexed,
      batches,
      failedBatches,
      embeddingFailures: this.gateway.stats().failures - failuresBefore,
    };
  }
}
