import path from "node:path";
import { describeError } from "../domain/errors.js";
import { ChunkingOptions, SourceDocument } from "../domain/types.js";
import { VectorStore } from "../domain/vectorStore.js";
import {
  assertSupportedExtension,
  loadDocument,
  loadDocumentFromBuffer,
} from "../infra/parsers/documentLoader.js";
import { BatchIndexer, chunkId, FailedBatch } from "../pipelines/batchIndexer.js";
import { assertChunkingOptions, chunkDocument } from "../pipelines/chunking.js";
import { EmbeddingGateway } from "../pipelines/embeddingGateway.js";
import { normalizeSourceName } from "../utils/text.js";

export interface IngestionSettings extends ChunkingOptions {
  batchSize: number;
}

export interface UploadedDocumentInput {
  source: string;
  contentBase64: string;
}

export interface IngestedFile {
  source: string;
  status: "indexed" | "partial" | "failed";
  pages: number;
  chunks: number;
  reason?: string;
}

export interface IngestionSummary {
  files: IngestedFile[];
  succeeded: number;
  failed: number;
  totalChunks: number;
  embeddingFailures: number;
  failedBatches: FailedBatch[];
}

export interface IndexedSource {
  source: string;
  chunks: number;
  pages: number[];
}

export interface IngestionProgress {
  source: string;
  fileIndex: number;
  fileCount: number;
  progress: number;
}

export interface IngestOptions {
  onProgress?: (update: IngestionProgress) => void;
}

type DocumentLoad = () => Promise<SourceDocument>;

export class IngestionService {
  private readonly indexer: BatchIndexer;

  constructor(
    private readonly store: VectorStore,
    gateway: EmbeddingGateway,
    private readonly settings: IngestionSettings,
  ) {
    assertChunkingOptions(settings);
    this.indexer = new BatchIndexer(store, gateway);
  }

  async ingestFiles(paths: string[], options: IngestOptions = {}): Promise<IngestionSummary> {
    const loads = paths.map((rawPath) => ({
      label: path.basename(rawPath),
      load: () => loadDocument(path.resolve(rawPath)),
    }));
    return this.ingest(loads, options);
  }

  async ingestUploads(
    uploads: UploadedDocumentInput[],
    options: IngestOptions = {},
  ): Promise<IngestionSummary> {
    const loads = uploads.map((upload, index) => {
      const source = normalizeSourceName(upload.source, index);
      return {
        label: source,
        load: async () => {
          assertSupportedExtension(source);
          return loadDocumentFromBuffer(source, decodeBase64(upload.contentBase64));
        },
      };
    });
    return this.ingest(loads, options);
  }

  async ingestDocuments(
    documents: SourceDocument[],
    options: IngestOptions = {},
  ): Promise<IngestionSummary> {
    return this.ingest(
      documents.map((document) => ({ label: document.name, load: async () => document })),
      options,
    );
  }

  /** Inventory derived from the stored entries, sorted by source name. */
  async listSources(): Promise<IndexedSource[]> {
    const entries = await this.store.getAll();
    const bySource = new Map<string, { chunks: number; pages: Set<number> }>();
    for (const entry of entries) {
      const current = bySource.get(entry.metadata.source) ?? { chunks: 0, pages: new Set() };
      current.chunks += 1;
      current.pages.add(entry.metadata.page);
      bySource.set(entry.metadata.source, current);
    }

    return [...bySource.entries()]
      .map(([source, value]) => ({
        source,
        chunks: value.chunks,
        pages: [...value.pages].sort((a, b) => a - b),
      }))
      .sort((a, b) => a.source.localeCompare(b.source));
  }

  async resetIndex(): Promise<{ cleared_entries: number }> {
    const result = await this.store.reset();
    console.error(`[ingest] index reset, ${result.cleared_entries} entries removed`);
    return result;
  }

  private async ingest(
    loads: Array<{ label: string; load: DocumentLoad }>,
    options: IngestOptions,
  ): Promise<IngestionSummary> {
    const files: IngestedFile[] = [];
    const failedBatches: FailedBatch[] = [];
    let totalChunks = 0;
    let embeddingFailures = 0;

    for (let fileIndex = 0; fileIndex < loads.length; fileIndex += 1) {
      const { label, load } = loads[fileIndex];
      let document: SourceDocument;
      try {
        document = await load();
      } catch (error) {
        files.push({ source: label, status: "failed", pages: 0, chunks: 0, reason: describeError(error) });
        console.error(`[ingest] ${label}: ${describeError(error)}`);
        continue;
      }

      const chunks = chunkDocument(document, this.settings);
      if (chunks.length === 0) {
        files.push({
          source: document.name,
          status: "failed",
          pages: document.pages.length,
          chunks: 0,
          reason: "No extractable text.",
        });
        continue;
      }

      // Same source + same chunking yields the same ids, so new batches
      // overwrite in place and only the stale tail is pruned afterwards.
      const result = await this.indexer.insert(chunks, {
        batchSize: this.settings.batchSize,
        onProgress: (progress) =>
          options.onProgress?.({
            source: document.name,
            fileIndex,
            fileCount: loads.length,
            progress,
          }),
      });

      totalChunks += result.indexed;
      embeddingFailures += result.embeddingFailures;
      failedBatches.push(...result.failedBatches);

      let reason: string | undefined;
      if (result.failedBatches.length > 0) {
        reason = `${result.failedBatches.length} batch write(s) failed.`;
      } else {
        const current = new Set(chunks.map((chunk, index) => chunkId(chunk.source, index)));
        try {
          const removed = await this.store.deleteBySource(document.name, current);
          if (removed > 0) {
            console.error(`[ingest] ${document.name}: removed ${removed} stale entries`);
          }
        } catch (error) {
          reason = `Stale entries not removed: ${describeError(error)}`;
          console.error(`[ingest] ${document.name}: ${reason}`);
        }
      }

      const status =
        reason === undefined ? "indexed" : result.indexed > 0 ? "partial" : "failed";
      files.push({
        source: document.name,
        status,
        pages: document.pages.length,
        chunks: result.indexed,
        ...(reason === undefined ? {} : { reason }),
      });
      console.error(
        `[ingest] ${document.name}: ${result.indexed}/${result.total} chunks in ${result.batches} batch(es)` +
          (result.embeddingFailures > 0
            ? `, ${result.embeddingFailures} zero-vector fallback(s)`
            : ""),
      );
    }

    return {
      files,
      succeeded: files.filter((file) => file.status !== "failed").length,
      failed: files.filter((file) => file.status === "failed").length,
      totalChunks,
      embeddingFailures,
      failedBatches,
    };
  }
}

function decodeBase64(value: string): Buffer {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new Error("Empty file payload.");
  }
  if (!/^[A-Za-z0-9+/=\s_-]+$/.test(trimmed)) {
    throw new Error("Invalid base64 payload.");
  }
  return Buffer.from(trimmed, "base64");
}
