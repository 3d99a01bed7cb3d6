import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { UpsertInput } from "../src/domain/vectorStore.js";
import { InMemoryVectorStore } from "../src/infra/store/inMemoryVectorStore.js";
import { EmbeddingGateway } from "../src/pipelines/embeddingGateway.js";
import { IngestionProgress, IngestionService } from "../src/services/ingestionService.js";
import { FakeEmbeddingProvider } from "./helpers/fakes.js";

const DIMENSION = 4;
const TEMP_DIR = path.resolve(".tmp-tests-ingestion");

class UnreliableStore extends InMemoryVectorStore {
  failUpserts = false;
  failCleanupFor: string | null = null;

  async upsert(input: UpsertInput): Promise<void> {
    if (this.failUpserts) {
      throw new Error("write refused");
    }
    return super.upsert(input);
  }

  async deleteBySource(source: string, keep?: ReadonlySet<string>): Promise<number> {
    if (source === this.failCleanupFor) {
      throw new Error("disk unavailable");
    }
    return super.deleteBySource(source, keep);
  }
}

function setup() {
  const store = new UnreliableStore(DIMENSION);
  const gateway = new EmbeddingGateway(new FakeEmbeddingProvider(DIMENSION), { dimension: DIMENSION });
  const service = new IngestionService(store, gateway, { chunkSize: 1000, overlap: 200, batchSize: 50 });
  return { store, service };
}

const twoPageDoc = {
  name: "doc.pdf",
  pages: [
    { text: "x".repeat(1200), pageNumber: 1 },
    { text: "y".repeat(300), pageNumber: 2 },
  ],
};

describe("IngestionService", () => {
  afterEach(async () => {
    await fs.rm(TEMP_DIR, { recursive: true, force: true });
  });

  it("indexes a two-page document as doc.pdf_0..2", async () => {
    const { store, service } = setup();
    const progress: IngestionProgress[] = [];

    const summary = await service.ingestDocuments([twoPageDoc], {
      onProgress: (update) => progress.push(update),
    });

    expect(summary).toEqual({
      files: [{ source: "doc.pdf", status: "indexed", pages: 2, chunks: 3 }],
      succeeded: 1,
      failed: 0,
      totalChunks: 3,
      embeddingFailures: 0,
      failedBatches: [],
    });
    const entries = await store.getAll();
    expect(entries.map((entry) => [entry.id, entry.metadata])).toEqual([
      ["doc.pdf_0", { source: "doc.pdf", page: 1, char_start: 0 }],
      ["doc.pdf_1", { source: "doc.pdf", page: 1, char_start: 800 }],
      ["doc.pdf_2", { source: "doc.pdf", page: 2, char_start: 0 }],
    ]);
    expect(entries[1].document).toBe("x".repeat(400));
    expect(progress).toEqual([{ source: "doc.pdf", fileIndex: 0, fileCount: 1, progress: 1 }]);
    expect(await service.listSources()).toEqual([{ source: "doc.pdf", chunks: 3, pages: [1, 2] }]);
  });

  it("replaces the entries of a re-ingested source", async () => {
    const { store, service } = setup();
    await service.ingestDocuments([twoPageDoc]);

    await service.ingestDocuments([{ name: "doc.pdf", pages: [{ text: "shorter", pageNumber: 1 }] }]);

    const entries = await store.getAll();
    expect(entries.map((entry) => [entry.id, entry.document])).toEqual([["doc.pdf_0", "shorter"]]);
  });

  it("keeps the committed entries when a re-ingest cannot write", async () => {
    const { store, service } = setup();
    await service.ingestDocuments([{ name: "a.txt", pages: [{ text: "x".repeat(1200), pageNumber: 1 }] }]);
    expect(await store.count()).toBe(2);

    store.failUpserts = true;
    const summary = await service.ingestDocuments([
      { name: "a.txt", pages: [{ text: "z".repeat(300), pageNumber: 1 }] },
    ]);

    expect(summary.files).toEqual([
      { source: "a.txt", status: "failed", pages: 1, chunks: 0, reason: "1 batch write(s) failed." },
    ]);
    const entries = await store.getAll();
    expect(entries.map((entry) => [entry.id, entry.document])).toEqual([
      ["a.txt_0", "x".repeat(1000)],
      ["a.txt_1", "x".repeat(400)],
    ]);
  });

  it("continues with the next file when stale-entry cleanup fails", async () => {
    const { store, service } = setup();
    store.failCleanupFor = "b.txt";

    const summary = await service.ingestDocuments([
      { name: "a.txt", pages: [{ text: "alpha", pageNumber: 1 }] },
      { name: "b.txt", pages: [{ text: "beta", pageNumber: 1 }] },
      { name: "c.txt", pages: [{ text: "gamma", pageNumber: 1 }] },
    ]);

    expect(summary.files).toEqual([
      { source: "a.txt", status: "indexed", pages: 1, chunks: 1 },
      {
        source: "b.txt",
        status: "partial",
        pages: 1,
        chunks: 1,
        reason: "Stale entries not removed: disk unavailable",
      },
      { source: "c.txt", status: "indexed", pages: 1, chunks: 1 },
    ]);
    expect(summary.succeeded).toBe(3);
    expect((await store.getAll()).map((entry) => entry.id)).toEqual(["a.txt_0", "b.txt_0", "c.txt_0"]);
  });

  it("reports per-file failures and keeps going", async () => {
    await fs.mkdir(TEMP_DIR, { recursive: true });
    const good = path.join(TEMP_DIR, "guide.txt");
    const bad = path.join(TEMP_DIR, "table.csv");
    await fs.writeFile(good, "Hold the reset button for ten seconds.", "utf-8");
    await fs.writeFile(bad, "a,b", "utf-8");
    const { service } = setup();

    const summary = await service.ingestFiles([bad, good]);

    expect(summary.files).toEqual([
      {
        source: "table.csv",
        status: "failed",
        pages: 0,
        chunks: 0,
        reason: "Unsupported extension: .csv. Allowed: .md, .txt, .pdf, .docx",
      },
      { source: "guide.txt", status: "indexed", pages: 1, chunks: 1 },
    ]);
    expect(summary.succeeded).toBe(1);
    expect(summary.failed).toBe(1);
  });

  it("ingests base64 uploads and rejects bad payloads", async () => {
    const { store, service } = setup();

    const summary = await service.ingestUploads([
      { source: "faq.md", contentBase64: Buffer.from("Reset with the pin.").toString("base64") },
      { source: "broken.txt", contentBase64: "not base64!" },
      { source: "blank.txt", contentBase64: Buffer.from("   ").toString("base64") },
    ]);

    expect(summary.files).toEqual([
      { source: "faq.md", status: "indexed", pages: 1, chunks: 1 },
      { source: "broken.txt", status: "failed", pages: 0, chunks: 0, reason: "Invalid base64 payload." },
      { source: "blank.txt", status: "failed", pages: 0, chunks: 0, reason: "No extractable text." },
    ]);
    expect((await store.getAll())[0]).toMatchObject({ id: "faq.md_0", document: "Reset with the pin." });
  });

  it("resets the index", async () => {
    const { service } = setup();
    await service.ingestDocuments([twoPageDoc]);

    expect(await service.resetIndex()).toEqual({ cleared_entries: 3 });
    expect(await service.listSources()).toEqual([]);
  });
});
