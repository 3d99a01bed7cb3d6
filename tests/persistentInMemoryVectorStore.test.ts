import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { IndexWriteError } from "../src/domain/errors.js";
import { PersistentInMemoryVectorStore } from "../src/infra/store/persistentInMemoryVectorStore.js";

const TEMP_DIR = path.resolve(".tmp-tests-vector-store");
const TEMP_FILE = path.join(TEMP_DIR, "vector-store-test.json");

const oneEntry = {
  ids: ["weekly.txt_0"],
  vectors: [[0.1, 0.2, 0.3]],
  documents: ["Weekly report table includes user and project fields."],
  metadatas: [{ source: "weekly.txt", page: 1, char_start: 0 }],
};

describe("PersistentInMemoryVectorStore", () => {
  afterEach(async () => {
    await fs.rm(TEMP_DIR, { recursive: true, force: true });
  });

  it("restores entries after restart", async () => {
    const first = new PersistentInMemoryVectorStore(TEMP_FILE, { dimension: 3, maxBytes: 1_000_000 });
    await first.initialize();
    await first.upsert(oneEntry);
    await first.close();

    const second = new PersistentInMemoryVectorStore(TEMP_FILE, { dimension: 3, maxBytes: 1_000_000 });
    await second.initialize();

    expect(await second.count()).toBe(1);
    const hits = await second.query([0.1, 0.2, 0.3], 3);
    expect(hits).toEqual([
      {
        id: "weekly.txt_0",
        document: "Weekly report table includes user and project fields.",
        metadata: { source: "weekly.txt", page: 1, char_start: 0 },
        distance: 0,
      },
    ]);

    const persisted: unknown = JSON.parse(await fs.readFile(TEMP_FILE, "utf-8"));
    expect(persisted).toMatchObject({ format_version: 1 });
  });

  it("refuses a snapshot that exceeds the size limit and keeps memory unchanged", async () => {
    const store = new PersistentInMemoryVectorStore(TEMP_FILE, { dimension: 3, maxBytes: 120 });
    await store.initialize();

    const write = store.upsert({ ...oneEntry, documents: ["A".repeat(200)] });
    await expect(write).rejects.toBeInstanceOf(IndexWriteError);
    await expect(store.upsert({ ...oneEntry, documents: ["A".repeat(200)] })).rejects.toThrow(
      "exceeds size limit",
    );
    expect(await store.count()).toBe(0);
  });

  it("refuses a snapshot written with another dimension", async () => {
    const first = new PersistentInMemoryVectorStore(TEMP_FILE, { dimension: 3, maxBytes: 1_000_000 });
    await first.upsert(oneEntry);

    const second = new PersistentInMemoryVectorStore(TEMP_FILE, { dimension: 4, maxBytes: 1_000_000 });
    await expect(second.initialize()).rejects.toThrow(
      "Stored index dimension 3 does not match configured dimension 4.",
    );
  });

  it("persists deletions and resets", async () => {
    const store = new PersistentInMemoryVectorStore(TEMP_FILE, { dimension: 3, maxBytes: 1_000_000 });
    await store.upsert(oneEntry);
    expect(await store.reset()).toEqual({ cleared_entries: 1 });

    const reopened = new PersistentInMemoryVectorStore(TEMP_FILE, { dimension: 3, maxBytes: 1_000_000 });
    expect(await reopened.count()).toBe(0);
  });
});
