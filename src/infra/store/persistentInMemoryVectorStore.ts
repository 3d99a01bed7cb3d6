import { promises as fs } from "node:fs";
import path from "node:path";
import { describeError, IndexWriteError } from "../../domain/errors.js";
import { IndexEntry } from "../../domain/types.js";
import { UpsertInput, VectorQueryHit } from "../../domain/vectorStore.js";
import { InMemoryVectorStore, InMemoryVectorStoreSnapshot } from "./inMemoryVectorStore.js";

const CURRENT_FORMAT_VERSION = 1;

interface PersistedVectorStore {
  format_version: number;
  saved_at: string;
  snapshot: InMemoryVectorStoreSnapshot;
}

export interface PersistentVectorStoreOptions {
  dimension: number;
  maxBytes: number;
}

/**
 * In-memory index mirrored to a JSON file after every mutation. Writes go
 * through a single promise chain so snapshots land in mutation order.
 */
export class PersistentInMemoryVectorStore extends InMemoryVectorStore {
  private initialized = false;

  private writeChain: Promise<void> = Promise.resolve();

  private readonly absolutePath: string;

  constructor(
    filePath: string,
    private readonly options: PersistentVectorStoreOptions,
  ) {
    super(options.dimension);
    this.absolutePath = path.resolve(filePath);
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });

    try {
      const raw = await fs.readFile(this.absolutePath, "utf-8");
      const parsed: unknown = JSON.parse(raw);
      this.importSnapshot(parseSnapshotFromDisk(parsed));
    } catch (error) {
      if (!isFileMissing(error)) {
        throw error;
      }
    }

    this.initialized = true;
  }

  async upsert(input: UpsertInput): Promise<void> {
    await this.initialize();
    const previous = this.exportSnapshot();
    await super.upsert(input);
    try {
      await this.enqueueWrite(() => this.persistNow());
    } catch (error) {
      // The batch is not committed unless it reached disk.
      this.importSnapshot(previous);
      throw new IndexWriteError(`Snapshot write failed: ${describeError(error)}`, [...input.ids], {
        cause: error,
      });
    }
  }

  async query(vector: number[], k: number): Promise<VectorQueryHit[]> {
    await this.initialize();
    return super.query(vector, k);
  }

  async getAll(): Promise<IndexEntry[]> {
    await this.initialize();
    return super.getAll();
  }

  async count(): Promise<number> {
    await this.initialize();
    return super.count();
  }

  async deleteBySource(source: string, keep?: ReadonlySet<string>): Promise<number> {
    await this.initialize();
    const removed = await super.deleteBySource(source, keep);
    if (removed > 0) {
      await this.enqueueWrite(() => this.persistNow());
    }
    return removed;
  }

  async reset(): Promise<{ cleared_entries: number }> {
    await this.initialize();
    const cleared = await super.reset();
    await this.enqueueWrite(() => this.persistNow());
    return cleared;
  }


  async close(): Promise<void> {
    await this.initialize();
    await this.enqueueWrite(() => this.persistNow());
  }

  private enqueueWrite(task: () => Promise<void>): Promise<void> {
    this.writeChain = this.writeChain.then(task, task);
    return this.writeChain;
  }

  private async persistNow(): Promise<void> {
    const payload: PersistedVectorStore = {
      format_version: CURRENT_FORMAT_VERSION,
      saved_at: new Date().toISOString(),
      snapshot: this.exportSnapshot(),
    };

    const serialized = JSON.stringify(payload);
    const bytes = Buffer.byteLength(serialized, "utf-8");
    if (bytes > this.options.maxBytes) {
      throw new Error(
        `Vector store snapshot exceeds size limit (${bytes} > ${this.options.maxBytes} bytes).`,
      );
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });
    const tempPath = `${this.absolutePath}.tmp`;
    await fs.writeFile(tempPath, serialized, "utf-8");
    await replaceFileSafely(tempPath, this.absolutePath, serialized);
  }

}

function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}

function isFileMissing(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}

async function replaceFileSafely(
  tempPath: string,
  targetPath: string,
  content: string,
): Promise<void> {
  try {
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  try {
    await fs.rm(targetPath, { force: true });
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  // Windows may keep the target locked; fall back to an in-place write.
  await fs.writeFile(targetPath, content, "utf-8");
  await fs.rm(tempPath, { force: true });
}

function isReplaceableRenameError(error: unknown): boolean {
  const code = errorCode(error);
  return code === "EPERM" || code === "EEXIST" || code === "EBUSY";
}

function parseSnapshotFromDisk(raw: unknown): InMemoryVectorStoreSnapshot {
  if (!raw || typeof raw !== "object") {
    throw new Error("Invalid vector store snapshot format.");
  }
  const record = raw as Partial<Record<keyof PersistedVectorStore, unknown>>;

  if (typeof record.format_version !== "number") {
    throw new Error("Invalid vector store snapshot format.");
  }
  if (record.format_version !== CURRENT_FORMAT_VERSION) {
    throw new Error(
      `Unsupported vector store format version: ${record.format_version}. Expected ${CURRENT_FORMAT_VERSION}.`,
    );
  }
  if (!isValidSnapshot(record.snapshot)) {
    throw new Error("Invalid vector store snapshot format.");
  }
  return record.snapshot;
}

function isValidSnapshot(value: unknown): value is InMemoryVectorStoreSnapshot {
  if (!value || typeof value !== "object") {
    return false;
  }
  const snapshot = value as { dimension?: unknown; entries?: unknown };
  if (typeof snapshot.dimension !== "number" || !Array.isArray(snapshot.entries)) {
    return false;
  }
  return snapshot.entries.every(isValidEntry);
}

function isValidEntry(value: unknown): boolean {
  if (!value || typeof value !== "object") {
    return false;
  }
  const entry = value as {
    id?: unknown;
    document?: unknown;
    vector?: unknown;
    metadata?: { source?: unknown; page?: unknown };
  };
  return (
    typeof entry.id === "string" &&
    typeof entry.document === "string" &&
    Array.isArray(entry.vector) &&
    typeof entry.metadata?.source === "string" &&
    typeof entry.metadata.page === "number"
  );
}
