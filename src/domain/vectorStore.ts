import { IndexWriteError } from "./errors.js";
import { EntryMetadata, IndexEntry } from "./types.js";

export interface UpsertInput {
  ids: string[];
  vectors: number[][];
  documents: string[];
  metadatas: EntryMetadata[];
}

export interface VectorQueryHit {
  id: string;
  document: string;
  metadata: EntryMetadata;
  distance: number;
}

export interface VectorStore {
  /** Inserts or overwrites entries by id. The four arrays must be aligned. */
  upsert(input: UpsertInput): Promise<void>;
  /** Nearest entries first, at most `k`. */
  query(vector: number[], k: number): Promise<VectorQueryHit[]>;
  getAll(): Promise<IndexEntry[]>;
  count(): Promise<number>;
  /** Removes the entries of `source`, except the ids in `keep`. */
  deleteBySource(source: string, keep?: ReadonlySet<string>): Promise<number>;
  /** Drops and recreates the collection. */
  reset(): Promise<{ cleared_entries: number }>;
}

export function assertAlignedUpsert(input: UpsertInput, dimension: number): void {
  const size = input.ids.length;
  if (
    input.vectors.length !== size ||
    input.documents.length !== size ||
    input.metadatas.length !== size
  ) {
    throw new IndexWriteError(
      `Misaligned upsert: ${size} ids, ${input.vectors.length} vectors, ${input.documents.length} documents, ${input.metadatas.length} metadatas.`,
      [...input.ids],
    );
  }
  for (let i = 0; i < size; i += 1) {
    if (input.vectors[i].length !== dimension) {
      throw new IndexWriteError(
        `Vector for ${input.ids[i]} has dimension ${input.vectors[i].length}, expected ${dimension}.`,
        [...input.ids],
      );
    }
  }
  if (new Set(input.ids).size !== size) {
    throw new IndexWriteError("Duplicate ids in a single upsert.", [...input.ids]);
  }
}
