import { IndexEntry } from "../../domain/types.js";
import {
  assertAlignedUpsert,
  UpsertInput,
  VectorQueryHit,
  VectorStore,
} from "../../domain/vectorStore.js";
import { squaredL2Distance } from "../../utils/vector.js";

export interface InMemoryVectorStoreSnapshot {
  dimension: number;
  entries: IndexEntry[];
}

export class InMemoryVectorStore implements VectorStore {
  protected entries = new Map<string, IndexEntry>();

  constructor(protected readonly dimension: number) {}

  async upsert(input: UpsertInput): Promise<void> {
    assertAlignedUpsert(input, this.dimension);

    for (let i = 0; i < input.ids.length; i += 1) {
      const id = input.ids[i];
      // Overwrite keeps the original insertion slot.
      this.entries.set(id, {
        id,
        document: input.documents[i],
        vector: [...input.vectors[i]],
        metadata: { ...input.metadatas[i] },
      });
    }
  }

  async query(vector: number[], k: number): Promise<VectorQueryHit[]> {
    if (vector.length !== this.dimension) {
      throw new Error(
        `Query vector has dimension ${vector.length}, expected ${this.dimension}.`,
      );
    }
    if (k <= 0 || this.entries.size === 0) {
      return [];
    }

    return [...this.entries.values()]
      .map((entry) => ({
        id: entry.id,
        document: entry.document,
        metadata: { ...entry.metadata },
        distance: squaredL2Distance(vector, entry.vector),
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, Math.floor(k));
  }

  async getAll(): Promise<IndexEntry[]> {
    return [...this.entries.values()].map(cloneEntry);
  }

  async count(): Promise<number> {
    return this.entries.size;
  }

  async deleteBySource(source: string, keep?: ReadonlySet<string>): Promise<number> {
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (entry.metadata.source === source && !keep?.has(id)) {
        this.entries.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  async reset(): Promise<{ cleared_entries: number }> {
    const cleared = this.entries.size;
    this.entries = new Map<string, IndexEntry>();
    return { cleared_entries: cleared };
  }

  protected exportSnapshot(): InMemoryVectorStoreSnapshot {
    return {
      dimension: this.dimension,
      entries: [...this.entries.values()].map(cloneEntry),
    };
  }

  protected importSnapshot(snapshot: InMemoryVectorStoreSnapshot): void {
    if (snapshot.dimension !== this.dimension) {
      throw new Error(
        `Stored index dimension ${snapshot.dimension} does not match configured dimension ${this.dimension}.`,
      );
    }
    this.entries = new Map(snapshot.entries.map((entry) => [entry.id, cloneEntry(entry)]));
  }
}

function cloneEntry(entry: IndexEntry): IndexEntry {
  return {
    id: entry.id,
    document: entry.document,
    vector: [...entry.vector],
    metadata: { ...entry.metadata },
  };
}
