import { RetrievalHit } from "../domain/types.js";
import { VectorStore } from "../domain/vectorStore.js";
import { EmbeddingGateway } from "./embeddingGateway.js";

export type RetrievalOutcome =
  | { status: "ok"; hits: RetrievalHit[] }
  | { status: "empty"; hits: [] }
  | { status: "degraded"; hits: []; reason: string };

export class Retriever {
  constructor(
    private readonly store: VectorStore,
    private readonly gateway: EmbeddingGateway,
  ) {}

  async query(text: string, k: number): Promise<RetrievalOutcome> {
    const limit = Math.max(0, Math.floor(k));
    const embedded = await this.gateway.embedQuery(text);
    // Distances against a zero query vector carry no meaning.
    if (embedded.degraded) {
      return { status: "degraded", hits: [], reason: embedded.reason };
    }
    if (limit === 0) {
      return { status: "empty", hits: [] };
    }

    const raw = await this.store.query(embedded.vector, limit);
    const hits: RetrievalHit[] = raw
      .map((hit) => ({
        id: hit.id,
        chunkText: hit.document,
        source: hit.metadata.source,
        page: hit.metadata.page,
        distance: hit.distance,
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, limit);

    if (hits.length === 0) {
      return { status: "empty", hits: [] };
    }
    return { status: "ok", hits };
  }
}

/** "name (Pg N)" labels, first occurrence order, no duplicates. */
export function describeSources(hits: readonly RetrievalHit[]): string[] {
  const labels: string[] = [];
  for (const hit of hits) {
    const label = `${hit.source} (Pg ${hit.page})`;
    if (!labels.includes(label)) {
      labels.push(label);
    }
  }
  return labels;
}
