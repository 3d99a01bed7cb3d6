export interface PageText {
  text: string;
  pageNumber: number;
}

export interface SourceDocument {
  name: string;
  pages: readonly PageText[];
}

export interface Chunk {
  text: string;
  source: string;
  page: number;
  charStart: number;
}

export interface ChunkingOptions {
  chunkSize: number;
  overlap: number;
}

export interface EntryMetadata {
  source: string;
  page: number;
  char_start?: number;
}

export interface IndexEntry {
  id: string;
  document: string;
  vector: number[];
  metadata: EntryMetadata;
}

export interface RetrievalHit {
  id: string;
  chunkText: string;
  source: string;
  page: number;
  distance: number;
}

export type ChatRole = "user" | "assistant";

export interface ChatTurn {
  role: ChatRole;
  content: string;
}
