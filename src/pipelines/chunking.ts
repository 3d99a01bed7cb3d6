import { ConfigurationError } from "../domain/errors.js";
import { Chunk, ChunkingOptions, PageText, SourceDocument } from "../domain/types.js";

export const DEFAULT_CHUNKING: ChunkingOptions = { chunkSize: 1000, overlap: 200 };

export function assertChunkingOptions({ chunkSize, overlap }: ChunkingOptions): void {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ConfigurationError(`chunkSize must be a positive integer (got ${chunkSize}).`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigurationError(`overlap must be a non-negative integer (got ${overlap}).`);
  }
  if (overlap >= chunkSize) {
    throw new ConfigurationError(
      `overlap (${overlap}) must be smaller than chunkSize (${chunkSize}).`,
    );
  }
}

/**
 * Fixed-size sliding windows over one page. Windows start at 0, step, 2*step...
 * with `step = chunkSize - overlap`; the last one may be shorter. The returned
 * iterable is lazy and can be iterated any number of times.
 */
export function splitPage(
  page: PageText,
  source: string,
  options: ChunkingOptions = DEFAULT_CHUNKING,
): Iterable<Chunk> {
  assertChunkingOptions(options);
  const step = options.chunkSize - options.overlap;

  return {
    *[Symbol.iterator]() {
      for (let start = 0; start < page.text.length; start += step) {
        yield {
          text: page.text.slice(start, start + options.chunkSize),
          source,
          page: page.pageNumber,
          charStart: start,
        };
      }
    },
  };
}

export function chunkDocument(
  document: SourceDocument,
  options: ChunkingOptions = DEFAULT_CHUNKING,
): Chunk[] {
  assertChunkingOptions(options);
  const chunks: Chunk[] = [];
  for (const page of document.pages) {
    chunks.push(...splitPage(page, document.name, options));
  }
  return chunks;
}

/**
 * Number of windows {@link splitPage} yields for a text of this length. A tail
 * window that lies entirely inside its predecessor's overlap is still emitted.
 */
export function countChunks(textLength: number, options: ChunkingOptions): number {
  assertChunkingOptions(options);
  if (textLength <= 0) {
    return 0;
  }
  return Math.ceil(textLength / (options.chunkSize - options.overlap));
}
