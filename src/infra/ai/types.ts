export type EmbeddingFailureKind = "unreachable" | "malformed";

export type EmbeddingResult =
  | { ok: true; vector: number[] }
  | { ok: false; kind: EmbeddingFailureKind; message: string };

export interface EmbeddingProvider {
  readonly modelName: string;
  embed(text: string, signal?: AbortSignal): Promise<EmbeddingResult>;
}

export interface GenerateOptions {
  temperature?: number;
  signal?: AbortSignal;
}

export type ModelListResult =
  | { ok: true; models: string[] }
  | { ok: false; kind: EmbeddingFailureKind; message: string };

export interface GenerationProvider {
  readonly modelName: string;
  /** Yields text fragments in order. Transport failures surface as thrown errors. */
  generate(prompt: string, options?: GenerateOptions): AsyncIterable<string>;
  listModels(): Promise<ModelListResult>;
}
