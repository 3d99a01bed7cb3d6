/** Invalid settings detected before any work starts. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** A vector-store write failed; `ids` lists the entries of the rejected batch. */
export class IndexWriteError extends Error {
  constructor(
    message: string,
    readonly ids: string[],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "IndexWriteError";
  }
}

export class UnsupportedDocumentError extends Error {
  constructor(readonly extension: string, supported: string[]) {
    super(`Unsupported extension: ${extension || "(none)"}. Allowed: ${supported.join(", ")}`);
    this.name = "UnsupportedDocumentError";
  }
}

/** The generation service broke off (or never started) the token stream. */
export class GenerationStreamError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationStreamError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
