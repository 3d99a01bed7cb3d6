export const MAX_SUGGESTIONS = 3;

export type SuggestionParseResult =
  | { ok: true; items: string[] }
  | { ok: false; reason: string };

const SIMPLE_ESCAPES: Record<string, string> = {
  "\\": "\\",
  '"': '"',
  "'": "'",
  "/": "/",
  n: "\n",
  t: "\t",
  r: "\r",
  b: "\b",
  f: "\f",
};

/**
 * Parses a bracketed list of quoted string literals, e.g. `["a", 'b', "c"]`.
 * Nothing else is accepted: no numbers, nesting, identifiers or expressions.
 */
export function parseSuggestionList(
  input: string,
  maxItems: number = MAX_SUGGESTIONS,
): SuggestionParseResult {
  const scanner = new ListScanner(input);
  try {
    const values = scanner.parse();
    const items = values
      .map((value) => value.replace(/\s+/g, " ").trim())
      .filter((value) => value.length > 0)
      .slice(0, Math.max(0, maxItems));
    return { ok: true, items };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : "parse failure" };
  }
}

class ListScanner {
  private pos = 0;

  constructor(private readonly text: string) {}

  parse(): string[] {
    const values: string[] = [];
    this.skipWhitespace();
    this.expect("[");
    this.skipWhitespace();

    if (this.peek() === "]") {
      this.pos += 1;
      this.expectEnd();
      return values;
    }

    while (true) {
      values.push(this.readString());
      this.skipWhitespace();

      const next = this.peek();
      if (next === "]") {
        this.pos += 1;
        break;
      }
      this.expect(",");
      this.skipWhitespace();
      if (this.peek() === "]") {
        this.pos += 1;
        break;
      }
    }

    this.expectEnd();
    return values;
  }

  private readString(): string {
    const quote = this.peek();
    if (quote !== '"' && quote !== "'") {
      throw new Error(`Expected a quoted string at offset ${this.pos}.`);
    }
    this.pos += 1;

    let value = "";
    while (this.pos < this.text.length) {
      const char = this.text[this.pos];
      this.pos += 1;

      if (char === quote) {
        return value;
      }
      if (char === "\n") {
        throw new Error("Unterminated string literal.");
      }
      if (char !== "\\") {
        value += char;
        continue;
      }

      const escaped = this.text[this.pos];
      this.pos += 1;
      if (escaped === undefined) {
        break;
      }
      if (escaped === "u") {
        const hex = this.text.slice(this.pos, this.pos + 4);
        if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
          throw new Error(`Invalid unicode escape at offset ${this.pos}.`);
        }
        value += String.fromCharCode(Number.parseInt(hex, 16));
        this.pos += 4;
        continue;
      }
      value += SIMPLE_ESCAPES[escaped] ?? escaped;
    }

    throw new Error("Unterminated string literal.");
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) {
      this.pos += 1;
    }
  }

  private peek(): string | undefined {
    return this.text[this.pos];
  }

  private expect(char: string): void {
    if (this.text[this.pos] !== char) {
      throw new Error(`Expected "${char}" at offset ${this.pos}.`);
    }
    this.pos += 1;
  }

  private expectEnd(): void {
    this.skipWhitespace();
    if (this.pos !== this.text.length) {
      throw new Error(`Unexpected trailing content at offset ${this.pos}.`);
    }
  }
}
