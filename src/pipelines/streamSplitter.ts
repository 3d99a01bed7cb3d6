import { parseSuggestionList } from "./suggestions.js";

export const THINK_OPEN = "<think>";
export const THINK_CLOSE = "</think>";
export const SUGGESTIONS_OPEN = "<suggestions>";
export const SUGGESTIONS_CLOSE = "</suggestions>";

// Tolerant forms: any case, whitespace inside the angle brackets.
const THINK_OPEN_AT_START = /^\s*<\s*think\s*>/i;
const THINK_CLOSE_PATTERN = /<\s*\/\s*think\s*>/i;
const SUGGESTIONS_OPEN_PATTERN = /<\s*suggestions\s*>/i;
const SUGGESTIONS_CLOSE_PATTERN = /<\s*\/\s*suggestions\s*>/i;
const BOLD_SEGMENT = /\*\*([^*\n]+?)\*\*/g;

export type StreamPhase = "AwaitingMarker" | "InReasoning" | "InAnswer";

export interface StreamState {
  phase: StreamPhase;
  buffer: string;
  reasoning: string;
  answer: string;
  suggestions: string[];
}

export interface StreamView {
  phase: StreamPhase;
  reasoning: string;
  /** Everything shown so far; only ever grows. */
  answer: string;
  /** Text appended to `answer` by this update. */
  answerDelta: string;
  /** Latest bolded phrase of the reasoning, for a progress label. */
  activity: string | null;
}

export interface SplitResult {
  reasoning: string;
  answer: string;
  suggestions: string[];
}

/**
 * Demultiplexes one generation stream into reasoning, answer and suggestions.
 * Every push rescans the accumulated buffer, so markers may straddle tokens.
 */
export class StreamSplitter {
  private phase: StreamPhase = "AwaitingMarker";

  private buffer = "";

  private reasoningStart = 0;

  private answerStart = 0;

  private reasoning = "";

  private shownAnswer = "";

  private activity: string | null = null;

  private finalized: SplitResult | null = null;

  private disposed = false;

  push(token: string): StreamView {
    this.assertWritable();
    const before = this.shownAnswer;
    this.buffer += token;
    this.advance();
    return this.view(this.shownAnswer.slice(before.length));
  }

  state(): StreamState {
    return {
      phase: this.phase,
      buffer: this.buffer,
      reasoning: this.reasoning,
      answer: this.shownAnswer,
      suggestions: this.finalized ? [...this.finalized.suggestions] : [],
    };
  }

  /** Non-incremental rescan of the whole buffer. Idempotent. */
  finalize(): SplitResult {
    if (this.finalized) {
      return this.finalized;
    }
    if (this.disposed) {
      throw new Error("StreamSplitter was disposed before finalization.");
    }

    const { reasoning, answerRaw } = splitReasoning(this.buffer);
    const { answer, suggestions } = extractSuggestions(answerRaw);

    this.finalized = {
      reasoning: reasoning.trim(),
      answer: answer.trim(),
      suggestions,
    };
    this.reasoning = this.finalized.reasoning;
    return this.finalized;
  }

  /** Drops buffered state; used when the consumer stops reading early. */
  dispose(): void {
    this.disposed = true;
    this.buffer = "";
    this.reasoning = "";
    this.shownAnswer = "";
    this.activity = null;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  private advance(): void {
    if (this.phase === "AwaitingMarker") {
      const lead = this.buffer.trimStart();
      if (!lead || couldStillBecome(lead, THINK_OPEN)) {
        return;
      }
      const open = THINK_OPEN_AT_START.exec(this.buffer);
      if (open) {
        this.phase = "InReasoning";
        this.reasoningStart = open[0].length;
      } else {
        this.phase = "InAnswer";
        this.answerStart = 0;
      }
    }

    if (this.phase === "InReasoning") {
      const tail = this.buffer.slice(this.reasoningStart);
      const close = THINK_CLOSE_PATTERN.exec(tail);
      if (!close) {
        this.reasoning = holdBackPartialMarker(tail, THINK_CLOSE).trimStart();
        this.activity = latestBoldSegment(this.reasoning) ?? this.activity;
        return;
      }
      this.reasoning = tail.slice(0, close.index).trim();
      this.activity = latestBoldSegment(this.reasoning) ?? this.activity;
      this.answerStart = this.reasoningStart + close.index + close[0].length;
      this.phase = "InAnswer";
    }

    this.refreshAnswer();
  }

  private refreshAnswer(): void {
    const raw = this.buffer.slice(this.answerStart);
    const open = SUGGESTIONS_OPEN_PATTERN.exec(raw);
    const visible = open
      ? raw.slice(0, open.index)
      : holdBackPartialMarker(raw, SUGGESTIONS_OPEN);
    const candidate = visible.trim();

    // Append-only: text already on screen is never edited or withdrawn.
    if (candidate.startsWith(this.shownAnswer)) {
      this.shownAnswer = candidate;
    }
  }

  private view(answerDelta: string): StreamView {
    return {
      phase: this.phase,
      reasoning: this.reasoning,
      answer: this.shownAnswer,
      answerDelta,
      activity: this.activity,
    };
  }

  private assertWritable(): void {
    if (this.disposed) {
      throw new Error("StreamSplitter was disposed.");
    }
    if (this.finalized) {
      throw new Error("StreamSplitter was already finalized.");
    }
  }
}

export type StreamOutcome =
  | { status: "completed"; result: SplitResult }
  | { status: "aborted" };

export interface SplitStreamOptions {
  onUpdate?: (view: StreamView) => void;
  signal?: AbortSignal;
  splitter?: StreamSplitter;
}

/**
 * Pulls tokens until the source ends, then finalizes. An abort releases the
 * splitter immediately; errors from the source propagate to the caller.
 */
export async function splitStream(
  tokens: AsyncIterable<string>,
  options: SplitStreamOptions = {},
): Promise<StreamOutcome> {
  const splitter = options.splitter ?? new StreamSplitter();
  if (options.signal?.aborted) {
    splitter.dispose();
    return { status: "aborted" };
  }

  try {
    for await (const token of tokens) {
      if (options.signal?.aborted) {
        splitter.dispose();
        return { status: "aborted" };
      }
      const view = splitter.push(token);
      options.onUpdate?.(view);
    }
  } catch (error) {
    splitter.dispose();
    if (options.signal?.aborted) {
      return { status: "aborted" };
    }
    throw error;
  }

  if (options.signal?.aborted) {
    splitter.dispose();
    return { status: "aborted" };
  }
  return { status: "completed", result: splitter.finalize() };
}

function splitReasoning(buffer: string): { reasoning: string; answerRaw: string } {
  const open = THINK_OPEN_AT_START.exec(buffer);
  if (!open) {
    return { reasoning: "", answerRaw: buffer };
  }

  const tail = buffer.slice(open[0].length);
  const close = THINK_CLOSE_PATTERN.exec(tail);
  if (!close) {
    // Unterminated reasoning: keep the text visible as answer content.
    return { reasoning: "", answerRaw: tail };
  }
  return {
    reasoning: tail.slice(0, close.index),
    answerRaw: tail.slice(close.index + close[0].length),
  };
}

function extractSuggestions(answerRaw: string): { answer: string; suggestions: string[] } {
  const open = SUGGESTIONS_OPEN_PATTERN.exec(answerRaw);
  if (!open) {
    return { answer: answerRaw, suggestions: [] };
  }

  const block = answerRaw.slice(open.index + open[0].length);
  const close = SUGGESTIONS_CLOSE_PATTERN.exec(block);
  const body = close ? block.slice(0, close.index) : block;
  const parsed = parseSuggestionList(body);
  if (!parsed.ok) {
    console.error(`[chat] suggestions block ignored: ${parsed.reason}`);
  }

  return {
    answer: answerRaw.slice(0, open.index),
    suggestions: parsed.ok ? parsed.items : [],
  };
}

/** True while `text` (whitespace ignored, any case) is a proper prefix of `marker`. */
function couldStillBecome(text: string, marker: string): boolean {
  const compact = text.replace(/\s+/g, "").toLowerCase();
  return compact.length < marker.length && marker.startsWith(compact);
}

/** Cuts a trailing fragment that may turn out to be the start of `marker`. */
function holdBackPartialMarker(text: string, marker: string): string {
  const lastOpen = text.lastIndexOf("<");
  if (lastOpen < 0) {
    return text;
  }
  const fragment = text.slice(lastOpen);
  return couldStillBecome(fragment, marker) ? text.slice(0, lastOpen) : text;
}

function latestBoldSegment(text: string): string | null {
  let latest: string | null = null;
  for (const match of text.matchAll(BOLD_SEGMENT)) {
    const label = match[1].trim();
    if (label) {
      latest = label;
    }
  }
  return latest;
}
