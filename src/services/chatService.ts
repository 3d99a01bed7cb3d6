import { promises as fs } from "node:fs";
import path from "node:path";
import { describeError } from "../domain/errors.js";
import { ChatTurn, RetrievalHit } from "../domain/types.js";
import { GenerationProvider } from "../infra/ai/types.js";
import { ConversationLog } from "../infra/log/conversationLog.js";
import { assemblePrompt, DEFAULT_HISTORY_TURNS } from "../pipelines/promptAssembler.js";
import { describeSources, Retriever } from "../pipelines/retriever.js";
import { splitStream, StreamOutcome, StreamView } from "../pipelines/streamSplitter.js";

export const DEFAULT_SYSTEM_PROMPT = "You are a helpful assistant.";
export const NO_MATCHES_NOTICE = "No matching passages were found in the indexed documents.";

export type AskStatus = "answered" | "no_matches" | "degraded" | "failed" | "aborted";

export interface AskResult {
  status: AskStatus;
  reasoning: string;
  answer: string;
  suggestions: string[];
  sources: string[];
  /** Set for `no_matches`, `degraded` and `failed`. */
  notice?: string;
}

export interface AskOptions {
  onUpdate?: (view: StreamView) => void;
  /** Fires once retrieval finished, before generation starts. */
  onRetrieved?: (hits: readonly RetrievalHit[]) => void;
  signal?: AbortSignal;
}

export interface ChatSettings {
  topK: number;
  historyTurns?: number;
  temperature?: number;
  systemInstructions?: string;
}

/** Reads the system prompt file; a missing file yields the default prompt. */
export async function loadSystemPrompt(filePath: string): Promise<string> {
  try {
    const content = await fs.readFile(path.resolve(filePath), "utf-8");
    return content.trim() || DEFAULT_SYSTEM_PROMPT;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return DEFAULT_SYSTEM_PROMPT;
    }
    throw error;
  }
}

/**
 * One conversation: history lives here, in memory, and only completed
 * exchanges are appended to it.
 */
export class ChatSession {
  private readonly history: ChatTurn[];

  constructor(
    private readonly retriever: Retriever,
    private readonly generation: GenerationProvider,
    private readonly log: ConversationLog,
    private readonly settings: ChatSettings,
    history: readonly ChatTurn[] = [],
  ) {
    this.history = history.map((turn) => ({ ...turn }));
  }

  getHistory(): ChatTurn[] {
    return this.history.map((turn) => ({ ...turn }));
  }

  async ask(userInput: string, options: AskOptions = {}): Promise<AskResult> {
    const question = userInput.trim();
    if (!question) {
      throw new Error("Question must not be empty.");
    }

    await this.record("user", question);

    const retrieval = await this.retriever.query(question, this.settings.topK);
    options.onRetrieved?.(retrieval.hits);
    const sources = describeSources(retrieval.hits);

    if (retrieval.status === "degraded") {
      const notice = `Retrieval unavailable: ${retrieval.reason}`;
      console.error(`[chat] ${notice}`);
      await this.record("assistant", notice);
      return { status: "degraded", reasoning: "", answer: "", suggestions: [], sources, notice };
    }

    const prompt = assemblePrompt({
      systemInstructions: this.settings.systemInstructions ?? DEFAULT_SYSTEM_PROMPT,
      hits: retrieval.hits,
      history: this.history,
      userInput: question,
      historyTurns: this.settings.historyTurns ?? DEFAULT_HISTORY_TURNS,
    });

    let outcome: StreamOutcome;
    try {
      outcome = await splitStream(
        this.generation.generate(prompt, {
          temperature: this.settings.temperature,
          signal: options.signal,
        }),
        { onUpdate: options.onUpdate, signal: options.signal },
      );
    } catch (error) {
      if (options.signal?.aborted) {
        return { status: "aborted", reasoning: "", answer: "", suggestions: [], sources };
      }
      const notice = `Generation failed: ${describeError(error)}`;
      console.error(`[chat] ${notice}`);
      await this.record("assistant", notice);
      return { status: "failed", reasoning: "", answer: "", suggestions: [], sources, notice };
    }

    if (outcome.status === "aborted") {
      return { status: "aborted", reasoning: "", answer: "", suggestions: [], sources };
    }

    const { reasoning, answer, suggestions } = outcome.result;
    await this.record("assistant", answer);
    this.history.push({ role: "user", content: question }, { role: "assistant", content: answer });

    if (retrieval.status === "empty") {
      return {
        status: "no_matches",
        reasoning,
        answer,
        suggestions,
        sources,
        notice: NO_MATCHES_NOTICE,
      };
    }
    return { status: "answered", reasoning, answer, suggestions, sources };
  }

  /** Transcript writes never fail the turn. */
  private async record(role: ChatTurn["role"], content: string): Promise<void> {
    try {
      await this.log.append(role, content);
    } catch (error) {
      console.error(`[chat] conversation log write failed: ${describeError(error)}`);
    }
  }
}

/** Models the generation service has installed, or just the configured one. */
export async function listAvailableModels(generation: GenerationProvider): Promise<string[]> {
  const listed = await generation.listModels();
  if (listed.ok && listed.models.length > 0) {
    return listed.models;
  }
  if (!listed.ok) {
    console.error(`[chat] model listing failed (${listed.kind}): ${listed.message}`);
  }
  return [generation.modelName];
}
