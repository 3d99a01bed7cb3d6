import { ChatTurn, RetrievalHit } from "../domain/types.js";
import { SUGGESTIONS_CLOSE, SUGGESTIONS_OPEN, THINK_CLOSE, THINK_OPEN } from "./streamSplitter.js";

export const DEFAULT_HISTORY_TURNS = 6;
export const NO_CONTEXT_NOTICE = "No local manual pages found.";

export interface AssemblePromptInput {
  systemInstructions: string;
  hits: readonly RetrievalHit[];
  history: readonly ChatTurn[];
  userInput: string;
  historyTurns?: number;
}

export function renderContext(hits: readonly RetrievalHit[]): string {
  if (hits.length === 0) {
    return NO_CONTEXT_NOTICE;
  }
  return hits
    .map((hit) => `--- [Source: ${hit.source} (Pg ${hit.page})] ---\n${hit.chunkText}`)
    .join("\n\n");
}

export function renderHistory(history: readonly ChatTurn[], turns: number): string {
  if (turns <= 0) {
    return "";
  }
  return history
    .slice(-turns)
    .map((turn) => `${turn.role.toUpperCase()}: ${turn.content}`)
    .join("\n");
}

export function assemblePrompt(input: AssemblePromptInput): string {
  const turns = input.historyTurns ?? DEFAULT_HISTORY_TURNS;

  return [
    "### SYSTEM INSTRUCTIONS (IMMUTABLE)",
    input.systemInstructions.trim(),
    "",
    "### DATABASE CONTEXT",
    renderContext(input.hits),
    "",
    "### CONVERSATION HISTORY",
    renderHistory(input.history, turns),
    "",
    "### CURRENT USER INPUT",
    input.userInput,
    "",
    "### EXECUTION",
    `1. Think first inside ${THINK_OPEN}...${THINK_CLOSE}, then write the answer for the user.`,
    "2. Cite the sources you used as name (Pg N).",
    "3. If the user lacks some information but says they do not have it, accept that and continue with a warning.",
    "4. Do not simulate the user.",
    `5. End with exactly three short follow-up questions as ${SUGGESTIONS_OPEN}["...", "...", "..."]${SUGGESTIONS_CLOSE}.`,
  ].join("\n");
}
