import { describe, expect, it } from "vitest";
import { ChatTurn } from "../src/domain/types.js";
import {
  assemblePrompt,
  NO_CONTEXT_NOTICE,
  renderContext,
  renderHistory,
} from "../src/pipelines/promptAssembler.js";

const hit = (source: string, page: number, chunkText: string) => ({
  id: `${source}_${page}`,
  chunkText,
  source,
  page,
  distance: 0.1,
});

describe("prompt assembler", () => {
  it("renders each hit under a source header", () => {
    expect(renderContext([hit("guide.pdf", 3, "Step one."), hit("faq.md", 1, "Answer.")])).toBe(
      "--- [Source: guide.pdf (Pg 3)] ---\nStep one.\n\n--- [Source: faq.md (Pg 1)] ---\nAnswer.",
    );
  });

  it("uses the notice when nothing was retrieved", () => {
    expect(renderContext([])).toBe(NO_CONTEXT_NOTICE);
  });

  it("keeps only the last turns of history", () => {
    const history = Array.from({ length: 8 }, (_, i): ChatTurn => ({
      role: i % 2 === 0 ? "user" : "assistant",
      content: `turn ${i}`,
    }));

    expect(renderHistory(history, 6).split("\n")).toEqual([
      "USER: turn 2",
      "ASSISTANT: turn 3",
      "USER: turn 4",
      "ASSISTANT: turn 5",
      "USER: turn 6",
      "ASSISTANT: turn 7",
    ]);
    expect(renderHistory(history, 0)).toBe("");
  });

  it("lays out the sections in fixed order", () => {
    const prompt = assemblePrompt({
      systemInstructions: "  Be precise.  ",
      hits: [hit("guide.pdf", 2, "Press reset.")],
      history: [{ role: "user", content: "hello" }],
      userInput: "How do I reset?",
    });
    const lines = prompt.split("\n");

    expect(lines.slice(0, 12)).toEqual([
      "### SYSTEM INSTRUCTIONS (IMMUTABLE)",
      "Be precise.",
      "",
      "### DATABASE CONTEXT",
      "--- [Source: guide.pdf (Pg 2)] ---",
      "Press reset.",
      "",
      "### CONVERSATION HISTORY",
      "USER: hello",
      "",
      "### CURRENT USER INPUT",
      "How do I reset?",
    ]);
    expect(lines[13]).toBe("### EXECUTION");
    expect(lines).toHaveLength(19);
    expect(lines[14]).toContain("<think>...</think>");
    expect(lines[18]).toContain('<suggestions>["...", "...", "..."]</suggestions>');
  });
});
