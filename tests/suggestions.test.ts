import { describe, expect, it } from "vitest";
import { parseSuggestionList } from "../src/pipelines/suggestions.js";

describe("parseSuggestionList", () => {
  it("accepts single and double quotes with a trailing comma", () => {
    expect(parseSuggestionList(`["What next?", 'Why "this"?', "Third",]`)).toEqual({
      ok: true,
      items: ["What next?", 'Why "this"?', "Third"],
    });
  });

  it("keeps at most three items", () => {
    expect(parseSuggestionList(`["a", "b", "c", "d"]`)).toEqual({ ok: true, items: ["a", "b", "c"] });
  });

  it("collapses whitespace and drops empty items", () => {
    expect(parseSuggestionList(`\n  [ "  two   words ", "", "   " ]  \n`)).toEqual({
      ok: true,
      items: ["two words"],
    });
  });

  it("decodes escapes", () => {
    expect(parseSuggestionList(`["caf\\u00e9", "say \\"hi\\""]`)).toEqual({
      ok: true,
      items: ["café", 'say "hi"'],
    });
  });

  it("accepts an empty list", () => {
    expect(parseSuggestionList("[]")).toEqual({ ok: true, items: [] });
  });

  it.each([
    [`["a", 1]`],
    [`[open("x")]`],
    [`["a"`],
    [`["a"] trailing`],
    [`{"a": 1}`],
    [`["line\nbreak"]`],
    [""],
  ])("rejects %j", (input) => {
    expect(parseSuggestionList(input).ok).toBe(false);
  });
});
