import { describe, expect, it } from "vitest";
import { splitStream, StreamSplitter } from "../src/pipelines/streamSplitter.js";
import { fromArray } from "./helpers/fakes.js";

const FULL_RESPONSE =
  '<think>Checking the **manual** first, then **cross-checking**.</think>The answer is 42. ' +
  '<suggestions>["Why 42?", "Who asked?"]</suggestions>';

function pushAll(tokens: readonly string[]) {
  const splitter = new StreamSplitter();
  const views = tokens.map((token) => splitter.push(token));
  return { splitter, views };
}

function pieces(text: string, size: number): string[] {
  const out: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    out.push(text.slice(i, i + size));
  }
  return out;
}

describe("StreamSplitter", () => {
  it("separates reasoning, answer and suggestions", () => {
    const { splitter } = pushAll([FULL_RESPONSE]);
    expect(splitter.finalize()).toEqual({
      reasoning: "Checking the **manual** first, then **cross-checking**.",
      answer: "The answer is 42.",
      suggestions: ["Why 42?", "Who asked?"],
    });
  });

  it("gives the same result however the stream is fragmented", () => {
    const whole = pushAll([FULL_RESPONSE]).splitter.finalize();
    for (const size of [1, 2, 3, 7, 13]) {
      const { splitter } = pushAll(pieces(FULL_RESPONSE, size));
      expect(splitter.finalize()).toEqual(whole);
    }
  });

  it("only ever grows the displayed answer and never shows markers", () => {
    const { views } = pushAll(pieces(FULL_RESPONSE, 1));

    for (let i = 1; i < views.length; i += 1) {
      expect(views[i].answer.startsWith(views[i - 1].answer)).toBe(true);
    }
    for (const view of views) {
      expect(view.answer).not.toContain("<");
    }
    expect(views.map((view) => view.answerDelta).join("")).toBe("The answer is 42.");
    expect(views[views.length - 1].answer).toBe("The answer is 42.");
  });

  it("tracks phases and the latest bold phrase of the reasoning", () => {
    const splitter = new StreamSplitter();
    expect(splitter.push("<thi").phase).toBe("AwaitingMarker");
    expect(splitter.push("nk>Looking at **page 3**").phase).toBe("InReasoning");

    const reasoningView = splitter.push(" and **page 4**<");
    expect(reasoningView.reasoning).toBe("Looking at **page 3** and **page 4**");
    expect(reasoningView.activity).toBe("page 4");

    const answerView = splitter.push("/think>Done.");
    expect(answerView.phase).toBe("InAnswer");
    expect(answerView.answer).toBe("Done.");
    expect(answerView.answerDelta).toBe("Done.");
  });

  it("treats a stream without a think marker as all answer", () => {
    const { splitter, views } = pushAll(["Plain ", "answer ", "text."]);
    expect(views[0].phase).toBe("InAnswer");
    expect(splitter.finalize()).toEqual({ reasoning: "", answer: "Plain answer text.", suggestions: [] });
  });

  it("drops a malformed suggestions block without leaking it into the answer", () => {
    const { splitter } = pushAll(['Answer text<suggestions>["a", "b"</suggestions>']);
    expect(splitter.finalize()).toEqual({ reasoning: "", answer: "Answer text", suggestions: [] });
  });

  it("shows unterminated reasoning as the answer", () => {
    const { splitter } = pushAll(["<think>still ", "thinking"]);
    expect(splitter.finalize()).toEqual({ reasoning: "", answer: "still thinking", suggestions: [] });
  });

  it("accepts markers in any case and with inner whitespace", () => {
    const { splitter } = pushAll(["<THINK>r</ think >Ans<Suggestions>['x']</suggestions>"]);
    expect(splitter.finalize()).toEqual({ reasoning: "r", answer: "Ans", suggestions: ["x"] });
  });

  it("parses an unclosed suggestions block and drops text after a closed one", () => {
    expect(pushAll(['A<suggestions>["x", "y"]']).splitter.finalize().suggestions).toEqual(["x", "y"]);
    expect(pushAll(['A<suggestions>["x"]</suggestions> trailing']).splitter.finalize()).toEqual({
      reasoning: "",
      answer: "A",
      suggestions: ["x"],
    });
  });

  it("is idempotent on finalize and closed for writing afterwards", () => {
    const { splitter } = pushAll(["Hello"]);
    const first = splitter.finalize();
    expect(splitter.finalize()).toBe(first);
    expect(() => splitter.push("more")).toThrow("already finalized");
  });

  it("exposes the buffered state", () => {
    const splitter = new StreamSplitter();
    splitter.push("<think>a</think>B<sugg");
    expect(splitter.state()).toEqual({
      phase: "InAnswer",
      buffer: "<think>a</think>B<sugg",
      reasoning: "a",
      answer: "B",
      suggestions: [],
    });
  });

  it("handles an empty stream", () => {
    expect(new StreamSplitter().finalize()).toEqual({ reasoning: "", answer: "", suggestions: [] });
  });
});

describe("splitStream", () => {
  it("forwards updates and finalizes", async () => {
    const answers: string[] = [];
    const outcome = await splitStream(fromArray(["<think>x</think>", "Hi", " there"]), {
      onUpdate: (view) => answers.push(view.answer),
    });

    expect(answers).toEqual(["", "Hi", "Hi there"]);
    expect(outcome).toEqual({
      status: "completed",
      result: { reasoning: "x", answer: "Hi there", suggestions: [] },
    });
  });

  it("releases the splitter when aborted mid-stream", async () => {
    const controller = new AbortController();
    const splitter = new StreamSplitter();

    const outcome = await splitStream(fromArray(["one ", "two ", "three"]), {
      splitter,
      signal: controller.signal,
      onUpdate: () => controller.abort(),
    });

    expect(outcome).toEqual({ status: "aborted" });
    expect(splitter.isDisposed).toBe(true);
    expect(() => splitter.push("four")).toThrow("disposed");
  });

  it("propagates source errors after disposing", async () => {
    const splitter = new StreamSplitter();
    async function* failing(): AsyncIterable<string> {
      yield "partial";
      throw new Error("stream reset by peer");
    }

    await expect(splitStream(failing(), { splitter })).rejects.toThrow("stream reset by peer");
    expect(splitter.isDisposed).toBe(true);
  });

  it("reports aborted when the source fails after the signal fired", async () => {
    const controller = new AbortController();
    const splitter = new StreamSplitter();
    async function* cut(): AsyncIterable<string> {
      yield "partial";
      throw Object.assign(new Error("This operation was aborted"), { name: "AbortError" });
    }

    const outcome = await splitStream(cut(), {
      splitter,
      signal: controller.signal,
      onUpdate: () => controller.abort(),
    });

    expect(outcome).toEqual({ status: "aborted" });
    expect(splitter.isDisposed).toBe(true);
  });
});
