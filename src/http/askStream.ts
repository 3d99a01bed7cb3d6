import { ServerResponse } from "node:http";
import { z } from "zod";
import { describeError } from "../domain/errors.js";
import { ChatSession } from "../services/chatService.js";
import { describeSources } from "../pipelines/retriever.js";

export type AskStreamEvent = "meta" | "reasoning" | "answer" | "suggestions" | "error" | "done";

export interface SseSink {
  send(event: AskStreamEvent, data: unknown): void;
  readonly closed: boolean;
}

export const askStreamBodySchema = z.object({
  question: z.string().trim().min(1),
  history: z
    .array(
      z.object({
        role: z.enum(["user", "assistant"]),
        content: z.string(),
      }),
    )
    .max(200)
    .optional(),
});

export type AskStreamBody = z.infer<typeof askStreamBodySchema>;

export function createSseSink(res: ServerResponse): SseSink {
  res.writeHead(200, {
    "Content-Type": "text/event-stream",
    "Cache-Control": "no-cache",
    Connection: "keep-alive",
  });

  let closed = false;
  res.on("close", () => {
    closed = true;
  });

  return {
    send(event, data) {
      if (closed) {
        return;
      }
      res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
    },
    get closed() {
      return closed;
    },
  };
}

/**
 * Runs one question through the session and mirrors progress as SSE events.
 * Always ends with exactly one `done` event unless the client went away.
 */
export async function streamAsk(
  session: ChatSession,
  question: string,
  sink: SseSink,
  signal?: AbortSignal,
): Promise<void> {
  let lastReasoning = "";
  let lastActivity: string | null = null;

  try {
    const result = await session.ask(question, {
      signal,
      onRetrieved: (hits) => {
        sink.send("meta", { sources: describeSources(hits), hits: hits.length });
      },
      onUpdate: (view) => {
        if (view.reasoning !== lastReasoning || view.activity !== lastActivity) {
          lastReasoning = view.reasoning;
          lastActivity = view.activity;
          sink.send("reasoning", { text: view.reasoning, activity: view.activity });
        }
        if (view.answerDelta) {
          sink.send("answer", { delta: view.answerDelta });
        }
      },
    });

    if (result.status === "aborted") {
      return;
    }
    if (result.status === "failed" || result.status === "degraded") {
      sink.send("error", { message: result.notice ?? result.status });
    } else {
      sink.send("suggestions", { items: result.suggestions });
    }
    sink.send("done", {
      status: result.status,
      answer: result.answer,
      reasoning: result.reasoning,
      sources: result.sources,
      ...(result.notice ? { notice: result.notice } : {}),
    });
  } catch (error) {
    sink.send("error", { message: describeError(error) });
    sink.send("done", { status: "failed" });
  }
}
