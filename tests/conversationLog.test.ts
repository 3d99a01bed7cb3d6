import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { FileConversationLog, formatLogRecord } from "../src/infra/log/conversationLog.js";

const TEMP_DIR = path.resolve(".tmp-tests-conversation-log");
const SEPARATOR = "-".repeat(40);

describe("conversation log", () => {
  afterEach(async () => {
    await fs.rm(TEMP_DIR, { recursive: true, force: true });
  });

  it("formats one timestamped record per turn", () => {
    const at = new Date(2024, 2, 5, 9, 7, 3);
    expect(formatLogRecord("user", "How do I reset?", at)).toBe(
      `[2024-03-05 09:07:03] USER: How do I reset?\n${SEPARATOR}\n`,
    );
  });

  it("appends records in call order", async () => {
    const log = new FileConversationLog(path.join(TEMP_DIR, "nested", "chat.log"));
    const at = new Date(2024, 0, 1, 12, 0, 0);

    await Promise.all([log.append("user", "first", at), log.append("assistant", "second", at)]);

    const content = await fs.readFile(path.join(TEMP_DIR, "nested", "chat.log"), "utf-8");
    expect(content).toBe(
      `[2024-01-01 12:00:00] USER: first\n${SEPARATOR}\n` +
        `[2024-01-01 12:00:00] ASSISTANT: second\n${SEPARATOR}\n`,
    );
  });
});
