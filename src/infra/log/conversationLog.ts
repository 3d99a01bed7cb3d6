import { promises as fs } from "node:fs";
import path from "node:path";
import { ChatRole } from "../../domain/types.js";

export interface ConversationLog {
  append(role: ChatRole, content: string, at?: Date): Promise<void>;
}

const SEPARATOR = "-".repeat(40);

export function formatLogRecord(role: ChatRole, content: string, at: Date): string {
  return `[${formatTimestamp(at)}] ${role.toUpperCase()}: ${content}\n${SEPARATOR}\n`;
}

/** Append-only transcript, one record per turn. Never read back. */
export class FileConversationLog implements ConversationLog {
  private writeChain: Promise<void> = Promise.resolve();

  private readonly absolutePath: string;

  constructor(filePath: string) {
    this.absolutePath = path.resolve(filePath);
  }

  append(role: ChatRole, content: string, at: Date = new Date()): Promise<void> {
    const record = formatLogRecord(role, content, at);
    const task = async () => {
      await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });
      await fs.appendFile(this.absolutePath, record, "utf-8");
    };
    this.writeChain = this.writeChain.then(task, task);
    return this.writeChain;
  }
}

export class NullConversationLog implements ConversationLog {
  async append(): Promise<void> {}
}

function formatTimestamp(at: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${at.getFullYear()}-${pad(at.getMonth() + 1)}-${pad(at.getDate())} ` +
    `${pad(at.getHours())}:${pad(at.getMinutes())}:${pad(at.getSeconds())}`
  );
}
