/**
 * Chat transcripts
 *
 * One JSONL file per chat session under `sessions.dir`.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";
import { createLogger } from "../utils/logger.js";

const log = createLogger("session-transcript");

export const transcriptMessageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  timestamp: z.number(),
  /** Files an assistant answer drew on. */
  sources: z.array(z.string()).optional(),
});

export type TranscriptMessage = z.infer<typeof transcriptMessageSchema>;

export type SessionId = string;

export interface SessionTranscriptStore {
  append(sessionId: SessionId, message: TranscriptMessage): Promise<void>;
  readAll(sessionId: SessionId): Promise<TranscriptMessage[]>;
  getHistory(sessionId: SessionId, maxTurns?: number): Promise<TranscriptMessage[]>;
  clear(sessionId: SessionId): Promise<void>;
}

export function createSessionTranscriptStore(sessionsDir: string): SessionTranscriptStore {
  const getPath = (sessionId: SessionId) => join(sessionsDir, `${safeFile(sessionId)}.jsonl`);

  return {
    async append(sessionId, message) {
      const path = getPath(sessionId);
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, JSON.stringify(message) + "\n", { flag: "a" });
      log.debug(`Appended ${message.role} message to ${sessionId}`);
    },

    async readAll(sessionId) {
      return readJsonl(getPath(sessionId));
    },

    async getHistory(sessionId, maxTurns = 10) {
      const messages = await readJsonl(getPath(sessionId));

      // Group into turns (user + assistant = 1 turn)
      const turns: TranscriptMessage[][] = [];
      let currentTurn: TranscriptMessage[] = [];
      for (const msg of messages) {
        currentTurn.push(msg);
        if (msg.role === "assistant") {
          turns.push(currentTurn);
          currentTurn = [];
        }
      }
      if (currentTurn.length > 0) turns.push(currentTurn);

      return turns.slice(-maxTurns).flat();
    },

    async clear(sessionId) {
      const path = getPath(sessionId);
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, "");
      log.info(`Cleared transcript ${sessionId}`);
    },
  };
}

function safeFile(input: string): string {
  return input.replace(/[^a-zA-Z0-9._-]/g, "_");
}

async function readJsonl(path: string): Promise<TranscriptMessage[]> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return [];
    }
    throw err;
  }

  const messages: TranscriptMessage[] = [];
  const lines = content.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]?.trim();
    if (!line) continue;
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (err) {
      log.warn(`Failed to parse line ${i + 1} in ${path}: ${err instanceof Error ? err.message : String(err)}`);
      continue;
    }
    const parsed = transcriptMessageSchema.safeParse(value);
    if (parsed.success) messages.push(parsed.data);
    else log.warn(`Skipping malformed message on line ${i + 1} in ${path}`);
  }
  return messages;
}
