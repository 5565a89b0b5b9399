import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { ChatMessage, LLMClient } from "../../llm/types.js";
import { openIndexDb, type IndexDb } from "../../retrieval/db.js";
import { chat } from "../chat.js";
import { chatSystemPrompt } from "../prompts.js";
import { createSessionTranscriptStore, type SessionTranscriptStore } from "../session-transcript.js";

vi.mock("../../utils/logger.js", () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

const CHUNK = "This content is from the file a.txt:\n\nQuarterly budget: 1200";

describe("chat", () => {
  let dir: string;
  let db: IndexDb;
  let transcripts: SessionTranscriptStore;
  let calls: ChatMessage[][];
  let llm: LLMClient;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "filewise-chat-"));
    transcripts = createSessionTranscriptStore(dir);
    db = openIndexDb(":memory:");
    db.prepare("INSERT INTO files (path, sourceId, hash, updatedAt) VALUES (?, ?, ?, ?)").run(
      "notes/a.txt",
      "notes/a.txt",
      "h",
      1,
    );
    db.prepare(
      "INSERT INTO chunks (id, path, startLine, endLine, text, embedding) VALUES (?, ?, ?, ?, ?, NULL)",
    ).run("c1", "notes/a.txt", 1, 3, CHUNK);

    calls = [];
    let n = 0;
    llm = {
      model: "fake",
      complete: async (messages) => {
        calls.push(messages);
        n++;
        return { content: ` answer ${n} `, model: "fake", usage: { promptTokens: 0, completionTokens: 0 }, truncated: false };
      },
      embed: async () => [],
      listModels: async () => [],
    };
  });

  afterEach(async () => {
    db.close();
    await rm(dir, { recursive: true, force: true });
  });

  it("answers from retrieved excerpts and records the exchange", async () => {
    const deps = { db, llm, transcripts, topK: 4, maxTurns: 10, now: () => 7 };

    const result = await chat(deps, "s1", "  Quarterly budget  ");

    expect(result).toEqual({ answer: "answer 1", sources: ["notes/a.txt"] });
    expect(calls[0]).toEqual([
      {
        role: "system",
        content: chatSystemPrompt([{ path: "notes/a.txt", text: CHUNK }]),
      },
      { role: "user", content: "Quarterly budget" },
    ]);
    expect(await transcripts.readAll("s1")).toEqual([
      { role: "user", content: "Quarterly budget", timestamp: 7 },
      { role: "assistant", content: "answer 1", timestamp: 7, sources: ["notes/a.txt"] },
    ]);
  });

  it("includes earlier turns as history", async () => {
    const deps = { db, llm, transcripts, topK: 4, maxTurns: 10 };
    await chat(deps, "s1", "Quarterly budget");
    await chat(deps, "s1", "and holidays?");

    expect(calls[1]?.slice(1)).toEqual([
      { role: "user", content: "Quarterly budget" },
      { role: "assistant", content: "answer 1" },
      { role: "user", content: "and holidays?" },
    ]);
    expect(calls[1]?.[0]?.content).toBe(chatSystemPrompt([]));
  });

  it("rejects an empty question", async () => {
    await expect(chat({ db, llm, transcripts, topK: 4, maxTurns: 10 }, "s1", "   ")).rejects.toThrow(
      "Question must not be empty",
    );
    expect(calls).toEqual([]);
  });
});
