import type { ChatMessage, LLMClient } from "../llm/types.js";
import type { IndexDb } from "../retrieval/db.js";
import { retrieve, sourcePaths } from "../retrieval/retriever.js";
import { createLogger } from "../utils/logger.js";
import { chatSystemPrompt } from "./prompts.js";
import type { SessionTranscriptStore } from "./session-transcript.js";

const log = createLogger("chat");

export interface ChatDeps {
  db: IndexDb;
  llm: LLMClient;
  transcripts: SessionTranscriptStore;
  topK: number;
  maxTurns: number;
  embed?: (text: string) => Promise<number[]>;
  now?: () => number;
}

export interface ChatAnswer {
  answer: string;
  sources: string[];
}

/**
 * Answer a question from indexed file excerpts, with the session's recent
 * turns as history. Both sides of the exchange are appended to the transcript.
 */
export async function chat(deps: ChatDeps, sessionId: string, question: string): Promise<ChatAnswer> {
  const now = deps.now ?? Date.now;
  const trimmed = question.trim();
  if (!trimmed) throw new Error("Question must not be empty");

  const chunks = await retrieve(deps.db, trimmed, { topK: deps.topK, embed: deps.embed });
  const sources = sourcePaths(chunks);
  log.debug(`Retrieved ${chunks.length} chunk(s) from ${sources.length} file(s)`);

  const history = await deps.transcripts.getHistory(sessionId, deps.maxTurns);
  const messages: ChatMessage[] = [
    { role: "system", content: chatSystemPrompt(chunks) },
    ...history.map((m): ChatMessage => ({ role: m.role, content: m.content })),
    { role: "user", content: trimmed },
  ];

  const answer = (await deps.llm.complete(messages)).content.trim();

  await deps.transcripts.append(sessionId, { role: "user", content: trimmed, timestamp: now() });
  await deps.transcripts.append(sessionId, {
    role: "assistant",
    content: answer,
    timestamp: now(),
    sources,
  });

  return { answer, sources };
}
