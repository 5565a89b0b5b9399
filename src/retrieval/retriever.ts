import type { LLMClient } from "../llm/types.js";
import { createLogger } from "../utils/logger.js";
import type { IndexDb } from "./db.js";

const log = createLogger("retriever");

export interface RetrievedChunk {
  path: string;
  startLine: number;
  endLine: number;
  text: string;
  score: number;
}

export interface RetrieveOptions {
  topK: number;
  /** Query embedder; when absent (or failing) keyword scoring is used. */
  embed?: (text: string) => Promise<number[]>;
}

function escapeLike(input: string): string {
  return input.replace(/[\\%_]/g, (m) => `\\${m}`);
}

function tokenizeQuery(query: string): string[] {
  const tokens = query
    .toLowerCase()
    .split(/\s+/g)
    .map((t) => t.trim())
    .filter(Boolean);
  return Array.from(new Set(tokens));
}

export function cosineSimilarity(a: number[], b: number[]): number {
  const len = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < len; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function parseVector(raw: string): number[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!Array.isArray(parsed)) return null;
  const out: number[] = [];
  for (const v of parsed) {
    if (typeof v !== "number") return null;
    out.push(v);
  }
  return out;
}

function byScoreThenPosition(a: RetrievedChunk, b: RetrievedChunk): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.path !== b.path) return a.path < b.path ? -1 : 1;
  return a.startLine - b.startLine;
}

/**
 * Keyword scoring: the whole phrase scores 3, each distinct token 1
 * (case-insensitive substring match).
 */
export function keywordSearch(db: IndexDb, query: string, topK: number): RetrievedChunk[] {
  const phrase = query.trim().toLowerCase();
  const tokens = tokenizeQuery(query);
  if (!phrase) return [];

  const likePatterns = [phrase, ...tokens].map((t) => `%${escapeLike(t)}%`);
  const scoreExpr = [
    "(CASE WHEN text LIKE ? ESCAPE '\\' COLLATE NOCASE THEN 3 ELSE 0 END)",
    ...tokens.map(() => "(CASE WHEN text LIKE ? ESCAPE '\\' COLLATE NOCASE THEN 1 ELSE 0 END)"),
  ].join(" + ");
  const whereExpr = likePatterns.map(() => "text LIKE ? ESCAPE '\\' COLLATE NOCASE").join(" OR ");

  const sql = `
    SELECT path, startLine, endLine, text, (${scoreExpr}) as score
    FROM chunks
    WHERE (${whereExpr})
    ORDER BY score DESC, path ASC, startLine ASC
    LIMIT ?
  `;

  const rows = db
    .prepare<Array<string | number>, RetrievedChunk>(sql)
    .all(...likePatterns, ...likePatterns, Math.max(topK, 1));

  return rows
    .map((row) => ({ ...row, score: Number(row.score) || 0 }))
    .filter((r) => r.score > 0)
    .sort(byScoreThenPosition);
}

export function vectorSearch(db: IndexDb, queryVector: number[], topK: number): RetrievedChunk[] {
  const rows = db
    .prepare<[], Omit<RetrievedChunk, "score"> & { embedding: string }>(
      "SELECT path, startLine, endLine, text, embedding FROM chunks WHERE embedding IS NOT NULL",
    )
    .all();

  const scored: RetrievedChunk[] = [];
  for (const row of rows) {
    const vector = parseVector(row.embedding);
    if (!vector) continue;
    scored.push({
      path: row.path,
      startLine: row.startLine,
      endLine: row.endLine,
      text: row.text,
      score: cosineSimilarity(queryVector, vector),
    });
  }

  return scored.sort(byScoreThenPosition).slice(0, Math.max(topK, 1));
}

/** Top chunks for a query: embeddings when available, keyword scoring otherwise. */
export async function retrieve(
  db: IndexDb,
  query: string,
  options: RetrieveOptions,
): Promise<RetrievedChunk[]> {
  if (options.embed) {
    try {
      const results = vectorSearch(db, await options.embed(query), options.topK);
      if (results.length > 0) return results;
      log.debug("No embedded chunks; using keyword search");
    } catch (err) {
      log.warn("Query embedding failed; using keyword search", err);
    }
  }
  return keywordSearch(db, query, options.topK);
}

/** Distinct file paths in order of first appearance. */
export function sourcePaths(chunks: RetrievedChunk[]): string[] {
  return Array.from(new Set(chunks.map((c) => c.path)));
}

/** Query embedder for `retrieve`, or undefined when embeddings are off. */
export function queryEmbedder(
  llm: LLMClient,
  enabled: boolean,
): ((text: string) => Promise<number[]>) | undefined {
  if (!enabled) return undefined;
  return async (text) => {
    const [vector] = await llm.embed([text]);
    if (!vector) throw new Error("Embedding endpoint returned no vector");
    return vector;
  };
}

/** Opening text of each file (its first chunk), clipped to `maxChars`. */
export function fileOpenings(db: IndexDb, paths: string[], maxChars: number): Map<string, string> {
  const stmt = db.prepare<[string], { text: string }>(
    "SELECT text FROM chunks WHERE path = ? ORDER BY startLine ASC LIMIT 1",
  );
  const out = new Map<string, string>();
  for (const p of paths) {
    const text = stmt.get(p)?.text;
    if (text) out.set(p, text.length > maxChars ? `${text.slice(0, maxChars)}…` : text);
  }
  return out;
}
