import { createHash } from "node:crypto";

import type { IndexConfig } from "../config/schema.js";
import type { LLMClient } from "../llm/types.js";
import type { FileRecord, FileSource } from "../sources/types.js";
import { createLogger } from "../utils/logger.js";
import { normalizeRelPath } from "../utils/paths.js";
import { chunkDocument, type DocumentChunk } from "./chunker.js";
import { getMeta, setMeta, type IndexDb } from "./db.js";

const log = createLogger("indexer");

export interface IndexStats {
  indexed: number;
  skipped: number;
  removed: number;
  failed: number;
}

export interface IndexSourceParams {
  db: IndexDb;
  source: FileSource;
  config: IndexConfig;
  /** Needed when `config.embeddings` is on. */
  llm?: LLMClient;
  /** Index only this folder (root-relative); pruning is limited to it. */
  folderPath?: string;
}

function hashContent(content: string): string {
  return createHash("sha256").update(content).digest("hex");
}

function chunkId(chunk: DocumentChunk): string {
  return createHash("sha256").update(`${chunk.path}:${chunk.index}:${chunk.text}`).digest("hex");
}

function escapeLike(input: string): string {
  return input.replace(/[\\%_]/g, (m) => `\\${m}`);
}

async function embedChunks(llm: LLMClient, chunks: DocumentChunk[], path: string): Promise<Array<number[] | null>> {
  try {
    return await llm.embed(chunks.map((c) => c.text));
  } catch (err) {
    log.warn(`Embedding failed for ${path}; falling back to keyword search for it`, err);
    return chunks.map(() => null);
  }
}

/**
 * Bring the index in line with the source: changed files are re-chunked,
 * unchanged ones (same hash) are skipped, vanished ones are removed. With
 * embeddings on, a file whose chunks lack embeddings counts as changed.
 */
export async function indexSource(params: IndexSourceParams): Promise<IndexStats> {
  const { db, source, config } = params;
  const folderPath = normalizeRelPath(params.folderPath ?? "");
  const stats: IndexStats = { indexed: 0, skipped: 0, removed: 0, failed: 0 };

  // A different root makes every stored path meaningless.
  const sourceKey = `${source.kind}:${source.root}`;
  const previousSource = getMeta(db, "source");
  if (previousSource !== undefined && previousSource !== sourceKey) {
    log.info(`Index source changed (${previousSource} -> ${sourceKey}); clearing`);
    db.exec("DELETE FROM chunks; DELETE FROM files;");
  }
  setMeta(db, "source", sourceKey);

  const files = (await source.list({ folderPath, recursive: true })).filter((f) => !f.isFolder);

  const selectFile = db.prepare<[string], { hash: string }>("SELECT hash FROM files WHERE path = ?");
  const countUnembedded = db.prepare<[string], { c: number }>(
    "SELECT COUNT(*) AS c FROM chunks WHERE path = ? AND embedding IS NULL",
  );
  const upToDate = (path: string, known: string | undefined, hash: string | undefined): boolean => {
    if (!hash || known !== hash) return false;
    if (!config.embeddings || !params.llm) return true;
    return (countUnembedded.get(path)?.c ?? 0) === 0;
  };
  const upsertFile = db.prepare<[string, string, string, number]>(
    "INSERT INTO files (path, sourceId, hash, updatedAt) VALUES (?, ?, ?, ?) " +
      "ON CONFLICT(path) DO UPDATE SET sourceId=excluded.sourceId, hash=excluded.hash, updatedAt=excluded.updatedAt",
  );
  const deleteChunksByPath = db.prepare<[string]>("DELETE FROM chunks WHERE path = ?");
  const insertChunk = db.prepare<[string, string, number, number, string, string | null]>(
    "INSERT OR REPLACE INTO chunks (id, path, startLine, endLine, text, embedding) VALUES (?, ?, ?, ?, ?, ?)",
  );

  const updateFileTx = db.transaction(
    (file: FileRecord, hash: string, chunks: DocumentChunk[], embeddings: Array<number[] | null>) => {
      upsertFile.run(file.path, file.id, hash, Date.now());
      deleteChunksByPath.run(file.path);
      chunks.forEach((chunk, i) => {
        const vector = embeddings[i];
        insertChunk.run(
          chunkId(chunk),
          chunk.path,
          chunk.startLine,
          chunk.endLine,
          chunk.text,
          vector ? JSON.stringify(vector) : null,
        );
      });
    },
  );

  for (const file of files) {
    const known = selectFile.get(file.path)?.hash;
    if (upToDate(file.path, known, file.contentHash)) {
      stats.skipped++;
      continue;
    }

    let text: string | undefined;
    try {
      text = (await source.readContent(file)).text;
    } catch (err) {
      log.warn(`Skipping ${file.path}: cannot read content`, err);
      stats.failed++;
      continue;
    }

    const hash = file.contentHash ?? hashContent(text ?? "");
    if (upToDate(file.path, known, hash)) {
      stats.skipped++;
      continue;
    }

    const chunks = text?.trim()
      ? chunkDocument({
          path: file.path,
          name: file.name,
          text,
          options: { targetChars: config.chunkChars, overlapChars: config.overlapChars },
        })
      : [];
    const embeddings =
      config.embeddings && params.llm && chunks.length > 0
        ? await embedChunks(params.llm, chunks, file.path)
        : chunks.map(() => null);

    updateFileTx(file, hash, chunks, embeddings);
    stats.indexed++;
    log.debug(`Indexed ${file.path} (${chunks.length} chunks)`);
  }

  stats.removed = pruneMissing(
    db,
    files.map((f) => f.path),
    folderPath,
  );

  setMeta(db, "last_indexed_at", String(Date.now()));
  log.info(
    `Index updated: ${stats.indexed} indexed, ${stats.skipped} unchanged, ` +
      `${stats.removed} removed, ${stats.failed} failed`,
  );
  return stats;
}

function pruneMissing(db: IndexDb, currentPaths: string[], folderPath: string): number {
  // Temp table instead of `NOT IN (?, ?, ...)` to stay under SQLite's variable limit.
  db.exec("DROP TABLE IF EXISTS temp_current_paths");
  db.exec("CREATE TEMP TABLE temp_current_paths (path TEXT PRIMARY KEY NOT NULL)");

  const insertCurrentPath = db.prepare<[string]>(
    "INSERT OR REPLACE INTO temp_current_paths (path) VALUES (?)",
  );
  const insertTx = db.transaction((paths: string[]) => {
    for (const p of paths) insertCurrentPath.run(p);
  });
  insertTx(currentPaths);

  const scope = folderPath ? "AND path LIKE ? ESCAPE '\\'" : "";
  const scopeParams = folderPath ? [`${escapeLike(folderPath)}/%`] : [];

  db.prepare<string[]>(
    `DELETE FROM chunks WHERE path NOT IN (SELECT path FROM temp_current_paths) ${scope}`,
  ).run(...scopeParams);
  const removed = db
    .prepare<string[]>(
      `DELETE FROM files WHERE path NOT IN (SELECT path FROM temp_current_paths) ${scope}`,
    )
    .run(...scopeParams).changes;

  db.exec("DROP TABLE IF EXISTS temp_current_paths");
  return removed;
}
