import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import path from "node:path";

export const INDEX_SCHEMA_VERSION = 1;

export type IndexDb = Database.Database;

function ensureDbDir(dbPath: string): void {
  if (dbPath === ":memory:") return;
  mkdirSync(path.dirname(dbPath), { recursive: true });
}

function initSchema(db: IndexDb): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS meta (
      key TEXT PRIMARY KEY NOT NULL,
      value TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS files (
      path TEXT PRIMARY KEY NOT NULL,
      sourceId TEXT NOT NULL,
      hash TEXT NOT NULL,
      updatedAt INTEGER NOT NULL
    );
    CREATE TABLE IF NOT EXISTS chunks (
      id TEXT PRIMARY KEY NOT NULL,
      path TEXT NOT NULL,
      startLine INTEGER NOT NULL,
      endLine INTEGER NOT NULL,
      text TEXT NOT NULL,
      -- JSON array of numbers, NULL when embeddings are off or failed
      embedding TEXT,
      FOREIGN KEY(path) REFERENCES files(path) ON DELETE CASCADE
    );
    CREATE INDEX IF NOT EXISTS idx_chunks_path ON chunks(path);
  `);

  const row = getMeta(db, "schema_version");
  if (row === undefined) {
    setMeta(db, "schema_version", String(INDEX_SCHEMA_VERSION));
    return;
  }
  if (row !== String(INDEX_SCHEMA_VERSION)) {
    throw new Error(
      `Unsupported index schema version ${row}; expected ${INDEX_SCHEMA_VERSION}`,
    );
  }
}

export function getMeta(db: IndexDb, key: string): string | undefined {
  return db.prepare<[string], { value: string }>("SELECT value FROM meta WHERE key = ?").get(key)
    ?.value;
}

export function setMeta(db: IndexDb, key: string, value: string): void {
  db.prepare<[string, string]>(
    "INSERT INTO meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value=excluded.value",
  ).run(key, value);
}

export function openIndexDb(dbPath: string): IndexDb {
  ensureDbDir(dbPath);
  const db = new Database(dbPath);
  db.pragma("foreign_keys = ON");
  if (dbPath !== ":memory:") db.pragma("journal_mode = WAL");
  initSchema(db);
  return db;
}
