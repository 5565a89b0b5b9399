import { z } from "zod";
import type { LLMClient } from "../llm/types.js";
import type { IndexDb } from "../retrieval/db.js";
import { fileOpenings } from "../retrieval/retriever.js";
import type { FileRecord } from "../sources/types.js";
import { createLogger } from "../utils/logger.js";
import { normalizeRelPath } from "../utils/paths.js";
import { parseJsonReply } from "./decision.js";
import { buildSuggestMessages } from "./prompts.js";

const log = createLogger("suggest");

const structureSchema = z.record(z.string(), z.array(z.string()));

export interface SuggestedStructure {
  /** Folder → root-relative file paths. */
  folders: Record<string, string[]>;
  /** Names in the reply that match no known file. */
  unknown: string[];
  /** Known files the reply left out. */
  unassigned: string[];
}

export interface SuggestParams {
  db: IndexDb;
  llm: LLMClient;
  files: readonly FileRecord[];
  /** Per-file excerpt budget. */
  excerptChars?: number;
}

/**
 * Map reply entries to known files. Entries may name a path or a bare file
 * name (when that name is unique). Each file lands in the first folder that
 * lists it.
 */
export function resolveStructure(
  raw: Record<string, string[]>,
  files: readonly FileRecord[],
): SuggestedStructure {
  const byPath = new Map(files.map((f) => [f.path, f]));
  const byName = new Map<string, FileRecord | null>();
  for (const f of files) byName.set(f.name, byName.has(f.name) ? null : f);

  const assigned = new Set<string>();
  const folders: Record<string, string[]> = {};
  const unknown: string[] = [];

  for (const [folderName, entries] of Object.entries(raw)) {
    const folder = normalizeRelPath(folderName);
    if (!folder) continue;
    for (const entry of entries) {
      const key = normalizeRelPath(entry);
      const file = byPath.get(key) ?? byName.get(key) ?? undefined;
      if (!file) {
        unknown.push(entry);
        continue;
      }
      if (assigned.has(file.path)) continue;
      assigned.add(file.path);
      (folders[folder] ??= []).push(file.path);
    }
  }

  const unassigned = files.filter((f) => !assigned.has(f.path)).map((f) => f.path);
  return { folders, unknown, unassigned };
}

/** Ask the model for a folder structure covering `files`, using indexed excerpts. */
export async function suggestStructure(params: SuggestParams): Promise<SuggestedStructure> {
  const files = params.files.filter((f) => !f.isFolder);
  if (files.length === 0) return { folders: {}, unknown: [], unassigned: [] };

  const openings = fileOpenings(
    params.db,
    files.map((f) => f.path),
    params.excerptChars ?? 300,
  );
  const messages = buildSuggestMessages(files.map((f) => ({ path: f.path, opening: openings.get(f.path) })));

  const reply = (await params.llm.complete(messages)).content;
  const json = parseJsonReply(reply);
  if (!json.ok) throw new Error(`Could not read suggested structure: ${json.error}`);

  const parsed = structureSchema.safeParse(json.value);
  if (!parsed.success) {
    throw new Error('Could not read suggested structure: expected {"folder": ["file", ...]}');
  }

  const result = resolveStructure(parsed.data, files);
  if (result.unknown.length > 0) {
    log.warn(`Dropped ${result.unknown.length} unknown file(s) from suggestion`);
  }
  return result;
}
