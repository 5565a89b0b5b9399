import type { FileRecord } from "../sources/types.js";
import type { ClassificationDecision } from "./types.js";

function timeOf(file: FileRecord): number {
  const t = Date.parse(file.modifiedTime);
  return Number.isNaN(t) ? Number.POSITIVE_INFINITY : t;
}

/** Earliest modified first; ties go to the shorter, then lexically smaller path. */
export function compareOriginals(a: FileRecord, b: FileRecord): number {
  const dt = timeOf(a) - timeOf(b);
  if (dt !== 0 && !Number.isNaN(dt)) return dt;
  if (a.path.length !== b.path.length) return a.path.length - b.path.length;
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

/**
 * Group files by content hash. Returns duplicate id → original record;
 * originals, empty files and files without a hash are absent.
 */
export function findDuplicates(files: readonly FileRecord[]): Map<string, FileRecord> {
  const groups = new Map<string, FileRecord[]>();
  for (const file of files) {
    // Every empty file shares one hash.
    if (file.isFolder || file.size === 0 || !file.contentHash) continue;
    const group = groups.get(file.contentHash);
    if (group) group.push(file);
    else groups.set(file.contentHash, [file]);
  }

  const out = new Map<string, FileRecord>();
  for (const group of groups.values()) {
    if (group.length < 2) continue;
    const [original, ...copies] = [...group].sort(compareOriginals);
    if (!original) continue;
    for (const copy of copies) out.set(copy.id, original);
  }
  return out;
}

export function duplicateDecision(original: FileRecord): ClassificationDecision {
  return {
    action: "duplicate",
    category: "Duplicates",
    reason: `Same content as ${original.path}`,
    confidence: 1,
    duplicateOf: original.path,
    duplicateOfId: original.id,
  };
}
