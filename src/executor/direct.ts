/**
 * File operations run directly from the CLI, outside any plan. They go
 * through the same protection check and audit trail as plan actions.
 */

import type { AuditLogger } from "../audit/logger.js";
import { NotFoundError } from "../sources/errors.js";
import type { FileRecord, FileSource, RemoveMode } from "../sources/types.js";
import { normalizeRelPath } from "../utils/paths.js";
import { ProtectedPathError, type ProtectedMatcher } from "./protected.js";

export interface DirectDeps {
  source: FileSource;
  audit: AuditLogger;
  isProtected: ProtectedMatcher;
  now?: () => number;
}

async function audited<T>(
  deps: DirectDeps,
  intent: { operation: string; path: string; target?: string },
  fn: () => Promise<T>,
): Promise<T> {
  const now = deps.now ?? Date.now;
  const pre = await deps.audit.preLog({ ...intent, source: deps.source.kind });
  const started = now();
  try {
    const result = await fn();
    await deps.audit.finalize(pre.id, "success", { duration: now() - started });
    return result;
  } catch (err) {
    await deps.audit.finalize(pre.id, "error", {
      error: err instanceof Error ? err.message : String(err),
      duration: now() - started,
    });
    throw err;
  }
}

async function requireFile(source: FileSource, path: string): Promise<FileRecord> {
  const file = await source.stat(path);
  if (!file) throw new NotFoundError(`Not found: ${normalizeRelPath(path) || "/"}`);
  return file;
}

export async function makeFolder(deps: DirectDeps, path: string): Promise<FileRecord> {
  return audited(deps, { operation: "create-folder", path: normalizeRelPath(path) }, () =>
    deps.source.ensureFolder(path),
  );
}

export async function moveFile(deps: DirectDeps, path: string, folderPath: string): Promise<FileRecord> {
  const rel = normalizeRelPath(path);
  if (deps.isProtected(rel)) throw new ProtectedPathError(rel);
  const file = await requireFile(deps.source, rel);
  return audited(deps, { operation: "move", path: rel, target: normalizeRelPath(folderPath) }, () =>
    deps.source.move(file, folderPath),
  );
}

export async function removeFile(deps: DirectDeps, path: string, mode: RemoveMode): Promise<void> {
  const rel = normalizeRelPath(path);
  if (deps.isProtected(rel)) throw new ProtectedPathError(rel);
  const file = await requireFile(deps.source, rel);
  await audited(deps, { operation: mode === "trash" ? "trash" : "delete", path: rel }, () =>
    deps.source.remove(file, mode),
  );
}
