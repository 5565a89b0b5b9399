import { minimatch } from "minimatch";
import { TRASH_DIR } from "../sources/local.js";
import { joinRelPath, normalizeRelPath } from "../utils/paths.js";

/** Directories whose contents are never touched, at any depth. */
const PROTECTED_DIRS = [".git", ".ssh", ".gnupg", TRASH_DIR] as const;

const PROTECTED_FILES = [".npmrc", ".netrc"] as const;

/** Protected filename patterns */
const PROTECTED_PATTERNS = [
  /^\.env(\..+)?$/, // .env, .env.local, .env.production, etc.
  /^id_[a-z0-9]+(\.pub)?$/, // SSH keys
  /^.*\.pem$/, // Certificates
  /^.*\.key$/, // Private keys
  /^.*\.p12$/,
] as const;

export class ProtectedPathError extends Error {
  constructor(public readonly path: string) {
    super(`Protected path cannot be changed: ${path}`);
    this.name = "ProtectedPathError";
  }
}

export function isBuiltInProtected(relPath: string): boolean {
  const segments = normalizeRelPath(relPath).toLowerCase().split("/");
  const basename = segments[segments.length - 1] ?? "";

  if (segments.some((s) => PROTECTED_DIRS.some((d) => d === s))) return true;
  if (PROTECTED_FILES.some((f) => f === basename)) return true;
  return PROTECTED_PATTERNS.some((pattern) => pattern.test(basename));
}

export type ProtectedMatcher = (relPath: string) => boolean;

/** Built-in rules plus `organize.protect` globs (root-relative). */
export function createProtectedMatcher(patterns: readonly string[] = []): ProtectedMatcher {
  return (relPath) => {
    if (isBuiltInProtected(relPath)) return true;
    const normalized = normalizeRelPath(relPath);
    return patterns.some((p) => minimatch(normalized, p, { dot: true }));
  };
}

/** A move may not land in a protected folder or produce a protected path. */
export function isProtectedTarget(isProtected: ProtectedMatcher, folder: string, fileName: string): boolean {
  const target = normalizeRelPath(folder);
  return isProtected(target) || isProtected(joinRelPath(target, fileName));
}
