import { homedir } from "node:os";
import { join, resolve } from "node:path";

/**
 * Resolve FILEWISE_HOME (default ~/.filewise) and export it so `${FILEWISE_HOME}`
 * in config defaults expands consistently.
 */
export function ensureFilewiseHomeEnv(): string {
  const existing = process.env.FILEWISE_HOME?.trim();
  const home = existing ? resolvePathLike(existing) : join(homedir(), ".filewise");
  process.env.FILEWISE_HOME = home;
  return home;
}

export function defaultConfigPath(): string {
  return join(ensureFilewiseHomeEnv(), "app.yaml");
}

/** Expand a leading `~` and resolve relative paths against `baseDir` (default cwd). */
export function resolvePathLike(input: string, baseDir?: string): string {
  const home = homedir();
  if (input === "~") return home;
  if (input.startsWith("~/")) return join(home, input.slice(2));
  return baseDir ? resolve(baseDir, input) : resolve(input);
}

/** Posix-normalize a root-relative path: no leading/trailing slashes, no "." segments. */
export function normalizeRelPath(input: string): string {
  const parts: string[] = [];
  for (const seg of input.replace(/\\/g, "/").split("/")) {
    if (!seg || seg === ".") continue;
    parts.push(seg);
  }
  return parts.join("/");
}

export function joinRelPath(...segments: string[]): string {
  return normalizeRelPath(segments.filter(Boolean).join("/"));
}

export function parentRelPath(relPath: string): string {
  const norm = normalizeRelPath(relPath);
  const idx = norm.lastIndexOf("/");
  return idx === -1 ? "" : norm.slice(0, idx);
}

export function baseName(relPath: string): string {
  const norm = normalizeRelPath(relPath);
  const idx = norm.lastIndexOf("/");
  return idx === -1 ? norm : norm.slice(idx + 1);
}
