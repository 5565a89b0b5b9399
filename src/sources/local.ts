/**
 * Local filesystem source.
 *
 * Every path is root-relative; anything resolving outside the root is refused.
 * Symbolic links are never followed, listed, moved, or removed.
 */

import { createHash } from "node:crypto";
import { createReadStream, type Stats } from "node:fs";
import { lstat, mkdir, open, readdir, rename, rm } from "node:fs/promises";
import path from "node:path";
import { minimatch } from "minimatch";

import type { ScanConfig } from "../config/schema.js";
import { createLogger } from "../utils/logger.js";
import { baseName, joinRelPath, normalizeRelPath, parentRelPath } from "../utils/paths.js";
import { InvalidPathError, NotFoundError } from "./errors.js";
import { decodeText, detectMimeType } from "./mime.js";
import {
  LOCAL_FOLDER_MIME_TYPE,
  type FileContent,
  type FileRecord,
  type FileSource,
  type ListOptions,
  type RemoveMode,
} from "./types.js";

const log = createLogger("local-source");

export const TRASH_DIR = ".filewise-trash";

export interface LocalFileSourceOptions {
  root: string;
  scan: ScanConfig;
  /** Clock for trash names (tests). */
  now?: () => Date;
}

async function hashFile(absPath: string): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of createReadStream(absPath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

async function lstatOrNull(absPath: string): Promise<Stats | null> {
  try {
    return await lstat(absPath);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
    throw err;
  }
}

export class LocalFileSource implements FileSource {
  readonly kind = "local" as const;
  readonly root: string;
  private readonly scan: ScanConfig;
  private readonly now: () => Date;

  constructor(opts: LocalFileSourceOptions) {
    this.root = path.resolve(opts.root);
    this.scan = opts.scan;
    this.now = opts.now ?? (() => new Date());
  }

  /** Resolve a root-relative path; throws InvalidPathError when it escapes the root. */
  resolve(relPath: string): { absPath: string; relPath: string } {
    if (relPath.includes("\0")) throw new InvalidPathError(relPath, "contains a NUL byte");
    if (path.isAbsolute(relPath)) throw new InvalidPathError(relPath);

    const absPath = path.resolve(this.root, relPath);
    const rel = path.relative(this.root, absPath).replace(/\\/g, "/");
    if (rel === ".." || rel.startsWith("../") || path.isAbsolute(rel)) {
      throw new InvalidPathError(relPath);
    }
    return { absPath, relPath: normalizeRelPath(rel) };
  }

  async list(options: ListOptions = {}): Promise<FileRecord[]> {
    const { absPath, relPath } = this.resolve(options.folderPath ?? "");
    const st = await lstatOrNull(absPath);
    if (!st || !st.isDirectory()) {
      throw new NotFoundError(`Folder not found: ${relPath || "/"}`);
    }

    const out: FileRecord[] = [];
    await this.walk(absPath, relPath, options.recursive ?? false, out);
    out.sort((a, b) => a.path.localeCompare(b.path));
    return out;
  }

  async stat(relPath: string): Promise<FileRecord | null> {
    const resolved = this.resolve(relPath);
    const st = await lstatOrNull(resolved.absPath);
    if (!st || st.isSymbolicLink()) return null;
    return this.toRecord(resolved.absPath, resolved.relPath, st);
  }

  /** Local ids are root-relative paths. */
  async get(id: string): Promise<FileRecord | null> {
    return this.stat(id);
  }

  async readContent(file: FileRecord): Promise<FileContent> {
    if (file.isFolder) throw new InvalidPathError(file.path, "is a folder");
    const { absPath } = this.resolve(file.path);

    const handle = await open(absPath, "r");
    try {
      const st = await handle.stat();
      const length = Math.min(st.size, this.scan.maxReadBytes);
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, 0);
      const bytes = buffer.subarray(0, bytesRead);
      const mimeType = detectMimeType(file.name);
      return { bytes, mimeType, text: decodeText(bytes, mimeType) };
    } finally {
      await handle.close();
    }
  }

  async ensureFolder(relPath: string): Promise<FileRecord> {
    const resolved = this.resolve(relPath);
    await mkdir(resolved.absPath, { recursive: true });
    const st = await lstat(resolved.absPath);
    if (!st.isDirectory()) {
      throw new InvalidPathError(resolved.relPath, "exists and is not a folder");
    }
    return this.toRecord(resolved.absPath, resolved.relPath, st);
  }

  async createFolder(name: string, parentPath = ""): Promise<FileRecord> {
    if (!name || name.includes("/") || name === "." || name === "..") {
      throw new InvalidPathError(name, "folder name must be a single path segment");
    }
    const folder = await this.ensureFolder(joinRelPath(parentPath, name));
    log.info(`Created folder ${folder.path}`);
    return folder;
  }

  async move(file: FileRecord, folderPath: string): Promise<FileRecord> {
    const source = await this.requireEntry(file.path);
    const target = this.resolve(folderPath);
    if (source.st.isDirectory() && `${target.relPath}/`.startsWith(`${source.relPath}/`)) {
      throw new InvalidPathError(folderPath, "cannot move a folder into itself");
    }
    if (parentRelPath(source.relPath) === target.relPath) {
      return this.toRecord(source.absPath, source.relPath, source.st);
    }

    const folder = await this.ensureFolder(target.relPath);
    const dest = this.resolve(await this.uniqueChildPath(folder.path, baseName(source.relPath)));

    await rename(source.absPath, dest.absPath);
    log.info(`Moved ${source.relPath} -> ${dest.relPath}`);
    const st = await lstat(dest.absPath);
    return this.toRecord(dest.absPath, dest.relPath, st);
  }

  async remove(file: FileRecord, mode: RemoveMode): Promise<void> {
    const source = await this.requireEntry(file.path);
    if (!source.relPath) throw new InvalidPathError(file.path, "cannot remove the root");

    if (mode === "permanent") {
      await rm(source.absPath, { recursive: source.st.isDirectory(), force: false });
      log.info(`Deleted ${source.relPath}`);
      return;
    }

    const stamp = this.now().toISOString().replace(/[:.]/g, "-");
    await this.ensureFolder(TRASH_DIR);
    const trashRel = await this.uniqueChildPath(TRASH_DIR, `${stamp}-${baseName(source.relPath)}`);
    await rename(source.absPath, this.resolve(trashRel).absPath);
    log.info(`Trashed ${source.relPath} -> ${trashRel}`);
  }

  private async requireEntry(
    relPath: string,
  ): Promise<{ absPath: string; relPath: string; st: Stats }> {
    const resolved = this.resolve(relPath);
    const st = await lstatOrNull(resolved.absPath);
    if (!st) throw new NotFoundError(`File not found: ${resolved.relPath}`);
    if (st.isSymbolicLink()) throw new InvalidPathError(resolved.relPath, "is a symbolic link");
    return { ...resolved, st };
  }

  /** `name`, or `name (n).ext` when taken. */
  private async uniqueChildPath(folderRel: string, name: string): Promise<string> {
    const ext = path.extname(name);
    const stem = ext ? name.slice(0, -ext.length) : name;
    let candidate = joinRelPath(folderRel, name);
    for (let n = 1; await lstatOrNull(this.resolve(candidate).absPath); n++) {
      candidate = joinRelPath(folderRel, `${stem} (${n})${ext}`);
    }
    return candidate;
  }

  private isExcluded(relPath: string, isDir: boolean): boolean {
    for (const pattern of this.scan.exclude) {
      if (minimatch(relPath, pattern, { dot: true })) return true;
      // "dir/**" style patterns prune the directory itself.
      if (isDir && pattern.endsWith("/**") && minimatch(relPath, pattern.slice(0, -3), { dot: true })) {
        return true;
      }
    }
    return false;
  }

  private isIncluded(relPath: string): boolean {
    if (this.scan.include.length === 0) return true;
    return this.scan.include.some((pattern) => minimatch(relPath, pattern, { dot: true }));
  }

  private async walk(
    dirAbs: string,
    dirRel: string,
    recursive: boolean,
    out: FileRecord[],
  ): Promise<void> {
    let entries;
    try {
      entries = await readdir(dirAbs, { withFileTypes: true });
    } catch (err) {
      log.warn(`Cannot read directory ${dirRel || "/"}`, err);
      return;
    }

    for (const entry of entries) {
      if (entry.isSymbolicLink()) continue;
      if (entry.name.startsWith(".") && !this.scan.includeHidden) continue;

      const rel = joinRelPath(dirRel, entry.name);
      if (rel === TRASH_DIR) continue;

      const abs = path.join(dirAbs, entry.name);
      if (entry.isDirectory()) {
        if (this.isExcluded(rel, true)) continue;
        const st = await lstatOrNull(abs);
        if (!st) continue;
        out.push(await this.toRecord(abs, rel, st));
        if (recursive) await this.walk(abs, rel, true, out);
        continue;
      }

      if (!entry.isFile()) continue;
      if (this.isExcluded(rel, false) || !this.isIncluded(rel)) continue;

      try {
        const st = await lstat(abs);
        out.push(await this.toRecord(abs, rel, st));
      } catch (err) {
        // Files can disappear between readdir and stat.
        log.warn(`Skipping ${rel}`, err);
      }
    }
  }

  private async toRecord(absPath: string, relPath: string, st: Stats): Promise<FileRecord> {
    const isFolder = st.isDirectory();
    const name = relPath ? baseName(relPath) : path.basename(this.root);

    let contentHash: string | undefined;
    if (!isFolder && st.size <= this.scan.maxHashBytes) {
      contentHash = await hashFile(absPath);
    }

    return {
      id: relPath,
      path: relPath,
      name,
      mimeType: isFolder ? LOCAL_FOLDER_MIME_TYPE : detectMimeType(name),
      size: isFolder ? 0 : st.size,
      modifiedTime: st.mtime.toISOString(),
      createdTime: st.birthtime.toISOString(),
      isFolder,
      contentHash,
      parentId: relPath ? parentRelPath(relPath) : undefined,
    };
  }
}
