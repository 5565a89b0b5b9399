/**
 * Google Drive source.
 *
 * Drive has no paths, only parent links, so every root-relative path is
 * resolved one segment at a time starting from the configured root folder.
 */

import { createLogger } from "../utils/logger.js";
import { baseName, joinRelPath, normalizeRelPath, parentRelPath } from "../utils/paths.js";
import type { DriveClient, DriveFileMeta } from "./drive-client.js";
import { InvalidPathError, NotFoundError } from "./errors.js";
import { decodeText, isWorkspaceMimeType, workspaceExportMimeType } from "./mime.js";
import {
  FOLDER_MIME_TYPE,
  type FileContent,
  type FileRecord,
  type FileSource,
  type ListOptions,
  type RemoveMode,
} from "./types.js";

const log = createLogger("drive-source");

/** Parent links followed before a file counts as outside the root. */
const MAX_DEPTH = 64;

export interface DriveFileSourceOptions {
  client: DriveClient;
  /** Drive path of the organizer root ("/" = My Drive). */
  rootPath: string;
  pageSize: number;
  maxReadBytes: number;
}

/** Escape a value for a single-quoted Drive query literal. */
export function escapeDriveQuery(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

export class DriveFileSource implements FileSource {
  readonly kind = "drive" as const;
  readonly root: string;
  private readonly client: DriveClient;
  private readonly pageSize: number;
  private readonly maxReadBytes: number;
  private rootId: string | null = null;

  constructor(opts: DriveFileSourceOptions) {
    this.client = opts.client;
    this.root = `/${normalizeRelPath(opts.rootPath)}`;
    this.pageSize = opts.pageSize;
    this.maxReadBytes = opts.maxReadBytes;
  }

  async list(options: ListOptions = {}): Promise<FileRecord[]> {
    const folderPath = normalizeRelPath(options.folderPath ?? "");
    const folder = await this.requirePath(folderPath);
    if (folder.mimeType !== FOLDER_MIME_TYPE) {
      throw new NotFoundError(`Folder not found: ${folderPath || "/"}`);
    }

    const out: FileRecord[] = [];
    const queue: Array<{ id: string; path: string }> = [{ id: folder.id, path: folderPath }];
    while (queue.length > 0) {
      const next = queue.shift();
      if (!next) break;
      for (const child of await this.listChildren(next.id)) {
        const record = toRecord(child, joinRelPath(next.path, child.name));
        out.push(record);
        if (options.recursive && record.isFolder) queue.push({ id: child.id, path: record.path });
      }
    }

    out.sort((a, b) => a.path.localeCompare(b.path));
    return out;
  }

  async stat(path: string): Promise<FileRecord | null> {
    const relPath = normalizeRelPath(path);
    const meta = await this.findByPath(relPath);
    return meta ? toRecord(meta, relPath) : null;
  }

  /**
   * Look a file up by id and rebuild its path by walking parents up to the
   * organizer root. Trashed files and files outside the root give null.
   */
  async get(id: string): Promise<FileRecord | null> {
    const meta = await this.getMeta(id);
    if (!meta || meta.trashed) return null;

    const rootId = (await this.getRoot()).id;
    if (meta.id === rootId) return toRecord(meta, "");

    const segments = [meta.name];
    let parentId = meta.parents?.[0];
    for (let depth = 0; parentId !== rootId; depth++) {
      if (!parentId || depth >= MAX_DEPTH) return null;
      const parent = await this.getMeta(parentId);
      if (!parent || parent.trashed) return null;
      segments.unshift(parent.name);
      parentId = parent.parents?.[0];
    }
    return toRecord(meta, segments.join("/"));
  }

  async readContent(file: FileRecord): Promise<FileContent> {
    if (file.isFolder) throw new InvalidPathError(file.path, "is a folder");

    if (isWorkspaceMimeType(file.mimeType)) {
      const exportType = workspaceExportMimeType(file.mimeType);
      if (!exportType) {
        log.debug(`No text export for ${file.path} (${file.mimeType})`);
        return { bytes: Buffer.alloc(0), mimeType: file.mimeType };
      }
      const bytes = this.clip(await this.client.exportFile(file.id, exportType));
      return { bytes, mimeType: exportType, text: bytes.toString("utf8") };
    }

    const bytes = this.clip(await this.client.download(file.id));
    return { bytes, mimeType: file.mimeType, text: decodeText(bytes, file.mimeType) };
  }

  async ensureFolder(path: string): Promise<FileRecord> {
    const relPath = normalizeRelPath(path);
    let current = await this.getRoot();
    let currentPath = "";

    for (const segment of relPath ? relPath.split("/") : []) {
      currentPath = joinRelPath(currentPath, segment);
      const existing = await this.findChild(current.id, segment);
      if (existing && existing.mimeType !== FOLDER_MIME_TYPE) {
        throw new InvalidPathError(currentPath, "exists and is not a folder");
      }
      current = existing ?? (await this.client.createFolder(segment, current.id));
      if (!existing) log.info(`Created Drive folder ${currentPath}`);
    }

    return toRecord(current, relPath);
  }

  async createFolder(name: string, parentPath = ""): Promise<FileRecord> {
    if (!name || name.includes("/")) {
      throw new InvalidPathError(name, "folder name must be a single path segment");
    }
    const parent = await this.requirePath(normalizeRelPath(parentPath));
    if (parent.mimeType !== FOLDER_MIME_TYPE) {
      throw new InvalidPathError(parentPath, "is not a folder");
    }
    const created = await this.client.createFolder(name, parent.id);
    log.info(`Created Drive folder ${joinRelPath(parentPath, name)} (${created.id})`);
    return toRecord(created, joinRelPath(parentPath, name));
  }

  async move(file: FileRecord, folderPath: string): Promise<FileRecord> {
    const target = normalizeRelPath(folderPath);
    if (file.isFolder && `${target}/`.startsWith(`${file.path}/`)) {
      throw new InvalidPathError(folderPath, "cannot move a folder into itself");
    }

    const folder = await this.ensureFolder(target);
    const current = await this.client.getFile(file.id);
    const previousParents = current.parents ?? [];
    if (previousParents.length === 1 && previousParents[0] === folder.id) {
      return toRecord(current, file.path);
    }

    const updated = await this.client.updateParents(
      file.id,
      folder.id,
      previousParents.filter((p) => p !== folder.id).join(","),
    );
    const newPath = joinRelPath(target, file.name);
    log.info(`Moved ${file.path} -> ${newPath}`);
    return toRecord({ ...current, ...updated }, newPath);
  }

  async remove(file: FileRecord, mode: RemoveMode): Promise<void> {
    if (!normalizeRelPath(file.path)) throw new InvalidPathError(file.path, "cannot remove the root");

    if (mode === "trash") {
      await this.client.trash(file.id);
      log.info(`Trashed ${file.path}`);
      return;
    }

    if (file.isFolder) await this.deleteFolderContents(file.id);
    await this.client.deleteFile(file.id);
    log.info(`Deleted ${file.path}`);
  }

  /** Resolve a root-relative path to its Drive id ("root" for My Drive). */
  async findIdByPath(path: string): Promise<string> {
    return (await this.requirePath(normalizeRelPath(path))).id;
  }

  private async deleteFolderContents(folderId: string): Promise<void> {
    for (const child of await this.listChildren(folderId)) {
      if (child.mimeType === FOLDER_MIME_TYPE) {
        await this.deleteFolderContents(child.id);
      }
      await this.client.deleteFile(child.id);
    }
  }

  private async getMeta(id: string): Promise<DriveFileMeta | null> {
    try {
      return await this.client.getFile(id);
    } catch (err) {
      if (err instanceof NotFoundError) return null;
      throw err;
    }
  }

  private clip(bytes: Buffer): Buffer {
    return bytes.length > this.maxReadBytes ? bytes.subarray(0, this.maxReadBytes) : bytes;
  }

  private async listChildren(folderId: string): Promise<DriveFileMeta[]> {
    const q = `'${escapeDriveQuery(folderId)}' in parents and trashed = false`;
    const out: DriveFileMeta[] = [];
    let pageToken: string | undefined;
    do {
      const page = await this.client.listFiles({ q, pageSize: this.pageSize, pageToken });
      out.push(...page.files);
      pageToken = page.nextPageToken;
    } while (pageToken);
    return out;
  }

  private async findChild(parentId: string, name: string): Promise<DriveFileMeta | null> {
    const q =
      `name = '${escapeDriveQuery(name)}' and ` +
      `'${escapeDriveQuery(parentId)}' in parents and trashed = false`;
    const page = await this.client.listFiles({ q, pageSize: 10 });
    return page.files[0] ?? null;
  }

  private async getRoot(): Promise<DriveFileMeta> {
    if (!this.rootId) {
      this.rootId = await this.walkFrom("root", normalizeRelPath(this.root), this.root);
    }
    return this.client.getFile(this.rootId);
  }

  private async walkFrom(startId: string, relPath: string, fullPath: string): Promise<string> {
    let parentId = startId;
    for (const part of relPath ? relPath.split("/") : []) {
      const child = await this.findChild(parentId, part);
      if (!child) throw new NotFoundError(`Cannot find '${part}' in path '${fullPath}'`);
      parentId = child.id;
    }
    return parentId;
  }

  private async findByPath(relPath: string): Promise<DriveFileMeta | null> {
    try {
      return await this.requirePath(relPath);
    } catch (err) {
      if (err instanceof NotFoundError) return null;
      throw err;
    }
  }

  private async requirePath(relPath: string): Promise<DriveFileMeta> {
    const root = await this.getRoot();
    if (!relPath) return root;
    const id = await this.walkFrom(root.id, relPath, relPath);
    return this.client.getFile(id);
  }
}

function toRecord(meta: DriveFileMeta, path: string): FileRecord {
  const isFolder = meta.mimeType === FOLDER_MIME_TYPE;
  return {
    id: meta.id,
    path,
    name: path ? baseName(path) : meta.name,
    mimeType: meta.mimeType,
    size: isFolder ? 0 : Number.parseInt(meta.size ?? "0", 10) || 0,
    modifiedTime: meta.modifiedTime ?? "",
    createdTime: meta.createdTime,
    owner: meta.owner,
    isFolder,
    contentHash: meta.md5Checksum,
    parentId: meta.parents?.[0] ?? (path ? parentRelPath(path) : undefined),
  };
}
