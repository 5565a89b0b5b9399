/**
 * Ingestion adapter contracts shared by the local and Drive sources.
 */

export type SourceKind = "local" | "drive";

export interface FileRecord {
  /** Local: root-relative path. Drive: file id. */
  id: string;
  /** Root-relative posix path, no leading slash ("" is the root itself). */
  path: string;
  name: string;
  mimeType: string;
  size: number;
  modifiedTime: string;
  createdTime?: string;
  owner?: string;
  isFolder: boolean;
  /** sha256 (local) or md5Checksum (drive), when known. */
  contentHash?: string;
  parentId?: string;
}

export interface FileContent {
  bytes: Buffer;
  mimeType: string;
  /** Present for text-like files and Workspace exports. */
  text?: string;
}

export interface ListOptions {
  /** Root-relative folder (default: root). */
  folderPath?: string;
  recursive?: boolean;
}

export type RemoveMode = "trash" | "permanent";

export interface FileSource {
  readonly kind: SourceKind;
  /** Human-readable description of the root (directory or drive path). */
  readonly root: string;
  list(options?: ListOptions): Promise<FileRecord[]>;
  stat(path: string): Promise<FileRecord | null>;
  /** Look a file up by its source id; null once it is gone or outside the root. */
  get(id: string): Promise<FileRecord | null>;
  readContent(file: FileRecord): Promise<FileContent>;
  ensureFolder(path: string): Promise<FileRecord>;
  createFolder(name: string, parentPath?: string): Promise<FileRecord>;
  move(file: FileRecord, folderPath: string): Promise<FileRecord>;
  remove(file: FileRecord, mode: RemoveMode): Promise<void>;
}

export const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";
export const LOCAL_FOLDER_MIME_TYPE = "inode/directory";
