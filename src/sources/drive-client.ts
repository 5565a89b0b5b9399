/**
 * Narrow Google Drive v3 client used by DriveFileSource.
 *
 * The source only talks to this interface; `createGoogleDriveClient` binds it to
 * `googleapis`, and tests bind it to an in-memory fake.
 */

import type { Readable } from "node:stream";
import { google, type drive_v3 } from "googleapis";
import { NotFoundError } from "./errors.js";

export type GoogleOAuthClient = InstanceType<typeof google.auth.OAuth2>;

export interface DriveFileMeta {
  id: string;
  name: string;
  mimeType: string;
  parents?: string[];
  createdTime?: string;
  modifiedTime?: string;
  /** Drive reports sizes as decimal strings. */
  size?: string;
  md5Checksum?: string;
  owner?: string;
  trashed?: boolean;
}

export interface DriveListParams {
  q: string;
  pageSize: number;
  pageToken?: string;
}

export interface DriveListPage {
  files: DriveFileMeta[];
  nextPageToken?: string;
}

export interface DriveClient {
  listFiles(params: DriveListParams): Promise<DriveListPage>;
  getFile(fileId: string): Promise<DriveFileMeta>;
  createFolder(name: string, parentId: string): Promise<DriveFileMeta>;
  updateParents(fileId: string, addParents: string, removeParents: string): Promise<DriveFileMeta>;
  trash(fileId: string): Promise<void>;
  deleteFile(fileId: string): Promise<void>;
  exportFile(fileId: string, mimeType: string): Promise<Buffer>;
  download(fileId: string): Promise<Buffer>;
}

export const DRIVE_FILE_FIELDS =
  "id, name, mimeType, parents, createdTime, modifiedTime, size, md5Checksum, trashed, owners(displayName, emailAddress)";

function toMeta(file: drive_v3.Schema$File): DriveFileMeta | null {
  if (!file.id || !file.name) return null;
  const owner = file.owners?.[0];
  return {
    id: file.id,
    name: file.name,
    mimeType: file.mimeType ?? "application/octet-stream",
    parents: file.parents ?? undefined,
    createdTime: file.createdTime ?? undefined,
    modifiedTime: file.modifiedTime ?? undefined,
    size: file.size ?? undefined,
    md5Checksum: file.md5Checksum ?? undefined,
    owner: owner?.displayName ?? owner?.emailAddress ?? undefined,
    trashed: file.trashed ?? undefined,
  };
}

function requireMeta(file: drive_v3.Schema$File, what: string): DriveFileMeta {
  const meta = toMeta(file);
  if (!meta) throw new NotFoundError(`Drive returned no metadata for ${what}`);
  return meta;
}

async function collect(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

/** googleapis rejects with a GaxiosError carrying the HTTP status. */
function isNotFound(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if ("status" in err && err.status === 404) return true;
  return "code" in err && (err.code === 404 || err.code === "404");
}

export function createGoogleDriveClient(auth: GoogleOAuthClient): DriveClient {
  const drive = google.drive({ version: "v3", auth });

  return {
    async listFiles(params) {
      const res = await drive.files.list({
        q: params.q,
        pageSize: params.pageSize,
        pageToken: params.pageToken,
        spaces: "drive",
        fields: `nextPageToken, files(${DRIVE_FILE_FIELDS})`,
      });
      const files: DriveFileMeta[] = [];
      for (const f of res.data.files ?? []) {
        const meta = toMeta(f);
        if (meta) files.push(meta);
      }
      return { files, nextPageToken: res.data.nextPageToken ?? undefined };
    },

    async getFile(fileId) {
      try {
        const res = await drive.files.get({ fileId, fields: DRIVE_FILE_FIELDS });
        return requireMeta(res.data, fileId);
      } catch (err) {
        if (isNotFound(err)) throw new NotFoundError(`File not found: ${fileId}`);
        throw err;
      }
    },

    async createFolder(name, parentId) {
      const res = await drive.files.create({
        requestBody: {
          name,
          mimeType: "application/vnd.google-apps.folder",
          parents: [parentId],
        },
        fields: DRIVE_FILE_FIELDS,
      });
      return requireMeta(res.data, name);
    },

    async updateParents(fileId, addParents, removeParents) {
      const res = await drive.files.update({
        fileId,
        addParents,
        removeParents,
        fields: DRIVE_FILE_FIELDS,
      });
      return requireMeta(res.data, fileId);
    },

    async trash(fileId) {
      await drive.files.update({ fileId, requestBody: { trashed: true } });
    },

    async deleteFile(fileId) {
      await drive.files.delete({ fileId });
    },

    async exportFile(fileId, mimeType) {
      const res = await drive.files.export({ fileId, mimeType }, { responseType: "stream" });
      return collect(res.data);
    },

    async download(fileId) {
      const res = await drive.files.get({ fileId, alt: "media" }, { responseType: "stream" });
      return collect(res.data);
    },
  };
}
