/**
 * MIME detection and text extraction helpers.
 */

import { extname } from "node:path";

const MIME_BY_EXTENSION: Record<string, string> = {
  ".txt": "text/plain",
  ".md": "text/markdown",
  ".csv": "text/csv",
  ".tsv": "text/tab-separated-values",
  ".json": "application/json",
  ".yaml": "application/yaml",
  ".yml": "application/yaml",
  ".xml": "application/xml",
  ".html": "text/html",
  ".htm": "text/html",
  ".log": "text/plain",
  ".ts": "text/typescript",
  ".js": "text/javascript",
  ".py": "text/x-python",
  ".sh": "application/x-sh",
  ".pdf": "application/pdf",
  ".doc": "application/msword",
  ".docx": "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  ".xlsx": "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  ".pptx": "application/vnd.openxmlformats-officedocument.presentationml.presentation",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".mp3": "audio/mpeg",
  ".mp4": "video/mp4",
  ".zip": "application/zip",
};

const TEXT_APPLICATION_TYPES = new Set([
  "application/json",
  "application/yaml",
  "application/xml",
  "application/x-sh",
]);

export function detectMimeType(fileName: string): string {
  return MIME_BY_EXTENSION[extname(fileName).toLowerCase()] ?? "application/octet-stream";
}

export function isTextMimeType(mimeType: string): boolean {
  return mimeType.startsWith("text/") || TEXT_APPLICATION_TYPES.has(mimeType);
}

/** Google Workspace types and the text format they export to. */
const WORKSPACE_EXPORTS: Record<string, string> = {
  "application/vnd.google-apps.document": "text/plain",
  "application/vnd.google-apps.spreadsheet": "text/csv",
  "application/vnd.google-apps.presentation": "text/plain",
};

export function isWorkspaceMimeType(mimeType: string): boolean {
  return mimeType.startsWith("application/vnd.google-apps");
}

export function workspaceExportMimeType(mimeType: string): string | undefined {
  return WORKSPACE_EXPORTS[mimeType];
}

/**
 * Decode bytes as UTF-8 for text types; unknown types count as text when the
 * first 8 KiB hold no NUL byte.
 */
export function decodeText(bytes: Buffer, mimeType: string): string | undefined {
  if (isTextMimeType(mimeType)) return bytes.toString("utf8");
  if (mimeType !== "application/octet-stream") return undefined;
  const probe = bytes.subarray(0, 8192);
  if (probe.length === 0 || probe.includes(0)) return undefined;
  return bytes.toString("utf8");
}

/** Whether reading the file can yield text (skips downloads of media and archives). */
export function mayHaveText(mimeType: string): boolean {
  return (
    isTextMimeType(mimeType) ||
    workspaceExportMimeType(mimeType) !== undefined ||
    mimeType === "application/octet-stream"
  );
}
