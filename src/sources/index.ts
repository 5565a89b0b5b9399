import { loadAuthorizedClient } from "../auth/google.js";
import type { Config, SourceType } from "../config/schema.js";
import { createGoogleDriveClient } from "./drive-client.js";
import { DriveFileSource } from "./drive.js";
import { LocalFileSource } from "./local.js";
import type { FileSource } from "./types.js";

export type { FileContent, FileRecord, FileSource, ListOptions, RemoveMode, SourceKind } from "./types.js";
export { InvalidPathError, NotFoundError } from "./errors.js";

/** Build the configured source; `type` overrides `source.type`. */
export async function createFileSource(
  config: Config,
  type: SourceType = config.source.type,
): Promise<FileSource> {
  if (type === "local") {
    return new LocalFileSource({ root: config.local.root, scan: config.scan });
  }

  const auth = await loadAuthorizedClient(config.drive);
  return new DriveFileSource({
    client: createGoogleDriveClient(auth),
    rootPath: config.drive.rootPath,
    pageSize: config.drive.pageSize,
    maxReadBytes: config.scan.maxReadBytes,
  });
}
