/**
 * Google token storage (JSON file, mode 0600).
 */

import { chmod, mkdir, readFile, unlink, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { createLogger } from "../utils/logger.js";

const log = createLogger("auth-store");

export const googleTokenSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  /** Unix timestamp in ms */
  expiry_date: z.number().nullish(),
  token_type: z.string().nullish(),
  id_token: z.string().nullish(),
  scope: z
    .string()
    .nullish()
    .transform((v) => v ?? undefined),
});

export type GoogleToken = z.infer<typeof googleTokenSchema>;

export interface TokenStore {
  readonly path: string;
  get(): Promise<GoogleToken | null>;
  save(token: GoogleToken): Promise<void>;
  /** Returns false when there was nothing to delete. */
  clear(): Promise<boolean>;
}

/**
 * Overlay freshly issued tokens on stored ones. Refresh responses omit the
 * refresh token, so missing fields keep their previous value.
 */
export function mergeTokens(prev: GoogleToken | null, next: GoogleToken): GoogleToken {
  return {
    access_token: next.access_token ?? prev?.access_token,
    refresh_token: next.refresh_token ?? prev?.refresh_token,
    expiry_date: next.expiry_date ?? prev?.expiry_date,
    token_type: next.token_type ?? prev?.token_type,
    id_token: next.id_token ?? prev?.id_token,
    scope: next.scope ?? prev?.scope,
  };
}

export function createTokenStore(tokenPath: string): TokenStore {
  return {
    path: tokenPath,

    async get(): Promise<GoogleToken | null> {
      let content: string;
      try {
        content = await readFile(tokenPath, "utf-8");
      } catch (err) {
        if ((err as NodeJS.ErrnoException).code === "ENOENT") {
          return null;
        }
        throw err;
      }
      if (!content.trim()) return null;

      let value: unknown;
      try {
        value = JSON.parse(content);
      } catch (err) {
        log.warn(`Ignoring unreadable token file ${tokenPath}`, err);
        return null;
      }
      const parsed = googleTokenSchema.safeParse(value);
      if (!parsed.success) {
        log.warn(`Ignoring malformed token file ${tokenPath}`);
        return null;
      }
      return parsed.data;
    },

    async save(token: GoogleToken): Promise<void> {
      await mkdir(dirname(tokenPath), { recursive: true });
      await writeFile(tokenPath, JSON.stringify(token, null, 2), { mode: 0o600 });
      // writeFile only applies mode on creation
      await chmod(tokenPath, 0o600);
      log.debug(`Google token saved to ${tokenPath}`);
    },

    async clear(): Promise<boolean> {
      try {
        await unlink(tokenPath);
        log.info("Google token cleared");
        return true;
      } catch (err) {
        if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
          throw err;
        }
        return false;
      }
    },
  };
}
