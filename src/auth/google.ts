/**
 * Google OAuth for Drive access (installed-app flow).
 *
 * The browser is sent to Google's consent page and redirected back to a
 * short-lived local server on `drive.redirectPort`. In headless environments
 * the URL is printed and the user pastes the redirect URL (or bare code).
 */

import { existsSync, readFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { createServer, type Server } from "node:http";
import { createInterface } from "node:readline";
import { google } from "googleapis";
import open from "open";
import { z } from "zod";

import type { DriveSourceConfig } from "../config/schema.js";
import type { GoogleOAuthClient } from "../sources/drive-client.js";
import { createLogger } from "../utils/logger.js";
import { createTokenStore, mergeTokens, type GoogleToken } from "./store.js";

const log = createLogger("google-auth");

type Credentials = Parameters<GoogleOAuthClient["setCredentials"]>[0];

const clientSecretsSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
});

const credentialsFileSchema = z.object({
  installed: clientSecretsSchema.optional(),
  web: clientSecretsSchema.optional(),
});

export type ClientSecrets = z.infer<typeof clientSecretsSchema>;

export class NotAuthenticatedError extends Error {
  constructor() {
    super("Not authenticated with Google Drive. Run `filewise auth google` first.");
    this.name = "NotAuthenticatedError";
  }
}

/**
 * Detect if running in a headless/remote environment where opening a browser
 * is unlikely to work (SSH, Docker, no display server).
 */
export function isHeadlessEnvironment(): boolean {
  if (process.platform === "darwin" || process.platform === "win32") {
    return false;
  }

  if (existsSync("/.dockerenv")) {
    return true;
  }
  let cgroup = "";
  try {
    cgroup = readFileSync("/proc/1/cgroup", "utf-8");
  } catch (err) {
    log.debug("Cannot read /proc/1/cgroup", err);
  }
  if (cgroup.includes("docker") || cgroup.includes("containerd")) {
    return true;
  }

  return !process.env.DISPLAY && !process.env.WAYLAND_DISPLAY;
}

/** Read the OAuth client file downloaded from the Google Cloud console. */
export async function loadClientSecrets(credentialsPath: string): Promise<ClientSecrets> {
  let content: string;
  try {
    content = await readFile(credentialsPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new Error(
        `Google OAuth client file not found: ${credentialsPath}. ` +
          "Download it from the Google Cloud console (OAuth client ID, Desktop app).",
      );
    }
    throw err;
  }

  const parsed = credentialsFileSchema.safeParse(JSON.parse(content));
  const secrets = parsed.success ? (parsed.data.installed ?? parsed.data.web) : undefined;
  if (!secrets) {
    throw new Error(`Invalid Google OAuth client file ${credentialsPath}: expected an "installed" or "web" block`);
  }
  return secrets;
}

export function redirectUriFor(port: number): string {
  return `http://localhost:${port}/`;
}

export function createOAuthClient(secrets: ClientSecrets, redirectUri: string): GoogleOAuthClient {
  return new google.auth.OAuth2(secrets.client_id, secrets.client_secret, redirectUri);
}

export function buildAuthUrl(client: GoogleOAuthClient, scopes: string[]): string {
  return client.generateAuthUrl({
    access_type: "offline",
    prompt: "consent",
    scope: scopes,
  });
}

/**
 * Pull the authorization code out of a pasted redirect URL, or accept a bare
 * code. Returns null for empty input.
 */
export function extractAuthCode(input: string): string | null {
  const trimmed = input.trim();
  if (!trimmed) return null;

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return trimmed;
  }
  const error = url.searchParams.get("error");
  if (error) throw new Error(`Authorization denied: ${error}`);
  return url.searchParams.get("code");
}

function toToken(credentials: Credentials): GoogleToken {
  return {
    access_token: credentials.access_token,
    refresh_token: credentials.refresh_token,
    expiry_date: credentials.expiry_date,
    token_type: credentials.token_type,
    id_token: credentials.id_token,
    scope: credentials.scope,
  };
}

function toCredentials(token: GoogleToken): Credentials {
  return {
    access_token: token.access_token,
    refresh_token: token.refresh_token,
    expiry_date: token.expiry_date,
    token_type: token.token_type,
    id_token: token.id_token,
    scope: token.scope,
  };
}

function askUser(message: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return new Promise<string>((resolve) => {
    rl.question(`${message} `, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (c) => `&#${c.charCodeAt(0)};`);
}

/** One-shot redirect listener; resolves with the `code` query parameter. */
function waitForCallback(port: number): { code: Promise<string>; close: () => void } {
  let server: Server | undefined;
  const code = new Promise<string>((resolve, reject) => {
    server = createServer((req, res) => {
      const url = new URL(req.url ?? "/", redirectUriFor(port));
      const error = url.searchParams.get("error");
      if (error) {
        res.writeHead(400, { "Content-Type": "text/html; charset=utf-8" });
        res.end(`<p>Authorization failed: ${escapeHtml(error)}</p>`);
        reject(new Error(`Authorization denied: ${error}`));
        return;
      }
      const value = url.searchParams.get("code");
      if (!value) {
        res.writeHead(404);
        res.end();
        return;
      }
      res.writeHead(200, { "Content-Type": "text/html; charset=utf-8" });
      res.end("<p>Authorization complete. You can close this window.</p>");
      resolve(value);
    });
    server.once("error", reject);
    server.listen(port, "localhost");
  });
  return { code, close: () => server?.close() };
}

export interface AuthorizeOptions {
  headless?: boolean;
  /** Prompt used in headless mode (tests inject one). */
  prompt?: (message: string) => Promise<string>;
}

/** Run the consent flow and persist the resulting token. */
export async function authorizeDrive(
  drive: DriveSourceConfig,
  options: AuthorizeOptions = {},
): Promise<GoogleToken> {
  const secrets = await loadClientSecrets(drive.credentialsPath);
  const client = createOAuthClient(secrets, redirectUriFor(drive.redirectPort));
  const url = buildAuthUrl(client, drive.scopes);

  const headless = options.headless ?? isHeadlessEnvironment();
  let code: string | null;

  if (headless) {
    log.debug("Headless environment detected, using manual URL paste mode");
    log.info("Open this URL in your browser:\n");
    log.info(`  ${url}\n`);
    log.info(
      `After consenting, copy the FULL redirect URL (${redirectUriFor(drive.redirectPort)}?code=...) ` +
        "from the address bar and paste it below.",
    );
    const ask = options.prompt ?? askUser;
    code = extractAuthCode(await ask("Paste the redirect URL (or authorization code):"));
  } else {
    const callback = waitForCallback(drive.redirectPort);
    try {
      log.info("Opening browser for Google Drive authorization...");
      log.info(`If the browser doesn't open, visit: ${url}`);
      open(url).catch((err: unknown) => {
        log.warn("Failed to open browser; visit the URL above.", err);
      });
      code = await callback.code;
    } finally {
      callback.close();
    }
  }

  if (!code) throw new Error("No authorization code received");

  const { tokens } = await client.getToken(code);
  const store = createTokenStore(drive.tokenPath);
  const token = mergeTokens(await store.get(), toToken(tokens));
  await store.save(token);

  if (!token.refresh_token) {
    log.warn("Google did not return a refresh token; access will lapse when the token expires");
  }
  log.info("Google Drive authentication successful!");
  return token;
}

/**
 * OAuth client primed with the stored token. Refreshed tokens are written
 * back to the store as the client emits them.
 */
export async function loadAuthorizedClient(drive: DriveSourceConfig): Promise<GoogleOAuthClient> {
  const store = createTokenStore(drive.tokenPath);
  const token = await store.get();
  if (!token || (!token.refresh_token && !token.access_token)) {
    throw new NotAuthenticatedError();
  }

  const secrets = await loadClientSecrets(drive.credentialsPath);
  const client = createOAuthClient(secrets, redirectUriFor(drive.redirectPort));
  client.setCredentials(toCredentials(token));

  client.on("tokens", (tokens) => {
    store
      .get()
      .then((prev) => store.save(mergeTokens(prev, toToken(tokens))))
      .catch((err: unknown) => {
        log.warn("Failed to persist refreshed Google token", err);
      });
  });

  return client;
}

export interface DriveAuthStatus {
  authenticated: boolean;
  hasRefreshToken: boolean;
  expiresAt?: number;
  scopes?: string[];
}

export async function getDriveAuthStatus(drive: DriveSourceConfig): Promise<DriveAuthStatus> {
  const token = await createTokenStore(drive.tokenPath).get();
  if (!token) {
    return { authenticated: false, hasRefreshToken: false };
  }
  const hasRefreshToken = !!token.refresh_token;
  return {
    authenticated: hasRefreshToken || !!token.access_token,
    hasRefreshToken,
    expiresAt: token.expiry_date ?? undefined,
    scopes: token.scope ? token.scope.split(" ").filter(Boolean) : undefined,
  };
}

export async function logoutDrive(drive: DriveSourceConfig): Promise<boolean> {
  return createTokenStore(drive.tokenPath).clear();
}
