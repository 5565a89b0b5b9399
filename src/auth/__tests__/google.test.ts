import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { driveSourceSchema, type DriveSourceConfig } from "../../config/schema.js";
import {
  authorizeDrive,
  buildAuthUrl,
  createOAuthClient,
  extractAuthCode,
  getDriveAuthStatus,
  loadAuthorizedClient,
  loadClientSecrets,
  logoutDrive,
  NotAuthenticatedError,
  redirectUriFor,
} from "../google.js";
import { createTokenStore } from "../store.js";

vi.mock("../../utils/logger.js", () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

const secrets = { client_id: "test-client.apps.googleusercontent.com", client_secret: "test-secret" };

describe("extractAuthCode", () => {
  it("reads the code from a redirect URL", () => {
    expect(extractAuthCode("  http://localhost:3000/?code=4%2Fabc&scope=drive ")).toBe("4/abc");
  });

  it("accepts a bare code", () => {
    expect(extractAuthCode(" 4/abc ")).toBe("4/abc");
  });

  it("returns null for empty input or a URL without a code", () => {
    expect(extractAuthCode("   ")).toBeNull();
    expect(extractAuthCode("http://localhost:3000/")).toBeNull();
  });

  it("throws when consent was denied", () => {
    expect(() => extractAuthCode("http://localhost:3000/?error=access_denied")).toThrow(
      "Authorization denied: access_denied",
    );
  });
});

describe("buildAuthUrl", () => {
  it("asks for offline access with a consent prompt", () => {
    const url = new URL(
      buildAuthUrl(createOAuthClient(secrets, redirectUriFor(3000)), ["https://www.googleapis.com/auth/drive"]),
    );
    expect(url.searchParams.get("access_type")).toBe("offline");
    expect(url.searchParams.get("prompt")).toBe("consent");
    expect(url.searchParams.get("scope")).toBe("https://www.googleapis.com/auth/drive");
    expect(url.searchParams.get("client_id")).toBe(secrets.client_id);
    expect(url.searchParams.get("redirect_uri")).toBe("http://localhost:3000/");
  });
});

describe("with a config directory", () => {
  let dir: string;
  let drive: DriveSourceConfig;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "filewise-google-"));
    drive = driveSourceSchema.parse({
      credentialsPath: join(dir, "credentials.json"),
      tokenPath: join(dir, "token.json"),
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads installed or web client blocks", async () => {
    await writeFile(drive.credentialsPath, JSON.stringify({ installed: secrets }));
    expect(await loadClientSecrets(drive.credentialsPath)).toEqual(secrets);

    await writeFile(drive.credentialsPath, JSON.stringify({ web: { ...secrets, redirect_uris: ["x"] } }));
    expect((await loadClientSecrets(drive.credentialsPath)).redirect_uris).toEqual(["x"]);
  });

  it("explains a missing or invalid client file", async () => {
    await expect(loadClientSecrets(drive.credentialsPath)).rejects.toThrow(
      `Google OAuth client file not found: ${drive.credentialsPath}`,
    );
    await writeFile(drive.credentialsPath, JSON.stringify({ other: {} }));
    await expect(loadClientSecrets(drive.credentialsPath)).rejects.toThrow(
      `Invalid Google OAuth client file ${drive.credentialsPath}: expected an "installed" or "web" block`,
    );
  });

  it("fails the headless flow without a code", async () => {
    await writeFile(drive.credentialsPath, JSON.stringify({ installed: secrets }));
    await expect(authorizeDrive(drive, { headless: true, prompt: async () => "" })).rejects.toThrow(
      "No authorization code received",
    );
  });

  it("requires a stored token for an authorized client", async () => {
    await expect(loadAuthorizedClient(drive)).rejects.toThrow(NotAuthenticatedError);
  });

  it("primes the client with the stored token", async () => {
    await writeFile(drive.credentialsPath, JSON.stringify({ installed: secrets }));
    await createTokenStore(drive.tokenPath).save({ access_token: "test-access", refresh_token: "test-refresh" });

    const client = await loadAuthorizedClient(drive);
    expect(client.credentials.refresh_token).toBe("test-refresh");
  });

  it("reports status and logs out", async () => {
    expect(await getDriveAuthStatus(drive)).toEqual({ authenticated: false, hasRefreshToken: false });

    await createTokenStore(drive.tokenPath).save({
      access_token: "test-access",
      refresh_token: "test-refresh",
      expiry_date: 1_700_000_000_000,
      scope: "https://www.googleapis.com/auth/drive openid",
    });
    expect(await getDriveAuthStatus(drive)).toEqual({
      authenticated: true,
      hasRefreshToken: true,
      expiresAt: 1_700_000_000_000,
      scopes: ["https://www.googleapis.com/auth/drive", "openid"],
    });

    expect(await logoutDrive(drive)).toBe(true);
    expect((await getDriveAuthStatus(drive)).authenticated).toBe(false);
  });
});
