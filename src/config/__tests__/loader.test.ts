import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { loadConfig, parseConfig } from "../loader.js";
import { expandEnvVarsDeep } from "../expand-env.js";
import { mkdtemp, writeFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { stringify } from "yaml";

vi.mock("../../utils/logger.js", () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

const ENV_SNAPSHOT = { ...process.env };

describe("config loader", () => {
  let dir: string;

  beforeEach(async () => {
    process.env = { ...ENV_SNAPSHOT };
    dir = await mkdtemp(join(tmpdir(), "filewise-config-"));
    process.env.FILEWISE_HOME = join(dir, "home");
    delete process.env.FILEWISE_LLM_API_KEY;
    delete process.env.FILEWISE_GATEWAY_TOKEN;
  });

  afterEach(async () => {
    process.env = { ...ENV_SNAPSHOT };
    await rm(dir, { recursive: true, force: true });
  });

  it("fills defaults and expands FILEWISE_HOME", async () => {
    const appConfigPath = join(dir, "app.yaml");
    await writeFile(appConfigPath, stringify({ llm: { model: "qwen2.5:7b" } }), "utf-8");

    const config = await loadConfig(appConfigPath);

    expect(config.llm.model).toBe("qwen2.5:7b");
    expect(config.llm.baseUrl).toBe("http://localhost:11434/v1");
    expect(config.source.type).toBe("local");
    expect(config.local.root).toBe(join(dir, "home", "documents"));
    expect(config.index.path).toBe(join(dir, "home", "index.sqlite"));
    expect(config.organize.planStorePath).toBe(join(dir, "home", "plans.sqlite"));
    expect(config.drive.tokenPath).toBe(join(dir, "home", "auth", "google-token.json"));
    expect(config.organize.requireApproval).toBe(true);
    expect(config.organize.allowDelete).toBe(false);
    expect(config.gateway.port).toBe(8790);
  });

  it("expands env vars and merges secrets", async () => {
    process.env.DOCS_DIR = "my-docs";
    const appConfigPath = join(dir, "app.yaml");
    await writeFile(
      appConfigPath,
      stringify({
        llm: { apiKey: "secrets" },
        local: { root: "./${DOCS_DIR}" },
        gateway: { token: "secrets" },
      }),
      "utf-8",
    );
    await writeFile(
      join(dir, "secrets.yaml"),
      stringify({ llm: { apiKey: "test-key" }, gateway: { token: "test-gateway-token" } }),
      "utf-8",
    );

    const config = await loadConfig(appConfigPath);

    expect(config.llm.apiKey).toBe("test-key");
    expect(config.gateway.token).toBe("test-gateway-token");
    expect(config.local.root).toBe(join(dir, "my-docs"));
  });

  it("falls back to env for secrets", async () => {
    process.env.FILEWISE_LLM_API_KEY = "env-key";
    process.env.FILEWISE_GATEWAY_TOKEN = "env-token";
    const appConfigPath = join(dir, "app.yaml");
    await writeFile(appConfigPath, stringify({ llm: { apiKey: "env" }, gateway: { token: "secrets" } }), "utf-8");

    const config = await loadConfig(appConfigPath);

    expect(config.llm.apiKey).toBe("env-key");
    expect(config.gateway.token).toBe("env-token");
  });

  it("keeps in-memory store paths", async () => {
    const appConfigPath = join(dir, "app.yaml");
    await writeFile(
      appConfigPath,
      stringify({ index: { path: ":memory:" }, organize: { planStorePath: ":memory:" } }),
      "utf-8",
    );

    const config = await loadConfig(appConfigPath);

    expect(config.index.path).toBe(":memory:");
    expect(config.organize.planStorePath).toBe(":memory:");
  });

  it("reports a missing file", async () => {
    await expect(loadConfig(join(dir, "nope.yaml"))).rejects.toThrow(
      `Config file not found: ${join(dir, "nope.yaml")}`,
    );
  });
});

describe("parseConfig", () => {
  it("lists every validation problem", () => {
    expect(() =>
      parseConfig({ llm: { authType: "header" }, organize: { minConfidence: 2 } }),
    ).toThrow(
      "Config validation failed:\n" +
        "- llm.authHeader: authHeader is required when authType is 'header'. Example: authHeader: 'X-API-Key'\n" +
        "- organize.minConfidence: Number must be less than or equal to 1",
    );
  });
});

describe("expandEnvVarsDeep", () => {
  it("replaces variables in nested strings and blanks unknown ones", () => {
    expect(
      expandEnvVarsDeep({ a: "${X}/b", list: ["${Y}", 3], n: null }, { X: "/root" }),
    ).toEqual({ a: "/root/b", list: ["", 3], n: null });
  });
});
