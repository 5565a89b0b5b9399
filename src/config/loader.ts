/**
 * Config loader with environment variable expansion
 */

import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { resolve, dirname, join } from "node:path";
import { ZodError } from "zod";
import { configSchema, type Config } from "./schema.js";
import { createLogger } from "../utils/logger.js";
import { ensureFilewiseHomeEnv, resolvePathLike } from "../utils/paths.js";
import { expandEnvVarsDeep } from "./expand-env.js";

const log = createLogger("config");

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function asRecord(value: unknown): RawRecord | undefined {
  return isRecord(value) ? value : undefined;
}

function pickString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

async function readYamlIfExists(path: string): Promise<RawRecord | null> {
  try {
    const content = await readFile(path, "utf-8");
    return asRecord(parse(content)) ?? {};
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
    throw err;
  }
}

/**
 * Merge secrets.yaml / env values into the raw document.
 * `apiKey: secrets` prefers secrets.yaml then env; `apiKey: env` reads env only.
 */
function mergeSecrets(raw: RawRecord, secrets: RawRecord | null): void {
  const llm = asRecord(raw.llm);
  if (llm) {
    if (llm.apiKey === "secrets") {
      llm.apiKey =
        pickString(asRecord(secrets?.llm)?.apiKey) ?? process.env.FILEWISE_LLM_API_KEY;
    } else if (llm.apiKey === "env") {
      llm.apiKey = process.env.FILEWISE_LLM_API_KEY;
    }
  }

  const gateway = asRecord(raw.gateway);
  if (gateway?.token === "secrets") {
    gateway.token =
      pickString(asRecord(secrets?.gateway)?.token) ?? process.env.FILEWISE_GATEWAY_TOKEN;
  }
}

export async function loadConfig(path: string): Promise<Config> {
  // Ensure FILEWISE_HOME is always defined so ${FILEWISE_HOME} defaults expand.
  ensureFilewiseHomeEnv();

  const expandedPath = resolvePathLike(path);
  log.info(`Loading config from ${expandedPath}`);

  let content: string;
  try {
    content = await readFile(expandedPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new Error(`Config file not found: ${expandedPath}`);
    }
    throw err;
  }
  const raw = asRecord(parse(content)) ?? {};

  const configDir = dirname(expandedPath);
  const secrets = await readYamlIfExists(join(configDir, "secrets.yaml"));
  mergeSecrets(raw, secrets);

  // Schema defaults may also contain ${VARS}; we expand again after parse.
  let config = parseConfig(expandEnvVarsDeep(raw, process.env));
  config = parseConfig(expandEnvVarsDeep(config, process.env));

  config.local.root = resolvePathLike(config.local.root, configDir);
  config.index.path = resolveStorePath(config.index.path, configDir);
  config.organize.planStorePath = resolveStorePath(config.organize.planStorePath, configDir);
  config.audit.path = resolvePathLike(config.audit.path, configDir);
  config.sessions.dir = resolvePathLike(config.sessions.dir, configDir);
  config.drive.credentialsPath = resolvePathLike(config.drive.credentialsPath, configDir);
  config.drive.tokenPath = resolvePathLike(config.drive.tokenPath, configDir);
  log.debug(`Resolved local root: ${config.local.root}`);

  log.info("Config loaded successfully");
  return config;
}

function resolveStorePath(p: string, configDir: string): string {
  return p === ":memory:" ? p : resolvePathLike(p, configDir);
}

export function parseConfig(input: unknown): Config {
  try {
    return configSchema.parse(input);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new Error(formatZodError(err));
    }
    throw err;
  }
}

export function formatZodError(error: ZodError): string {
  const lines = error.errors.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `- ${path}: ${issue.message}`;
  });
  return `Config validation failed:\n${lines.join("\n")}`;
}
