/**
 * Config merge utilities - atomic YAML patching
 */

import { mkdir, readFile, writeFile, rename } from "node:fs/promises";
import { dirname } from "node:path";
import { parse, stringify } from "yaml";
import { randomBytes } from "node:crypto";
import { createLogger } from "../utils/logger.js";

const log = createLogger("config-merge");

type YamlDoc = Record<string, unknown>;

function isPlainObject(value: unknown): value is YamlDoc {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Deep-merge `patch` into `base`; arrays and scalars in the patch replace. */
export function deepMerge(base: YamlDoc, patch: YamlDoc): YamlDoc {
  const out: YamlDoc = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    const existing = out[key];
    out[key] =
      isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }
  return out;
}

async function writeYamlAtomic(path: string, doc: YamlDoc): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmpPath = `${path}.tmp.${randomBytes(4).toString("hex")}`;
  await writeFile(tmpPath, stringify(doc, { lineWidth: 120 }), "utf-8");
  await rename(tmpPath, path);
}

/**
 * Merge a patch into an app.yaml (created when missing).
 * Atomic write: write to temp file, then rename
 */
export async function mergeConfigFile(appConfigPath: string, patch: YamlDoc): Promise<void> {
  let doc: YamlDoc = {};
  try {
    const parsed: unknown = parse(await readFile(appConfigPath, "utf-8"));
    if (isPlainObject(parsed)) doc = parsed;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
      log.error("Failed to read config for merge", err);
      throw err;
    }
  }

  await writeYamlAtomic(appConfigPath, deepMerge(doc, patch));
  log.info(`Merged config patch into ${appConfigPath}`);
}

/** Starter config written by `filewise init`. */
export function defaultConfigDocument(): YamlDoc {
  return {
    llm: {
      baseUrl: "http://localhost:11434/v1",
      model: "llama3.2:3b",
      authType: "none",
    },
    source: { type: "local" },
    local: { root: "${FILEWISE_HOME}/documents" },
    organize: {
      requireApproval: true,
      allowDelete: false,
      deleteMode: "trash",
    },
  };
}
