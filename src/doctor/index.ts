/**
 * Startup diagnosis: config, model service and the selected file source.
 */

import { access, readFile } from "node:fs/promises";
import { parse } from "yaml";

import { getDriveAuthStatus } from "../auth/google.js";
import { loadConfig } from "../config/loader.js";
import type { Config, LlmConfig } from "../config/schema.js";
import { createLLMClient } from "../llm/client.js";
import type { LLMClient } from "../llm/types.js";
import { resolvePathLike } from "../utils/paths.js";

export type DoctorSeverity = "error" | "warning";

export interface DoctorIssue {
  id: string;
  severity: DoctorSeverity;
  message: string;
  /** Where the problem was found (file path or URL). */
  source?: string;
}

export interface DoctorReport {
  ok: boolean;
  configPath: string;
  issues: DoctorIssue[];
  /** Models the service offers, when it answered. */
  models?: string[];
}

export interface DiagnoseOptions {
  configPath: string;
  createLlm?: (config: LlmConfig) => LLMClient;
}

/** Ollama lists untagged pulls as `name:latest`. */
export function hasModel(available: readonly string[], model: string): boolean {
  if (available.includes(model)) return true;
  return !model.includes(":") && available.includes(`${model}:latest`);
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function checkModels(config: Config, llm: LLMClient, report: DoctorReport): Promise<void> {
  let models: string[];
  try {
    models = await llm.listModels();
  } catch (err) {
    report.issues.push({
      id: "llm.unreachable",
      severity: "error",
      message: `Model service is not reachable: ${errorMessage(err)}. Is \`ollama serve\` running?`,
      source: config.llm.baseUrl,
    });
    return;
  }
  report.models = models;

  const wanted = [config.llm.model];
  if (config.index.embeddings && config.llm.embeddingModel) wanted.push(config.llm.embeddingModel);
  for (const model of wanted) {
    if (hasModel(models, model)) continue;
    report.issues.push({
      id: "llm.model_missing",
      severity: "error",
      message: `Model ${model} is not available. Run \`ollama pull ${model}\`.`,
      source: config.llm.baseUrl,
    });
  }
}

async function checkSource(config: Config, report: DoctorReport): Promise<void> {
  if (config.source.type === "local") {
    if (!(await exists(config.local.root))) {
      report.issues.push({
        id: "local.root_missing",
        severity: "warning",
        message: `Local root does not exist yet: ${config.local.root}`,
        source: config.local.root,
      });
    }
    return;
  }

  if (!(await exists(config.drive.credentialsPath))) {
    report.issues.push({
      id: "drive.credentials_missing",
      severity: "error",
      message:
        "Google OAuth client file not found. Download it from the Google Cloud console " +
        "(OAuth client ID, Desktop app) and save it there.",
      source: config.drive.credentialsPath,
    });
  }
  const status = await getDriveAuthStatus(config.drive);
  if (!status.authenticated) {
    report.issues.push({
      id: "drive.not_authenticated",
      severity: "error",
      message: "Not signed in to Google Drive. Run `filewise auth google`.",
      source: config.drive.tokenPath,
    });
  } else if (!status.hasRefreshToken) {
    report.issues.push({
      id: "drive.no_refresh_token",
      severity: "warning",
      message: "Stored Google token has no refresh token; sign in again when it expires.",
      source: config.drive.tokenPath,
    });
  }
}

export async function diagnoseDoctor(options: DiagnoseOptions): Promise<DoctorReport> {
  const configPath = resolvePathLike(options.configPath);
  const report: DoctorReport = { ok: false, configPath, issues: [] };

  let raw: string;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err) {
    report.issues.push({
      id: "config.missing",
      severity: "error",
      message:
        (err as NodeJS.ErrnoException).code === "ENOENT"
          ? "Config file not found. Run `filewise init`."
          : `Cannot read config: ${errorMessage(err)}`,
      source: configPath,
    });
    return report;
  }

  try {
    parse(raw);
  } catch (err) {
    report.issues.push({ id: "config.parse_error", severity: "error", message: errorMessage(err), source: configPath });
    return report;
  }

  let config: Config;
  try {
    config = await loadConfig(configPath);
  } catch (err) {
    report.issues.push({ id: "config.invalid", severity: "error", message: errorMessage(err), source: configPath });
    return report;
  }

  const llm = (options.createLlm ?? createLLMClient)(config.llm);
  await checkModels(config, llm, report);
  await checkSource(config, report);

  report.ok = report.issues.every((i) => i.severity !== "error");
  return report;
}
