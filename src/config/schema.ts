/**
 * Configuration schema (Zod)
 */

import { z } from "zod";

export const llmSchema = z
  .object({
    /** OpenAI-compatible endpoint; Ollama serves one at /v1. */
    baseUrl: z.string().url().default("http://localhost:11434/v1"),
    model: z.string().min(1).default("llama3.2:3b"),
    /** Defaults to `model` when unset. */
    embeddingModel: z.string().min(1).optional(),
    apiKey: z.string().optional(),
    authType: z.enum(["bearer", "api-key", "header", "none"]).default("bearer"),
    authHeader: z.string().optional(),
    timeoutMs: z.number().int().positive().default(120_000),
    temperature: z.number().min(0).max(2).default(0),
    maxTokens: z.number().int().positive().default(1024),
  })
  .refine((data) => data.authType !== "header" || !!data.authHeader, {
    message:
      "authHeader is required when authType is 'header'. " +
      "Example: authHeader: 'X-API-Key'",
    path: ["authHeader"],
  });

export const localSourceSchema = z
  .object({
    root: z.string().default("${FILEWISE_HOME}/documents"),
  })
  .default({ root: "${FILEWISE_HOME}/documents" });

export const driveSourceSchema = z
  .object({
    /** Drive folder the organizer treats as its root ("/" = My Drive). */
    rootPath: z.string().default("/"),
    credentialsPath: z.string().default("${FILEWISE_HOME}/credentials.json"),
    tokenPath: z.string().default("${FILEWISE_HOME}/auth/google-token.json"),
    scopes: z
      .array(z.string())
      .min(1)
      .default(["https://www.googleapis.com/auth/drive"]),
    redirectPort: z.number().int().min(1).max(65_535).default(3000),
    pageSize: z.number().int().min(1).max(1000).default(100),
  })
  .default({
    rootPath: "/",
    credentialsPath: "${FILEWISE_HOME}/credentials.json",
    tokenPath: "${FILEWISE_HOME}/auth/google-token.json",
    scopes: ["https://www.googleapis.com/auth/drive"],
    redirectPort: 3000,
    pageSize: 100,
  });

export const scanSchema = z
  .object({
    /** Glob patterns (root-relative); when non-empty only matching files are listed. */
    include: z.array(z.string()).default([]),
    exclude: z
      .array(z.string())
      .default(["**/node_modules/**", "**/.git/**"]),
    includeHidden: z.boolean().default(false),
    maxHashBytes: z
      .number()
      .int()
      .nonnegative()
      .default(64 * 1024 * 1024),
    maxReadBytes: z
      .number()
      .int()
      .positive()
      .default(2 * 1024 * 1024),
  })
  .default({
    include: [],
    exclude: ["**/node_modules/**", "**/.git/**"],
    includeHidden: false,
    maxHashBytes: 64 * 1024 * 1024,
    maxReadBytes: 2 * 1024 * 1024,
  });

export const indexSchema = z
  .object({
    path: z.string().default("${FILEWISE_HOME}/index.sqlite"),
    chunkChars: z.number().int().min(50).default(1200),
    overlapChars: z.number().int().nonnegative().default(200),
    embeddings: z.boolean().default(false),
    topK: z.number().int().positive().default(4),
  })
  .default({
    path: "${FILEWISE_HOME}/index.sqlite",
    chunkChars: 1200,
    overlapChars: 200,
    embeddings: false,
    topK: 4,
  });

export const organizeSchema = z
  .object({
    categories: z
      .array(z.string().min(1))
      .default(["Documents", "Finance", "Work", "Personal", "Media", "Code", "Archive"]),
    /** Folder under which `move` decisions without an explicit target land. */
    targetRoot: z.string().default("Organized"),
    minConfidence: z.number().min(0).max(1).default(0.6),
    maxContentChars: z.number().int().positive().default(4000),
    requireApproval: z.boolean().default(true),
    allowDelete: z.boolean().default(false),
    deleteMode: z.enum(["trash", "permanent"]).default("trash"),
    duplicates: z.enum(["move", "delete", "flag"]).default("move"),
    duplicatesFolder: z.string().default("Duplicates"),
    /** Extra glob patterns that are never moved or deleted. */
    protect: z.array(z.string()).default([]),
    planStorePath: z.string().default("${FILEWISE_HOME}/plans.sqlite"),
  })
  .default({
    categories: ["Documents", "Finance", "Work", "Personal", "Media", "Code", "Archive"],
    targetRoot: "Organized",
    minConfidence: 0.6,
    maxContentChars: 4000,
    requireApproval: true,
    allowDelete: false,
    deleteMode: "trash",
    duplicates: "move",
    duplicatesFolder: "Duplicates",
    protect: [],
    planStorePath: "${FILEWISE_HOME}/plans.sqlite",
  });

export const gatewaySchema = z
  .object({
    host: z.string().default("127.0.0.1"),
    port: z.number().int().min(0).max(65_535).default(8790),
    token: z.string().optional(),
    /** IPs or CIDR ranges; empty allows everyone. */
    allowlist: z.array(z.string()).default([]),
  })
  .default({ host: "127.0.0.1", port: 8790, allowlist: [] });

export const auditSchema = z
  .object({
    path: z.string().default("${FILEWISE_HOME}/audit.jsonl"),
  })
  .default({ path: "${FILEWISE_HOME}/audit.jsonl" });

export const sessionsSchema = z
  .object({
    dir: z.string().default("${FILEWISE_HOME}/sessions"),
    maxTurns: z.number().int().positive().default(10),
  })
  .default({ dir: "${FILEWISE_HOME}/sessions", maxTurns: 10 });

export const configSchema = z.object({
  llm: llmSchema.default({}),
  source: z
    .object({
      type: z.enum(["local", "drive"]).default("local"),
    })
    .default({ type: "local" }),
  local: localSourceSchema,
  drive: driveSourceSchema,
  scan: scanSchema,
  index: indexSchema,
  organize: organizeSchema,
  gateway: gatewaySchema,
  audit: auditSchema,
  sessions: sessionsSchema,
});

export type Config = z.infer<typeof configSchema>;
export type LlmConfig = z.infer<typeof llmSchema>;
export type LocalSourceConfig = z.infer<typeof localSourceSchema>;
export type DriveSourceConfig = z.infer<typeof driveSourceSchema>;
export type ScanConfig = z.infer<typeof scanSchema>;
export type IndexConfig = z.infer<typeof indexSchema>;
export type OrganizeConfig = z.infer<typeof organizeSchema>;
export type GatewayConfig = z.infer<typeof gatewaySchema>;
export type SourceType = Config["source"]["type"];
