/**
 * Audit log for file operations (JSONL, two-phase).
 *
 * `preLog` writes the intent before the operation runs; `finalize` appends
 * the outcome as a separate `_finalize` line.
 */

import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import { ulid } from "ulid";
import { z } from "zod";
import { createLogger } from "../utils/logger.js";
import { redactParams } from "./redact.js";

const log = createLogger("audit");

export type AuditResult = "success" | "error" | "refused" | "pending";

export interface AuditEntry {
  id: string;
  ts: string;
  version: number;
  /** Operation: move, trash, delete, flag, create-folder, ... */
  operation: string;
  source: string;
  path: string;
  target?: string;
  planId?: string;
  actionId?: string;
  params: Record<string, unknown>;
  result: AuditResult;
  reason?: string;
  error?: string;
  duration?: number;
}

export type AuditIntent = Omit<AuditEntry, "id" | "ts" | "version" | "result" | "params"> & {
  params?: Record<string, unknown>;
};

export interface PreLogResult {
  ok: boolean;
  id: string;
  error?: string;
}

const entrySchema = z.object({
  id: z.string(),
  ts: z.string(),
  version: z.number(),
  operation: z.string(),
  source: z.string(),
  path: z.string(),
  target: z.string().optional(),
  planId: z.string().optional(),
  actionId: z.string().optional(),
  params: z.record(z.unknown()).default({}),
  result: z.enum(["success", "error", "refused", "pending"]),
  reason: z.string().optional(),
  error: z.string().optional(),
  duration: z.number().optional(),
});

const finalizeSchema = z.object({
  _finalize: z.string(),
  result: z.enum(["success", "error", "refused"]),
  reason: z.string().optional(),
  error: z.string().optional(),
  duration: z.number().optional(),
});

export class AuditLogger {
  private readonly logPath: string;
  private degraded = false;
  private memoryBuffer: string[] = [];
  private readonly maxBufferSize = 1000;

  constructor(logPath: string) {
    this.logPath = logPath;
  }

  /**
   * Phase 1: record the intent before the operation runs
   */
  async preLog(intent: AuditIntent): Promise<PreLogResult> {
    const id = ulid();
    const entry: AuditEntry = {
      ...intent,
      id,
      ts: new Date().toISOString(),
      version: 1,
      result: "pending",
      params: intent.params ? redactParams(intent.params) : {},
    };

    try {
      await this.writeLine(JSON.stringify(entry));
      return { ok: true, id };
    } catch (err) {
      log.error("Audit pre-log failed", err);
      this.degraded = true;
      this.bufferLine(JSON.stringify(entry));
      return {
        ok: false,
        id,
        error: err instanceof Error ? err.message : String(err),
      };
    }
  }

  /**
   * Phase 2: record the outcome
   */
  async finalize(
    id: string,
    result: Exclude<AuditResult, "pending">,
    extra?: { reason?: string; error?: string; duration?: number },
  ): Promise<void> {
    const update = {
      _finalize: id,
      ts: new Date().toISOString(),
      result,
      ...extra,
    };

    try {
      await this.writeLine(JSON.stringify(update));
    } catch (err) {
      // Finalize failure enters degraded mode but doesn't block returning results
      log.error("Audit finalize failed, entering degraded mode", err);
      this.degraded = true;
      this.bufferLine(JSON.stringify(update));
    }
  }

  isDegraded(): boolean {
    return this.degraded;
  }

  private async writeLine(line: string): Promise<void> {
    await mkdir(dirname(this.logPath), { recursive: true });

    if (this.memoryBuffer.length > 0) {
      const buffered = this.memoryBuffer.splice(0);
      for (const bl of buffered) {
        await appendFile(this.logPath, bl + "\n", "utf-8");
      }
      this.degraded = false;
      log.info("Memory buffer flushed, audit system recovered");
    }

    await appendFile(this.logPath, line + "\n", "utf-8");
  }

  private bufferLine(line: string): void {
    if (this.memoryBuffer.length >= this.maxBufferSize) {
      this.memoryBuffer.shift(); // Drop oldest
      log.warn("Audit buffer full, dropping oldest entry");
    }
    this.memoryBuffer.push(line);
    process.stderr.write(`[AUDIT-DEGRADED] ${line}\n`);
  }

  /**
   * Most recent entries (oldest first) with their finalized outcome applied.
   */
  async queryRecent(limit = 100): Promise<AuditEntry[]> {
    let content: string;
    try {
      content = await readFile(this.logPath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        return [];
      }
      throw err;
    }

    const entries: AuditEntry[] = [];
    const byId = new Map<string, AuditEntry>();

    for (const line of content.split("\n")) {
      if (!line.trim()) continue;
      let value: unknown;
      try {
        value = JSON.parse(line);
      } catch (parseErr) {
        log.warn("Failed to parse audit line", parseErr);
        continue;
      }

      const fin = finalizeSchema.safeParse(value);
      if (fin.success) {
        const target = byId.get(fin.data._finalize);
        if (target) {
          target.result = fin.data.result;
          if (fin.data.reason !== undefined) target.reason = fin.data.reason;
          if (fin.data.error !== undefined) target.error = fin.data.error;
          if (fin.data.duration !== undefined) target.duration = fin.data.duration;
        }
        continue;
      }

      const entry = entrySchema.safeParse(value);
      if (entry.success) {
        entries.push(entry.data);
        byId.set(entry.data.id, entry.data);
      }
    }

    return entries.slice(-limit);
  }
}
