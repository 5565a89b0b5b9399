import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { AuditLogger } from "../logger.js";
import { redactParams } from "../redact.js";

vi.mock("../../utils/logger.js", () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

describe("AuditLogger", () => {
  let dir: string;
  let logPath: string;
  let logger: AuditLogger;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "filewise-audit-"));
    logPath = join(dir, "logs", "audit.jsonl");
    logger = new AuditLogger(logPath);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  async function lines(): Promise<Array<Record<string, unknown>>> {
    const content = await readFile(logPath, "utf-8");
    return content
      .trim()
      .split("\n")
      .map((l) => JSON.parse(l));
  }

  it("pre-logs a pending entry with a ULID", async () => {
    const result = await logger.preLog({ operation: "move", source: "local", path: "a.txt", target: "Finance" });

    expect(result.ok).toBe(true);
    expect(result.id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);

    const [entry] = await lines();
    expect(entry).toMatchObject({
      id: result.id,
      version: 1,
      operation: "move",
      source: "local",
      path: "a.txt",
      target: "Finance",
      params: {},
      result: "pending",
    });
  });

  it("redacts sensitive params", async () => {
    await logger.preLog({
      operation: "delete",
      source: "drive",
      path: "x.txt",
      params: { reason: "junk", accessToken: "test-secret", nested: { password: "pw", ok: 1 } },
    });

    const [entry] = await lines();
    expect(entry?.params).toEqual({
      reason: "junk",
      accessToken: "[REDACTED]",
      nested: { password: "[REDACTED]", ok: 1 },
    });
  });

  it("merges finalize lines into their entries", async () => {
    const ok = await logger.preLog({ operation: "move", source: "local", path: "a.txt" });
    const bad = await logger.preLog({ operation: "trash", source: "local", path: "b.txt" });
    await logger.finalize(ok.id, "success", { duration: 12 });
    await logger.finalize(bad.id, "error", { error: "EACCES" });

    expect(await lines()).toHaveLength(4);

    const entries = await logger.queryRecent();
    expect(entries.map((e) => [e.path, e.result, e.duration, e.error])).toEqual([
      ["a.txt", "success", 12, undefined],
      ["b.txt", "error", undefined, "EACCES"],
    ]);
    expect((await logger.queryRecent(1)).map((e) => e.path)).toEqual(["b.txt"]);
  });

  it("returns nothing before the first write", async () => {
    expect(await logger.queryRecent()).toEqual([]);
  });

  it("skips unreadable lines", async () => {
    await logger.preLog({ operation: "move", source: "local", path: "a.txt" });
    await writeFile(logPath, "garbage\n", { flag: "a" });

    expect((await logger.queryRecent()).map((e) => e.path)).toEqual(["a.txt"]);
  });

  it("buffers entries while the log cannot be written and flushes them later", async () => {
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    // A file where the log directory should be makes every write fail.
    await writeFile(join(dir, "logs"), "");

    const first = await logger.preLog({ operation: "move", source: "local", path: "a.txt" });
    expect(first.ok).toBe(false);
    expect(logger.isDegraded()).toBe(true);

    await rm(join(dir, "logs"));
    const second = await logger.preLog({ operation: "move", source: "local", path: "b.txt" });

    expect(second.ok).toBe(true);
    expect(logger.isDegraded()).toBe(false);
    expect((await lines()).map((l) => l.path)).toEqual(["a.txt", "b.txt"]);
  });
});

describe("redactParams", () => {
  it("truncates long strings", () => {
    const long = "x".repeat(201);
    expect(redactParams({ note: long })).toEqual({ note: `${"x".repeat(50)}...[truncated]` });
  });

  it("redacts inside arrays of objects", () => {
    expect(redactParams({ items: [{ apiKey: "test-secret" }, "plain"] })).toEqual({
      items: [{ apiKey: "[REDACTED]" }, "plain"],
    });
  });
});
