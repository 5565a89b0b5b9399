import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdir, mkdtemp, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { organizeSchema, type ScanConfig } from "../../config/schema.js";
import { createProtectedMatcher } from "../../executor/protected.js";
import type { ChatMessage, LLMClient } from "../../llm/types.js";
import { FakeDriveClient } from "../../sources/__tests__/fake-drive.js";
import { DriveFileSource } from "../../sources/drive.js";
import { LocalFileSource } from "../../sources/local.js";
import { createPlan, initialStatus } from "../planner.js";
import { createPlanStore, type PlanStore } from "../store.js";

vi.mock("../../utils/logger.js", () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

const scan: ScanConfig = {
  include: [],
  exclude: [],
  includeHidden: false,
  maxHashBytes: 1024 * 1024,
  maxReadBytes: 1024 * 1024,
};

const replies: Record<string, string> = {
  "notes/todo.txt": '{"action":"keep","category":"Personal","reason":"Fine where it is","confidence":0.8}',
  "report.txt": 'Sure! {"action":"move","category":"finance","reason":"An invoice","confidence":0.9}',
  "tmp.log": '{"action":"delete","category":"Archive","reason":"Scratch output","confidence":0.95}',
};

function pathOf(messages: ChatMessage[]): string {
  const user = messages.find((m) => m.role === "user")?.content ?? "";
  return /^Path: (.*)$/m.exec(user)?.[1] ?? "";
}

function fakeLlm(seen: string[]): LLMClient {
  return {
    model: "fake",
    complete: async (messages) => {
      const path = pathOf(messages);
      seen.push(path);
      return {
        content: replies[path] ?? "no idea",
        model: "fake",
        usage: { promptTokens: 0, completionTokens: 0 },
        truncated: false,
      };
    },
    embed: async () => [],
    listModels: async () => ["fake"],
  };
}

describe("createPlan", () => {
  let dir: string;
  let source: LocalFileSource;
  let store: PlanStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "filewise-plan-"));
    await mkdir(join(dir, "notes"));
    await mkdir(join(dir, "old"));
    await writeFile(join(dir, "notes", "todo.txt"), "Buy milk\n");
    await writeFile(join(dir, "report.txt"), "Invoice 42, total due\n");
    await writeFile(join(dir, "old", "report-copy.txt"), "Invoice 42, total due\n");
    await writeFile(join(dir, "tmp.log"), "scratch\n");
    await utimes(join(dir, "report.txt"), new Date("2024-01-01"), new Date("2024-01-01"));
    await utimes(join(dir, "old", "report-copy.txt"), new Date("2024-06-01"), new Date("2024-06-01"));

    source = new LocalFileSource({ root: dir, scan });
    store = createPlanStore(":memory:");
  });

  afterEach(async () => {
    store.close();
    await rm(dir, { recursive: true, force: true });
  });

  it("classifies every file and stores the plan", async () => {
    const seen: string[] = [];
    const organize = organizeSchema.parse({});
    const plan = await createPlan({
      source,
      llm: fakeLlm(seen),
      store,
      organize,
      isProtected: createProtectedMatcher(),
      now: () => 1234,
    });

    expect(plan.createdAt).toBe(1234);
    expect(plan.status).toBe("open");
    expect(plan.folderPath).toBe("");
    expect(plan.actions.map((a) => [a.seq, a.file.path, a.decision.action, a.status])).toEqual([
      [0, "notes/todo.txt", "keep", "skipped"],
      [1, "old/report-copy.txt", "duplicate", "pending"],
      [2, "report.txt", "move", "pending"],
      [3, "tmp.log", "delete", "pending"],
    ]);
    expect(plan.actions[1]?.decision).toEqual({
      action: "duplicate",
      category: "Duplicates",
      reason: "Same content as report.txt",
      confidence: 1,
      duplicateOf: "report.txt",
      duplicateOfId: "report.txt",
    });
    expect(plan.actions[2]?.decision).toMatchObject({
      category: "Finance",
      targetFolder: "Organized/Finance",
    });

    // Duplicates are decided without a model call.
    expect(seen).toEqual(["notes/todo.txt", "report.txt", "tmp.log"]);
    expect(store.getPlan(plan.id)?.actions).toHaveLength(4);
  });

  it("auto-approves moves only when approval is not required", async () => {
    const plan = await createPlan({
      source,
      llm: fakeLlm([]),
      store,
      organize: organizeSchema.parse({ requireApproval: false }),
      isProtected: createProtectedMatcher(),
    });

    expect(plan.actions.map((a) => a.status)).toEqual(["skipped", "pending", "approved", "pending"]);
  });

  it("limits the plan to a folder", async () => {
    const plan = await createPlan(
      {
        source,
        llm: fakeLlm([]),
        store,
        organize: organizeSchema.parse({}),
        isProtected: createProtectedMatcher(),
      },
      { folderPath: "/notes/" },
    );

    expect(plan.folderPath).toBe("notes");
    expect(plan.actions.map((a) => a.file.path)).toEqual(["notes/todo.txt"]);
  });

  it("keeps files in protected paths", async () => {
    const plan = await createPlan({
      source,
      llm: fakeLlm([]),
      store,
      organize: organizeSchema.parse({ protect: ["report.txt"] }),
      isProtected: createProtectedMatcher(["report.txt"]),
    });

    const report = plan.actions.find((a) => a.file.path === "report.txt");
    expect(report?.decision.action).toBe("keep");
    expect(report?.decision.reason).toBe("Protected path (was: move)");
    expect(report?.status).toBe("skipped");
  });

  it("keeps a copy when the original is proposed for deletion", async () => {
    await writeFile(join(dir, "old", "report-2.txt"), "Invoice 42, total due\n");
    await utimes(join(dir, "old", "report-2.txt"), new Date("2024-09-01"), new Date("2024-09-01"));
    const base = fakeLlm([]);
    const llm: LLMClient = {
      ...base,
      complete: async (messages) => {
        const reply = await base.complete(messages);
        return pathOf(messages) === "report.txt"
          ? { ...reply, content: '{"action":"delete","category":"Archive","reason":"Stale","confidence":0.9}' }
          : reply;
      },
    };

    const plan = await createPlan({
      source,
      llm,
      store,
      organize: organizeSchema.parse({ duplicates: "delete", allowDelete: true }),
      isProtected: createProtectedMatcher(),
    });

    const byPath = new Map(plan.actions.map((a) => [a.file.path, a]));
    expect(byPath.get("report.txt")?.decision.action).toBe("delete");
    expect(byPath.get("old/report-copy.txt")?.decision).toEqual({
      action: "keep",
      category: "Duplicates",
      reason: "Last copy kept: report.txt is proposed for deletion",
      confidence: 1,
    });
    expect(byPath.get("old/report-copy.txt")?.status).toBe("skipped");
    expect(byPath.get("old/report-2.txt")?.decision).toMatchObject({
      action: "duplicate",
      duplicateOf: "old/report-copy.txt",
      duplicateOfId: "old/report-copy.txt",
    });
    expect(store.getPlan(plan.id)?.actions.find((a) => a.file.path === "old/report-copy.txt")?.status).toBe(
      "skipped",
    );
  });

  it("does not treat empty files as duplicates", async () => {
    await mkdir(join(dir, "pkg"));
    await writeFile(join(dir, "empty.txt"), "");
    await writeFile(join(dir, "pkg", "__init__.py"), "");
    const seen: string[] = [];

    const plan = await createPlan({
      source,
      llm: fakeLlm(seen),
      store,
      organize: organizeSchema.parse({}),
      isProtected: createProtectedMatcher(),
    });

    const empties = plan.actions.filter((a) => a.file.size === 0);
    expect(empties.map((a) => [a.file.path, a.decision.action])).toEqual([
      ["empty.txt", "keep"],
      ["pkg/__init__.py", "keep"],
    ]);
    expect(seen).toContain("empty.txt");
    expect(seen).toContain("pkg/__init__.py");
  });

  it("reports progress", async () => {
    const progress: Array<[number, number]> = [];
    await createPlan({
      source,
      llm: fakeLlm([]),
      store,
      organize: organizeSchema.parse({}),
      isProtected: createProtectedMatcher(),
      onProgress: (done, total) => progress.push([done, total]),
    });
    expect(progress).toEqual([
      [1, 4],
      [2, 4],
      [3, 4],
      [4, 4],
    ]);
  });
});

describe("createPlan on Drive", () => {
  it("marks only the second of two same-name uploads as a duplicate", async () => {
    const client = new FakeDriveClient();
    const first = client.add("report.txt", "root", { content: "Invoice 42", md5Checksum: "m1" });
    const second = client.add("report.txt", "root", { content: "Invoice 42", md5Checksum: "m1" });
    const source = new DriveFileSource({ client, rootPath: "/", pageSize: 10, maxReadBytes: 1024 });
    const store = createPlanStore(":memory:");

    const plan = await createPlan({
      source,
      llm: fakeLlm([]),
      store,
      organize: organizeSchema.parse({ duplicates: "delete", allowDelete: true }),
      isProtected: createProtectedMatcher(),
    });

    expect(plan.actions.map((a) => [a.file.id, a.decision.action])).toEqual([
      [first.id, "move"],
      [second.id, "duplicate"],
    ]);
    expect(plan.actions[1]?.decision.duplicateOfId).toBe(first.id);
    store.close();
  });
});

describe("initialStatus", () => {
  const organize = organizeSchema.parse({ requireApproval: false });

  it("never auto-approves destructive actions", () => {
    expect(initialStatus({ action: "delete", category: "x", reason: "", confidence: 1 }, organize)).toBe("pending");
    expect(initialStatus({ action: "duplicate", category: "x", reason: "", confidence: 1 }, organize)).toBe(
      "pending",
    );
  });
});
