import { beforeEach, describe, expect, it, vi } from "vitest";

import { DriveFileSource, escapeDriveQuery } from "../drive.js";
import { InvalidPathError, NotFoundError } from "../errors.js";
import { FOLDER_MIME_TYPE } from "../types.js";
import { FakeDriveClient } from "./fake-drive.js";

vi.mock("../../utils/logger.js", () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

const DOC = "application/vnd.google-apps.document";
const FORM = "application/vnd.google-apps.form";

describe("escapeDriveQuery", () => {
  it("escapes quotes and backslashes", () => {
    expect(escapeDriveQuery("it's a\\b")).toBe("it\\'s a\\\\b");
  });
});

describe("DriveFileSource", () => {
  let client: FakeDriveClient;
  let source: DriveFileSource;
  let reportsId: string;
  let q1Id: string;

  beforeEach(() => {
    client = new FakeDriveClient();
    const reports = client.addFolder("Reports", "root");
    reportsId = reports.id;
    q1Id = client.add("q1.txt", reports.id, { content: "Q1 numbers", md5Checksum: "m1" }).id;
    client.add("Plan", "root", { mimeType: DOC, content: "Roadmap draft" });
    client.add("Survey", "root", { mimeType: FORM });
    source = new DriveFileSource({ client, rootPath: "/", pageSize: 1, maxReadBytes: 7 });
  });

  it("lists recursively across pages", async () => {
    const files = await source.list({ recursive: true });
    expect(files.map((f) => [f.path, f.isFolder])).toEqual([
      ["Plan", false],
      ["Reports", true],
      ["Reports/q1.txt", false],
      ["Survey", false],
    ]);
    expect(files[2]).toMatchObject({ id: q1Id, size: 10, contentHash: "m1", parentId: reportsId });
  });

  it("lists one level by default", async () => {
    expect((await source.list({ folderPath: "Reports" })).map((f) => f.path)).toEqual(["Reports/q1.txt"]);
    expect((await source.list()).map((f) => f.path)).toEqual(["Plan", "Reports", "Survey"]);
  });

  it("refuses to list a file or a missing folder", async () => {
    await expect(source.list({ folderPath: "Plan" })).rejects.toThrow("Folder not found: Plan");
    await expect(source.list({ folderPath: "Nope" })).rejects.toThrow("Cannot find 'Nope' in path 'Nope'");
  });

  it("reports a missing root folder with the full path", async () => {
    client.addFolder("Work", "root");
    const scoped = new DriveFileSource({ client, rootPath: "/Work/Inbox", pageSize: 10, maxReadBytes: 100 });
    await expect(scoped.list()).rejects.toThrow(new NotFoundError("Cannot find 'Inbox' in path '/Work/Inbox'"));
  });

  it("resolves paths relative to a nested root", async () => {
    const scoped = new DriveFileSource({ client, rootPath: "Reports/", pageSize: 10, maxReadBytes: 100 });
    expect(scoped.root).toBe("/Reports");
    expect((await scoped.list()).map((f) => f.path)).toEqual(["q1.txt"]);
  });

  it("stats existing and missing paths", async () => {
    expect((await source.stat("/Reports/q1.txt"))?.id).toBe(q1Id);
    expect(await source.stat("Reports/missing.txt")).toBeNull();
  });

  it("looks files up by id and rebuilds their path", async () => {
    expect(await source.get(q1Id)).toMatchObject({ id: q1Id, path: "Reports/q1.txt", name: "q1.txt" });
    expect((await source.get(reportsId))?.path).toBe("Reports");
    expect(await source.get("f999")).toBeNull();
  });

  it("tells same-name siblings apart by id", async () => {
    const older = client.add("notes.txt", "root", { content: "BBB", md5Checksum: "mb" });
    const newer = client.add("notes.txt", "root", { content: "AAA", md5Checksum: "ma" });

    const found = await source.get(newer.id);
    expect(found).toMatchObject({ id: newer.id, path: "notes.txt", contentHash: "ma" });
    expect((await source.get(older.id))?.contentHash).toBe("mb");
  });

  it("gives null for trashed files and files outside the root", async () => {
    const scoped = new DriveFileSource({ client, rootPath: "/Reports", pageSize: 10, maxReadBytes: 100 });
    const plan = await source.stat("Plan");
    if (!plan) throw new Error("Plan missing");

    expect(await scoped.get(plan.id)).toBeNull();
    expect((await scoped.get(q1Id))?.path).toBe("q1.txt");

    await source.remove(plan, "trash");
    expect(await source.get(plan.id)).toBeNull();
  });

  it("exports Workspace documents as text, clipped", async () => {
    const plan = await source.stat("Plan");
    if (!plan) throw new Error("Plan missing");
    const content = await source.readContent(plan);

    expect(content).toEqual({ bytes: Buffer.from("Roadmap"), mimeType: "text/plain", text: "Roadmap" });
    expect(client.exports).toEqual([{ fileId: plan.id, mimeType: "text/plain" }]);
  });

  it("returns no text for Workspace types without an export", async () => {
    const survey = await source.stat("Survey");
    if (!survey) throw new Error("Survey missing");
    expect(await source.readContent(survey)).toEqual({ bytes: Buffer.alloc(0), mimeType: FORM });
  });

  it("downloads regular files", async () => {
    const q1 = await source.stat("Reports/q1.txt");
    if (!q1) throw new Error("q1 missing");
    expect((await source.readContent(q1)).text).toBe("Q1 numb");
  });

  it("moves a file into a new nested folder, replacing its parents", async () => {
    const q1 = await source.stat("Reports/q1.txt");
    if (!q1) throw new Error("q1 missing");

    const moved = await source.move(q1, "Archive/2024");

    expect(moved.path).toBe("Archive/2024/q1.txt");
    const folder = await source.stat("Archive/2024");
    expect(folder?.isFolder).toBe(true);
    expect(client.files.get(q1Id)?.meta.parents).toEqual([folder?.id]);
    expect((await source.list({ folderPath: "Reports" })).map((f) => f.path)).toEqual([]);
  });

  it("leaves a file already in the target folder alone", async () => {
    const q1 = await source.stat("Reports/q1.txt");
    if (!q1) throw new Error("q1 missing");
    expect((await source.move(q1, "Reports")).path).toBe("Reports/q1.txt");
    expect(client.files.get(q1Id)?.meta.parents).toEqual([reportsId]);
  });

  it("refuses to create a folder over a file", async () => {
    await expect(source.ensureFolder("Plan/Sub")).rejects.toThrow(
      new InvalidPathError("Plan", "exists and is not a folder"),
    );
  });

  it("creates folders under a parent", async () => {
    const created = await source.createFolder("Notes", "Reports");
    expect(created).toMatchObject({ path: "Reports/Notes", mimeType: FOLDER_MIME_TYPE, isFolder: true });
    await expect(source.createFolder("a/b")).rejects.toThrow(InvalidPathError);
  });

  it("trashes or deletes files", async () => {
    const q1 = await source.stat("Reports/q1.txt");
    if (!q1) throw new Error("q1 missing");
    await source.remove(q1, "trash");
    expect(client.files.get(q1Id)?.trashed).toBe(true);
    expect(await source.stat("Reports/q1.txt")).toBeNull();
  });

  it("deletes folders with their contents", async () => {
    const reports = await source.stat("Reports");
    if (!reports) throw new Error("Reports missing");
    await source.remove(reports, "permanent");
    expect(client.files.has(reportsId)).toBe(false);
    expect(client.files.has(q1Id)).toBe(false);
  });

  it("never removes the root", async () => {
    const root = await source.stat("");
    if (!root) throw new Error("root missing");
    await expect(source.remove(root, "trash")).rejects.toThrow("Invalid path '': cannot remove the root");
  });

  it("resolves ids by path", async () => {
    expect(await source.findIdByPath("")).toBe("root");
    expect(await source.findIdByPath("Reports")).toBe(reportsId);
  });
});
