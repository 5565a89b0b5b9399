import { describe, expect, it, vi } from "vitest";

import { organizeSchema } from "../../config/schema.js";
import { createProtectedMatcher } from "../../executor/protected.js";
import type { ChatMessage, LLMClient } from "../../llm/types.js";
import type { FileRecord } from "../../sources/types.js";
import { applyPolicy, classifyFile } from "../classifier.js";
import type { ClassificationDecision } from "../types.js";

vi.mock("../../utils/logger.js", () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

const organize = organizeSchema.parse({ maxContentChars: 10 });
const isProtected = createProtectedMatcher();

const file: FileRecord = {
  id: "inbox/invoice.txt",
  path: "inbox/invoice.txt",
  name: "invoice.txt",
  mimeType: "text/plain",
  size: 42,
  modifiedTime: "2024-02-03T04:05:06.000Z",
  isFolder: false,
};

function llmReplying(reply: string | Error, calls: ChatMessage[][] = []): LLMClient {
  return {
    model: "fake",
    complete: async (messages) => {
      calls.push(messages);
      if (reply instanceof Error) throw reply;
      return { content: reply, model: "fake", usage: { promptTokens: 1, completionTokens: 1 }, truncated: false };
    },
    embed: async () => [],
    listModels: async () => [],
  };
}

const move: ClassificationDecision = { action: "move", category: "Finance", reason: "Invoice", confidence: 0.9 };

describe("applyPolicy", () => {
  it("fills in the default target folder", () => {
    expect(applyPolicy(file, move, organize, isProtected)).toEqual({ ...move, targetFolder: "Organized/Finance" });
  });

  it("normalizes an explicit target", () => {
    expect(applyPolicy(file, { ...move, targetFolder: "/Finance/2024/" }, organize, isProtected).targetFolder).toBe(
      "Finance/2024",
    );
  });

  it("keeps files already in the target folder", () => {
    expect(applyPolicy(file, { ...move, targetFolder: "inbox" }, organize, isProtected)).toEqual({
      action: "keep",
      category: "Finance",
      reason: "Already in inbox",
      confidence: 0.9,
    });
  });

  it("keeps low-confidence suggestions", () => {
    expect(applyPolicy(file, { ...move, confidence: 0.4 }, organize, isProtected)).toEqual({
      action: "keep",
      category: "Finance",
      reason: "Low confidence 0.40 for move: Invoice",
      confidence: 0.4,
    });
  });

  it.each([".ssh", ".git/hooks", ".filewise-trash"])("keeps files the model wants moved into %s", (target) => {
    expect(applyPolicy(file, { ...move, targetFolder: target }, organize, isProtected)).toEqual({
      action: "keep",
      category: "Finance",
      reason: `Protected target folder ${target}`,
      confidence: 0.9,
    });
  });

  it("keeps protected files", () => {
    const key: FileRecord = { ...file, path: "certs/server.pem", name: "server.pem" };
    expect(applyPolicy(key, { ...move, action: "delete" }, organize, isProtected).reason).toBe(
      "Protected path (was: delete)",
    );
  });
});

describe("classifyFile", () => {
  it("sends file details and clipped content to the model", async () => {
    const calls: ChatMessage[][] = [];
    const decision = await classifyFile(
      { llm: llmReplying('{"action":"move","category":"Finance","reason":"Invoice","confidence":0.9}', calls), organize, isProtected },
      { file, text: "Invoice number 42 for March", existingFolders: ["inbox"] },
    );

    expect(decision).toEqual({
      action: "move",
      category: "Finance",
      targetFolder: "Organized/Finance",
      reason: "Invoice",
      confidence: 0.9,
    });
    expect(calls[0]?.[1]?.content).toBe(
      [
        "Categories: Documents, Finance, Work, Personal, Media, Code, Archive",
        "Existing folders: inbox",
        "",
        "File: invoice.txt",
        "Path: inbox/invoice.txt",
        "Type: text/plain",
        "Size: 42 bytes",
        "Modified: 2024-02-03T04:05:06.000Z",
        "",
        "Content (first 10 characters):",
        "<<<",
        "Invoice nu",
        ">>>",
      ].join("\n"),
    );
  });

  it("keeps the file when the model fails", async () => {
    const decision = await classifyFile(
      { llm: llmReplying(new Error("HTTP 500: boom")), organize, isProtected },
      { file, existingFolders: [] },
    );
    expect(decision).toEqual({
      action: "keep",
      category: "Uncategorized",
      reason: "Model error: HTTP 500: boom",
      confidence: 0,
    });
  });

  it("keeps the file when the reply is unusable", async () => {
    const decision = await classifyFile(
      { llm: llmReplying("I think it is a finance document."), organize, isProtected },
      { file, existingFolders: [] },
    );
    expect(decision).toEqual({
      action: "keep",
      category: "Uncategorized",
      reason: "Unparseable reply: no JSON object in model reply",
      confidence: 0,
    });
  });
});
