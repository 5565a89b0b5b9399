import { describe, expect, it } from "vitest";
import { chunkDocument, documentHeader } from "./chunker.js";

const header = (name: string) => documentHeader(name);

describe("documentHeader", () => {
  it("names the file", () => {
    expect(documentHeader("a.txt")).toBe("This content is from the file a.txt:\n\n");
  });
});

describe("chunkDocument", () => {
  it("keeps short content in a single chunk", () => {
    expect(chunkDocument({ path: "notes/a.txt", name: "a.txt", text: "one\ntwo\nthree\n" })).toEqual([
      {
        path: "notes/a.txt",
        name: "a.txt",
        index: 0,
        startLine: 1,
        endLine: 3,
        text: `${header("a.txt")}one\ntwo\nthree`,
      },
    ]);
  });

  it("packs paragraphs and collapses runs of blank lines", () => {
    const chunks = chunkDocument({
      path: "p.txt",
      name: "p.txt",
      text: "alpha\n\n\n\nbeta",
      options: { targetChars: 50, overlapChars: 0 },
    });

    expect(chunks.map((c) => [c.startLine, c.endLine, c.text])).toEqual([[1, 5, `${header("p.txt")}alpha\n\nbeta`]]);
  });

  it("cuts after the paragraph that reaches the target", () => {
    const text = `${"a".repeat(30)}\n${"b".repeat(30)}\n\n${"c".repeat(10)}`;
    const chunks = chunkDocument({ path: "doc.md", name: "doc.md", text, options: { targetChars: 50, overlapChars: 0 } });

    expect(chunks.map((c) => [c.index, c.startLine, c.endLine, c.text])).toEqual([
      [0, 1, 2, `${header("doc.md")}${"a".repeat(30)}\n${"b".repeat(30)}`],
      [1, 4, 4, `${header("doc.md")}${"c".repeat(10)}`],
    ]);
  });

  it("splits a paragraph longer than twice the target at line ends", () => {
    const line = "x".repeat(40);
    const chunks = chunkDocument({
      path: "long.txt",
      name: "long.txt",
      text: [line, line, line, "tail"].join("\n"),
      options: { targetChars: 50, overlapChars: 0 },
    });

    expect(chunks.map((c) => [c.startLine, c.endLine])).toEqual([
      [1, 2],
      [3, 4],
    ]);
    expect(chunks[1]?.text).toBe(`${header("long.txt")}${line}\ntail`);
  });

  it("splits an overlong line anywhere, keeping the header on every piece", () => {
    const chunks = chunkDocument({
      path: "blob.txt",
      name: "blob.txt",
      text: "z".repeat(230),
      options: { targetChars: 50, overlapChars: 0 },
    });

    expect(chunks.map((c) => [c.startLine, c.endLine, c.text.length - header("blob.txt").length])).toEqual([
      [1, 1, 100],
      [1, 1, 100],
      [1, 1, 30],
    ]);
    expect(chunks.every((c) => c.text.startsWith(header("blob.txt")))).toBe(true);
  });

  it("carries short trailing paragraphs over as overlap", () => {
    const text = ["x".repeat(45), "", "short", "", "y".repeat(45), "", "z"].join("\n");
    const chunks = chunkDocument({ path: "o.txt", name: "o.txt", text, options: { targetChars: 50, overlapChars: 20 } });

    expect(chunks.map((c) => [c.startLine, c.endLine, c.text.slice(header("o.txt").length)])).toEqual([
      [1, 3, `${"x".repeat(45)}\n\nshort`],
      [3, 5, `short\n\n${"y".repeat(45)}`],
      [7, 7, "z"],
    ]);
  });

  it("skips whitespace-only content", () => {
    expect(chunkDocument({ path: "blank.txt", name: "blank.txt", text: "\n\n   \n" })).toEqual([]);
  });
});
