import { describe, expect, it } from "vitest";
import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createSessionTranscriptStore, type TranscriptMessage } from "./session-transcript.js";

async function makeTmpDir() {
  return mkdtemp(join(tmpdir(), "filewise-session-transcript-"));
}

describe("SessionTranscriptStore", () => {
  it("appends and reads messages", async () => {
    const dir = await makeTmpDir();
    const store = createSessionTranscriptStore(dir);

    const m1: TranscriptMessage = { role: "user", content: "where are my invoices?", timestamp: 1 };
    const m2: TranscriptMessage = {
      role: "assistant",
      content: "In Finance/",
      timestamp: 2,
      sources: ["Finance/inv-1.txt"],
    };

    await store.append("s1", m1);
    await store.append("s1", m2);

    expect(await store.readAll("s1")).toEqual([m1, m2]);
  });

  it("getHistory returns last N turns", async () => {
    const dir = await makeTmpDir();
    const store = createSessionTranscriptStore(dir);

    const msgs: TranscriptMessage[] = [
      { role: "user", content: "u1", timestamp: 1 },
      { role: "assistant", content: "a1", timestamp: 2 },
      { role: "user", content: "u2", timestamp: 3 },
      { role: "assistant", content: "a2", timestamp: 4 },
      { role: "user", content: "u3", timestamp: 5 },
      { role: "assistant", content: "a3", timestamp: 6 },
    ];
    for (const m of msgs) await store.append("s1", m);

    expect(await store.getHistory("s1", 2)).toEqual(msgs.slice(2));
  });

  it("clear truncates transcript", async () => {
    const dir = await makeTmpDir();
    const store = createSessionTranscriptStore(dir);

    await store.append("s1", { role: "user", content: "hi", timestamp: 1 });
    await store.clear("s1");

    expect(await store.readAll("s1")).toEqual([]);
  });

  it("returns nothing for an unknown session", async () => {
    const store = createSessionTranscriptStore(await makeTmpDir());
    expect(await store.readAll("missing")).toEqual([]);
  });

  it("skips malformed lines", async () => {
    const dir = await makeTmpDir();
    await writeFile(
      join(dir, "s1.jsonl"),
      [
        '{"role":"user","content":"ok","timestamp":1}',
        "not json",
        '{"role":"system","content":"nope","timestamp":2}',
        "",
      ].join("\n"),
    );
    const store = createSessionTranscriptStore(dir);

    expect(await store.readAll("s1")).toEqual([{ role: "user", content: "ok", timestamp: 1 }]);
  });

  it("keeps session ids inside the sessions directory", async () => {
    const dir = await makeTmpDir();
    const store = createSessionTranscriptStore(dir);

    await store.append("../web:abc", { role: "user", content: "hi", timestamp: 1 });

    const raw = await readFile(join(dir, ".._web_abc.jsonl"), "utf-8");
    expect(raw).toBe('{"role":"user","content":"hi","timestamp":1}\n');
  });
});
