import type { ChatMessage } from "../llm/types.js";
import type { FileRecord } from "../sources/types.js";

export const CLASSIFY_SYSTEM_PROMPT = `You are a file organization assistant. For one file at a time you decide whether it should stay where it is, be moved into a folder, or be deleted because it is redundant or junk.

Answer with a single JSON object and nothing else:
{"action": "keep" | "move" | "delete", "category": "<one of the categories>", "targetFolder": "<folder path relative to the root, only for move>", "reason": "<one short sentence>", "confidence": <number between 0 and 1>}

Prefer existing folders when one fits. Only suggest delete for files that are clearly temporary, empty, or useless.`;

export interface ClassifyPromptInput {
  file: FileRecord;
  text?: string;
  categories: readonly string[];
  existingFolders: readonly string[];
  maxContentChars: number;
}

export function buildClassifyMessages(input: ClassifyPromptInput): ChatMessage[] {
  const { file } = input;
  const lines = [
    `Categories: ${input.categories.join(", ")}`,
    `Existing folders: ${input.existingFolders.length > 0 ? input.existingFolders.join(", ") : "(none)"}`,
    "",
    `File: ${file.name}`,
    `Path: ${file.path}`,
    `Type: ${file.mimeType}`,
    `Size: ${file.size} bytes`,
    `Modified: ${file.modifiedTime || "unknown"}`,
  ];
  if (file.owner) lines.push(`Owner: ${file.owner}`);
  lines.push("");

  const text = input.text?.trim();
  if (text) {
    const clipped = text.length > input.maxContentChars;
    lines.push(
      `Content${clipped ? ` (first ${input.maxContentChars} characters)` : ""}:`,
      "<<<",
      clipped ? text.slice(0, input.maxContentChars) : text,
      ">>>",
    );
  } else {
    lines.push("Content: (not available)");
  }

  return [
    { role: "system", content: CLASSIFY_SYSTEM_PROMPT },
    { role: "user", content: lines.join("\n") },
  ];
}

export const SUGGEST_SYSTEM_PROMPT = `You reorganize files into a clear folder structure based on what they contain.

Answer with a single JSON object mapping folder names to the file names that belong in them, and nothing else, for example:
{"folder": ["file1", "file2"]}

Use only the file names listed. Put every file in exactly one folder.`;

export function buildSuggestMessages(
  files: ReadonlyArray<{ path: string; opening?: string }>,
): ChatMessage[] {
  const blocks = files.map((f) =>
    f.opening ? `File: ${f.path}\n${f.opening}` : `File: ${f.path}\n(no text content)`,
  );
  return [
    { role: "system", content: SUGGEST_SYSTEM_PROMPT },
    {
      role: "user",
      content: `Suggest a reorganized folder structure for these files.\n\n${blocks.join("\n\n---\n\n")}`,
    },
  ];
}

export function chatSystemPrompt(context: ReadonlyArray<{ path: string; text: string }>): string {
  const intro =
    "You answer questions about the user's files. Use the excerpts below; " +
    "if they do not contain the answer, say you don't know. Mention the files you used.";
  if (context.length === 0) return `${intro}\n\n(No matching excerpts.)`;
  const excerpts = context.map((c) => `[${c.path}]\n${c.text}`).join("\n\n");
  return `${intro}\n\n${excerpts}`;
}
