/**
 * Splits a file's text into retrieval chunks.
 *
 * Paragraphs (runs of non-blank lines) are packed into a chunk until it
 * reaches the target size. A paragraph longer than twice the target is split
 * at line ends, and a line longer than that is split anywhere. Every chunk
 * starts with the file header so a retrieved chunk always names its file;
 * the header does not count towards the target.
 */

export interface DocumentChunk {
  /** Root-relative path (posix style). */
  path: string;
  /** File name quoted in the header. */
  name: string;
  /** Position of the chunk within its file, from 0. */
  index: number;
  /** Lines of the file text covered, 1-indexed inclusive. */
  startLine: number;
  endLine: number;
  /** Header plus body. */
  text: string;
}

export interface ChunkingOptions {
  /** Rough target body size (characters). */
  targetChars?: number;
  /** Paragraphs carried over from the previous chunk, up to this many characters. */
  overlapChars?: number;
}

interface Block {
  startLine: number;
  endLine: number;
  text: string;
}

const PARAGRAPH_SEPARATOR = "\n\n";

export function documentHeader(name: string): string {
  return `This content is from the file ${name}:${PARAGRAPH_SEPARATOR}`;
}

function paragraphs(text: string): Block[] {
  const lines = text.split(/\r?\n/);
  const out: Block[] = [];
  let current: string[] = [];
  let start = 1;

  lines.forEach((line, i) => {
    if (line.trim() === "") {
      if (current.length > 0) out.push({ startLine: start, endLine: i, text: current.join("\n").trimEnd() });
      current = [];
      return;
    }
    if (current.length === 0) start = i + 1;
    current.push(line);
  });
  if (current.length > 0) {
    out.push({ startLine: start, endLine: lines.length, text: current.join("\n").trimEnd() });
  }
  return out;
}

function splitBlock(block: Block, maxChars: number): Block[] {
  if (block.text.length <= maxChars) return [block];

  const out: Block[] = [];
  let current: string[] = [];
  let currentChars = 0;
  let start = block.startLine;
  const lines = block.text.split("\n");

  for (const [i, line] of lines.entries()) {
    const lineNo = block.startLine + i;
    if (current.length > 0 && currentChars + line.length + 1 > maxChars) {
      out.push({ startLine: start, endLine: lineNo - 1, text: current.join("\n") });
      current = [];
      currentChars = 0;
    }
    if (line.length > maxChars) {
      for (let at = 0; at < line.length; at += maxChars) {
        out.push({ startLine: lineNo, endLine: lineNo, text: line.slice(at, at + maxChars) });
      }
      continue;
    }
    if (current.length === 0) start = lineNo;
    current.push(line);
    currentChars += line.length + 1;
  }
  if (current.length > 0) {
    out.push({ startLine: start, endLine: block.startLine + lines.length - 1, text: current.join("\n") });
  }
  return out;
}

function bodyChars(blocks: readonly Block[]): number {
  return blocks.reduce((acc, b) => acc + b.text.length + PARAGRAPH_SEPARATOR.length, 0);
}

/** Trailing blocks that fit in `overlapChars`; never the whole chunk. */
function overlapTail(blocks: readonly Block[], overlapChars: number): Block[] {
  const tail: Block[] = [];
  let chars = 0;
  for (let i = blocks.length - 1; i > 0; i--) {
    const block = blocks[i];
    if (!block || chars + block.text.length > overlapChars) break;
    tail.unshift(block);
    chars += block.text.length + PARAGRAPH_SEPARATOR.length;
  }
  return tail;
}

export function chunkDocument(params: {
  path: string;
  name: string;
  text: string;
  options?: ChunkingOptions;
}): DocumentChunk[] {
  const targetChars = Math.max(50, params.options?.targetChars ?? 1200);
  const overlapChars = Math.min(
    Math.max(0, params.options?.overlapChars ?? 200),
    Math.floor(targetChars / 2),
  );
  const header = documentHeader(params.name);
  const blocks = paragraphs(params.text).flatMap((b) => splitBlock(b, targetChars * 2));

  const out: DocumentChunk[] = [];
  let current: Block[] = [];
  let fresh = 0;

  const emit = () => {
    const first = current[0];
    const last = current[current.length - 1];
    if (!first || !last) return;
    out.push({
      path: params.path,
      name: params.name,
      index: out.length,
      startLine: first.startLine,
      endLine: last.endLine,
      text: header + current.map((b) => b.text).join(PARAGRAPH_SEPARATOR),
    });
  };

  for (const block of blocks) {
    current.push(block);
    fresh++;
    if (bodyChars(current) >= targetChars) {
      emit();
      current = overlapTail(current, overlapChars);
      fresh = 0;
    }
  }
  if (fresh > 0) emit();

  return out;
}
