import { z } from "zod";
import type { ClassificationDecision } from "./types.js";

/** Shape the model is asked to answer with. */
const modelDecisionSchema = z.object({
  action: z.preprocess(
    (v) => (typeof v === "string" ? v.trim().toLowerCase() : v),
    z.enum(["keep", "move", "delete"]),
  ),
  category: z.string().trim().min(1),
  targetFolder: z
    .string()
    .nullish()
    .transform((v) => (v && v.trim() ? v.trim() : undefined)),
  reason: z.string().default(""),
  confidence: z.coerce.number().min(0).max(1),
});

export type ParseDecisionResult =
  | { ok: true; decision: ClassificationDecision }
  | { ok: false; error: string };

/**
 * First balanced `{...}` in `text`, honouring string literals.
 * Code fences and chatter around the object are ignored.
 */
export function extractJsonObject(text: string): string | null {
  let start = text.indexOf("{");
  while (start !== -1) {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (inString) {
        if (escaped) escaped = false;
        else if (ch === "\\") escaped = true;
        else if (ch === '"') inString = false;
        continue;
      }
      if (ch === '"') inString = true;
      else if (ch === "{") depth++;
      else if (ch === "}") {
        depth--;
        if (depth === 0) return text.slice(start, i + 1);
      }
    }

    // Unbalanced from here; try the next opening brace.
    start = text.indexOf("{", start + 1);
  }
  return null;
}

/** Parse the JSON object embedded in a model reply. */
export function parseJsonReply(reply: string): { ok: true; value: unknown } | { ok: false; error: string } {
  const raw = extractJsonObject(reply);
  if (!raw) return { ok: false, error: "no JSON object in model reply" };
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (err) {
    return { ok: false, error: `invalid JSON in model reply: ${err instanceof Error ? err.message : String(err)}` };
  }
}

/**
 * Validate a classification reply. Categories are matched case-insensitively
 * against `categories` and take their configured spelling.
 */
export function parseDecision(reply: string, categories: readonly string[]): ParseDecisionResult {
  const json = parseJsonReply(reply);
  if (!json.ok) return json;

  const parsed = modelDecisionSchema.safeParse(json.value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") || "reply";
    return { ok: false, error: `invalid decision (${where}: ${issue?.message ?? "unknown"})` };
  }

  const d = parsed.data;
  const category =
    categories.find((c) => c.toLowerCase() === d.category.toLowerCase()) ?? d.category;

  return {
    ok: true,
    decision: {
      action: d.action,
      category,
      targetFolder: d.action === "move" ? d.targetFolder : undefined,
      reason: d.reason.trim(),
      confidence: d.confidence,
    },
  };
}
