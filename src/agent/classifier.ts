/**
 * Classification agent: one model call per file, then a fixed policy that
 * turns low-confidence or no-op answers into `keep`.
 */

import type { OrganizeConfig } from "../config/schema.js";
import { isProtectedTarget, type ProtectedMatcher } from "../executor/protected.js";
import type { LLMClient } from "../llm/types.js";
import type { FileRecord } from "../sources/types.js";
import { createLogger } from "../utils/logger.js";
import { joinRelPath, normalizeRelPath, parentRelPath } from "../utils/paths.js";
import { parseDecision } from "./decision.js";
import { buildClassifyMessages } from "./prompts.js";
import type { ClassificationDecision } from "./types.js";

const log = createLogger("classifier");

export interface ClassifierDeps {
  llm: LLMClient;
  organize: OrganizeConfig;
  isProtected: ProtectedMatcher;
}

export interface ClassifyInput {
  file: FileRecord;
  /** Extracted text, when the file has any. */
  text?: string;
  existingFolders: readonly string[];
}

function keep(decision: ClassificationDecision, reason: string): ClassificationDecision {
  return {
    action: "keep",
    category: decision.category,
    reason,
    confidence: decision.confidence,
  };
}

/**
 * Post-parse rules, in order: protected paths stay; low confidence stays;
 * a move gets a default target under `targetRoot`; a move to the current
 * folder or into a protected folder stays.
 */
export function applyPolicy(
  file: FileRecord,
  decision: ClassificationDecision,
  organize: OrganizeConfig,
  isProtected: ProtectedMatcher,
): ClassificationDecision {
  if (decision.action === "keep") return decision;

  if (isProtected(file.path)) {
    return keep(decision, `Protected path (was: ${decision.action})`);
  }

  if (decision.confidence < organize.minConfidence) {
    return keep(
      decision,
      `Low confidence ${decision.confidence.toFixed(2)} for ${decision.action}: ${decision.reason}`,
    );
  }

  if (decision.action !== "move") return decision;

  const target = normalizeRelPath(
    decision.targetFolder ?? joinRelPath(organize.targetRoot, decision.category),
  );
  if (target === parentRelPath(file.path)) {
    return keep(decision, `Already in ${target || "the root folder"}`);
  }
  if (isProtectedTarget(isProtected, target, file.name)) {
    return keep(decision, `Protected target folder ${target}`);
  }
  return { ...decision, targetFolder: target };
}

/** Classify one file. Never throws: failures become `keep` with confidence 0. */
export async function classifyFile(
  deps: ClassifierDeps,
  input: ClassifyInput,
): Promise<ClassificationDecision> {
  const { file } = input;
  const messages = buildClassifyMessages({
    file,
    text: input.text,
    categories: deps.organize.categories,
    existingFolders: input.existingFolders,
    maxContentChars: deps.organize.maxContentChars,
  });

  let reply: string;
  try {
    reply = (await deps.llm.complete(messages)).content;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.warn(`Classification failed for ${file.path}: ${message}`);
    return { action: "keep", category: "Uncategorized", reason: `Model error: ${message}`, confidence: 0 };
  }

  const parsed = parseDecision(reply, deps.organize.categories);
  if (!parsed.ok) {
    log.warn(`Unusable reply for ${file.path}: ${parsed.error}`);
    return { action: "keep", category: "Uncategorized", reason: `Unparseable reply: ${parsed.error}`, confidence: 0 };
  }

  const decision = applyPolicy(file, parsed.decision, deps.organize, deps.isProtected);
  log.debug(`${file.path}: ${decision.action} (${decision.confidence}) ${decision.reason}`);
  return decision;
}
