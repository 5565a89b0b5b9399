/**
 * Organize run: scan → duplicate detection → classification → stored plan.
 */

import { ulid } from "ulid";

import { applyPolicy, classifyFile } from "../agent/classifier.js";
import { compareOriginals, duplicateDecision, findDuplicates } from "../agent/duplicates.js";
import type { ClassificationDecision } from "../agent/types.js";
import type { OrganizeConfig } from "../config/schema.js";
import type { ProtectedMatcher } from "../executor/protected.js";
import type { LLMClient } from "../llm/types.js";
import { mayHaveText } from "../sources/mime.js";
import type { FileRecord, FileSource } from "../sources/types.js";
import { createLogger } from "../utils/logger.js";
import { normalizeRelPath } from "../utils/paths.js";
import type { PlanStore } from "./store.js";
import type { ActionStatus, Plan, PlannedAction } from "./types.js";

const log = createLogger("planner");

export interface PlannerDeps {
  source: FileSource;
  llm: LLMClient;
  store: PlanStore;
  organize: OrganizeConfig;
  isProtected: ProtectedMatcher;
  now?: () => number;
  onProgress?: (done: number, total: number, file: FileRecord) => void;
}

export interface CreatePlanOptions {
  /** Root-relative folder to organize (default: the whole root). */
  folderPath?: string;
}

/** Initial review status of a fresh action. */
export function initialStatus(decision: ClassificationDecision, organize: OrganizeConfig): ActionStatus {
  switch (decision.action) {
    case "keep":
      return "skipped";
    case "move":
      return organize.requireApproval ? "pending" : "approved";
    case "delete":
    case "duplicate":
      return "pending";
  }
}

async function readText(source: FileSource, file: FileRecord): Promise<string | undefined> {
  if (!mayHaveText(file.mimeType)) return undefined;
  try {
    return (await source.readContent(file)).text;
  } catch (err) {
    log.warn(`Cannot read ${file.path}; classifying from metadata only`, err);
    return undefined;
  }
}

/**
 * A duplicate group always keeps one copy. When the model proposes deleting
 * the original, its earliest copy is kept instead and the other copies point
 * at that one.
 */
export function keepLastCopies(
  actions: readonly PlannedAction[],
  deps: Pick<PlannerDeps, "organize" | "isProtected">,
): void {
  const byFileId = new Map(actions.map((a) => [a.file.id, a]));
  const copiesByOriginal = new Map<string, PlannedAction[]>();
  for (const action of actions) {
    const originalId = action.decision.action === "duplicate" ? action.decision.duplicateOfId : undefined;
    if (!originalId) continue;
    const copies = copiesByOriginal.get(originalId);
    if (copies) copies.push(action);
    else copiesByOriginal.set(originalId, [action]);
  }

  for (const [originalId, copies] of copiesByOriginal) {
    const original = byFileId.get(originalId);
    if (original?.decision.action !== "delete") continue;

    const [survivor, ...rest] = [...copies].sort((a, b) => compareOriginals(a.file, b.file));
    if (!survivor) continue;
    survivor.decision = {
      action: "keep",
      category: survivor.decision.category,
      reason: `Last copy kept: ${original.file.path} is proposed for deletion`,
      confidence: 1,
    };
    survivor.status = initialStatus(survivor.decision, deps.organize);
    log.info(`Keeping ${survivor.file.path}: original ${original.file.path} is proposed for deletion`);

    for (const copy of rest) {
      copy.decision = applyPolicy(copy.file, duplicateDecision(survivor.file), deps.organize, deps.isProtected);
      copy.status = initialStatus(copy.decision, deps.organize);
    }
  }
}

export async function createPlan(deps: PlannerDeps, options: CreatePlanOptions = {}): Promise<Plan> {
  const now = deps.now ?? Date.now;
  const folderPath = normalizeRelPath(options.folderPath ?? "");

  const entries = await deps.source.list({ folderPath, recursive: true });
  const files = entries.filter((f) => !f.isFolder);
  const existingFolders = entries.filter((f) => f.isFolder).map((f) => f.path);
  const duplicates = findDuplicates(files);

  log.info(
    `Planning ${files.length} file(s) under ${folderPath || "/"} ` +
      `(${duplicates.size} duplicate(s) by content)`,
  );

  const planId = ulid();
  const actions: PlannedAction[] = [];

  for (const [i, file] of files.entries()) {
    const original = duplicates.get(file.id);
    const decision = original
      ? applyPolicy(file, duplicateDecision(original), deps.organize, deps.isProtected)
      : await classifyFile(
          { llm: deps.llm, organize: deps.organize, isProtected: deps.isProtected },
          { file, text: await readText(deps.source, file), existingFolders },
        );

    actions.push({
      id: ulid(),
      planId,
      seq: i,
      file,
      decision,
      status: initialStatus(decision, deps.organize),
    });
    deps.onProgress?.(i + 1, files.length, file);
  }

  keepLastCopies(actions, deps);

  const plan: Plan = {
    id: planId,
    source: deps.source.kind,
    root: deps.source.root,
    folderPath,
    createdAt: now(),
    status: "open",
    actions,
  };
  deps.store.savePlan(plan);
  log.info(`Plan ${plan.id} saved with ${actions.length} action(s)`);
  return plan;
}
