/**
 * Action executor: applies a plan's approved actions, one at a time, in
 * plan order. Every change is pre-logged and finalized in the audit log.
 */

import type { ClassificationDecision } from "../agent/types.js";
import type { AuditLogger } from "../audit/logger.js";
import type { OrganizeConfig } from "../config/schema.js";
import type { PlanStore } from "../plan/store.js";
import { PlanNotFoundError } from "../plan/errors.js";
import type { PlannedAction, PlanStatus } from "../plan/types.js";
import type { FileSource, RemoveMode } from "../sources/types.js";
import { createLogger } from "../utils/logger.js";
import { joinRelPath } from "../utils/paths.js";
import { isProtectedTarget, ProtectedPathError, type ProtectedMatcher } from "./protected.js";

const log = createLogger("executor");

export interface ExecutorDeps {
  source: FileSource;
  store: PlanStore;
  organize: OrganizeConfig;
  audit: AuditLogger;
  isProtected: ProtectedMatcher;
  now?: () => number;
}

export interface ApplyOptions {
  /** Report what would happen without touching files or statuses. */
  dryRun?: boolean;
}

/** Concrete operation an action resolves to. */
export type Operation =
  | { kind: "move"; target: string }
  | { kind: "remove"; mode: RemoveMode }
  | { kind: "flag" };

export interface ActionOutcome {
  actionId: string;
  path: string;
  operation?: Operation["kind"];
  status: "applied" | "failed" | "would-apply";
  message: string;
  resultPath?: string;
}

export interface ApplyResult {
  planId: string;
  dryRun: boolean;
  /** Plan status after the run (unchanged on dry runs). */
  status: PlanStatus;
  outcomes: ActionOutcome[];
}

/**
 * Operation for an action, or the reason it may not run.
 */
export function resolveOperation(
  action: PlannedAction,
  organize: OrganizeConfig,
): { ok: true; op: Operation } | { ok: false; reason: string } {
  const { decision } = action;
  switch (decision.action) {
    case "move":
      if (!decision.targetFolder) return { ok: false, reason: "Move has no target folder" };
      return { ok: true, op: { kind: "move", target: decision.targetFolder } };

    case "delete":
      if (!organize.allowDelete) {
        return { ok: false, reason: "Deletion is disabled (organize.allowDelete is false)" };
      }
      return { ok: true, op: { kind: "remove", mode: organize.deleteMode } };

    case "duplicate":
      switch (organize.duplicates) {
        case "flag":
          return { ok: true, op: { kind: "flag" } };
        case "move":
          return {
            ok: true,
            op: { kind: "move", target: joinRelPath(organize.duplicatesFolder) },
          };
        case "delete":
          if (!organize.allowDelete) {
            return { ok: false, reason: "Deletion is disabled (organize.allowDelete is false)" };
          }
          return { ok: true, op: { kind: "remove", mode: organize.deleteMode } };
      }
      break;

    case "keep":
      break;
  }
  return { ok: false, reason: "Nothing to do for keep" };
}

export function describeOperation(path: string, op: Operation): string {
  switch (op.kind) {
    case "move":
      return `move ${path} -> ${op.target}/`;
    case "remove":
      return op.mode === "trash" ? `trash ${path}` : `delete ${path}`;
    case "flag":
      return `flag ${path} as duplicate`;
  }
}

function auditOperation(op: Operation): string {
  return op.kind === "remove" ? (op.mode === "trash" ? "trash" : "delete") : op.kind;
}

async function originalExists(source: FileSource, decision: ClassificationDecision): Promise<boolean> {
  if (decision.duplicateOfId) return (await source.get(decision.duplicateOfId)) !== null;
  if (decision.duplicateOf) return (await source.stat(decision.duplicateOf)) !== null;
  return false;
}

export async function applyPlan(
  deps: ExecutorDeps,
  planId: string,
  options: ApplyOptions = {},
): Promise<ApplyResult> {
  const now = deps.now ?? Date.now;
  const dryRun = options.dryRun ?? false;

  const plan = deps.store.getPlan(planId);
  if (!plan) throw new PlanNotFoundError(planId);

  const approved = plan.actions.filter((a) => a.status === "approved");
  const outcomes: ActionOutcome[] = [];
  log.info(`${dryRun ? "Dry run of" : "Applying"} plan ${planId}: ${approved.length} approved action(s)`);

  for (const action of approved) {
    const path = action.file.path;
    const fail = (message: string, operation?: Operation["kind"]) => {
      if (!dryRun) deps.store.markFailed(planId, action.id, message, now());
      outcomes.push({ actionId: action.id, path, operation, status: "failed", message });
      log.warn(`Action ${action.id} (${path}) failed: ${message}`);
    };

    const resolved = resolveOperation(action, deps.organize);
    if (!resolved.ok) {
      fail(resolved.reason);
      continue;
    }
    const { op } = resolved;

    if (deps.isProtected(path)) {
      fail(`Protected path cannot be changed: ${path}`, op.kind);
      continue;
    }
    if (op.kind === "move" && isProtectedTarget(deps.isProtected, op.target, action.file.name)) {
      fail(`Protected target folder cannot receive files: ${op.target}`, op.kind);
      continue;
    }

    if (dryRun) {
      const message = `Would ${describeOperation(path, op)}`;
      log.info(message);
      outcomes.push({ actionId: action.id, path, operation: op.kind, status: "would-apply", message });
      continue;
    }

    const pre = await deps.audit.preLog({
      operation: auditOperation(op),
      source: deps.source.kind,
      path,
      target: op.kind === "move" ? op.target : undefined,
      planId,
      actionId: action.id,
      params: { reason: action.decision.reason, confidence: action.decision.confidence },
    });
    const started = now();

    try {
      // Paths are not unique on Drive; act on the file that was reviewed.
      const file = await deps.source.get(action.file.id);
      if (!file) throw new Error(`File no longer exists: ${path}`);
      if (file.path !== path && deps.isProtected(file.path)) throw new ProtectedPathError(file.path);
      if (op.kind === "remove" && action.decision.action === "duplicate") {
        if (!(await originalExists(deps.source, action.decision))) {
          throw new Error(`Original ${action.decision.duplicateOf ?? "?"} no longer exists; keeping this copy`);
        }
      }

      let resultPath: string | undefined;
      if (op.kind === "move") {
        resultPath = (await deps.source.move(file, op.target)).path;
      } else if (op.kind === "remove") {
        await deps.source.remove(file, op.mode);
      }

      deps.store.markApplied(planId, action.id, now(), resultPath);
      await deps.audit.finalize(pre.id, "success", { duration: now() - started });
      const message = describeOperation(path, op);
      outcomes.push({ actionId: action.id, path, operation: op.kind, status: "applied", message, resultPath });
      log.info(`Applied: ${message}`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      await deps.audit.finalize(pre.id, "error", { error: message, duration: now() - started });
      fail(message, op.kind);
    }
  }

  if (dryRun || approved.length === 0) {
    return { planId, dryRun, status: plan.status, outcomes };
  }

  const status: PlanStatus = outcomes.every((o) => o.status === "applied") ? "applied" : "partially-applied";
  deps.store.setPlanStatus(planId, status);
  log.info(`Plan ${planId} ${status}`);
  return { planId, dryRun, status, outcomes };
}
