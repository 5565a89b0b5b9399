/**
 * Plain-text rendering for CLI output.
 */

import type { SuggestedStructure } from "../agent/suggest.js";
import type { ApplyResult } from "../executor/executor.js";
import { ActionNotFoundError } from "../plan/errors.js";
import type { Plan, PlannedAction, PlanSummary } from "../plan/types.js";
import type { FileRecord } from "../sources/types.js";

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  const units = ["KB", "MB", "GB", "TB"];
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${units[unit]}`;
}

export function formatFileList(files: readonly FileRecord[]): string {
  if (files.length === 0) return "(empty)";
  return files
    .map((f) => {
      const size = f.isFolder ? "-" : formatSize(f.size);
      return `${size.padStart(9)}  ${f.modifiedTime.slice(0, 10)}  ${f.path}${f.isFolder ? "/" : ""}`;
    })
    .join("\n");
}

function describeDecision(action: PlannedAction): string {
  const { decision } = action;
  switch (decision.action) {
    case "move":
      return `move -> ${decision.targetFolder ?? "?"}/`;
    case "duplicate":
      return `duplicate of ${decision.duplicateOf ?? "?"}`;
    case "delete":
    case "keep":
      return decision.action;
  }
}

export function formatAction(action: PlannedAction): string {
  const head = `${String(action.seq + 1).padStart(3)}. [${action.status}] ${action.file.path}: ${describeDecision(action)}`;
  const detail = `     ${action.decision.category}, ${action.decision.confidence.toFixed(2)}: ${action.decision.reason}`;
  const lines = [head, detail];
  if (action.error) lines.push(`     error: ${action.error}`);
  if (action.resultPath) lines.push(`     now at: ${action.resultPath}`);
  return lines.join("\n");
}

export function formatPlan(plan: Plan): string {
  const header = [
    `Plan ${plan.id} (${plan.status})`,
    `Source: ${plan.source} ${plan.root}${plan.folderPath ? ` / ${plan.folderPath}` : ""}`,
    `Created: ${new Date(plan.createdAt).toISOString()}`,
    "",
  ];
  if (plan.actions.length === 0) return [...header, "(no files)"].join("\n");
  return [...header, ...plan.actions.map(formatAction)].join("\n");
}

export function formatPlanList(plans: readonly PlanSummary[]): string {
  if (plans.length === 0) return "No plans yet. Run `filewise plan`.";
  return plans
    .map((p) => {
      const c = p.counts;
      return (
        `${p.id}  ${new Date(p.createdAt).toISOString()}  ${p.status.padEnd(17)}  ` +
        `pending ${c.pending}, approved ${c.approved}, applied ${c.applied}, failed ${c.failed}`
      );
    })
    .join("\n");
}

export function formatApplyResult(result: ApplyResult): string {
  if (result.outcomes.length === 0) return "No approved actions.";
  const lines = result.outcomes.map((o) => {
    const mark = o.status === "applied" ? "ok" : o.status === "failed" ? "FAILED" : "dry-run";
    return `${mark.padEnd(7)} ${o.message}`;
  });
  if (!result.dryRun) lines.push("", `Plan ${result.planId} is now ${result.status}.`);
  return lines.join("\n");
}

export function formatSuggestion(structure: SuggestedStructure): string {
  const lines: string[] = [];
  for (const [folder, files] of Object.entries(structure.folders)) {
    lines.push(`${folder}/`);
    for (const f of files) lines.push(`  ${f}`);
  }
  if (structure.unassigned.length > 0) {
    lines.push("(unassigned)");
    for (const f of structure.unassigned) lines.push(`  ${f}`);
  }
  return lines.length > 0 ? lines.join("\n") : "No suggestion.";
}

/**
 * Resolve action references given on the command line: an action id or the
 * 1-based number shown by `filewise show`.
 */
export function resolveActionRefs(plan: Plan, refs: readonly string[]): string[] {
  return refs.map((ref) => {
    const byId = plan.actions.find((a) => a.id === ref);
    if (byId) return byId.id;
    if (/^\d+$/.test(ref)) {
      const bySeq = plan.actions.find((a) => a.seq === Number.parseInt(ref, 10) - 1);
      if (bySeq) return bySeq.id;
    }
    throw new ActionNotFoundError(plan.id, ref);
  });
}
