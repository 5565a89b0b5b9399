import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import path from "node:path";

import type { SourceKind } from "../sources/types.js";
import { ActionNotFoundError, InvalidTransitionError, PlanNotFoundError } from "./errors.js";
import {
  decisionSchema,
  emptyCounts,
  fileRecordSchema,
  REVIEW_STATUSES,
  type ActionStatus,
  type Plan,
  type PlannedAction,
  type PlanStatus,
  type PlanSummary,
  type ReviewStatus,
} from "./types.js";

export interface PlanStore {
  savePlan(plan: Plan): void;
  getPlan(planId: string): Plan | null;
  /** Newest first. */
  listPlans(limit?: number): PlanSummary[];
  /** User review: moves an action between pending, approved and rejected. */
  setActionStatus(planId: string, actionId: string, status: ReviewStatus): PlannedAction;
  /** Approve every pending action whose decision passes `filter`; returns how many changed. */
  approveAll(planId: string, filter: (action: PlannedAction) => boolean): number;
  markApplied(planId: string, actionId: string, at: number, resultPath?: string): void;
  markFailed(planId: string, actionId: string, error: string, at: number): void;
  setPlanStatus(planId: string, status: PlanStatus): void;
  close(): void;
}

interface PlanRow {
  id: string;
  source: string;
  root: string;
  folder_path: string;
  created_at: number;
  status: string;
}

interface ActionRow {
  id: string;
  plan_id: string;
  seq: number;
  file_json: string;
  decision_json: string;
  status: string;
  error: string | null;
  applied_at: number | null;
  result_path: string | null;
}

const SOURCE_KINDS: readonly SourceKind[] = ["local", "drive"];
const PLAN_STATUSES: readonly PlanStatus[] = ["open", "applied", "partially-applied"];
const ACTION_STATUSES: readonly ActionStatus[] = [
  "pending",
  "approved",
  "rejected",
  "applied",
  "failed",
  "skipped",
];

function oneOf<T extends string>(values: readonly T[], value: string, what: string): T {
  const found = values.find((v) => v === value);
  if (found === undefined) throw new Error(`Corrupt plan store: unknown ${what} '${value}'`);
  return found;
}

function isReviewStatus(status: ActionStatus): status is ReviewStatus {
  return REVIEW_STATUSES.some((s) => s === status);
}

function toAction(row: ActionRow): PlannedAction {
  return {
    id: row.id,
    planId: row.plan_id,
    seq: row.seq,
    file: fileRecordSchema.parse(JSON.parse(row.file_json)),
    decision: decisionSchema.parse(JSON.parse(row.decision_json)),
    status: oneOf(ACTION_STATUSES, row.status, "action status"),
    error: row.error ?? undefined,
    appliedAt: row.applied_at ?? undefined,
    resultPath: row.result_path ?? undefined,
  };
}

function toPlanHeader(row: PlanRow): Omit<Plan, "actions"> {
  return {
    id: row.id,
    source: oneOf(SOURCE_KINDS, row.source, "source"),
    root: row.root,
    folderPath: row.folder_path,
    createdAt: row.created_at,
    status: oneOf(PLAN_STATUSES, row.status, "plan status"),
  };
}

export function createPlanStore(dbPath: string): PlanStore {
  if (dbPath !== ":memory:") mkdirSync(path.dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  db.exec(`
    CREATE TABLE IF NOT EXISTS plans (
      id TEXT PRIMARY KEY,
      source TEXT NOT NULL,
      root TEXT NOT NULL,
      folder_path TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      status TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS actions (
      id TEXT PRIMARY KEY,
      plan_id TEXT NOT NULL REFERENCES plans(id) ON DELETE CASCADE,
      seq INTEGER NOT NULL,
      file_json TEXT NOT NULL,
      decision_json TEXT NOT NULL,
      status TEXT NOT NULL,
      error TEXT,
      applied_at INTEGER,
      result_path TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_actions_plan ON actions(plan_id, seq);
  `);

  const insertPlan = db.prepare<[string, string, string, string, number, string]>(
    "INSERT OR REPLACE INTO plans (id, source, root, folder_path, created_at, status) VALUES (?, ?, ?, ?, ?, ?)",
  );
  const deleteActions = db.prepare<[string]>("DELETE FROM actions WHERE plan_id = ?");
  const insertAction = db.prepare<
    [string, string, number, string, string, string, string | null, number | null, string | null]
  >(
    "INSERT INTO actions (id, plan_id, seq, file_json, decision_json, status, error, applied_at, result_path) " +
      "VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)",
  );
  const selectPlan = db.prepare<[string], PlanRow>("SELECT * FROM plans WHERE id = ?");
  const selectPlans = db.prepare<[number], PlanRow>(
    "SELECT * FROM plans ORDER BY created_at DESC, id DESC LIMIT ?",
  );
  const selectActions = db.prepare<[string], ActionRow>(
    "SELECT * FROM actions WHERE plan_id = ? ORDER BY seq ASC",
  );
  const selectAction = db.prepare<[string, string], ActionRow>(
    "SELECT * FROM actions WHERE plan_id = ? AND id = ?",
  );
  const selectCounts = db.prepare<[string], { status: string; n: number }>(
    "SELECT status, COUNT(*) as n FROM actions WHERE plan_id = ? GROUP BY status",
  );
  const updateStatus = db.prepare<[string, string, string]>(
    "UPDATE actions SET status = ? WHERE plan_id = ? AND id = ?",
  );
  const updateApplied = db.prepare<[number, string | null, string, string]>(
    "UPDATE actions SET status = 'applied', error = NULL, applied_at = ?, result_path = ? WHERE plan_id = ? AND id = ?",
  );
  const updateFailed = db.prepare<[string, number, string, string]>(
    "UPDATE actions SET status = 'failed', error = ?, applied_at = ? WHERE plan_id = ? AND id = ?",
  );
  const updatePlanStatus = db.prepare<[string, string]>("UPDATE plans SET status = ? WHERE id = ?");

  const savePlanTx = db.transaction((plan: Plan) => {
    insertPlan.run(plan.id, plan.source, plan.root, plan.folderPath, plan.createdAt, plan.status);
    deleteActions.run(plan.id);
    for (const a of plan.actions) {
      insertAction.run(
        a.id,
        plan.id,
        a.seq,
        JSON.stringify(a.file),
        JSON.stringify(a.decision),
        a.status,
        a.error ?? null,
        a.appliedAt ?? null,
        a.resultPath ?? null,
      );
    }
  });

  const requirePlan = (planId: string): PlanRow => {
    const row = selectPlan.get(planId);
    if (!row) throw new PlanNotFoundError(planId);
    return row;
  };

  const requireAction = (planId: string, actionId: string): PlannedAction => {
    requirePlan(planId);
    const row = selectAction.get(planId, actionId);
    if (!row) throw new ActionNotFoundError(planId, actionId);
    return toAction(row);
  };

  const approveAllTx = db.transaction(
    (planId: string, filter: (action: PlannedAction) => boolean): number => {
      let changed = 0;
      for (const row of selectActions.all(planId)) {
        const action = toAction(row);
        if (action.status !== "pending" || !filter(action)) continue;
        updateStatus.run("approved", planId, action.id);
        changed++;
      }
      return changed;
    },
  );

  return {
    savePlan(plan) {
      savePlanTx(plan);
    },

    getPlan(planId) {
      const row = selectPlan.get(planId);
      if (!row) return null;
      return { ...toPlanHeader(row), actions: selectActions.all(planId).map(toAction) };
    },

    listPlans(limit = 50) {
      return selectPlans.all(Math.max(1, limit)).map((row) => {
        const counts = emptyCounts();
        for (const c of selectCounts.all(row.id)) {
          counts[oneOf(ACTION_STATUSES, c.status, "action status")] = c.n;
        }
        return { ...toPlanHeader(row), counts };
      });
    },

    setActionStatus(planId, actionId, status) {
      const action = requireAction(planId, actionId);
      if (!isReviewStatus(action.status)) {
        throw new InvalidTransitionError(actionId, action.status, status);
      }
      updateStatus.run(status, planId, actionId);
      return { ...action, status };
    },

    approveAll(planId, filter) {
      requirePlan(planId);
      return approveAllTx(planId, filter);
    },

    markApplied(planId, actionId, at, resultPath) {
      requireAction(planId, actionId);
      updateApplied.run(at, resultPath ?? null, planId, actionId);
    },

    markFailed(planId, actionId, error, at) {
      requireAction(planId, actionId);
      updateFailed.run(error, at, planId, actionId);
    },

    setPlanStatus(planId, status) {
      requirePlan(planId);
      updatePlanStatus.run(status, planId);
    },

    close() {
      db.close();
    },
  };
}
