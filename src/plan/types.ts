import { z } from "zod";
import type { ClassificationDecision } from "../agent/types.js";
import type { FileRecord, SourceKind } from "../sources/types.js";

export type PlanStatus = "open" | "applied" | "partially-applied";

export type ActionStatus = "pending" | "approved" | "rejected" | "applied" | "failed" | "skipped";

/** Statuses a user may set (and move between). */
export type ReviewStatus = "pending" | "approved" | "rejected";

export const REVIEW_STATUSES: readonly ReviewStatus[] = ["pending", "approved", "rejected"];

export interface PlannedAction {
  id: string;
  planId: string;
  /** Position in the plan; actions apply in this order. */
  seq: number;
  /** File as it was when the plan was made. */
  file: FileRecord;
  decision: ClassificationDecision;
  status: ActionStatus;
  error?: string;
  appliedAt?: number;
  /** Path after a successful move. */
  resultPath?: string;
}

export interface Plan {
  id: string;
  source: SourceKind;
  root: string;
  /** Folder the plan was made for ("" = root). */
  folderPath: string;
  createdAt: number;
  status: PlanStatus;
  actions: PlannedAction[];
}

export type ActionCounts = Record<ActionStatus, number>;

export interface PlanSummary extends Omit<Plan, "actions"> {
  counts: ActionCounts;
}

export function emptyCounts(): ActionCounts {
  return { pending: 0, approved: 0, rejected: 0, applied: 0, failed: 0, skipped: 0 };
}

export function countActions(actions: readonly PlannedAction[]): ActionCounts {
  const counts = emptyCounts();
  for (const a of actions) counts[a.status]++;
  return counts;
}

// Stored JSON columns are validated on the way out of the database.

export const fileRecordSchema = z.object({
  id: z.string(),
  path: z.string(),
  name: z.string(),
  mimeType: z.string(),
  size: z.number(),
  modifiedTime: z.string(),
  createdTime: z.string().optional(),
  owner: z.string().optional(),
  isFolder: z.boolean(),
  contentHash: z.string().optional(),
  parentId: z.string().optional(),
});

export const decisionSchema = z.object({
  action: z.enum(["keep", "move", "delete", "duplicate"]),
  category: z.string(),
  targetFolder: z.string().optional(),
  reason: z.string(),
  confidence: z.number(),
  duplicateOf: z.string().optional(),
  duplicateOfId: z.string().optional(),
});
