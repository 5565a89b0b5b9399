/**
 * Classification agent output.
 */

export type DecisionAction = "keep" | "move" | "delete" | "duplicate";

export interface ClassificationDecision {
  action: DecisionAction;
  category: string;
  /** Root-relative destination folder; set for `move`. */
  targetFolder?: string;
  reason: string;
  /** 0..1 */
  confidence: number;
  /** Path of the file this one duplicates. */
  duplicateOf?: string;
  /** Source id of that file; paths are not unique on Drive. */
  duplicateOfId?: string;
}

export const DESTRUCTIVE_ACTIONS: ReadonlySet<DecisionAction> = new Set(["delete", "duplicate"]);
