import type { ProposalOption } from "../decision/types.js";

export type ApplyOutcome =
  | "Applied"
  | "Skipped"
  | "QuarantinedDuplicate"
  | "QuarantinedUnresolved"
  | "Failed";

/** Where in the gate a file stopped */
export type ApplyStage =
  | "propose"
  | "approve"
  | "duplicate-check"
  | "mkdir"
  | "copy"
  | "tag"
  | "place"
  | "quarantine";

export interface ApplyError {
  readonly stage: ApplyStage;
  /** errno code (EACCES, ENOSPC, ...) or error kind */
  readonly code: string;
  readonly message: string;
}

/** Terminal; a file is never retried within a run */
export interface ApplyResult {
  readonly filePath: string;
  readonly outcome: ApplyOutcome;
  readonly targetPath: string | null;
  readonly error: ApplyError | null;
}

/** Tag-only rewrites in place; copy-place writes a tagged copy at the destination */
export type ApplyMode = "tag-only" | "copy-place";

/** What the human chose for one proposal */
export type Approval =
  | { action: "apply"; option: ProposalOption }
  | { action: "skip" }
  | { action: "quarantine" };
