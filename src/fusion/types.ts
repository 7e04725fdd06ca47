import type { Candidate } from "../evidence/types.js";

export interface ScoredCandidate {
  readonly candidate: Candidate;
  /** Weighted, possibly penalized, cross-source score (0-1) */
  readonly score: number;
  readonly sourceWeight: number;
  /** Agreements with other candidates on date, venue and title */
  readonly corroboration: number;
  readonly durationPenalized: boolean;
  /** Position in the collector's output; last tie-break */
  readonly inputIndex: number;
}

export interface FusedDecision {
  /** Best first; never empty when at least one candidate was fused */
  readonly ranked: readonly ScoredCandidate[];
}
