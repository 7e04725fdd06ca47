import type { SourceKind } from "../evidence/types.js";

/**
 * Cross-source weights. A candidate's fused score is
 * `SOURCE_WEIGHTS[kind] × rawConfidence`, before any duration penalty.
 *
 * | source          | weight | raw confidence                                      |
 * |-----------------|--------|-----------------------------------------------------|
 * | Fingerprint     | 1.00   | AcoustID score                                      |
 * | ReferenceDB     | 0.90   | 1.00 for exact date+venue, else similarity ≤ 0.85   |
 * | MetadataService | 0.85   | AcoustID score of the id that led to it             |
 * | FileTags        | 0.60   | 0.70                                                |
 * | Filename        | 0.40   | 0.50                                                |
 *
 * These are chosen constants, not measured ones.
 */
export const SOURCE_WEIGHTS: Readonly<Record<SourceKind, number>> = Object.freeze({
  Fingerprint: 1.0,
  ReferenceDB: 0.9,
  MetadataService: 0.85,
  FileTags: 0.6,
  Filename: 0.4,
});

/** Final tie-break, lower wins */
export const SOURCE_PRIORITY: Readonly<Record<SourceKind, number>> = Object.freeze({
  ReferenceDB: 0,
  MetadataService: 1,
  Fingerprint: 2,
  FileTags: 3,
  Filename: 4,
});

/**
 * Scores compare at nine decimal places. Rounding keeps equality transitive,
 * so the sort order is total.
 */
export function scoreKey(score: number): number {
  return Math.round(score * 1e9);
}

/** Fuzzy-match level at which two titles or venues count as agreeing */
export const AGREEMENT_THRESHOLD = 0.8;
