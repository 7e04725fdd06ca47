import type { AudioFileDescriptor, Config } from "../config/types.js";
import type { Candidate } from "../evidence/types.js";
import type { FusedDecision, ScoredCandidate } from "./types.js";
import {
  AGREEMENT_THRESHOLD,
  SOURCE_PRIORITY,
  SOURCE_WEIGHTS,
  scoreKey,
} from "./weights.js";
import { datesAgree, similarity, titleSimilarity } from "../matching/similarity.js";
import { logger } from "../utils/logger.js";

export function titlesAgree(a: string | null, b: string | null): boolean {
  return a !== null && b !== null && titleSimilarity(a, b) >= AGREEMENT_THRESHOLD;
}

function venuesAgree(a: string | null, b: string | null): boolean {
  return a !== null && b !== null && similarity(a, b) >= AGREEMENT_THRESHOLD;
}

/** Field agreements between one candidate and every other. */
export function corroborationCount(index: number, candidates: readonly Candidate[]): number {
  const c = candidates[index];
  let count = 0;
  candidates.forEach((other, i) => {
    if (i === index) return;
    if (c.recordingDate && other.recordingDate && datesAgree(c.recordingDate, other.recordingDate)) {
      count++;
    }
    if (venuesAgree(c.venue, other.venue)) count++;
    if (titlesAgree(c.title, other.title)) count++;
  });
  return count;
}

/**
 * Whether a reference entry that flags a speed/pitch variance vouches for
 * this candidate's title, exempting it from the duration check.
 */
function hasVarianceExemption(c: Candidate, candidates: readonly Candidate[]): boolean {
  return candidates.some(
    (r) => r.sourceKind === "ReferenceDB" && r.speedVariance && titlesAgree(r.title, c.title)
  );
}

function compareScored(a: ScoredCandidate, b: ScoredCandidate): number {
  const byScore = scoreKey(b.score) - scoreKey(a.score);
  if (byScore !== 0) return byScore;
  if (a.corroboration !== b.corroboration) return b.corroboration - a.corroboration;
  const priority =
    SOURCE_PRIORITY[a.candidate.sourceKind] - SOURCE_PRIORITY[b.candidate.sourceKind];
  if (priority !== 0) return priority;
  return a.inputIndex - b.inputIndex;
}

/**
 * Rank candidates by weighted score. Deterministic: the same candidates in
 * the same order always produce the same ranking.
 */
export function fuse(
  candidates: readonly Candidate[],
  config: Readonly<Config>,
  descriptor?: Pick<AudioFileDescriptor, "durationSeconds">
): FusedDecision {
  const actual = descriptor?.durationSeconds;
  const { durationToleranceSeconds, durationPenalty } = config.fusion;

  const scored = candidates.map((candidate, inputIndex): ScoredCandidate => {
    const sourceWeight = SOURCE_WEIGHTS[candidate.sourceKind];
    let score = sourceWeight * candidate.rawConfidence;

    let durationPenalized = false;
    if (
      actual !== undefined &&
      candidate.durationSeconds !== null &&
      Math.abs(candidate.durationSeconds - actual) > durationToleranceSeconds &&
      !hasVarianceExemption(candidate, candidates)
    ) {
      score *= durationPenalty;
      durationPenalized = true;
    }

    return Object.freeze({
      candidate,
      score,
      sourceWeight,
      corroboration: corroborationCount(inputIndex, candidates),
      durationPenalized,
      inputIndex,
    });
  });

  const ranked = Object.freeze([...scored].sort(compareScored));

  if (logger.isDebugEnabled()) {
    for (const [rank, s] of ranked.entries()) {
      logger.debug(
        `  #${rank + 1} ${s.candidate.sourceKind} "${s.candidate.title ?? "?"}" ` +
          `score=${s.score.toFixed(3)} corroboration=${s.corroboration}` +
          (s.durationPenalized ? " (duration penalty)" : "")
      );
    }
  }

  return Object.freeze({ ranked });
}
