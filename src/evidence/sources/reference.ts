import type { Config } from "../../config/types.js";
import type { ReferenceRecording, ReferenceStore } from "../../reference/types.js";
import { createCandidate, isSourceTypeCode, type Candidate, type EvidenceHints } from "../types.js";
import { similarity, titleSimilarity } from "../../matching/similarity.js";

/** Raw-confidence ceiling for anything short of an exact date+venue match */
const INEXACT_CEILING = 0.85;

export interface ReferenceScore {
  combined: number;
  exactDateVenue: boolean;
}

function dateScore(hint: string, date: string): number {
  if (hint === date) return 1;
  if (hint.slice(0, 4) === date.slice(0, 4)) return 0.8;
  return 0;
}

/**
 * Average of the hint comparisons that apply: title (best of title and
 * aliases), venue when both sides have one, and date when the dates agree
 * at least on the year. A disagreeing date contributes nothing.
 */
export function scoreReference(hints: EvidenceHints, rec: ReferenceRecording): ReferenceScore {
  const parts: number[] = [];

  const title = hints.title;
  if (title) {
    const titles = [rec.title, ...rec.aliases];
    parts.push(Math.max(...titles.map((t) => titleSimilarity(title, t))));
  }

  let venueSim = 0;
  if (hints.venue && rec.venue) {
    venueSim = similarity(hints.venue, rec.venue);
    parts.push(venueSim);
  }

  let exactDate = false;
  if (hints.date && rec.date) {
    const score = dateScore(hints.date, rec.date);
    if (score > 0) parts.push(score);
    exactDate = score === 1;
  }

  const combined = parts.length === 0 ? 0 : parts.reduce((a, b) => a + b, 0) / parts.length;
  return { combined, exactDateVenue: exactDate && venueSim >= 0.9 };
}

export function referenceCandidate(rec: ReferenceRecording, score: ReferenceScore): Candidate {
  const raw = score.exactDateVenue ? 1.0 : Math.min(score.combined, INEXACT_CEILING);
  const source = rec.sourceType?.toUpperCase() ?? "";

  const evidence = [
    `Reference #${rec.id} "${rec.title}"${rec.date ? ` ${rec.date}` : ""}${rec.venue ? ` at ${rec.venue}` : ""}` +
      ` (match ${score.combined.toFixed(2)}${score.exactDateVenue ? ", exact date+venue" : ""})`,
  ];
  if (rec.speedVariance) evidence.push("known speed/pitch variance");
  if (rec.notes) evidence.push(`notes: ${rec.notes}`);

  return createCandidate("ReferenceDB", raw, {
    title: rec.title,
    recordingDate: rec.date,
    venue: rec.venue,
    city: rec.city,
    sourceTypeCode: isSourceTypeCode(source) ? source : null,
    durationSeconds: rec.durationSeconds,
    speedVariance: rec.speedVariance,
    externalIds: { reference: String(rec.id) },
    evidence,
  });
}

/**
 * Query the reference store and keep every row whose combined similarity
 * clears the threshold, best first.
 */
export async function queryReference(
  store: ReferenceStore,
  hints: EvidenceHints,
  config: Readonly<Config>
): Promise<Candidate[]> {
  const rows = await store.findCandidates(hints);
  return rows
    .map((rec) => ({ rec, score: scoreReference(hints, rec) }))
    .filter(({ score }) => score.combined >= config.evidence.similarityThreshold)
    .sort((a, b) => b.score.combined - a.score.combined || a.rec.id - b.rec.id)
    .map(({ rec, score }) => referenceCandidate(rec, score));
}
