import type { AudioFileDescriptor } from "../config/types.js";
import type { ScoredCandidate } from "../fusion/types.js";
import type { NormalizationCandidate, NormalizationInput } from "./types.js";

function toNormalizationCandidate(s: ScoredCandidate, rank: number): NormalizationCandidate {
  const c = s.candidate;
  return {
    rank,
    score: s.score,
    sourceKind: c.sourceKind,
    title: c.title,
    artist: c.artist,
    album: c.album,
    trackNumber: c.trackNumber,
    recordingDate: c.recordingDate,
    city: c.city,
    venue: c.venue,
    sourceTypeCode: c.sourceTypeCode,
    externalIds: { ...c.externalIds },
    durationSeconds: c.durationSeconds,
    speedVariance: c.speedVariance,
    evidence: [...c.evidence],
  };
}

/** Build the normalizer input; candidates keep the order given. */
export function buildNormalizationInput(
  ranked: readonly ScoredCandidate[],
  descriptor: AudioFileDescriptor,
  namingRules: string,
  categories: readonly string[]
): NormalizationInput {
  return {
    file: {
      filename: descriptor.rawFilename,
      container: descriptor.container,
      durationSeconds: descriptor.durationSeconds ?? null,
      bitrate: descriptor.bitrate ?? null,
      sampleRate: descriptor.sampleRate ?? null,
      channelCount: descriptor.channelCount ?? null,
    },
    existingTags: { ...descriptor.existingTags },
    candidates: ranked.map((s, i) => toNormalizationCandidate(s, i + 1)),
    namingRules,
    categories: [...categories],
  };
}

/** Move one candidate to the front, keeping the rest in order. */
export function promote(
  ranked: readonly ScoredCandidate[],
  index: number
): ScoredCandidate[] {
  const chosen = ranked[index];
  if (chosen === undefined) return [...ranked];
  return [chosen, ...ranked.filter((_, i) => i !== index)];
}
