import type { SourceKind, SourceTypeCode } from "../evidence/types.js";

/** What the normalizer knows about the file itself */
export interface NormalizationFile {
  filename: string;
  container: string;
  durationSeconds: number | null;
  bitrate: number | null;
  sampleRate: number | null;
  channelCount: number | null;
}

/** A fused candidate flattened for the normalizer; rank 1 is the best */
export interface NormalizationCandidate {
  rank: number;
  score: number;
  sourceKind: SourceKind;
  title: string | null;
  artist: string | null;
  album: string | null;
  trackNumber: number | null;
  recordingDate: string | null;
  city: string | null;
  venue: string | null;
  sourceTypeCode: SourceTypeCode | null;
  externalIds: Record<string, string>;
  durationSeconds: number | null;
  speedVariance: boolean;
  evidence: string[];
}

/** JSON-serializable; identical inputs serialize identically */
export interface NormalizationInput {
  file: NormalizationFile;
  existingTags: Record<string, string>;
  candidates: NormalizationCandidate[];
  namingRules: string;
  /** Configured category names the output must choose from */
  categories: string[];
}

/**
 * Turns ranked evidence into one tag set and destination. The result is
 * untrusted until it passes `validateNormalization`.
 */
export interface Normalizer {
  readonly kind: "llm" | "rule-based";
  normalize(input: NormalizationInput): Promise<unknown>;
}
