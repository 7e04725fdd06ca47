/**
 * Candidate records produced by the evidence collector.
 */

export const SOURCE_KINDS = [
  "Fingerprint",
  "MetadataService",
  "ReferenceDB",
  "FileTags",
  "Filename",
] as const;

export type SourceKind = (typeof SOURCE_KINDS)[number];

export const SOURCE_TYPE_CODES = [
  "SBD",
  "AUD",
  "FM",
  "TV",
  "PRO",
  "MATRIX",
  "VINYL",
  "CD",
  "DAT",
] as const;

export type SourceTypeCode = (typeof SOURCE_TYPE_CODES)[number];

export function isSourceTypeCode(value: string): value is SourceTypeCode {
  return SOURCE_TYPE_CODES.some((code) => code === value);
}

/**
 * One hypothesis about a file's identity from one evidence source.
 * Frozen on creation; `sourceKind` never changes.
 */
export interface Candidate {
  readonly sourceKind: SourceKind;
  readonly title: string | null;
  readonly artist: string | null;
  readonly album: string | null;
  readonly trackNumber: number | null;
  /** ISO-8601 date or year only */
  readonly recordingDate: string | null;
  readonly city: string | null;
  readonly venue: string | null;
  readonly sourceTypeCode: SourceTypeCode | null;
  /** Service name -> opaque id */
  readonly externalIds: Readonly<Record<string, string>>;
  /** Source-local confidence (0-1); not comparable across sources until fused */
  readonly rawConfidence: number;
  /** Implied recording duration, when the source knows it */
  readonly durationSeconds: number | null;
  /** Reference data says this recording runs off-speed or off-pitch */
  readonly speedVariance: boolean;
  /** Human-readable lines explaining where the values came from */
  readonly evidence: readonly string[];
}

export type CandidateFields = Partial<Omit<Candidate, "sourceKind" | "rawConfidence">>;

/** Build a frozen candidate, defaulting every unset field to null/empty. */
export function createCandidate(
  sourceKind: SourceKind,
  rawConfidence: number,
  fields: CandidateFields
): Candidate {
  return Object.freeze({
    sourceKind,
    rawConfidence: Math.min(Math.max(rawConfidence, 0), 1),
    title: fields.title ?? null,
    artist: fields.artist ?? null,
    album: fields.album ?? null,
    trackNumber: fields.trackNumber ?? null,
    recordingDate: fields.recordingDate ?? null,
    city: fields.city ?? null,
    venue: fields.venue ?? null,
    sourceTypeCode: fields.sourceTypeCode ?? null,
    externalIds: Object.freeze({ ...(fields.externalIds ?? {}) }),
    durationSeconds: fields.durationSeconds ?? null,
    speedVariance: fields.speedVariance ?? false,
    evidence: Object.freeze([...(fields.evidence ?? [])]),
  });
}

/** Search hints derived from whatever the descriptor already knows */
export interface EvidenceHints {
  title?: string;
  date?: string;
  venue?: string;
}
