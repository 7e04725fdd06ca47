import * as path from "node:path";
import type { AudioFileDescriptor } from "../../config/types.js";
import { createCandidate, isSourceTypeCode, type Candidate, type EvidenceHints } from "../types.js";
import { getTag } from "../../apply/tag-map.js";

/** Confidence assigned to existing tags */
export const FILE_TAGS_CONFIDENCE = 0.7;
/** Confidence assigned to the filename literal */
export const FILENAME_CONFIDENCE = 0.5;

const ISO_DATE = /\b(\d{4}-\d{2}-\d{2})\b/;

/** Leading date-ish prefix of a tag value ("1983-08-03", "1984"), else null */
export function normalizeTagDate(value: string | undefined): string | null {
  return value?.match(/^\d{4}(?:-\d{2}(?:-\d{2})?)?/)?.[0] ?? null;
}

function parseTrackNumber(value: string | undefined): number | null {
  const n = value ? Number.parseInt(value, 10) : Number.NaN;
  return Number.isFinite(n) && n > 0 ? n : null;
}

function stemOf(descriptor: AudioFileDescriptor): string {
  return path.basename(descriptor.rawFilename, path.extname(descriptor.rawFilename));
}

/**
 * Candidate from the file's existing tags. Only produced when the tags
 * carry at least one identifying field.
 */
export function fileTagsCandidate(descriptor: AudioFileDescriptor): Candidate | null {
  const tags = descriptor.existingTags;
  const title = getTag(tags, "TITLE");
  const artist = getTag(tags, "ARTIST");
  const date = normalizeTagDate(getTag(tags, "DATE"));
  const venue = getTag(tags, "VENUE");
  if (!title && !artist && !date && !venue) return null;

  const source = getTag(tags, "SOURCE")?.toUpperCase();
  const externalIds: Record<string, string> = {};
  const mbid = getTag(tags, "MUSICBRAINZ_RECORDINGID");
  const acoustid = getTag(tags, "ACOUSTID_ID");
  if (mbid) externalIds.musicbrainz = mbid;
  if (acoustid) externalIds.acoustid = acoustid;

  return createCandidate("FileTags", FILE_TAGS_CONFIDENCE, {
    title: title ?? null,
    artist: artist ?? null,
    album: getTag(tags, "ALBUM") ?? null,
    trackNumber: parseTrackNumber(getTag(tags, "TRACKNUMBER")),
    recordingDate: date,
    venue: venue ?? null,
    city: getTag(tags, "CITY") ?? null,
    sourceTypeCode: source && isSourceTypeCode(source) ? source : null,
    externalIds,
    evidence: [`existing tags: ${Object.keys(tags).sort().join(", ")}`],
  });
}

/**
 * Candidate from the filename literal: the stem (underscores as spaces) is
 * the title, plus an ISO date if one appears.
 */
export function filenameCandidate(descriptor: AudioFileDescriptor): Candidate | null {
  const title = stemOf(descriptor).replace(/_/g, " ").replace(/\s+/g, " ").trim();
  if (!title) return null;

  return createCandidate("Filename", FILENAME_CONFIDENCE, {
    title,
    recordingDate: title.match(ISO_DATE)?.[1] ?? null,
    evidence: [`filename "${descriptor.rawFilename}"`],
  });
}

/**
 * Best-available search hints for the reference query: existing tags
 * first, then the filename with any track number and date removed.
 */
export function deriveHints(descriptor: AudioFileDescriptor): EvidenceHints {
  const tags = descriptor.existingTags;
  const stem = stemOf(descriptor).replace(/_/g, " ");
  const fileDate = stem.match(ISO_DATE)?.[1];
  const fileTitle = stem
    .replace(ISO_DATE, " ")
    .replace(/^[\s-]+/, "")
    .replace(/^\d{1,3}(?:\s*[-.]\s*|\s+)/, "")
    .replace(/^[\s-]+|[\s-]+$/g, "")
    .replace(/\s+/g, " ");

  const hints: EvidenceHints = {};
  const title = getTag(tags, "TITLE") ?? (fileTitle || undefined);
  const date = normalizeTagDate(getTag(tags, "DATE")) ?? fileDate;
  const venue = getTag(tags, "VENUE");
  if (title) hints.title = title;
  if (date) hints.date = date;
  if (venue) hints.venue = venue;
  return hints;
}
