/**
 * Canonical tag schema and its mapping onto each tag model.
 *
 * | canonical               | vorbis (FLAC/Ogg)     | id3v2 frame / ffmpeg key              | mp4 atom / ffmpeg key |
 * |-------------------------|-----------------------|---------------------------------------|-----------------------|
 * | ARTIST                  | ARTIST                | TPE1 / artist                         | ©ART / artist         |
 * | TITLE                   | TITLE                 | TIT2 / title                          | ©nam / title          |
 * | ALBUM                   | ALBUM                 | TALB / album                          | ©alb / album          |
 * | DATE                    | DATE                  | TDRC / date                           | ©day / date           |
 * | TRACKNUMBER             | TRACKNUMBER           | TRCK / track                          | trkn / track          |
 * | COMMENT                 | COMMENT               | COMM / comment                        | ©cmt / comment        |
 * | CITY                    | CITY                  | TXXX:CITY / CITY                      | CITY (mdta)           |
 * | VENUE                   | VENUE                 | TXXX:VENUE / VENUE                    | VENUE (mdta)          |
 * | SOURCE                  | SOURCE                | TXXX:SOURCE / SOURCE                  | SOURCE (mdta)         |
 * | MUSICBRAINZ_RECORDINGID | MUSICBRAINZ_TRACKID   | TXXX:MusicBrainz Recording Id         | same (mdta)           |
 * | ACOUSTID_ID             | ACOUSTID_ID           | TXXX:Acoustid Id                      | same (mdta)           |
 */

import type { TagModel } from "../config/types.js";

export const CANONICAL_TAGS = [
  "ARTIST",
  "TITLE",
  "DATE",
  "CITY",
  "VENUE",
  "SOURCE",
  "ALBUM",
  "TRACKNUMBER",
  "MUSICBRAINZ_RECORDINGID",
  "ACOUSTID_ID",
  "COMMENT",
] as const;

export type CanonicalTag = (typeof CANONICAL_TAGS)[number];

/** Canonical tag map; keys outside the schema are carried through untouched */
export type TagMap = Record<string, string>;

interface TagKeyMapping {
  /** Key/frame id as it appears in the file (what music-metadata reports) */
  native: string;
  /** Key to hand the writer (metaflac --set-tag or ffmpeg -metadata) */
  write: string;
}

const VORBIS: Record<CanonicalTag, TagKeyMapping> = {
  ARTIST: { native: "ARTIST", write: "ARTIST" },
  TITLE: { native: "TITLE", write: "TITLE" },
  DATE: { native: "DATE", write: "DATE" },
  CITY: { native: "CITY", write: "CITY" },
  VENUE: { native: "VENUE", write: "VENUE" },
  SOURCE: { native: "SOURCE", write: "SOURCE" },
  ALBUM: { native: "ALBUM", write: "ALBUM" },
  TRACKNUMBER: { native: "TRACKNUMBER", write: "TRACKNUMBER" },
  MUSICBRAINZ_RECORDINGID: { native: "MUSICBRAINZ_TRACKID", write: "MUSICBRAINZ_TRACKID" },
  ACOUSTID_ID: { native: "ACOUSTID_ID", write: "ACOUSTID_ID" },
  COMMENT: { native: "COMMENT", write: "COMMENT" },
};

const ID3V2: Record<CanonicalTag, TagKeyMapping> = {
  ARTIST: { native: "TPE1", write: "artist" },
  TITLE: { native: "TIT2", write: "title" },
  DATE: { native: "TDRC", write: "date" },
  CITY: { native: "TXXX:CITY", write: "CITY" },
  VENUE: { native: "TXXX:VENUE", write: "VENUE" },
  SOURCE: { native: "TXXX:SOURCE", write: "SOURCE" },
  ALBUM: { native: "TALB", write: "album" },
  TRACKNUMBER: { native: "TRCK", write: "track" },
  MUSICBRAINZ_RECORDINGID: {
    native: "TXXX:MusicBrainz Recording Id",
    write: "MusicBrainz Recording Id",
  },
  ACOUSTID_ID: { native: "TXXX:Acoustid Id", write: "Acoustid Id" },
  COMMENT: { native: "COMM", write: "comment" },
};

const MP4: Record<CanonicalTag, TagKeyMapping> = {
  ARTIST: { native: "©ART", write: "artist" },
  TITLE: { native: "©nam", write: "title" },
  DATE: { native: "©day", write: "date" },
  CITY: { native: "CITY", write: "CITY" },
  VENUE: { native: "VENUE", write: "VENUE" },
  SOURCE: { native: "SOURCE", write: "SOURCE" },
  ALBUM: { native: "©alb", write: "album" },
  TRACKNUMBER: { native: "trkn", write: "track" },
  MUSICBRAINZ_RECORDINGID: {
    native: "MusicBrainz Recording Id",
    write: "MusicBrainz Recording Id",
  },
  ACOUSTID_ID: { native: "Acoustid Id", write: "Acoustid Id" },
  COMMENT: { native: "©cmt", write: "comment" },
};

const TABLES: Record<Exclude<TagModel, "none">, Record<CanonicalTag, TagKeyMapping>> = {
  vorbis: VORBIS,
  id3v2: ID3V2,
  mp4: MP4,
};

export function isCanonicalTag(key: string): key is CanonicalTag {
  return CANONICAL_TAGS.some((tag) => tag === key);
}

/**
 * Key to pass to the writer for a canonical tag. Non-canonical keys are
 * passed through unchanged.
 */
export function writeKeyFor(model: TagModel, key: string): string {
  if (model === "none" || !isCanonicalTag(key)) return key;
  return TABLES[model][key].write;
}

/**
 * Canonical key for a native key read from a file. Unknown keys come back
 * upper-cased with any TXXX:/iTunes freeform prefix removed.
 */
export function canonicalKeyFor(model: TagModel, nativeKey: string): string {
  if (model !== "none") {
    const table = TABLES[model];
    for (const key of CANONICAL_TAGS) {
      if (table[key].native.toLowerCase() === nativeKey.toLowerCase()) {
        return key;
      }
    }
  }
  return nativeKey
    .replace(/^TXXX:/i, "")
    .replace(/^----:com\.apple\.iTunes:/i, "")
    .toUpperCase();
}

/** Case-insensitive tag lookup; empty values count as missing */
export function getTag(tags: Readonly<Record<string, string>>, key: string): string | undefined {
  const direct = tags[key.toUpperCase()];
  if (direct !== undefined) return direct.trim() || undefined;
  const match = Object.keys(tags).find((k) => k.toUpperCase() === key.toUpperCase());
  if (match === undefined) return undefined;
  return tags[match].trim() || undefined;
}
