import type { Config } from "./types.js";

export const DEFAULT_CONFIG: Config = {
  paths: {
    root: "~/Music",
    categoryRoots: {
      official: "Official",
      live: "Live",
      outtakes: "Outtakes",
      unofficial: "Unofficial",
    },
  },
  behavior: {
    minAutoScore: 0.5,
    alternateProximity: 0.15,
    memoizeNormalization: false,
    concurrency: 4,
  },
  naming: {
    templates: {
      live: "{date} - {city} - {venue}/{tracknum} {title} [{source}]",
      outtakes: "{date} - {title}",
      official: "{album}/{tracknum} {title}",
      unofficial: "{album}/{tracknum} {title}",
    },
  },
  fields: {
    keepCustomTags: [
      "LINEAGE",
      "TAPER",
      "TRANSFER",
      "COMMENT",
      "REPLAYGAIN_.*", // ReplayGain tags (with wildcard support)
      "R128_.*", // EBU R128 loudness tags
    ],
    preferDatesFrom: [
      "ReferenceDB",
      "MetadataService",
      "FileTags",
      "Fingerprint",
      "Filename",
    ],
  },
  evidence: {
    maxMetadataLookups: 5,
    similarityThreshold: 0.6,
    fingerprintLength: 120,
  },
  fusion: {
    durationToleranceSeconds: 5,
    durationPenalty: 0.5,
  },
  api: {
    acoustidKey: "env:ACOUSTID_API_KEY",
    musicbrainzUserAgent: "tapetag/0.1.0 ( tapetag@localhost )",
  },
  network: {
    timeoutMs: 5000,
  },
  llm: {
    enabled: false,
    provider: "ollama",
    model: "qwen2.5:7b",
    maxTokens: 1024,
    temperature: 0.1,
    timeoutMs: 30000,
  },
};

/** Used when naming.rulesFile is unset or missing */
export const DEFAULT_NAMING_RULES = `Naming rules for a personal live/bootleg library.

Categories:
- live: a concert or broadcast recording with a known date. Requires DATE; VENUE and CITY when known.
- outtakes: studio outtakes, rehearsals and demos. Requires DATE (year is enough).
- official: tracks from a commercially released album. Requires ALBUM.
- unofficial: bootleg compilations and anything that does not fit elsewhere.

Tags:
- DATE is ISO-8601 (YYYY-MM-DD), or the year alone when the day is unknown.
- TRACKNUMBER is two digits, zero-padded ("03").
- SOURCE is one of SBD, AUD, FM, TV, PRO, MATRIX, VINYL, CD, DAT. Omit it when unknown.
- Keep the performer's spelling of titles; drop bracketed lineage notes from TITLE and move them to COMMENT.

Paths:
- directory and filename may only use letters, digits, spaces and - _ ( ) [ ].
- filename has no extension and no path separators.
`;
