import type { Config } from "../config/types.js";
import type { SourceKind } from "../evidence/types.js";
import { titlesAgree } from "../fusion/fuser.js";
import type { TagMap } from "../apply/tag-map.js";
import { buildDestination, zeroPad } from "./template.js";
import type { NormalizationCandidate, NormalizationInput, Normalizer } from "./types.js";
import type { NormalizationOutput } from "./validate.js";

type CandidateField =
  | "title"
  | "artist"
  | "album"
  | "trackNumber"
  | "recordingDate"
  | "city"
  | "venue"
  | "sourceTypeCode";

function firstWith(
  candidates: readonly NormalizationCandidate[],
  field: CandidateField
): NormalizationCandidate | undefined {
  return candidates.find((c) => c[field] !== null);
}

/** Candidates ordered by preferDatesFrom, then by rank. Unlisted kinds go last. */
function byPreference(
  candidates: readonly NormalizationCandidate[],
  order: readonly SourceKind[]
): NormalizationCandidate[] {
  const position = (kind: SourceKind) => {
    const i = order.indexOf(kind);
    return i === -1 ? order.length : i;
  };
  return [...candidates].sort(
    (a, b) => position(a.sourceKind) - position(b.sourceKind) || a.rank - b.rank
  );
}

export function chooseCategory(tags: TagMap, categories: readonly string[]): string {
  const wanted =
    tags.DATE && (tags.VENUE || tags.CITY)
      ? "live"
      : tags.ALBUM
        ? "official"
        : tags.DATE
          ? "outtakes"
          : "unofficial";
  if (categories.includes(wanted)) return wanted;
  if (categories.includes("unofficial")) return "unofficial";
  return categories[0] ?? wanted;
}

/**
 * Deterministic normalization: identity fields from the highest-ranked
 * candidate that has them, date and place from the candidates that agree
 * with the winning title.
 */
export function normalizeByRules(
  input: NormalizationInput,
  config: Readonly<Config>
): NormalizationOutput {
  const { candidates } = input;
  const notes: string[] = [];

  const titleFrom = firstWith(candidates, "title");
  const title = titleFrom?.title ?? null;
  const agreeing =
    title === null ? candidates : candidates.filter((c) => titlesAgree(c.title, title));
  const preferred = byPreference(agreeing, config.fields.preferDatesFrom);

  const artistFrom = firstWith(candidates, "artist");
  const albumFrom = firstWith(candidates, "album");
  const trackFrom = firstWith(candidates, "trackNumber");
  const dateFrom = firstWith(preferred, "recordingDate");
  const venueFrom = firstWith(preferred, "venue");
  const cityFrom =
    venueFrom && venueFrom.city !== null ? venueFrom : firstWith(preferred, "city");
  const sourceFrom = firstWith(preferred, "sourceTypeCode");

  const tags: TagMap = {};
  const set = (key: string, value: string | number | null | undefined) => {
    if (value !== null && value !== undefined && String(value).trim() !== "") {
      tags[key] = String(value).trim();
    }
  };

  set("TITLE", title);
  set("ARTIST", artistFrom?.artist ?? input.existingTags.ARTIST);
  set("ALBUM", albumFrom?.album);
  if (trackFrom && trackFrom.trackNumber !== null) {
    set("TRACKNUMBER", zeroPad(trackFrom.trackNumber));
  }
  set("DATE", dateFrom?.recordingDate);
  set("VENUE", venueFrom?.venue);
  set("CITY", cityFrom?.city);
  set("SOURCE", sourceFrom?.sourceTypeCode);
  set("MUSICBRAINZ_RECORDINGID", agreeing.find((c) => c.externalIds.musicbrainz)?.externalIds.musicbrainz);
  set("ACOUSTID_ID", agreeing.find((c) => c.externalIds.acoustid)?.externalIds.acoustid);

  if (titleFrom) notes.push(`title from ${titleFrom.sourceKind} (#${titleFrom.rank})`);
  if (dateFrom) notes.push(`date from ${dateFrom.sourceKind} (#${dateFrom.rank})`);
  if (venueFrom) notes.push(`venue from ${venueFrom.sourceKind} (#${venueFrom.rank})`);

  const category = chooseCategory(tags, input.categories);
  const template = config.naming.templates[category] ?? "{title}";
  const { directory, filename } = buildDestination(template, tags, input.file.container);

  return {
    tags,
    category,
    directory,
    filename,
    notes,
    confidence: Math.min(Math.max(candidates[0]?.score ?? 0, 0), 1),
  };
}

export class RuleBasedNormalizer implements Normalizer {
  readonly kind = "rule-based";

  constructor(private readonly config: Readonly<Config>) {}

  async normalize(input: NormalizationInput): Promise<NormalizationOutput> {
    return normalizeByRules(input, this.config);
  }
}
