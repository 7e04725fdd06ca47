import type { LLMProvider } from "../llm/provider.js";
import { CANONICAL_TAGS } from "../apply/tag-map.js";
import { SOURCE_TYPE_CODES } from "../evidence/types.js";
import type { NormalizationInput, Normalizer } from "./types.js";

/**
 * Normalizer backed by a language model. The reply is returned as parsed
 * JSON and validated by the caller.
 */
export class LlmNormalizer implements Normalizer {
  readonly kind = "llm";

  constructor(private provider: LLMProvider) {}

  async normalize(input: NormalizationInput): Promise<unknown> {
    const response = await this.provider.query({
      type: "tag_normalization",
      context: input,
      system: this.buildSystemPrompt(input),
      prompt: this.buildPrompt(input),
    });

    if (!response.success) {
      throw new Error(`${this.provider.name}: ${response.reasoning}`);
    }
    return response.data;
  }

  /**
   * Standing instructions: naming rules plus the reply contract
   */
  private buildSystemPrompt(input: NormalizationInput): string {
    return `You normalize tags and file names for a personal library of live and bootleg audio recordings.

NAMING RULES:
${input.namingRules}

Reply with a single JSON object and nothing else:
{
  "tags": { "TITLE": "...", "ARTIST": "...", ... },
  "category": one of ${input.categories.map((c) => `"${c}"`).join(", ")},
  "directory": "relative directory under the category root, segments separated by /",
  "filename": "file name without extension",
  "notes": ["short reasons for your choices"],
  "confidence": 0.0-1.0
}

RULES:
- Tag keys come from: ${CANONICAL_TAGS.join(", ")}.
- TITLE and ARTIST are required.
- DATE is YYYY-MM-DD, or YYYY when only the year is known.
- SOURCE is one of: ${SOURCE_TYPE_CODES.join(", ")}. Omit it when unknown.
- TRACKNUMBER is two digits ("03").
- directory and filename may only contain letters A-Z a-z, digits, spaces and - _ ( ) [ ].
- filename is a single name: no "/", no "\\", no "..".
- directory is relative: never starts with "/", never contains "..".
- Prefer values from higher-ranked candidates. Only take a date or venue from a candidate whose title agrees with the one you chose.
- Never invent values that no candidate or existing tag supports.`;
  }

  private buildPrompt(input: NormalizationInput): string {
    const { file, existingTags, candidates } = input;
    const duration =
      file.durationSeconds !== null ? `${Math.round(file.durationSeconds)}s` : "unknown";

    return `File: ${file.filename} (${file.container}, ${duration})

Existing tags:
${JSON.stringify(existingTags, null, 2)}

Candidates (best first):
${candidates
  .map(
    (c) =>
      `#${c.rank} ${c.sourceKind} score=${c.score.toFixed(3)}\n${JSON.stringify(
        {
          title: c.title,
          artist: c.artist,
          album: c.album,
          trackNumber: c.trackNumber,
          recordingDate: c.recordingDate,
          city: c.city,
          venue: c.venue,
          sourceTypeCode: c.sourceTypeCode,
          externalIds: c.externalIds,
        },
        null,
        2
      )}`
  )
  .join("\n\n")}

Produce the JSON object for this file.`;
  }
}
