import { z } from "zod";
import type { Config } from "../../config/types.js";
import type { EvidenceServices } from "../services.js";
import { createCandidate, type Candidate } from "../types.js";
import { ResponseCache } from "../cache.js";
import { getJson } from "../http.js";
import type { FingerprintMatch } from "./fingerprint.js";

const MUSICBRAINZ_URL = "https://musicbrainz.org/ws/2";

const recordingSchema = z.object({
  id: z.string(),
  title: z.string(),
  length: z.number().nullable().optional(),
  disambiguation: z.string().optional(),
  "first-release-date": z.string().optional(),
  "artist-credit": z
    .array(z.object({ name: z.string(), joinphrase: z.string().optional() }))
    .optional(),
  releases: z
    .array(
      z.object({
        id: z.string(),
        title: z.string(),
        date: z.string().optional(),
        status: z.string().nullable().optional(),
      })
    )
    .optional(),
});

export type MusicBrainzRecording = z.infer<typeof recordingSchema>;

export interface DisambiguationInfo {
  live: boolean;
  date: string | null;
  venue: string | null;
  city: string | null;
}

/**
 * Parse a recording disambiguation such as
 * "live, 1983-08-03: First Avenue, Minneapolis, MN, USA".
 */
export function parseDisambiguation(text: string | undefined): DisambiguationInfo {
  const info: DisambiguationInfo = { live: false, date: null, venue: null, city: null };
  if (!text) return info;

  info.live = /\blive\b/i.test(text);
  info.date = text.match(/\b(\d{4}(?:-\d{2}(?:-\d{2})?)?)\b/)?.[1] ?? null;

  const colon = text.indexOf(":");
  if (colon >= 0) {
    const place = text
      .slice(colon + 1)
      .split(",")
      .map((p) => p.trim())
      .filter(Boolean);
    info.venue = place[0] ?? null;
    info.city = place[1] ?? null;
  }
  return info;
}

/** Fetch one recording by id, rate-limited and cached. */
export async function lookupRecording(
  recordingId: string,
  config: Readonly<Config>,
  services: EvidenceServices
): Promise<MusicBrainzRecording> {
  const url =
    `${config.api.musicbrainzUrl ?? MUSICBRAINZ_URL}/recording/${encodeURIComponent(recordingId)}` +
    "?inc=artists+releases&fmt=json";

  const body = await services.cache.getOrFetch(
    ResponseCache.keyFor("musicbrainz", "recording", recordingId),
    async () => {
      await services.limiters.musicbrainz.acquire();
      return getJson(services.fetch, url, {
        headers: {
          Accept: "application/json",
          "User-Agent": config.api.musicbrainzUserAgent,
        },
        timeoutMs: config.network.timeoutMs,
        label: `MusicBrainz recording ${recordingId}`,
      });
    }
  );
  return recordingSchema.parse(body);
}

/**
 * A MetadataService candidate inherits the AcoustID score of the match
 * that led to it.
 */
export function metadataCandidate(recording: MusicBrainzRecording, match: FingerprintMatch): Candidate {
  const place = parseDisambiguation(recording.disambiguation);
  const credits = recording["artist-credit"] ?? [];
  const artist = credits.map((c) => `${c.name}${c.joinphrase ?? ""}`).join("").trim();
  const official = recording.releases?.find((r) => r.status === "Official");
  const release = official ?? recording.releases?.[0];

  const evidence = [`MusicBrainz recording ${recording.id} "${recording.title}"`];
  if (recording.disambiguation) evidence.push(`disambiguation: ${recording.disambiguation}`);
  if (release) evidence.push(`release: ${release.title}${release.date ? ` (${release.date})` : ""}`);

  return createCandidate("MetadataService", match.score, {
    title: recording.title,
    artist: artist || null,
    album: place.live ? null : release?.title ?? null,
    recordingDate: place.date,
    venue: place.venue,
    city: place.city,
    durationSeconds: recording.length ? recording.length / 1000 : null,
    externalIds: { musicbrainz: recording.id, acoustid: match.acoustidId },
    evidence,
  });
}
