import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { z } from "zod";
import type { Config } from "../../config/types.js";
import type { EvidenceServices } from "../services.js";
import { createCandidate, type Candidate } from "../types.js";
import { ResponseCache } from "../cache.js";
import { getJson, isTransient } from "../http.js";
import { SourceUnavailableError, errorMessage } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { sleep } from "../../utils/timeout.js";

const execFileAsync = promisify(execFile);

const ACOUSTID_URL = "https://api.acoustid.org/v2/lookup";

export interface AcousticFingerprint {
  fingerprint: string;
  /** Seconds, as reported by fpcalc */
  duration: number;
}

export interface Fingerprinter {
  fingerprint(filePath: string, lengthSeconds: number): Promise<AcousticFingerprint>;
}

const fpcalcSchema = z.object({
  duration: z.number(),
  fingerprint: z.string().min(1),
});

/** Chromaprint's fpcalc, run once per file */
export class FpcalcFingerprinter implements Fingerprinter {
  constructor(private readonly timeoutMs: number) {}

  async fingerprint(filePath: string, lengthSeconds: number): Promise<AcousticFingerprint> {
    const { stdout } = await execFileAsync(
      "fpcalc",
      ["-json", "-length", String(lengthSeconds), filePath],
      { timeout: this.timeoutMs, maxBuffer: 4 * 1024 * 1024 }
    );
    return fpcalcSchema.parse(JSON.parse(stdout));
  }
}

const acoustidSchema = z.object({
  status: z.string(),
  error: z.object({ message: z.string() }).optional(),
  results: z
    .array(
      z.object({
        id: z.string(),
        score: z.number(),
        recordings: z
          .array(
            z.object({
              id: z.string(),
              title: z.string().optional(),
              duration: z.number().optional(),
              artists: z.array(z.object({ name: z.string() })).optional(),
            })
          )
          .optional(),
      })
    )
    .optional(),
});

/** One (AcoustID result, MusicBrainz recording) pair */
export interface FingerprintMatch {
  acoustidId: string;
  recordingId: string;
  score: number;
  title: string | null;
  artist: string | null;
  durationSeconds: number | null;
}

/**
 * Look a fingerprint up on AcoustID. Transient failures are retried once
 * after a fixed delay; anything else propagates.
 */
export async function lookupAcoustid(
  fp: AcousticFingerprint,
  config: Readonly<Config>,
  services: EvidenceServices
): Promise<FingerprintMatch[]> {
  const apiKey = config.api.acoustidKey;
  if (!apiKey) {
    throw new SourceUnavailableError("Fingerprint", "no AcoustID API key configured");
  }

  const params = new URLSearchParams({
    client: apiKey,
    meta: "recordings",
    format: "json",
    duration: String(Math.round(fp.duration)),
    fingerprint: fp.fingerprint,
  });
  const url = `${config.api.acoustidUrl ?? ACOUSTID_URL}?${params}`;

  const request = async (): Promise<unknown> => {
    await services.limiters.acoustid.acquire();
    return getJson(services.fetch, url, {
      timeoutMs: config.network.timeoutMs,
      label: "AcoustID lookup",
    });
  };

  const key = ResponseCache.keyFor("acoustid", fp.fingerprint, String(Math.round(fp.duration)));
  const body = await services.cache.getOrFetch(key, async () => {
    try {
      return await request();
    } catch (e) {
      if (!isTransient(e)) throw e;
      logger.debug(`AcoustID transient failure, retrying once: ${errorMessage(e)}`);
      await sleep(services.retryDelayMs);
      return request();
    }
  });

  const data = acoustidSchema.parse(body);
  if (data.status !== "ok") {
    throw new Error(`AcoustID error: ${data.error?.message ?? data.status}`);
  }

  const matches: FingerprintMatch[] = [];
  for (const result of data.results ?? []) {
    for (const recording of result.recordings ?? []) {
      matches.push({
        acoustidId: result.id,
        recordingId: recording.id,
        score: result.score,
        title: recording.title ?? null,
        artist: recording.artists?.map((a) => a.name).join(", ") || null,
        durationSeconds: recording.duration ?? null,
      });
    }
  }
  // Stable: equal scores keep response order
  return matches.sort((a, b) => b.score - a.score);
}

export function fingerprintCandidate(match: FingerprintMatch): Candidate {
  return createCandidate("Fingerprint", match.score, {
    title: match.title,
    artist: match.artist,
    durationSeconds: match.durationSeconds,
    externalIds: { acoustid: match.acoustidId, musicbrainz: match.recordingId },
    evidence: [
      `AcoustID ${match.acoustidId} score ${match.score.toFixed(2)} -> recording ${match.recordingId}`,
    ],
  });
}
