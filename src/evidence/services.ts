import type { FetchFn } from "./http.js";
import type { ResponseCache } from "./cache.js";
import type { Fingerprinter } from "./sources/fingerprint.js";
import type { ReferenceStore } from "../reference/types.js";
import { RateLimiter } from "../utils/rate-limit.js";

/**
 * Collaborators the collector reaches out through. Shared across every file
 * in a batch; none of them holds per-file state.
 */
export interface EvidenceServices {
  fetch: FetchFn;
  cache: ResponseCache;
  /** Unset when fpcalc is unavailable; the fingerprint source is skipped */
  fingerprinter?: Fingerprinter;
  /** Unset when no reference database is configured */
  referenceStore?: ReferenceStore;
  limiters: {
    acoustid: RateLimiter;
    musicbrainz: RateLimiter;
  };
  /** Fixed backoff before the single transient retry */
  retryDelayMs: number;
}

/** AcoustID allows 3 requests/second; MusicBrainz 1/second. */
export function createRateLimiters(): EvidenceServices["limiters"] {
  return {
    acoustid: new RateLimiter(334),
    musicbrainz: new RateLimiter(1000),
  };
}
