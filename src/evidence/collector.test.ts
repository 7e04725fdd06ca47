import { describe, it, expect, vi } from "vitest";
import { collect } from "./collector.js";
import { ResponseCache } from "./cache.js";
import type { FetchFn } from "./http.js";
import type { EvidenceServices } from "./services.js";
import type { Fingerprinter } from "./sources/fingerprint.js";
import type { ReferenceRecording, ReferenceStore } from "../reference/types.js";
import { createDescriptor } from "../audio/audio.js";
import { DEFAULT_CONFIG } from "../config/defaults.js";
import { finalizeConfig, mergeConfig } from "../config/config.js";
import { RateLimiter } from "../utils/rate-limit.js";

const config = finalizeConfig(
  mergeConfig(DEFAULT_CONFIG, { api: { acoustidKey: "test-secret" } }),
  {}
);

const acoustidBody = {
  status: "ok",
  results: [
    {
      id: "acoustid-1",
      score: 0.92,
      recordings: [
        { id: "mbid-1", title: "Purple Rain", duration: 296, artists: [{ name: "Prince" }] },
      ],
    },
  ],
};

const musicbrainzBody = {
  id: "mbid-1",
  title: "Purple Rain",
  length: 296000,
  disambiguation: "live, 1983-08-03: First Avenue, Minneapolis",
  "artist-credit": [{ name: "Prince" }],
  releases: [],
};

const purpleRain: ReferenceRecording = {
  id: 7,
  title: "Purple Rain",
  aliases: [],
  date: "1983-08-03",
  venue: "First Avenue",
  city: "Minneapolis",
  durationSeconds: 296,
  sourceType: "SBD",
  speedVariance: false,
  notes: null,
};

const descriptor = createDescriptor("/in/purple_rain.flac", {
  durationSeconds: 296,
  existingTags: { TITLE: "Purple Rain", ARTIST: "Prince", DATE: "1984" },
});

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

const fingerprinter: Fingerprinter = {
  fingerprint: async () => ({ fingerprint: "AQAB-test", duration: 296 }),
};

function storeReturning(rows: ReferenceRecording[]): ReferenceStore {
  return {
    findCandidates: async () => rows,
    close: async () => {},
  };
}

function services(fetchFn: FetchFn, overrides: Partial<EvidenceServices> = {}): EvidenceServices {
  return {
    fetch: fetchFn,
    cache: new ResponseCache(),
    fingerprinter,
    referenceStore: storeReturning([purpleRain]),
    limiters: { acoustid: new RateLimiter(0), musicbrainz: new RateLimiter(0) },
    retryDelayMs: 0,
    ...overrides,
  };
}

function routes(handlers: { acoustid: () => Response; musicbrainz: (url: string) => Response }) {
  return vi.fn(async (url: string) =>
    url.startsWith("https://api.acoustid.org") ? handlers.acoustid() : handlers.musicbrainz(url)
  );
}

describe("collect", () => {
  it("gathers every source in a fixed order", async () => {
    const fetchFn = routes({ acoustid: () => json(acoustidBody), musicbrainz: () => json(musicbrainzBody) });

    const candidates = await collect(descriptor, config, services(fetchFn));

    expect(candidates.map((c) => c.sourceKind)).toEqual([
      "Fingerprint",
      "MetadataService",
      "ReferenceDB",
      "FileTags",
      "Filename",
    ]);

    const [fingerprint, metadata, reference, tags, filename] = candidates;
    expect(fingerprint.rawConfidence).toBe(0.92);
    expect(fingerprint.externalIds).toEqual({ acoustid: "acoustid-1", musicbrainz: "mbid-1" });
    expect(metadata.rawConfidence).toBe(0.92);
    expect(metadata.recordingDate).toBe("1983-08-03");
    expect(metadata.venue).toBe("First Avenue");
    expect(metadata.city).toBe("Minneapolis");
    expect(metadata.durationSeconds).toBe(296);
    expect(reference.rawConfidence).toBe(0.85);
    expect(reference.sourceTypeCode).toBe("SBD");
    expect(tags.rawConfidence).toBe(0.7);
    expect(tags.recordingDate).toBe("1984");
    expect(filename.title).toBe("purple rain");
  });

  it("sends the configured User-Agent to MusicBrainz", async () => {
    const fetchFn = routes({ acoustid: () => json(acoustidBody), musicbrainz: () => json(musicbrainzBody) });

    await collect(descriptor, config, services(fetchFn));

    expect(fetchFn).toHaveBeenCalledWith(
      "https://musicbrainz.org/ws/2/recording/mbid-1?inc=artists+releases&fmt=json",
      {
        headers: { Accept: "application/json", "User-Agent": config.api.musicbrainzUserAgent },
        signal: expect.any(AbortSignal),
      }
    );
  });

  it("retries a transient AcoustID failure once", async () => {
    const acoustid = vi
      .fn<() => Response>()
      .mockReturnValueOnce(json({ error: "busy" }, 503))
      .mockReturnValueOnce(json(acoustidBody));
    const fetchFn = routes({ acoustid, musicbrainz: () => json(musicbrainzBody) });

    const candidates = await collect(descriptor, config, services(fetchFn));

    expect(acoustid).toHaveBeenCalledTimes(2);
    expect(candidates.filter((c) => c.sourceKind === "Fingerprint")).toHaveLength(1);
  });

  it("degrades to zero fingerprint candidates after a second failure", async () => {
    const acoustid = vi.fn(() => json({ error: "down" }, 500));
    const fetchFn = routes({ acoustid, musicbrainz: () => json(musicbrainzBody) });

    const candidates = await collect(descriptor, config, services(fetchFn));

    expect(acoustid).toHaveBeenCalledTimes(2);
    expect(candidates.map((c) => c.sourceKind)).toEqual(["ReferenceDB", "FileTags", "Filename"]);
  });

  it("does not retry client errors", async () => {
    const acoustid = vi.fn(() => json({ error: "bad key" }, 400));
    const fetchFn = routes({ acoustid, musicbrainz: () => json(musicbrainzBody) });

    await collect(descriptor, config, services(fetchFn));

    expect(acoustid).toHaveBeenCalledTimes(1);
  });

  it("keeps the fingerprint candidate when its metadata lookup fails", async () => {
    const fetchFn = routes({ acoustid: () => json(acoustidBody), musicbrainz: () => json({}, 404) });

    const candidates = await collect(descriptor, config, services(fetchFn));

    expect(candidates.map((c) => c.sourceKind)).toEqual([
      "Fingerprint",
      "ReferenceDB",
      "FileTags",
      "Filename",
    ]);
  });

  it("bounds metadata lookups", async () => {
    const body = {
      status: "ok",
      results: [
        {
          id: "acoustid-1",
          score: 0.9,
          recordings: [{ id: "mbid-1" }, { id: "mbid-2" }, { id: "mbid-3" }],
        },
      ],
    };
    const musicbrainz = vi.fn((url: string) =>
      json({ ...musicbrainzBody, id: url.includes("mbid-2") ? "mbid-2" : "mbid-1" })
    );
    const fetchFn = routes({ acoustid: () => json(body), musicbrainz });
    const bounded = finalizeConfig(
      mergeConfig(config, { evidence: { maxMetadataLookups: 2 } }),
      {}
    );

    const candidates = await collect(descriptor, bounded, services(fetchFn));

    expect(musicbrainz).toHaveBeenCalledTimes(2);
    expect(candidates.filter((c) => c.sourceKind === "Fingerprint")).toHaveLength(3);
    expect(candidates.filter((c) => c.sourceKind === "MetadataService")).toHaveLength(2);
  });

  it("skips the fingerprint chain without an API key", async () => {
    const fetchFn = routes({ acoustid: () => json(acoustidBody), musicbrainz: () => json(musicbrainzBody) });
    const keyless = finalizeConfig(mergeConfig(DEFAULT_CONFIG, {}), {});

    const candidates = await collect(descriptor, keyless, services(fetchFn));

    expect(fetchFn).not.toHaveBeenCalled();
    expect(candidates.map((c) => c.sourceKind)).toEqual(["ReferenceDB", "FileTags", "Filename"]);
  });

  it("degrades when the reference store fails", async () => {
    const fetchFn = routes({ acoustid: () => json(acoustidBody), musicbrainz: () => json(musicbrainzBody) });
    const failing: ReferenceStore = {
      findCandidates: async () => Promise.reject(new Error("database is locked")),
      close: async () => {},
    };

    const candidates = await collect(descriptor, config, services(fetchFn, { referenceStore: failing }));

    expect(candidates.map((c) => c.sourceKind)).toEqual([
      "Fingerprint",
      "MetadataService",
      "FileTags",
      "Filename",
    ]);
  });

  it("returns only local candidates when no services are available", async () => {
    const fetchFn = vi.fn(async () => json({}));
    const bare = createDescriptor("/in/track.flac", { durationSeconds: 100 });

    const candidates = await collect(
      bare,
      config,
      services(fetchFn, { fingerprinter: undefined, referenceStore: undefined })
    );

    expect(candidates.map((c) => c.sourceKind)).toEqual(["Filename"]);
    expect(candidates[0].title).toBe("track");
  });
});
