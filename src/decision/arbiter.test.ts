import { describe, it, expect, vi } from "vitest";
import { decide, findMissingFields, isUnchanged } from "./arbiter.js";
import { DEFAULT_CONFIG } from "../config/defaults.js";
import type { Config } from "../config/types.js";
import { createDescriptor } from "../audio/audio.js";
import { createCandidate, type Candidate } from "../evidence/types.js";
import { fuse } from "../fusion/fuser.js";
import { RuleBasedNormalizer } from "../normalize/rule-based.js";
import type { NormalizationInput, Normalizer } from "../normalize/types.js";

const config: Config = {
  ...DEFAULT_CONFIG,
  paths: { ...DEFAULT_CONFIG.paths, root: "/lib" },
  llm: { ...DEFAULT_CONFIG.llm, timeoutMs: 20 },
};

const LIVE_DIR = "/lib/Live/1983-08-03 - Minneapolis - First Avenue";

function spyNormalizer() {
  const inner = new RuleBasedNormalizer(config);
  const normalize = vi.fn((input: NormalizationInput) => inner.normalize(input));
  const normalizer: Normalizer = { kind: "rule-based", normalize };
  return { normalizer, normalize };
}

const scenarioA = createDescriptor("/incoming/d1t03.flac", {
  durationSeconds: 296,
  existingTags: { TITLE: "Purple Rain", ARTIST: "Prince", DATE: "1984" },
});

function scenarioACandidates(): Candidate[] {
  return [
    createCandidate("Fingerprint", 0.92, {
      title: "Purple Rain",
      artist: "Prince",
      durationSeconds: 297,
      externalIds: { acoustid: "acoustid-1" },
    }),
    createCandidate("ReferenceDB", 0.85, {
      title: "Purple Rain",
      recordingDate: "1983-08-03",
      venue: "First Avenue",
      city: "Minneapolis",
      durationSeconds: 298,
    }),
    createCandidate("FileTags", 0.7, { title: "Purple Rain", artist: "Prince", recordingDate: "1984" }),
  ];
}

async function decideFor(
  candidates: Candidate[],
  descriptor = scenarioA,
  normalizer: Normalizer = new RuleBasedNormalizer(config)
) {
  return decide(fuse(candidates, config, descriptor), "rules", descriptor, config, normalizer);
}

describe("decide", () => {
  it("takes the reference date over a disagreeing file tag (Scenario A)", async () => {
    const proposal = await decideFor(scenarioACandidates());

    expect(proposal.status).toBe("Proposed");
    expect(proposal.confidence).toBeCloseTo(0.92);
    expect(proposal.primary.tags.DATE).toBe("1983-08-03");
    expect(proposal.primary.tags.ACOUSTID_ID).toBe("acoustid-1");
    expect(proposal.primary.category).toBe("live");
    expect(proposal.primary.destinationDir).toBe(LIVE_DIR);
    expect(proposal.primary.filename).toBe("Purple Rain.flac");
    expect(proposal.primary.destinationPath).toBe(`${LIVE_DIR}/Purple Rain.flac`);
    expect(proposal.primary.missingFields).toEqual(["TRACKNUMBER", "SOURCE"]);
    expect(proposal.primary.usedFallback).toBe(false);
    expect(proposal.primary.candidateRank).toBe(1);
    expect(proposal.primary.sourceKind).toBe("Fingerprint");
    expect(proposal.issues).toEqual([]);
    // 0.92 - 0.765 is outside the alternate window
    expect(proposal.alternates).toEqual([]);
  });

  it("returns an empty Unresolved proposal for zero candidates (Scenario B)", async () => {
    const { normalizer, normalize } = spyNormalizer();
    const proposal = await decideFor([], scenarioA, normalizer);

    expect(proposal.status).toBe("Unresolved");
    expect(proposal.confidence).toBe(0);
    expect(proposal.primary).toEqual({
      tags: {},
      category: "",
      destinationDir: "",
      filename: "",
      destinationPath: "",
      notes: [],
      usedFallback: true,
      missingFields: ["TITLE", "ARTIST"],
      candidateRank: null,
      sourceKind: null,
    });
    expect(proposal.issues.map((i) => i.check)).toEqual(["candidates"]);
    expect(normalize).not.toHaveBeenCalled();
  });

  it("flips to Unresolved when the duration penalty sinks the top score (Scenario C)", async () => {
    const candidates = (duration: number) => [
      createCandidate("Fingerprint", 0.92, { title: "Purple Rain", artist: "Prince", durationSeconds: duration }),
      createCandidate("MetadataService", 0.92, { title: "Purple Rain", artist: "Prince", durationSeconds: duration }),
    ];

    const matching = await decideFor(candidates(296));
    expect(matching.status).toBe("Proposed");

    const { normalizer, normalize } = spyNormalizer();
    const mismatched = await decideFor(candidates(308), scenarioA, normalizer);

    expect(mismatched.status).toBe("Unresolved");
    expect(mismatched.confidence).toBeCloseTo(0.46);
    expect(mismatched.issues).toEqual([
      {
        stage: "decide",
        check: "minAutoScore",
        message: "top score 0.460 is below minAutoScore 0.5",
        candidateRank: 1,
      },
    ]);
    expect(mismatched.primary.usedFallback).toBe(true);
    expect(mismatched.primary.tags.TITLE).toBe("Purple Rain");
    expect(mismatched.alternates).toHaveLength(1);
    expect(mismatched.alternates[0].candidateRank).toBe(2);
    expect(normalize).not.toHaveBeenCalled();
  });

  it("never calls the normalizer below minAutoScore", async () => {
    const { normalizer, normalize } = spyNormalizer();
    const proposal = await decideFor(
      [createCandidate("FileTags", 0.7, { title: "Purple Rain", artist: "Prince" })],
      scenarioA,
      normalizer
    );

    expect(proposal.status).toBe("Unresolved");
    expect(normalize).not.toHaveBeenCalled();
  });

  it("falls back to the template when the normalizer returns a path as a filename (Scenario D)", async () => {
    const normalizer: Normalizer = {
      kind: "llm",
      normalize: async () => ({
        tags: { TITLE: "Purple Rain", ARTIST: "Prince", DATE: "1983-08-03" },
        category: "live",
        directory: "1983-08-03 - Minneapolis - First Avenue",
        filename: "1983-08-03/Purple Rain",
        notes: [],
        confidence: 0.9,
      }),
    };
    const proposal = await decideFor(scenarioACandidates(), scenarioA, normalizer);

    expect(proposal.status).toBe("Unresolved");
    expect(proposal.primary.usedFallback).toBe(true);
    expect(proposal.primary.filename).toBe("Purple Rain.flac");
    expect(proposal.primary.destinationPath).toBe(`${LIVE_DIR}/Purple Rain.flac`);
    expect(proposal.issues).toHaveLength(1);
    expect(proposal.issues[0].check).toBe("schema");
    expect(proposal.issues[0].message).toContain("filename: contains a path separator");
  });

  it("rejects a filename that the extension would push past the length limit", async () => {
    const normalizer: Normalizer = {
      kind: "llm",
      normalize: async () => ({
        tags: { TITLE: "Purple Rain", ARTIST: "Prince" },
        category: "live",
        directory: "",
        filename: "A".repeat(255),
        notes: [],
        confidence: 0.9,
      }),
    };
    const proposal = await decideFor(scenarioACandidates(), scenarioA, normalizer);

    expect(proposal.status).toBe("Unresolved");
    expect(proposal.primary.usedFallback).toBe(true);
    expect(proposal.primary.filename).toBe("Purple Rain.flac");
    expect(proposal.issues[0].message).toContain("filename: name is longer than 250 characters");
  });

  it("rejects doubled spaces in normalizer paths", async () => {
    const normalizer: Normalizer = {
      kind: "llm",
      normalize: async () => ({
        tags: { TITLE: "Purple Rain", ARTIST: "Prince" },
        category: "unofficial",
        directory: "Prince  Live",
        filename: "Purple   Rain",
        notes: [],
        confidence: 0.9,
      }),
    };
    const proposal = await decideFor(scenarioACandidates(), scenarioA, normalizer);

    expect(proposal.status).toBe("Unresolved");
    expect(proposal.primary.destinationPath).toBe(`${LIVE_DIR}/Purple Rain.flac`);
    expect(proposal.issues[0].check).toBe("schema");
  });

  it("falls back when the normalizer times out", async () => {
    const normalizer: Normalizer = { kind: "llm", normalize: () => new Promise(() => {}) };
    const proposal = await decideFor(scenarioACandidates(), scenarioA, normalizer);

    expect(proposal.status).toBe("Unresolved");
    expect(proposal.issues[0].check).toBe("timeout");
    expect(proposal.issues[0].message).toBe("llm normalizer timed out after 20ms");
  });

  it("falls back when the normalizer throws", async () => {
    const normalizer: Normalizer = {
      kind: "llm",
      normalize: async () => {
        throw new Error("ollama: connection refused");
      },
    };
    const proposal = await decideFor(scenarioACandidates(), scenarioA, normalizer);

    expect(proposal.issues).toEqual([
      { stage: "normalize", check: "error", message: "ollama: connection refused", candidateRank: 1 },
    ]);
  });

  it("offers close runners-up as alternates, each promoted to the front", async () => {
    const { normalizer, normalize } = spyNormalizer();
    const proposal = await decideFor(
      [
        createCandidate("Fingerprint", 0.9, { title: "Purple Rain", artist: "Prince" }),
        createCandidate("Fingerprint", 0.8, { title: "Computer Blue", artist: "Prince" }),
        createCandidate("Fingerprint", 0.7, { title: "Darling Nikki", artist: "Prince" }),
      ],
      scenarioA,
      normalizer
    );

    expect(proposal.status).toBe("Proposed");
    expect(proposal.alternates).toHaveLength(1);
    expect(proposal.alternates[0].tags.TITLE).toBe("Computer Blue");
    expect(proposal.alternates[0].candidateRank).toBe(2);
    expect(normalize).toHaveBeenCalledTimes(2);
    expect(normalize.mock.calls[1][0].candidates.map((c) => c.title)).toEqual([
      "Computer Blue",
      "Purple Rain",
      "Darling Nikki",
    ]);
  });

  it("proposes the current path and tags for an already-correct file", async () => {
    const descriptor = createDescriptor(`${LIVE_DIR}/03 Purple Rain [SBD].flac`, {
      durationSeconds: 296,
      existingTags: {
        TITLE: "Purple Rain",
        ARTIST: "Prince",
        DATE: "1983-08-03",
        CITY: "Minneapolis",
        VENUE: "First Avenue",
        SOURCE: "SBD",
        TRACKNUMBER: "03",
      },
    });
    const candidates = [
      createCandidate("ReferenceDB", 1.0, {
        title: "Purple Rain",
        recordingDate: "1983-08-03",
        venue: "First Avenue",
        city: "Minneapolis",
        sourceTypeCode: "SBD",
        externalIds: { reference: "r1" },
      }),
      createCandidate("FileTags", 0.7, {
        title: "Purple Rain",
        artist: "Prince",
        recordingDate: "1983-08-03",
        city: "Minneapolis",
        venue: "First Avenue",
        sourceTypeCode: "SBD",
        trackNumber: 3,
      }),
    ];

    const first = await decideFor(candidates, descriptor);
    const second = await decideFor(candidates, descriptor);

    expect(first.status).toBe("Proposed");
    expect(first.primary.destinationPath).toBe(descriptor.path);
    expect(first.primary.tags).toEqual(descriptor.existingTags);
    expect(isUnchanged(first.primary, descriptor)).toBe(true);
    expect(second).toEqual(first);
  });
});

describe("findMissingFields", () => {
  it("lists required tags first, then empty template fields", () => {
    expect(findMissingFields({ DATE: "1983" }, "{date} - {title}/{tracknum} {title}")).toEqual([
      "TITLE",
      "ARTIST",
      "TRACKNUMBER",
    ]);
  });
});
