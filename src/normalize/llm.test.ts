import { describe, it, expect, vi } from "vitest";
import type { LLMProvider } from "../llm/provider.js";
import type { LLMRequest, LLMResponse } from "../llm/types.js";
import { LlmNormalizer } from "./llm.js";
import type { NormalizationInput } from "./types.js";

const INPUT: NormalizationInput = {
  file: {
    filename: "d1t03.flac",
    container: ".flac",
    durationSeconds: 296.4,
    bitrate: null,
    sampleRate: 44100,
    channelCount: 2,
  },
  existingTags: { TITLE: "Purple Rain" },
  candidates: [
    {
      rank: 1,
      score: 0.92,
      sourceKind: "Fingerprint",
      title: "Purple Rain",
      artist: "Prince",
      album: null,
      trackNumber: null,
      recordingDate: null,
      city: null,
      venue: null,
      sourceTypeCode: null,
      externalIds: { acoustid: "acoustid-1" },
      durationSeconds: 297,
      speedVariance: false,
      evidence: [],
    },
  ],
  namingRules: "Use ISO dates.",
  categories: ["live", "unofficial"],
};

function fakeProvider(response: LLMResponse) {
  const query = vi.fn<(request: LLMRequest) => Promise<LLMResponse>>().mockResolvedValue(response);
  const provider: LLMProvider = { name: "fake", query };
  return { provider, query };
}

describe("LlmNormalizer", () => {
  it("returns the parsed reply untouched", async () => {
    const data = { tags: { TITLE: "Purple Rain" }, filename: "../escape" };
    const { provider } = fakeProvider({ success: true, data, reasoning: "" });

    await expect(new LlmNormalizer(provider).normalize(INPUT)).resolves.toBe(data);
  });

  it("sends naming rules, categories and candidates", async () => {
    const { provider, query } = fakeProvider({ success: true, data: {}, reasoning: "" });
    await new LlmNormalizer(provider).normalize(INPUT);

    const request = query.mock.calls[0][0];
    expect(request.type).toBe("tag_normalization");
    expect(request.context).toBe(INPUT);
    expect(request.system).toContain("Use ISO dates.");
    expect(request.system).toContain('one of "live", "unofficial"');
    expect(request.prompt).toContain("File: d1t03.flac (.flac, 296s)");
    expect(request.prompt).toContain("#1 Fingerprint score=0.920");
  });

  it("throws when the provider reports failure", async () => {
    const { provider } = fakeProvider({ success: false, data: null, reasoning: "connection refused" });

    await expect(new LlmNormalizer(provider).normalize(INPUT)).rejects.toThrow(
      "fake: connection refused"
    );
  });
});
