import { describe, it, expect } from "vitest";
import { deriveHints, fileTagsCandidate, filenameCandidate, normalizeTagDate } from "./local.js";
import { createDescriptor } from "../../audio/audio.js";

describe("normalizeTagDate", () => {
  it("keeps the leading date or year", () => {
    expect(normalizeTagDate("1983-08-03")).toBe("1983-08-03");
    expect(normalizeTagDate("1984-06-25T00:00:00")).toBe("1984-06-25");
    expect(normalizeTagDate("1984")).toBe("1984");
    expect(normalizeTagDate("summer 84")).toBeNull();
    expect(normalizeTagDate(undefined)).toBeNull();
  });
});

describe("fileTagsCandidate", () => {
  it("builds a candidate from existing tags", () => {
    const candidate = fileTagsCandidate(
      createDescriptor("/in/a.flac", {
        existingTags: {
          title: "Purple Rain",
          ARTIST: "Prince",
          DATE: "1983-08-03",
          SOURCE: "sbd",
          TRACKNUMBER: "03",
          MUSICBRAINZ_RECORDINGID: "mbid-1",
        },
      })
    );

    expect(candidate).not.toBeNull();
    expect(candidate?.sourceKind).toBe("FileTags");
    expect(candidate?.rawConfidence).toBe(0.7);
    expect(candidate?.title).toBe("Purple Rain");
    expect(candidate?.trackNumber).toBe(3);
    expect(candidate?.sourceTypeCode).toBe("SBD");
    expect(candidate?.externalIds).toEqual({ musicbrainz: "mbid-1" });
  });

  it("returns null when no identifying tag is present", () => {
    expect(fileTagsCandidate(createDescriptor("/in/a.flac", { existingTags: { ENCODER: "x" } }))).toBeNull();
  });
});

describe("filenameCandidate", () => {
  it("uses the literal stem and an ISO date", () => {
    const candidate = filenameCandidate(createDescriptor("/in/1983-08-03_Purple_Rain.flac"));
    expect(candidate?.title).toBe("1983-08-03 Purple Rain");
    expect(candidate?.recordingDate).toBe("1983-08-03");
    expect(candidate?.rawConfidence).toBe(0.5);
  });

  it("has no date without an ISO literal", () => {
    expect(filenameCandidate(createDescriptor("/in/track 3.mp3"))?.recordingDate).toBeNull();
  });
});

describe("deriveHints", () => {
  it("prefers tags", () => {
    const hints = deriveHints(
      createDescriptor("/in/03 Something Else.flac", {
        existingTags: { TITLE: "Purple Rain", DATE: "1984", VENUE: "First Avenue" },
      })
    );
    expect(hints).toEqual({ title: "Purple Rain", date: "1984", venue: "First Avenue" });
  });

  it("falls back to the filename without track number and date", () => {
    const hints = deriveHints(createDescriptor("/in/1983-08-03 - 03 - Purple_Rain.flac"));
    expect(hints).toEqual({ title: "Purple Rain", date: "1983-08-03" });
  });

  it("keeps numeric song titles", () => {
    expect(deriveHints(createDescriptor("/in/1999.flac"))).toEqual({ title: "1999" });
  });
});
