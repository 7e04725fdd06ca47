import { describe, it, expect } from "vitest";
import { validateNormalization } from "./validate.js";

const CATEGORIES = ["official", "live", "outtakes", "unofficial"];

function output(overrides: Record<string, unknown> = {}) {
  return {
    tags: { TITLE: "Purple Rain", ARTIST: "Prince", DATE: "1983-08-03", SOURCE: "SBD" },
    category: "live",
    directory: "1983-08-03 - Minneapolis - First Avenue",
    filename: "03 Purple Rain [SBD]",
    notes: ["from reference"],
    confidence: 0.9,
    ...overrides,
  };
}

function violationsOf(raw: unknown, extension = ""): string[] {
  const result = validateNormalization(raw, CATEGORIES, extension);
  return result.ok ? [] : result.violations;
}

describe("validateNormalization", () => {
  it("accepts well-formed output", () => {
    const result = validateNormalization(output(), CATEGORIES);
    expect(result.ok).toBe(true);
  });

  it("upper-cases tag keys, stringifies numbers and drops empty values", () => {
    const result = validateNormalization(
      output({ tags: { title: "Purple Rain", artist: "Prince", TRACKNUMBER: 3, ALBUM: " " } }),
      CATEGORIES
    );
    expect(result.ok && result.output.tags).toEqual({
      TITLE: "Purple Rain",
      ARTIST: "Prince",
      TRACKNUMBER: "3",
    });
  });

  it("defaults notes to an empty list", () => {
    const { notes: _notes, ...rest } = output();
    const result = validateNormalization(rest, CATEGORIES);
    expect(result.ok && result.output.notes).toEqual([]);
  });

  it("rejects a path separator in the filename", () => {
    expect(violationsOf(output({ filename: "1983-08-03/Purple Rain" }))).toEqual([
      "filename: contains a path separator",
    ]);
  });

  it("rejects .. in the filename", () => {
    expect(violationsOf(output({ filename: "..Purple Rain" }))).toEqual(['filename: contains ".."']);
  });

  it("rejects filename characters outside the path set", () => {
    expect(violationsOf(output({ filename: "Purple Rain.flac" }))).toEqual([
      "filename: name has characters outside A-Z a-z 0-9 space - _ ( ) [ ]",
    ]);
  });

  it("rejects absolute and escaping directories", () => {
    expect(violationsOf(output({ directory: "/etc" }))).toEqual(["directory: absolute directory"]);
    expect(violationsOf(output({ directory: "Live/../x" }))).toEqual([
      'directory: contains a ".." segment',
    ]);
  });

  it("treats only a bare drive letter as absolute", () => {
    expect(violationsOf(output({ directory: "C:/Music" }))).toEqual(["directory: absolute directory"]);
    expect(violationsOf(output({ directory: "C:" }))).toEqual(["directory: absolute directory"]);
  });

  it("rejects directory segments outside the path set", () => {
    expect(violationsOf(output({ directory: "A: B" }))).toEqual([
      'directory: segment "A: B" has characters outside A-Z a-z 0-9 space - _ ( ) [ ]',
    ]);
  });

  it("rejects over-long segments", () => {
    expect(violationsOf(output({ filename: "x".repeat(256) }))).toEqual([
      "filename: name is longer than 255 characters",
    ]);
  });

  it("counts the extension against the filename length", () => {
    expect(violationsOf(output({ filename: "A".repeat(250) }), ".flac")).toEqual([]);
    expect(violationsOf(output({ filename: "A".repeat(251) }), ".flac")).toEqual([
      "filename: name is longer than 250 characters",
    ]);
  });

  it("rejects consecutive spaces", () => {
    expect(violationsOf(output({ directory: "Prince  Live", filename: "Purple   Rain" }))).toEqual([
      'directory: segment "Prince  Live" has consecutive spaces',
      "filename: name has consecutive spaces",
    ]);
  });

  it("requires TITLE and ARTIST", () => {
    expect(violationsOf(output({ tags: { TITLE: "Purple Rain" } }))).toEqual([
      "tags.ARTIST: required tag is missing",
    ]);
  });

  it("checks SOURCE against the known codes", () => {
    expect(
      violationsOf(output({ tags: { TITLE: "Purple Rain", ARTIST: "Prince", SOURCE: "BOOT" } }))
    ).toEqual(['tags.SOURCE: "BOOT" is not one of SBD/AUD/FM/TV/PRO/MATRIX/VINYL/CD/DAT']);
  });

  it("checks the DATE format", () => {
    expect(
      violationsOf(output({ tags: { TITLE: "Purple Rain", ARTIST: "Prince", DATE: "Aug 3 1983" } }))
    ).toEqual(['tags.DATE: "Aug 3 1983" is not YYYY-MM-DD or YYYY']);
  });

  it("requires a configured category", () => {
    expect(violationsOf(output({ category: "bootlegs" }))).toEqual([
      'category: "bootlegs" is not a configured category',
    ]);
  });

  it("rejects confidence outside 0-1", () => {
    expect(violationsOf(output({ confidence: 1.5 }))).toHaveLength(1);
  });

  it("rejects non-object replies", () => {
    expect(violationsOf("Purple Rain")).toHaveLength(1);
  });
});
