import { describe, it, expect } from "vitest";
import { parseHashOutput } from "./hash.js";

describe("parseHashOutput", () => {
  it("extracts the digest", () => {
    const digest = "ab".repeat(32);
    expect(parseHashOutput(`SHA256=${digest}\n`)).toBe(digest);
  });

  it("lower-cases the digest", () => {
    expect(parseHashOutput(`SHA256=${"AB".repeat(32)}`)).toBe("ab".repeat(32));
  });

  it("throws on unexpected output", () => {
    expect(() => parseHashOutput("Invalid data found")).toThrow("Unexpected ffmpeg hash output");
  });
});
