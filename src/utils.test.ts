import { describe, it, expect } from "vitest";
import { escapeRegExp, formatTimestamp, mean, roundTo, speakerLabel } from "./utils.js";

describe("formatTimestamp", () => {
  it("should format seconds as [MM:SS]", () => {
    expect(formatTimestamp(0)).toBe("[00:00]");
    expect(formatTimestamp(65.9)).toBe("[01:05]");
    expect(formatTimestamp(3600)).toBe("[60:00]");
  });

  it("should clamp negative values to zero", () => {
    expect(formatTimestamp(-4)).toBe("[00:00]");
  });
});

describe("roundTo", () => {
  it("should round half away from zero on the decimal value", () => {
    expect(roundTo(7.85, 1)).toBe(7.9);
    expect(roundTo(1.005, 2)).toBe(1.01);
    expect(roundTo(-2.25, 1)).toBe(-2.3);
    expect(roundTo(7, 1)).toBe(7);
  });

  it("should handle values printed in exponent form", () => {
    expect(roundTo(1e-7, 1)).toBe(0);
  });
});

describe("mean", () => {
  it("should average values", () => {
    expect(mean([8, 6, 7])).toBe(7);
  });

  it("should return 0 for an empty list", () => {
    expect(mean([])).toBe(0);
  });
});

describe("escapeRegExp", () => {
  it("should escape pattern metacharacters", () => {
    expect(escapeRegExp("C++ (beta)?")).toBe("C\\+\\+ \\(beta\\)\\?");
    expect(new RegExp(escapeRegExp("a.b")).test("axb")).toBe(false);
  });
});

describe("speakerLabel", () => {
  it("should number diarized speakers from one", () => {
    expect(speakerLabel("0")).toBe("Speaker 1");
    expect(speakerLabel("3")).toBe("Speaker 4");
  });

  it("should pass named speakers through", () => {
    expect(speakerLabel("Agent")).toBe("Agent");
  });
});
