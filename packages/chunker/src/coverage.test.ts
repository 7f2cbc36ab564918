import { describe, it, expect } from "vitest";
import { calculateCoverage, mergeSpans } from "./coverage.js";

describe("mergeSpans", () => {
  it("merges overlapping and touching spans", () => {
    expect(
      mergeSpans([
        { start: 10, end: 20 },
        { start: 0, end: 5 },
        { start: 5, end: 8 },
        { start: 15, end: 25 },
      ]),
    ).toEqual([
      { start: 0, end: 8 },
      { start: 10, end: 25 },
    ]);
  });
});

describe("calculateCoverage", () => {
  it("counts only visible characters", () => {
    expect(calculateCoverage("abc def", [{ start: 0, end: 3 }])).toEqual({
      coveragePct: 50,
      gaps: [[4, 7]],
    });
  });

  it("ignores whitespace-only gaps", () => {
    const text = "one\n\ntwo\n";
    expect(
      calculateCoverage(text, [
        { start: 0, end: 3 },
        { start: 5, end: 8 },
      ]),
    ).toEqual({ coveragePct: 100, gaps: [] });
  });

  it("treats overlapping spans once", () => {
    expect(
      calculateCoverage("abcdefgh", [
        { start: 0, end: 6 },
        { start: 4, end: 8 },
      ]).coveragePct,
    ).toBe(100);
  });

  it("reports full coverage for blank text", () => {
    expect(calculateCoverage("  \n", [])).toEqual({ coveragePct: 100, gaps: [] });
  });
});
