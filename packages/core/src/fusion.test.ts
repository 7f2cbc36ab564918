import { describe, expect, it } from "vitest";
import type { CandidateRow } from "@corpora/vector-store";
import { reciprocalRankFusion } from "./fusion.js";

function row(chunkId: string): CandidateRow {
  return {
    chunkId,
    docId: chunkId.split(":")[0] ?? chunkId,
    title: `Title ${chunkId}`,
    url: `https://wiki.example.test/${chunkId}`,
    text: `text of ${chunkId}`,
    spaceKey: null,
    doctype: null,
    score: 0,
  };
}

describe("reciprocalRankFusion", () => {
  it("sums 1 / (k + rank) over both legs", () => {
    const fused = reciprocalRankFusion([row("a"), row("b"), row("c")], [row("c"), row("a")], 60);

    expect(fused.map((candidate) => candidate.row.chunkId)).toEqual(["a", "c", "b"]);
    const [a, c, b] = fused;
    expect(a?.rrfScore).toBeCloseTo(1 / 61 + 1 / 62, 12);
    expect(a?.denseRank).toBe(1);
    expect(a?.bm25Rank).toBe(2);
    expect(c?.rrfScore).toBeCloseTo(1 / 63 + 1 / 61, 12);
    expect(b?.rrfScore).toBeCloseTo(1 / 62, 12);
    expect(b?.bm25Rank).toBeNull();
  });

  it("breaks equal scores by ascending chunk id", () => {
    const fused = reciprocalRankFusion([row("y")], [row("x")]);

    expect(fused.map((candidate) => candidate.row.chunkId)).toEqual(["x", "y"]);
    expect(fused[0]?.rrfScore).toBe(fused[1]?.rrfScore);
  });

  it("counts a chunk once per leg", () => {
    const fused = reciprocalRankFusion([row("a"), row("a")], [], 10);

    expect(fused).toHaveLength(1);
    expect(fused[0]?.rrfScore).toBeCloseTo(1 / 11, 12);
    expect(fused[0]?.denseRank).toBe(1);
  });

  it("handles a dense-only run", () => {
    const fused = reciprocalRankFusion([row("a"), row("b")], []);
    expect(fused.every((candidate) => candidate.bm25Rank === null)).toBe(true);
  });
});
