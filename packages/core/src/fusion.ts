import type { CandidateRow } from "@corpora/vector-store";

export const DEFAULT_RRF_K = 60;

export interface FusedCandidate {
  row: CandidateRow;
  /** 1-based rank in the dense leg, null when absent */
  denseRank: number | null;
  bm25Rank: number | null;
  rrfScore: number;
}

export function compareChunkIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Reciprocal rank fusion: score = Σ 1 / (k + rank) over the legs a chunk
 * appears in. Legs are already ordered; ranks are 1-based. Ties go to the
 * smaller chunk_id.
 */
export function reciprocalRankFusion(
  dense: CandidateRow[],
  lexical: CandidateRow[],
  k: number = DEFAULT_RRF_K,
): FusedCandidate[] {
  const fused = new Map<string, FusedCandidate>();

  const visit = (rows: CandidateRow[], leg: "denseRank" | "bm25Rank"): void => {
    rows.forEach((row, index) => {
      const rank = index + 1;
      let entry = fused.get(row.chunkId);
      if (!entry) {
        entry = { row, denseRank: null, bm25Rank: null, rrfScore: 0 };
        fused.set(row.chunkId, entry);
      }
      // A chunk listed twice in one leg keeps its best rank
      if (entry[leg] !== null) return;
      entry[leg] = rank;
      entry.rrfScore += 1 / (k + rank);
    });
  };

  visit(dense, "denseRank");
  visit(lexical, "bm25Rank");

  return [...fused.values()].sort(
    (a, b) => b.rrfScore - a.rrfScore || compareChunkIds(a.row.chunkId, b.row.chunkId),
  );
}
