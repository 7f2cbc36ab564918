import type {
  Chunk,
  ChunkAssuranceReport,
  ChunkingConfig,
  DocumentCoverage,
  TokenStats,
} from "@corpora/types";

export function tokenStats(counts: number[]): TokenStats {
  if (counts.length === 0) {
    return { count: 0, min: 0, median: 0, p95: 0, max: 0, mean: 0 };
  }
  const sorted = [...counts].sort((a, b) => a - b);
  const n = sorted.length;
  const mid = Math.floor(n / 2);
  const median = n % 2 === 0 ? ((sorted[mid - 1] ?? 0) + (sorted[mid] ?? 0)) / 2 : (sorted[mid] ?? 0);
  const sum = sorted.reduce((acc, value) => acc + value, 0);

  return {
    count: n,
    min: sorted[0] ?? 0,
    median,
    p95: sorted[Math.max(0, Math.ceil(n * 0.95) - 1)] ?? 0,
    max: sorted[n - 1] ?? 0,
    mean: Math.round((sum / n) * 100) / 100,
  };
}

function hasTraceability(chunk: Chunk): boolean {
  const { title, url, sourceSystem } = chunk.traceability;
  return sourceSystem.trim().length > 0 && (title.trim().length > 0 || url.trim().length > 0);
}

/**
 * Check a chunk set against the chunking invariants. FAIL when any chunk is
 * over the hard cap, lacks traceability, or sits under the hard minimum
 * without a recorded reason.
 */
export function buildChunkAssurance(
  chunks: Chunk[],
  config: Pick<ChunkingConfig, "hardMaxTokens" | "hardMinTokens">,
  coverage: DocumentCoverage[] = [],
): ChunkAssuranceReport {
  const oversize = chunks.filter((c) => c.tokenCount > config.hardMaxTokens).map((c) => c.chunkId);
  const missingTraceability = chunks.filter((c) => !hasTraceability(c)).map((c) => c.chunkId);
  const smallChunks = chunks
    .filter((c) => c.tokenCount < config.hardMinTokens && !c.meta?.belowMinReason)
    .map((c) => c.chunkId);
  const docsWithGaps = coverage.filter((doc) => doc.gaps.length > 0).map((doc) => doc.docId);

  const strategies: Record<string, number> = {};
  for (const chunk of chunks) {
    strategies[chunk.splitStrategy] = (strategies[chunk.splitStrategy] ?? 0) + 1;
  }

  const failed = oversize.length > 0 || missingTraceability.length > 0 || smallChunks.length > 0;

  return {
    status: failed ? "FAIL" : "PASS",
    tokenStats: tokenStats(chunks.map((c) => c.tokenCount)),
    oversize,
    missingTraceability,
    smallChunks,
    docsWithGaps,
    strategies,
  };
}
