export type ChunkType = "heading" | "paragraph" | "sentence" | "code" | "table" | "token-window";

export type BaseSplitStrategy =
  | "no-split"
  | "heading"
  | "paragraph"
  | "sentence"
  | "code-fence-lines"
  | "code-digest"
  | "table-rows"
  | "token-window"
  | "force-truncate";

export type SplitStrategy = BaseSplitStrategy | `${BaseSplitStrategy}+glue`;

export interface Traceability {
  title: string;
  url: string;
  sourceSystem: string;
}

/** Why a chunk was allowed to stay below `hardMinTokens`. */
export type BelowMinReason = "document-size" | "indivisible-block" | "no-room";

export interface CodeDigestMeta {
  language: string;
  symbols: string[];
  originalTokens: number;
}

export interface ChunkMeta {
  belowMinReason?: BelowMinReason;
  digest?: CodeDigestMeta;
  /** Number of split pieces the glue pass merged into this chunk. */
  gluedPieces?: number;
}

export interface Chunk {
  chunkId: string;
  docId: string;
  ordinal: number;
  text: string;
  tokenCount: number;
  charStart: number;
  charEnd: number;
  chunkType: ChunkType;
  splitStrategy: SplitStrategy;
  traceability: Traceability;
  meta?: ChunkMeta;
}

export interface ChunkingConfig {
  hardMaxTokens: number;
  overlapTokens: number;
  softMinTokens: number;
  hardMinTokens: number;
  /** Minimum share of body characters the chunk spans must cover, in percent. */
  minCoveragePct: number;
}

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  hardMaxTokens: 800,
  overlapTokens: 60,
  softMinTokens: 200,
  hardMinTokens: 80,
  minCoveragePct: 99.5,
};

export type ChunkSkipReason =
  | "MISSING_DOC_ID"
  | "MISSING_TRACEABILITY"
  | "EMPTY_BODY"
  | "LOW_COVERAGE"
  | "CHUNKING_FAILED";

export interface ChunkSkip {
  docId: string;
  reason: ChunkSkipReason;
  detail?: string;
}

export interface DocumentCoverage {
  docId: string;
  coveragePct: number;
  gaps: Array<[number, number]>;
  /** True when a digest or truncation stands in for part of the body. */
  exempt: boolean;
}

export interface TokenStats {
  count: number;
  min: number;
  median: number;
  p95: number;
  max: number;
  mean: number;
}

export interface ChunkAssuranceReport {
  status: "PASS" | "FAIL";
  tokenStats: TokenStats;
  oversize: string[];
  missingTraceability: string[];
  smallChunks: string[];
  docsWithGaps: string[];
  strategies: Record<string, number>;
}

export interface ChunkRunResult {
  chunks: Chunk[];
  skipped: ChunkSkip[];
  coverage: DocumentCoverage[];
  assurance: ChunkAssuranceReport;
}
