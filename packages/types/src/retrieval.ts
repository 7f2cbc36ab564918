export interface RetrievalRequest {
  queryText: string;
  topK?: number;
  /** Character budgets; one packed context is produced per entry. */
  budgets?: number[];
  provider?: string;
  dimension?: number;
  hybridEnabled?: boolean;
  rrfK?: number;
  topkDense?: number;
  topkBm25?: number;
  boostsEnabled?: boolean;
  domainFilterEnabled?: boolean;
  spaceWhitelist?: string[];
  maxChunksPerDoc?: number;
}

export interface RetrievalHit {
  chunkId: string;
  docId: string;
  title: string;
  url: string;
  /** First characters of the chunk, whitespace collapsed. */
  snippet: string;
  text: string;
  denseRank: number | null;
  bm25Rank: number | null;
  /** Absent when boosts are disabled. */
  boost?: number;
  fusedScore: number;
}

export interface PackedContext {
  budget: number;
  text: string;
  chunkIds: string[];
  truncated: boolean;
}

export interface QueryAnalysis {
  original: string;
  expanded: string;
  isDomainQuery: boolean;
  matchedTriggers: string[];
  appliedExpansions: string[];
}

export interface RetrievalTimings {
  denseMs: number;
  lexicalMs: number;
  totalMs: number;
}

export interface RetrievalResponse {
  hits: RetrievalHit[];
  contexts: PackedContext[];
  query: QueryAnalysis;
  spaceWhitelist: string[];
  candidates: { dense: number; lexical: number; fused: number; droppedUntraceable: number };
  timings: RetrievalTimings;
}
