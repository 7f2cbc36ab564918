export type PreflightStatus = "PENDING" | "READY" | "BLOCKED";

/** Structural blockers only. Quality metrics never appear here. */
export type PreflightReason =
  | "MISSING_ENRICH"
  | "MISSING_CHUNKS"
  | "TOKENIZER_MISSING"
  | "CONFIG_INVALID"
  | "EMBEDDABLE_DOCS_ZERO";

export interface PreflightArtifacts {
  enriched: boolean;
  chunks: boolean;
  tokenizer: boolean;
  config: boolean;
}

export interface PreflightReport {
  runId: string;
  status: Exclude<PreflightStatus, "PENDING">;
  reasons: PreflightReason[];
  embeddableDocs: number;
  /** Advisory share of documents under the quality threshold, 0..1. */
  belowThresholdPct: number;
  skipList: string[];
  provider: string;
  model: string;
  dimension: number;
  docTotals: { all: number; embeddable: number; skipped: number };
  artifacts: PreflightArtifacts;
  configIssues: string[];
  timestamp: string;
}
