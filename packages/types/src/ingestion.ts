export interface FailedBatch {
  index: number;
  chunkIds: string[];
  docIds: string[];
  attempts: number;
  error: string;
}

export interface IngestionSummary {
  runId: string;
  provider: string;
  model: string;
  dimension: number;
  dryRun: boolean;
  cancelled: boolean;
  chunksTotal: number;
  chunksSkipped: number;
  chunksUnchanged: number;
  chunksEmbedded: number;
  rowsInserted: number;
  rowsUpdated: number;
  batches: number;
  failedBatches: FailedBatch[];
  failedDocIds: string[];
  estimatedTokens?: number;
  durationMs: number;
}
