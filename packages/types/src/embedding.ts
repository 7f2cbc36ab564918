export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface EmbeddingRecord {
  chunkId: string;
  provider: string;
  model: string;
  dimension: number;
  vector: number[];
  /** sha256 of the chunk text the vector was computed from. */
  contentHash: string;
}
