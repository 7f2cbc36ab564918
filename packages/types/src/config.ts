import type { ChunkingConfig } from "./chunk.js";

export type EmbeddingProviderName = "openai" | "cohere" | "deterministic";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "trace" | "debug" | "info" | "warn" | "error";
  runsDir: string;
  database: DatabaseConfig;
  redis: RedisConfig;
  embedding: EmbeddingConfig;
  chunking: ChunkingConfig;
  tokenizer: string;
  preflight: PreflightConfig;
  retrieval: RetrievalConfig;
  worker: WorkerConfig;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
}

export interface RedisConfig {
  url: string;
}

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderName;
  model: string;
  dimension: number;
  batchSize: number;
  openaiApiKey?: string;
  cohereApiKey?: string;
  retry: RetryConfig;
}

export interface PreflightConfig {
  minEmbedDocs: number;
  minQuality: number;
}

export interface RetrievalConfig {
  topK: number;
  rrfK: number;
  topkDense: number;
  topkBm25: number;
  maxChunksPerDoc: number;
  profilePath?: string;
}

export interface WorkerConfig {
  concurrency: number;
}

export interface BoostRule {
  name: string;
  /** Case-insensitive regular expression matched against title and doctype. */
  pattern: string;
  weight: number;
}

export interface QueryExpansionRule {
  name: string;
  /** Case-insensitive regular expression matched against the query. */
  when: string;
  terms: string[];
}

export interface RetrievalProfile {
  /** Ordered; the first positive rule that matches applies, negative rules all add up. */
  boosts: BoostRule[];
  /** Additive adjustment for date-stamped or periodic documents. */
  periodic: BoostRule;
  domain: {
    triggers: string[];
    synonyms: string[];
    expansions: QueryExpansionRule[];
    spaceWhitelist: string[];
  };
}
