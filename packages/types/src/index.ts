export type { SectionMapEntry, SourceDocument, EnrichedDocument, DocumentRecord } from "./document.js";
export type {
  ChunkType,
  BaseSplitStrategy,
  SplitStrategy,
  Traceability,
  BelowMinReason,
  CodeDigestMeta,
  ChunkMeta,
  Chunk,
  ChunkingConfig,
  ChunkSkipReason,
  ChunkSkip,
  DocumentCoverage,
  TokenStats,
  ChunkAssuranceReport,
  ChunkRunResult,
} from "./chunk.js";
export { DEFAULT_CHUNKING_CONFIG } from "./chunk.js";
export type { EmbeddingResult, EmbeddingRecord } from "./embedding.js";
export type {
  PreflightStatus,
  PreflightReason,
  PreflightArtifacts,
  PreflightReport,
} from "./preflight.js";
export type { FailedBatch, IngestionSummary } from "./ingestion.js";
export type {
  RetrievalRequest,
  RetrievalHit,
  PackedContext,
  QueryAnalysis,
  RetrievalTimings,
  RetrievalResponse,
} from "./retrieval.js";
export type { PipelineEventType, PipelineEvent, EventSink } from "./events.js";
export type { JobType, JobData, ChunkJobData, EmbedJobData, AnyJobData, JobResult } from "./job.js";
export type {
  EmbeddingProviderName,
  AppConfig,
  DatabaseConfig,
  RedisConfig,
  RetryConfig,
  EmbeddingConfig,
  PreflightConfig,
  RetrievalConfig,
  WorkerConfig,
  BoostRule,
  QueryExpansionRule,
  RetrievalProfile,
} from "./config.js";
