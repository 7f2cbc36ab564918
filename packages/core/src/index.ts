export { PreflightGate, runPreflight } from "./preflight.js";
export type { PreflightSettings, PreflightDependencies } from "./preflight.js";

export { ingest, DEFAULT_BATCH_SIZE } from "./ingestion-pipeline.js";
export type { IngestionDependencies, IngestionOptions } from "./ingestion-pipeline.js";
export { embedRun } from "./embed-run.js";
export type { EmbedRunDependencies } from "./embed-run.js";
export { runChunkSource, arrayChunkSource, documentFor } from "./materialized-chunks.js";
export type { MaterializedChunkSource } from "./materialized-chunks.js";
export { resolveProviderDimension, assertDimension } from "./dimension-guard.js";
export { contentHash } from "./content-hash.js";

export { retrieve, snippetOf, RETRIEVAL_DEFAULTS } from "./retrieval-pipeline.js";
export type { RetrievalDependencies } from "./retrieval-pipeline.js";
export { analyzeQuery } from "./query-analysis.js";
export { reciprocalRankFusion, compareChunkIds, DEFAULT_RRF_K } from "./fusion.js";
export type { FusedCandidate } from "./fusion.js";
export { computeBoost } from "./boosts.js";
export type { BoostSubject } from "./boosts.js";
export { capPerDocument, isTraceable } from "./diversity.js";
export { packContext, safeCut, TRUNCATION_NOTE } from "./context-assembler.js";
