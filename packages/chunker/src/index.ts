export type { IChunker, DocumentChunks } from "./chunker.interface.js";
export {
  LayeredChunker,
  chunkIdFor,
  validateChunkingConfig,
  TRUNCATION_MARKER,
} from "./layered-chunker.js";
export type { LayeredChunkerDeps } from "./layered-chunker.js";
export { chunkDocuments } from "./batch.js";
export type { ChunkDocumentsOptions } from "./batch.js";
export { calculateCoverage, mergeSpans } from "./coverage.js";
export type { CoverageResult } from "./coverage.js";
export { buildChunkAssurance, tokenStats } from "./assurance.js";
export { buildCodeDigest, extractSymbols } from "./code-digest.js";
export { parseBlocks, sectionBoundaries } from "./blocks.js";
export type { Block, BlockKind } from "./blocks.js";
export { DocumentSkipError } from "./errors.js";
