export { runPaths } from "./layout.js";
export type { RunPaths } from "./layout.js";
export {
  chunkRecordSchema,
  chunkToRecord,
  chunkFromRecord,
  enrichedRecordSchema,
  enrichedFromRecord,
  enrichedToRecord,
  preflightRecordSchema,
  preflightToRecord,
  preflightFromRecord,
  skiplistRecordSchema,
  summaryToRecord,
  isSplitStrategy,
} from "./records.js";
export type {
  ChunkRecord,
  EnrichedRecord,
  EnrichedRecordInput,
  PreflightRecord,
  SkiplistRecord,
} from "./records.js";
export { fileExists, readNdjson, readNdjsonAll, writeNdjson, readJson, writeJson } from "./files.js";
export type { RecordSchema } from "./files.js";
export { RunArtifacts } from "./run-artifacts.js";
