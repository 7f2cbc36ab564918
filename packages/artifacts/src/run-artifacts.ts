import { rm } from "node:fs/promises";
import type {
  Chunk,
  ChunkAssuranceReport,
  EnrichedDocument,
  IngestionSummary,
  PreflightReport,
} from "@corpora/types";
import { fileExists, readJson, readNdjson, readNdjsonAll, writeJson, writeNdjson } from "./files.js";
import { runPaths, type RunPaths } from "./layout.js";
import {
  chunkFromRecord,
  chunkRecordSchema,
  chunkToRecord,
  enrichedFromRecord,
  enrichedRecordSchema,
  enrichedToRecord,
  preflightFromRecord,
  preflightRecordSchema,
  preflightToRecord,
  skiplistRecordSchema,
  summaryToRecord,
  type SkiplistRecord,
} from "./records.js";

/**
 * Typed access to one run's directory. Chunk and enriched files are read as
 * streams so large runs do not need to fit in memory at once.
 */
export class RunArtifacts {
  readonly paths: RunPaths;

  constructor(
    runsDir: string,
    readonly runId: string,
  ) {
    this.paths = runPaths(runsDir, runId);
  }

  hasEnriched(): Promise<boolean> {
    return fileExists(this.paths.enriched);
  }

  hasChunks(): Promise<boolean> {
    return fileExists(this.paths.chunks);
  }

  async *streamEnriched(): AsyncGenerator<EnrichedDocument> {
    for await (const record of readNdjson(this.paths.enriched, enrichedRecordSchema)) {
      yield enrichedFromRecord(record);
    }
  }

  async readEnriched(): Promise<EnrichedDocument[]> {
    const records = await readNdjsonAll(this.paths.enriched, enrichedRecordSchema);
    return records.map(enrichedFromRecord);
  }

  async writeEnriched(documents: EnrichedDocument[]): Promise<number> {
    return writeNdjson(this.paths.enriched, documents.map(enrichedToRecord));
  }

  async *streamChunks(): AsyncGenerator<Chunk> {
    for await (const record of readNdjson(this.paths.chunks, chunkRecordSchema)) {
      yield chunkFromRecord(record);
    }
  }

  async readChunks(): Promise<Chunk[]> {
    const records = await readNdjsonAll(this.paths.chunks, chunkRecordSchema);
    return records.map(chunkFromRecord);
  }

  async writeChunks(chunks: Chunk[]): Promise<number> {
    return writeNdjson(this.paths.chunks, chunks.map(chunkToRecord));
  }

  async writeAssurance(report: ChunkAssuranceReport): Promise<void> {
    await writeJson(this.paths.assurance, report);
  }

  async readPreflight(): Promise<PreflightReport | undefined> {
    if (!(await fileExists(this.paths.preflight))) return undefined;
    return preflightFromRecord(await readJson(this.paths.preflight, preflightRecordSchema));
  }

  /** Writes preflight.json, and doc_skiplist.json when any document was skipped. */
  async writePreflight(report: PreflightReport, minQuality: number): Promise<void> {
    await writeJson(this.paths.preflight, preflightToRecord(report));
    if (report.skipList.length > 0) {
      const skiplist: SkiplistRecord = {
        skip: report.skipList,
        reason: "quality_below_min",
        min_quality: minQuality,
        total_docs: report.docTotals.all,
        skipped_count: report.skipList.length,
      };
      await writeJson(this.paths.skiplist, skiplist);
    } else {
      // A stale skip list from an earlier preflight must not survive
      await rm(this.paths.skiplist, { force: true });
    }
  }

  async readSkiplist(): Promise<string[]> {
    if (!(await fileExists(this.paths.skiplist))) return [];
    const record = await readJson(this.paths.skiplist, skiplistRecordSchema);
    return record.skip;
  }

  async writeSummary(summary: IngestionSummary): Promise<void> {
    await writeJson(this.paths.embedSummary, summaryToRecord(summary));
  }
}
