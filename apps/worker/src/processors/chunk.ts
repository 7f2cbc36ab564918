import { UnrecoverableError } from "bullmq";
import type { AppConfig, ChunkJobData, JobResult } from "@corpora/types";
import { RunArtifacts } from "@corpora/artifacts";
import { chunkDocuments } from "@corpora/chunker";
import { NotFoundError, ValidationError } from "@corpora/errors";
import { createTokenizer } from "@corpora/tokenizer";
import { createChildLogger, type Logger } from "@corpora/logger";
import { openRunEvents } from "./run-events.js";

export interface ChunkProcessorDeps {
  config: Pick<AppConfig, "runsDir" | "chunking" | "tokenizer">;
  logger: Logger;
}

/**
 * Chunk job processor.
 *
 * enrich/enriched.jsonl -> layered chunker -> chunk/chunks.ndjson
 * + chunk/assurance.json. Invalid chunking settings fail the job for good,
 * with nothing written.
 */
export async function processChunk(data: ChunkJobData, deps: ChunkProcessorDeps): Promise<JobResult> {
  const started = Date.now();
  const logger = createChildLogger(deps.logger, { runId: data.runId, stage: "chunk" });
  const artifacts = new RunArtifacts(deps.config.runsDir, data.runId);
  if (!(await artifacts.hasEnriched())) {
    throw new NotFoundError(`No enriched records for run ${data.runId}`, { runId: data.runId });
  }
  const events = openRunEvents(artifacts, logger);

  try {
    const documents = await artifacts.readEnriched();
    const result = chunkDocuments(documents, deps.config.chunking, {
      tokenizer: createTokenizer(deps.config.tokenizer),
      events: events.sink,
      logger,
      runId: data.runId,
    });

    await artifacts.writeChunks(result.chunks);
    await artifacts.writeAssurance(result.assurance);
    logger.info(
      { documents: documents.length, chunks: result.chunks.length, skipped: result.skipped.length },
      "Run chunked",
    );

    return {
      success: true,
      processedAt: new Date(),
      duration: Date.now() - started,
      metrics: {
        documents: documents.length,
        chunks: result.chunks.length,
        skipped: result.skipped.length,
      },
    };
  } catch (error: unknown) {
    if (error instanceof ValidationError) throw new UnrecoverableError(error.message);
    throw error;
  } finally {
    events.close();
  }
}
