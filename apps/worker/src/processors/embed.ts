import { UnrecoverableError } from "bullmq";
import type { AppConfig, EmbedJobData, JobResult } from "@corpora/types";
import { RunArtifacts } from "@corpora/artifacts";
import { embedRun, runPreflight } from "@corpora/core";
import type { IEmbeddingProvider } from "@corpora/embeddings";
import { DimensionMismatchError, PreflightBlockedError } from "@corpora/errors";
import { createChildLogger, type Logger } from "@corpora/logger";
import type { IVectorStore } from "@corpora/vector-store";
import { openRunEvents } from "./run-events.js";

export interface EmbedProcessorDeps {
  config: Pick<AppConfig, "runsDir" | "embedding" | "tokenizer" | "preflight">;
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  logger: Logger;
  signal?: AbortSignal;
}

/**
 * Embed job processor.
 *
 * Preflight -> ingestion -> embed/summary.json. A blocked preflight or a
 * dimension mismatch will not fix itself, so the job is not retried.
 */
export async function processEmbed(data: EmbedJobData, deps: EmbedProcessorDeps): Promise<JobResult> {
  const started = Date.now();
  const { config } = deps;
  const logger = createChildLogger(deps.logger, { runId: data.runId, stage: "embed" });
  const artifacts = new RunArtifacts(config.runsDir, data.runId);
  const events = openRunEvents(artifacts, logger);

  try {
    const preflight = await runPreflight(
      { embedding: config.embedding, tokenizer: config.tokenizer, preflight: config.preflight },
      { artifacts, events: events.sink, logger },
    );

    const summary = await embedRun(
      data.runId,
      {
        runsDir: config.runsDir,
        embeddingProvider: deps.embeddingProvider,
        vectorStore: deps.vectorStore,
        events: events.sink,
        logger,
      },
      {
        preflight,
        batchSize: config.embedding.batchSize,
        reembedAll: data.reembedAll,
        dryRun: data.dryRun,
        maxChunks: data.maxChunks,
        retry: {
          maxAttempts: config.embedding.retry.maxRetries + 1,
          baseDelayMs: config.embedding.retry.baseDelayMs,
          maxDelayMs: config.embedding.retry.maxDelayMs,
        },
        signal: deps.signal,
      },
    );

    return {
      success: summary.failedBatches.length === 0 && !summary.cancelled,
      processedAt: new Date(),
      duration: Date.now() - started,
      ...(summary.failedBatches.length > 0
        ? { error: `${String(summary.failedBatches.length)} batch(es) failed` }
        : {}),
      metrics: {
        embedded: summary.chunksEmbedded,
        unchanged: summary.chunksUnchanged,
        skipped: summary.chunksSkipped,
        inserted: summary.rowsInserted,
        updated: summary.rowsUpdated,
        failedBatches: summary.failedBatches.length,
      },
    };
  } catch (error: unknown) {
    if (error instanceof PreflightBlockedError || error instanceof DimensionMismatchError) {
      logger.error({ err: error }, "Embed run cannot proceed");
      throw new UnrecoverableError(error.message);
    }
    throw error;
  } finally {
    events.close();
  }
}
