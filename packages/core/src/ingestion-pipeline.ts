import type {
  Chunk,
  DocumentRecord,
  EmbeddingRecord,
  EventSink,
  FailedBatch,
  IngestionSummary,
  PreflightReport,
} from "@corpora/types";
import type { IEmbeddingProvider } from "@corpora/embeddings";
import type { IVectorStore } from "@corpora/vector-store";
import {
  DimensionMismatchError,
  ExternalServiceError,
  RetryPolicy,
  errorMessage,
  type RetryPolicyOptions,
} from "@corpora/errors";
import { createEvent, createSilentLogger, NoopEventSink, type Logger } from "@corpora/logger";
import { PreflightGate } from "./preflight.js";
import { assertDimension, resolveProviderDimension } from "./dimension-guard.js";
import { contentHash } from "./content-hash.js";
import { documentFor, type MaterializedChunkSource } from "./materialized-chunks.js";

export const DEFAULT_BATCH_SIZE = 128;

export interface IngestionOptions {
  batchSize?: number;
  /** Re-send chunks whose stored hash is unchanged. */
  reembedAll?: boolean;
  /** Count tokens only: no provider call, no write. */
  dryRun?: boolean;
  maxChunks?: number;
  retry?: Omit<RetryPolicyOptions, "onRetry">;
  signal?: AbortSignal;
}

export interface IngestionDependencies {
  source: MaterializedChunkSource;
  preflight: PreflightReport | undefined;
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  events?: EventSink;
  logger?: Logger;
  now?: () => number;
}

interface PreparedChunk {
  chunk: Chunk;
  hash: string;
}

/**
 * Ingestion pipeline: Gate -> Dimension guard -> Skip list -> Changed-only
 * -> Embed (retried per batch) -> Upsert.
 *
 * Every check that can fail the whole run happens before the first write.
 * A batch whose provider call keeps failing is recorded and skipped; the
 * rest of the run continues. Rows are keyed on (chunk_id, provider), so a
 * re-run or a resumed run never duplicates.
 */
export async function ingest(
  deps: IngestionDependencies,
  options: IngestionOptions = {},
): Promise<IngestionSummary> {
  const now = deps.now ?? Date.now;
  const startedAt = now();
  const runId = deps.source.runId;
  const provider = deps.embeddingProvider;
  const store = deps.vectorStore;
  const events = deps.events ?? new NoopEventSink();
  const logger = (deps.logger ?? createSilentLogger()).child({ runId, stage: "embed" });
  const batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
  const dryRun = options.dryRun ?? false;

  // Phase 1: Gate
  const report = PreflightGate.fromReport(deps.preflight).assertReady();

  // Phase 2: Dimension guard, before any write
  const expected = await store.expectedDimension();
  let dimension = provider.dimensions ?? expected;
  if (!dryRun || provider.dimensions !== undefined) {
    const probePolicy = new RetryPolicy(options.retry);
    dimension = await resolveProviderDimension(provider, (fn) => probePolicy.execute(fn));
    assertDimension(expected, dimension, provider, runId);
  }

  events.emit(
    createEvent(
      "embed.start",
      { provider: provider.name, model: provider.model, dimension, dryRun, batchSize },
      runId,
    ),
  );

  // Phase 3: Skip list, before any provider call
  const skip = new Set(report.skipList);
  let chunksTotal = 0;
  let chunksSkipped = 0;
  const selected: PreparedChunk[] = [];
  for await (const chunk of deps.source.chunks()) {
    chunksTotal += 1;
    if (skip.has(chunk.docId)) {
      chunksSkipped += 1;
      continue;
    }
    if (options.maxChunks !== undefined && selected.length >= options.maxChunks) continue;
    selected.push({ chunk, hash: contentHash(chunk.text) });
  }

  const summary: IngestionSummary = {
    runId,
    provider: provider.name,
    model: provider.model,
    dimension,
    dryRun,
    cancelled: false,
    chunksTotal,
    chunksSkipped,
    chunksUnchanged: 0,
    chunksEmbedded: 0,
    rowsInserted: 0,
    rowsUpdated: 0,
    batches: 0,
    failedBatches: [],
    failedDocIds: [],
    durationMs: 0,
  };

  const finish = (result: IngestionSummary): IngestionSummary => {
    result.durationMs = now() - startedAt;
    events.emit(
      createEvent(
        "embed.complete",
        {
          embedded: result.chunksEmbedded,
          unchanged: result.chunksUnchanged,
          skipped: result.chunksSkipped,
          inserted: result.rowsInserted,
          updated: result.rowsUpdated,
          failedBatches: result.failedBatches.length,
          cancelled: result.cancelled,
          dryRun: result.dryRun,
        },
        runId,
      ),
    );
    logger.info(
      {
        embedded: result.chunksEmbedded,
        unchanged: result.chunksUnchanged,
        failedBatches: result.failedBatches.length,
        durationMs: result.durationMs,
      },
      "Embedding run finished",
    );
    return result;
  };

  if (dryRun) {
    summary.estimatedTokens = selected.reduce((sum, item) => sum + item.chunk.tokenCount, 0);
    return finish(summary);
  }

  // Phase 4: Changed-only
  let pending = selected;
  if (!options.reembedAll) {
    const stored = await store.getEmbeddedHashes(
      provider.name,
      selected.map((item) => item.chunk.chunkId),
    );
    pending = selected.filter((item) => stored.get(item.chunk.chunkId) !== item.hash);
    summary.chunksUnchanged = selected.length - pending.length;
  }

  const documents = await deps.source.documents();

  // Phase 5: Embed and upsert, batch by batch
  for (let start = 0; start < pending.length; start += batchSize) {
    if (options.signal?.aborted) {
      summary.cancelled = true;
      events.emit(createEvent("embed.cancelled", { nextBatch: summary.batches }, runId));
      logger.warn({ nextBatch: summary.batches }, "Embedding cancelled between batches");
      break;
    }

    const index = summary.batches;
    const batch = pending.slice(start, start + batchSize);
    summary.batches += 1;

    const policy = new RetryPolicy({
      ...options.retry,
      onRetry: ({ attempt, delayMs, error }) => {
        events.emit(
          createEvent("embed.retry", { batch: index, attempt, delayMs, error: errorMessage(error) }, runId),
        );
        logger.warn({ batch: index, attempt, delayMs, err: error }, "Retrying embedding batch");
      },
    });

    const texts = batch.map((item) => item.chunk.text);
    const outcome = await policy.run(async () => {
      const result = await provider.batchEmbed(texts);
      if (result.embeddings.length !== texts.length) {
        throw new ExternalServiceError(
          `Provider returned ${String(result.embeddings.length)} vectors for ${String(texts.length)} texts`,
          provider.name,
        );
      }
      for (const vector of result.embeddings) assertDimension(expected, vector.length, provider, runId);
      return result;
    });

    if (!outcome.ok) {
      // A wrong width mid-run is as fatal as one found up front
      if (outcome.error instanceof DimensionMismatchError) throw outcome.error;

      const failed: FailedBatch = {
        index,
        chunkIds: batch.map((item) => item.chunk.chunkId),
        docIds: [...new Set(batch.map((item) => item.chunk.docId))],
        attempts: outcome.attempts,
        error: errorMessage(outcome.error),
      };
      summary.failedBatches.push(failed);
      events.emit(
        createEvent(
          "embed.batch_failed",
          { batch: index, attempts: failed.attempts, error: failed.error, chunks: batch.length },
          runId,
        ),
      );
      logger.error({ batch: index, attempts: failed.attempts, err: outcome.error }, "Embedding batch failed");
      continue;
    }

    const embedded = outcome.value;
    const records: EmbeddingRecord[] = batch.map((item, i) => {
      const vector = embedded.embeddings[i] ?? [];
      return {
        chunkId: item.chunk.chunkId,
        provider: provider.name,
        model: embedded.model,
        dimension: vector.length,
        vector,
        contentHash: item.hash,
      };
    });

    const batchDocs = new Map<string, DocumentRecord>();
    for (const item of batch) batchDocs.set(item.chunk.docId, documentFor(item.chunk, documents));

    const written = await store.writeBatch({
      documents: [...batchDocs.values()],
      chunks: batch.map((item) => item.chunk),
      embeddings: records,
    });

    summary.chunksEmbedded += batch.length;
    summary.rowsInserted += written.inserted;
    summary.rowsUpdated += written.updated;
    events.emit(
      createEvent(
        "embed.batch",
        {
          batch: index,
          chunks: batch.length,
          inserted: written.inserted,
          updated: written.updated,
          attempts: outcome.attempts,
          tokensUsed: embedded.tokensUsed,
        },
        runId,
      ),
    );
    logger.debug({ batch: index, ...written }, "Embedding batch written");
  }

  summary.failedDocIds = [...new Set(summary.failedBatches.flatMap((batch) => batch.docIds))];
  return finish(summary);
}
