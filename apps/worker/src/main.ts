import { Worker } from "bullmq";
import type { ChunkJobData, EmbedJobData } from "@corpora/types";
import { describeConfig, loadConfig } from "@corpora/config";
import { providerFromSettings } from "@corpora/embeddings";
import { withRetry } from "@corpora/errors";
import { createLogger } from "@corpora/logger";
import { parseRedisConnection, QUEUE_NAMES } from "@corpora/queue";
import { createVectorStore } from "@corpora/vector-store";
import { processChunk } from "./processors/chunk.js";
import { processEmbed } from "./processors/embed.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, service: "worker" });
  logger.info({ config: describeConfig(config) }, "Starting worker");

  const connection = parseRedisConnection(config.redis.url);
  const embeddingProvider = providerFromSettings(config.embedding);
  const vectorStore = createVectorStore({
    type: "pgvector",
    pgConnectionString: config.database.url,
    maxConnections: config.database.poolMax,
    poolProfile: "worker",
    dimension: config.embedding.dimension,
  });
  // The database may still be starting alongside the worker
  await withRetry(() => vectorStore.ensureSchema(), {
    maxRetries: 5,
    onRetry: ({ attempt, delayMs, error }) => {
      logger.warn({ attempt, delayMs, err: error }, "Database not ready, retrying schema setup");
    },
  });

  // Aborted on shutdown: running embed jobs stop after their current batch
  const controller = new AbortController();

  const chunkWorker = new Worker<ChunkJobData>(
    QUEUE_NAMES.CHUNK,
    async (job) => processChunk(job.data, { config, logger }),
    { connection, concurrency: config.worker.concurrency },
  );

  const embedWorker = new Worker<EmbedJobData>(
    QUEUE_NAMES.EMBED,
    async (job) =>
      processEmbed(job.data, {
        config,
        embeddingProvider,
        vectorStore,
        logger,
        signal: controller.signal,
      }),
    { connection, concurrency: config.worker.concurrency },
  );

  const workers = [chunkWorker, embedWorker];
  for (const worker of workers) {
    worker.on("failed", (job, error) => {
      logger.error({ queue: worker.name, jobId: job?.id, err: error }, "Job failed");
    });
  }

  logger.info({ queues: Object.values(QUEUE_NAMES) }, "Listening");

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "Shutting down");
    controller.abort();
    await Promise.all(workers.map((w) => w.close()));
    await vectorStore.close();
    logger.info("All workers closed");
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  createLogger({ service: "worker" }).fatal({ err }, "Worker failed to start");
  process.exit(1);
});
