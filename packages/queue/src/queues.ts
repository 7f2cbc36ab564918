import { Queue } from "bullmq";
import type { ConnectionOptions, JobsOptions } from "bullmq";
import type { ChunkJobData, EmbedJobData, JobType } from "@corpora/types";

export const QUEUE_NAMES = {
  CHUNK: "corpora-chunk",
  EMBED: "corpora-embed",
} as const;

export interface QueueConfig {
  connection: ConnectionOptions;
}

/** The part of a queued job the enqueue helpers look at. */
export interface QueuedJob {
  getState(): Promise<string>;
  remove(): Promise<void>;
}

/** Anything jobs can be added to; a BullMQ Queue in production. */
export interface JobSink<T> {
  add(name: string, data: T, opts?: JobsOptions): Promise<unknown>;
  getJob(jobId: string): Promise<QueuedJob | undefined>;
}

const FINISHED_STATES: ReadonlySet<string> = new Set(["completed", "failed"]);

/**
 * BullMQ ignores `add` for an id it still holds, so a finished job under the
 * run's id is removed first. A waiting or active job is left alone.
 */
async function releaseFinishedJob<T>(queue: JobSink<T>, jobId: string): Promise<void> {
  const existing = await queue.getJob(jobId);
  if (existing && FINISHED_STATES.has(await existing.getState())) {
    await existing.remove();
  }
}

export function parseRedisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port) || 6379,
    password: parsed.password || undefined,
  };
}

/**
 * One job id per stage and run, so a run queued twice while pending is held
 * only once.
 * BullMQ rejects custom ids containing ":".
 */
export function jobIdFor(stage: JobType, runId: string): string {
  return `${stage}-${runId}`;
}

export function createQueues(config: QueueConfig) {
  const defaultOpts = {
    connection: config.connection,
    defaultJobOptions: {
      attempts: 3,
      backoff: {
        type: "exponential" as const,
        delay: 1000,
      },
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  };

  const chunkQueue = new Queue<ChunkJobData>(QUEUE_NAMES.CHUNK, defaultOpts);

  // Batches already retry inside the run; the job itself retries less
  const embedQueue = new Queue<EmbedJobData>(QUEUE_NAMES.EMBED, {
    ...defaultOpts,
    defaultJobOptions: {
      ...defaultOpts.defaultJobOptions,
      attempts: 2,
    },
  });

  return { chunkQueue, embedQueue };
}

export type Queues = ReturnType<typeof createQueues>;

export async function enqueueChunkRun(queue: JobSink<ChunkJobData>, runId: string): Promise<string> {
  const jobId = jobIdFor("chunk", runId);
  await releaseFinishedJob(queue, jobId);
  await queue.add("chunk", { type: "chunk", runId }, { jobId });
  return jobId;
}

export async function enqueueEmbedRun(
  queue: JobSink<EmbedJobData>,
  runId: string,
  options: Omit<EmbedJobData, "type" | "runId"> = {},
): Promise<string> {
  const jobId = jobIdFor("embed", runId);
  await releaseFinishedJob(queue, jobId);
  await queue.add("embed", { ...options, type: "embed", runId }, { jobId });
  return jobId;
}

export async function closeQueues(queues: Queues): Promise<void> {
  await Promise.all([queues.chunkQueue.close(), queues.embedQueue.close()]);
}
