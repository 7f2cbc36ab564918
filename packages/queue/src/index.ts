export {
  QUEUE_NAMES,
  parseRedisConnection,
  jobIdFor,
  createQueues,
  enqueueChunkRun,
  enqueueEmbedRun,
  closeQueues,
} from "./queues.js";
export type { QueueConfig, JobSink, QueuedJob, Queues } from "./queues.js";
