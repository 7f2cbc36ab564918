export type JobType = "chunk" | "embed";

export interface JobData {
  runId: string;
  type: JobType;
}

export interface ChunkJobData extends JobData {
  type: "chunk";
}

export interface EmbedJobData extends JobData {
  type: "embed";
  reembedAll?: boolean;
  dryRun?: boolean;
  maxChunks?: number;
}

export type AnyJobData = ChunkJobData | EmbedJobData;

export interface JobResult {
  success: boolean;
  processedAt: Date;
  duration: number;
  error?: string;
  metrics?: Record<string, number>;
}
