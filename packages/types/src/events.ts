export type PipelineEventType =
  | "chunk.start"
  | "chunk.doc"
  | "chunk.skip"
  | "chunk.force_truncate"
  | "chunk.digest"
  | "chunk.complete"
  | "preflight.complete"
  | "embed.start"
  | "embed.batch"
  | "embed.retry"
  | "embed.batch_failed"
  | "embed.cancelled"
  | "embed.complete"
  | "retrieve.start"
  | "retrieve.complete";

export interface PipelineEvent {
  type: PipelineEventType;
  timestamp: string;
  runId?: string;
  data: Record<string, unknown>;
}

/** Destination for structured pipeline events. Implementations live in the logger package. */
export interface EventSink {
  emit(event: PipelineEvent): void;
}
