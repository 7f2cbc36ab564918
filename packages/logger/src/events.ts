import pino from "pino";
import type { EventSink, PipelineEvent, PipelineEventType } from "@corpora/types";

export function createEvent(
  type: PipelineEventType,
  data: Record<string, unknown> = {},
  runId?: string,
): PipelineEvent {
  return { type, timestamp: new Date().toISOString(), ...(runId ? { runId } : {}), data };
}

export class NoopEventSink implements EventSink {
  emit(_event: PipelineEvent): void {}
}

/** Collects events in memory, for tests and for summaries built after a run. */
export class MemoryEventSink implements EventSink {
  readonly events: PipelineEvent[] = [];

  emit(event: PipelineEvent): void {
    this.events.push(event);
  }

  ofType(type: PipelineEventType): PipelineEvent[] {
    return this.events.filter((event) => event.type === type);
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * Appends one JSON line per event to a file through a pino destination
 * (sonic-boom), creating parent directories as needed.
 */
export class JsonlEventSink implements EventSink {
  private readonly destination: ReturnType<typeof pino.destination>;

  constructor(readonly path: string) {
    this.destination = pino.destination({ dest: path, mkdir: true, sync: true, append: true });
  }

  emit(event: PipelineEvent): void {
    this.destination.write(`${JSON.stringify(event)}\n`);
  }

  close(): void {
    this.destination.flushSync();
    this.destination.end();
  }
}

export interface EventSinkFailure {
  event: PipelineEvent;
  error: unknown;
}

/**
 * Wraps a sink so that a failing `emit` never reaches the pipeline. Failures
 * are kept in `failures` and handed to `onError`.
 */
export class GuardedEventSink implements EventSink {
  readonly failures: EventSinkFailure[] = [];

  constructor(
    private readonly inner: EventSink,
    private readonly onError?: (failure: EventSinkFailure) => void,
  ) {}

  emit(event: PipelineEvent): void {
    try {
      this.inner.emit(event);
    } catch (error: unknown) {
      const failure = { event, error };
      this.failures.push(failure);
      this.onError?.(failure);
    }
  }
}
