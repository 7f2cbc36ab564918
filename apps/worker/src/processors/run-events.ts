import type { EventSink } from "@corpora/types";
import type { RunArtifacts } from "@corpora/artifacts";
import { GuardedEventSink, JsonlEventSink, NoopEventSink, type Logger } from "@corpora/logger";

export interface RunEvents {
  sink: EventSink;
  close(): void;
}

/**
 * Per-run `events.jsonl` sink. Opening, writing and closing the file may
 * fail; each failure is logged and the run carries on without events.
 */
export function openRunEvents(artifacts: RunArtifacts, logger: Logger): RunEvents {
  const path = artifacts.paths.events;
  let file: JsonlEventSink | undefined;
  try {
    file = new JsonlEventSink(path);
  } catch (error: unknown) {
    logger.warn({ path, err: error }, "Could not open run events file");
  }

  const sink = new GuardedEventSink(file ?? new NoopEventSink(), ({ event, error }) => {
    logger.warn({ eventType: event.type, err: error }, "Could not record pipeline event");
  });

  return {
    sink,
    close: () => {
      try {
        file?.close();
      } catch (error: unknown) {
        logger.warn({ path, err: error }, "Could not close run events file");
      }
    },
  };
}
