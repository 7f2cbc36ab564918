/**
 * @corpora/logger
 *
 * Structured logging with secret redaction, plus the pipeline event sinks.
 */

export { createLogger, createChildLogger, createSilentLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, REDACT_PATHS } from "./redactor.js";
export {
  createEvent,
  NoopEventSink,
  MemoryEventSink,
  JsonlEventSink,
  GuardedEventSink,
} from "./events.js";
export type { EventSinkFailure } from "./events.js";
