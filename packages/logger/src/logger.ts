import pino, { type Logger as PinoLogger, type LoggerOptions } from "pino";
import { REDACT_PATHS } from "./redactor.js";

export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Defaults to "debug" in development and "info" elsewhere. */
  level?: string;
  /** Attached to every line as `name`. */
  service?: string;
  /** Human-readable output through pino-pretty. Defaults to NODE_ENV === "development". */
  pretty?: boolean;
}

const PRETTY_TRANSPORT: pino.TransportSingleOptions = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "SYS:standard",
    ignore: "pid,hostname",
  },
};

/**
 * Root logger for a process. JSON lines unless `pretty` is on; secrets
 * under {@link REDACT_PATHS} are censored; `err` fields go through the
 * standard error serializer so causes and stacks survive.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const development = process.env["NODE_ENV"] === "development";
  const pretty = options.pretty ?? development;

  const settings: LoggerOptions = {
    level: options.level ?? (development ? "debug" : "info"),
    name: options.service ?? "corpora",
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    serializers: { err: pino.stdSerializers.err },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return pretty ? pino({ ...settings, transport: PRETTY_TRANSPORT }) : pino(settings);
}

/** Bind run context, e.g. `{ runId, stage: "embed" }`, to every line. */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

/** Drops everything; the default for library code given no logger. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
