export interface AppErrorOptions {
  message: string;
  code: string;
  statusCode?: number;
  isOperational?: boolean;
  /** Overrides the status-based retry decision when set. */
  retryable?: boolean;
  runId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly retryable?: boolean;
  public readonly runId?: string;
  public readonly details?: Record<string, unknown>;

  constructor({
    message,
    code,
    statusCode = 500,
    isOperational = true,
    retryable,
    runId,
    details,
    cause,
  }: AppErrorOptions) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.retryable = retryable;
    this.runId = runId;
    this.details = details;

    // Restore prototype chain (necessary when extending built-ins in TS)
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }
}

/** Render any thrown value as a one-line message. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}
