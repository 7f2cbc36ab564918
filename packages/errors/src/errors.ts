import { AppError } from "./app-error.js";

interface ErrorExtras {
  runId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorExtras) {
    super({ message, statusCode: 404, code: "NOT_FOUND", ...options });
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: ErrorExtras) {
    super({ message, statusCode: 400, code: "VALIDATION_ERROR", ...options });
    this.fields = fields;
  }
}

export class RateLimitedError extends AppError {
  /** Seconds the remote side asked us to wait, when it said. */
  public readonly retryAfter: number;

  constructor(message = "Rate limited", retryAfter: number, options?: ErrorExtras) {
    super({ message, statusCode: 429, code: "RATE_LIMITED", retryable: true, ...options });
    this.retryAfter = retryAfter;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(
    message = "External service error",
    service: string,
    options?: ErrorExtras & { statusCode?: number },
  ) {
    super({
      message,
      statusCode: options?.statusCode ?? 502,
      code: "EXTERNAL_SERVICE_ERROR",
      runId: options?.runId,
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

export class DimensionMismatchError extends AppError {
  public readonly expected: number;
  public readonly actual: number;
  public readonly provider: string;
  public readonly model: string;

  constructor(
    params: { expected: number; actual: number; provider: string; model: string },
    options?: ErrorExtras,
  ) {
    super({
      message: `Dimension mismatch: expected ${String(params.expected)}, got ${String(params.actual)} (provider=${params.provider}, model=${params.model})`,
      statusCode: 422,
      code: "DIMENSION_MISMATCH",
      retryable: false,
      ...options,
    });
    this.expected = params.expected;
    this.actual = params.actual;
    this.provider = params.provider;
    this.model = params.model;
  }
}

export class PreflightBlockedError extends AppError {
  public readonly reasons: string[];

  constructor(reasons: string[], options?: ErrorExtras) {
    super({
      message: `Preflight blocked: ${reasons.length > 0 ? reasons.join(", ") : "not run"}`,
      statusCode: 409,
      code: "PREFLIGHT_BLOCKED",
      retryable: false,
      ...options,
    });
    this.reasons = reasons;
  }
}

export class ChunkingError extends AppError {
  public readonly docId: string;

  constructor(message: string, docId: string, options?: ErrorExtras) {
    super({ message, statusCode: 422, code: "CHUNKING_FAILED", retryable: false, ...options });
    this.docId = docId;
  }
}

export class TokenizerUnavailableError extends AppError {
  public readonly tokenizer: string;

  constructor(tokenizer: string, options?: ErrorExtras) {
    super({
      message: `Tokenizer unavailable: ${tokenizer}`,
      statusCode: 500,
      code: "TOKENIZER_MISSING",
      retryable: false,
      ...options,
    });
    this.tokenizer = tokenizer;
  }
}
