import { AppError } from "./app-error.js";

export interface RetryPolicyOptions {
  /** Total attempts including the first call. Default: 4 */
  maxAttempts?: number;
  /** Base delay in milliseconds before the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds between retries. Default: 10000 */
  maxDelayMs?: number;
  /** Scale each delay by random(0.5, 1.0). Default: true */
  jitter?: boolean;
  /** Error codes that should be retried. If omitted, all retryable errors are retried. */
  retryableErrors?: string[];
  /** Replaces the default retry classification entirely. */
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  onRetry?: (info: RetryAttemptInfo) => void;
}

export interface RetryAttemptInfo {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

function statusOf(error: unknown): number | undefined {
  if (AppError.isAppError(error)) return error.statusCode;
  if (typeof error === "object" && error !== null && "status" in error) {
    const status = error.status;
    if (typeof status === "number") return status;
  }
  return undefined;
}

function codeOf(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const code = error.code;
    if (typeof code === "string") return code;
  }
  return undefined;
}

/**
 * Default classification: 429 and 5xx are retried, other 4xx are not.
 * Errors without a status (network failures, timeouts) are retried.
 */
export function isRetryableError(error: unknown, retryableErrors?: string[]): boolean {
  if (AppError.isAppError(error) && error.retryable !== undefined) {
    return error.retryable;
  }

  const status = statusOf(error);
  if (status !== undefined && status >= 400 && status < 500 && status !== 429) {
    return false;
  }

  if (retryableErrors && retryableErrors.length > 0) {
    const code = codeOf(error);
    return code !== undefined && retryableErrors.includes(code);
  }

  return true;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Bounded exponential backoff with optional jitter.
 * delay(attempt) = min(maxDelay, baseDelay * 2^(attempt-1)) * random(0.5, 1.0)
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitter: boolean;
  private readonly classify: (error: unknown) => boolean;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly onRetry?: (info: RetryAttemptInfo) => void;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 4);
    this.baseDelayMs = options.baseDelayMs ?? 1_000;
    this.maxDelayMs = options.maxDelayMs ?? 10_000;
    this.jitter = options.jitter ?? true;
    const retryableErrors = options.retryableErrors;
    this.classify = options.isRetryable ?? ((error) => isRetryableError(error, retryableErrors));
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.onRetry = options.onRetry;
  }

  /** Delay before retry number `attempt` (1-based: the wait after the first failure is attempt 1). */
  delayFor(attempt: number): number {
    const exponential = this.baseDelayMs * Math.pow(2, attempt - 1);
    const capped = Math.min(this.maxDelayMs, exponential);
    if (!this.jitter) return Math.floor(capped);
    return Math.floor(capped * (0.5 + this.random() * 0.5));
  }

  shouldRetry(error: unknown, attempt: number): boolean {
    return attempt < this.maxAttempts && this.classify(error);
  }

  /** Run `fn` until it succeeds or the policy gives up; never throws. */
  async run<T>(fn: (attempt: number) => Promise<T>): Promise<RetryOutcome<T>> {
    for (let attempt = 1; ; attempt++) {
      try {
        const value = await fn(attempt);
        return { ok: true, value, attempts: attempt };
      } catch (error: unknown) {
        if (!this.shouldRetry(error, attempt)) {
          return { ok: false, error, attempts: attempt };
        }
        const delayMs = this.delayFor(attempt);
        this.onRetry?.({ attempt, maxAttempts: this.maxAttempts, delayMs, error });
        await this.sleep(delayMs);
      }
    }
  }

  /** Like `run`, but rethrows the last error. */
  async execute<T>(fn: (attempt: number) => Promise<T>): Promise<T> {
    const outcome = await this.run(fn);
    if (outcome.ok) return outcome.value;
    throw outcome.error;
  }
}

export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 3 */
  maxRetries?: number;
  /** Base delay in milliseconds before the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds between retries. Default: 10000 */
  maxDelayMs?: number;
  /** Error codes that should be retried. If omitted, all retryable errors are retried. */
  retryableErrors?: string[];
  onRetry?: (info: RetryAttemptInfo) => void;
}

/**
 * Execute a function with retry logic using exponential backoff and jitter.
 * Does NOT retry on 4xx (client) errors other than 429.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const policy = new RetryPolicy({
    maxAttempts: (options?.maxRetries ?? 3) + 1,
    baseDelayMs: options?.baseDelayMs,
    maxDelayMs: options?.maxDelayMs,
    retryableErrors: options?.retryableErrors,
    onRetry: options?.onRetry,
  });
  return policy.execute(() => fn());
}
