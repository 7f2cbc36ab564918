import { AppError, ExternalServiceError, RateLimitedError, errorMessage } from "@corpora/errors";

function numericField(error: unknown, field: "status" | "statusCode"): number | undefined {
  if (typeof error !== "object" || error === null || !(field in error)) return undefined;
  const value: unknown = Reflect.get(error, field);
  return typeof value === "number" ? value : undefined;
}

/**
 * Normalize an SDK failure into the AppError hierarchy so the retry policy
 * can classify it: 429 becomes RateLimitedError, anything else an
 * ExternalServiceError carrying the upstream status (502 when there is none).
 */
export function toProviderError(service: string, error: unknown): AppError {
  if (AppError.isAppError(error)) return error;

  const status = numericField(error, "status") ?? numericField(error, "statusCode");
  const message = `${service} embedding request failed: ${errorMessage(error)}`;

  if (status === 429) {
    return new RateLimitedError(message, 0, { cause: error });
  }
  return new ExternalServiceError(message, service, { statusCode: status ?? 502, cause: error });
}
