import {
  AppError,
  ConstraintViolationError,
  StorageFailureError,
  StorageTimeoutError
} from "../../common/errors";

const TIMEOUT_CODES = new Set([
  "57014", // query_canceled (statement_timeout)
  "55P03" // lock_not_available (lock_timeout)
]);

export function pgErrorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

/**
 * Maps anything thrown inside a unit to the ledger's error taxonomy. Domain
 * errors pass through untouched.
 */
export function translatePgError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  const code = pgErrorCode(error);
  if (code && TIMEOUT_CODES.has(code)) {
    return new StorageTimeoutError(error);
  }
  if (code === "23514") {
    return new ConstraintViolationError();
  }
  // pg reports pool checkout and query_timeout expiry as plain Errors.
  if (!code && error instanceof Error && /timeout/i.test(error.message)) {
    return new StorageTimeoutError(error);
  }
  return new StorageFailureError(error);
}
