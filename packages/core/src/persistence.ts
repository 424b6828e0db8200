import { AppError, PersistenceError, type PersistenceOperation } from "@factvault/errors";

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Backend errors become {@link PersistenceError}; errors already classified
 * (integrity, validation) pass through untouched.
 */
export function toPersistenceError(
  error: unknown,
  operation: PersistenceOperation,
  committed = 0,
): AppError {
  if (error instanceof AppError) {
    return error;
  }
  return new PersistenceError(`${operation} failed: ${messageOf(error)}`, operation, {
    cause: error,
    committed,
  });
}
