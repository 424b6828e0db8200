import { AppError } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: ErrorExtras) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

/**
 * Upstream service failure that is worth retrying (5xx, 429, network).
 */
export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 502,
      code: "EXTERNAL_SERVICE_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

/**
 * The embedding service rejected the request itself (bad key, bad model, input too long).
 * Carries the upstream 4xx status so the retry policy never repeats it.
 */
export class EmbeddingRequestError extends AppError {
  public readonly service: string;

  constructor(message: string, service: string, statusCode: number, options?: ErrorExtras) {
    super({
      message,
      statusCode,
      code: "EMBEDDING_REQUEST_REJECTED",
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

export class EmbeddingUnavailableError extends AppError {
  public readonly attempts: number;

  constructor(message = "Embedding service unavailable", attempts: number, options?: ErrorExtras) {
    super({
      message,
      statusCode: 503,
      code: "EMBEDDING_UNAVAILABLE",
      details: options?.details,
      cause: options?.cause,
    });
    this.attempts = attempts;
  }
}

export type PersistenceOperation =
  | "upsert"
  | "upsertBatch"
  | "delete"
  | "deleteBatch"
  | "get"
  | "count"
  | "search"
  | "list";

export class PersistenceError extends AppError {
  public readonly operation: PersistenceOperation;
  /** Documents already written before the failure (batch writes only). */
  public readonly committed: number;

  constructor(
    message = "Persistence error",
    operation: PersistenceOperation,
    options?: ErrorExtras & { committed?: number },
  ) {
    super({
      message,
      statusCode: 500,
      code: "PERSISTENCE_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
    this.operation = operation;
    this.committed = options?.committed ?? 0;
  }
}

/**
 * Stored state would break a collection invariant, e.g. a vector of the wrong length.
 */
export class IntegrityError extends AppError {
  constructor(message: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 500,
      code: "INTEGRITY_ERROR",
      isOperational: false,
      details: options?.details,
      cause: options?.cause,
    });
  }
}
