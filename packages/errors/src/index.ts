export { AppError } from "./app-error.js";
export type { AppErrorOptions, SerializedAppError } from "./app-error.js";

export {
  ValidationError,
  ExternalServiceError,
  EmbeddingRequestError,
  EmbeddingUnavailableError,
  PersistenceError,
  IntegrityError,
} from "./errors.js";
export type { PersistenceOperation } from "./errors.js";

export { createCircuitBreaker } from "./circuit-breaker.js";
export type { CircuitBreakerOptions, CircuitStateListener } from "./circuit-breaker.js";

export { withRetry, isRetryable, calculateDelay, RetryExhaustedError } from "./retry.js";
export type { RetryOptions, BackoffStrategy } from "./retry.js";
