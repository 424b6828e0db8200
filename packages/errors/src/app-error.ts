export interface AppErrorOptions {
  message: string;
  statusCode: number;
  code: string;
  isOperational?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/** Plain-object form of an {@link AppError}, safe to hand to a logger or print. */
export interface SerializedAppError {
  name: string;
  code: string;
  statusCode: number;
  message: string;
  details?: Record<string, unknown>;
  cause?: string;
}

/**
 * Base of every classified failure. `isOperational` separates expected runtime
 * conditions (a down service, bad input) from broken invariants.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor({ message, statusCode, code, isOperational = true, details, cause }: AppErrorOptions) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    // Restore prototype chain (necessary when extending built-ins in TS)
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }

  toJSON(): SerializedAppError {
    const serialized: SerializedAppError = {
      name: this.name,
      code: this.code,
      statusCode: this.statusCode,
      message: this.message,
    };
    if (this.details) {
      serialized.details = this.details;
    }
    if (this.cause !== undefined) {
      serialized.cause = this.cause instanceof Error ? this.cause.message : String(this.cause);
    }
    return serialized;
  }
}
