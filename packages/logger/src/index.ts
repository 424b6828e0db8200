/**
 * @factvault/logger
 *
 * Structured logging with secret and email redaction.
 */

export { createLogger, createChildLogger, createSilentLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, redactFields, REDACT_PATHS } from "./pii-redactor.js";
