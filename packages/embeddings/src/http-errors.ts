import { EmbeddingRequestError, ExternalServiceError } from "@factvault/errors";

/**
 * Map a non-2xx embedding response to the error the retry policy understands.
 * 408 and 429 are worth another attempt; every other 4xx is the caller's fault.
 */
export function httpFailure(
  service: string,
  status: number,
  statusText: string,
  body: string,
): EmbeddingRequestError | ExternalServiceError {
  const message = `${service} embedding failed: ${String(status)} ${statusText}`.trim();
  const details = body ? { body: body.slice(0, 500) } : undefined;

  if (status >= 400 && status < 500 && status !== 408 && status !== 429) {
    return new EmbeddingRequestError(message, service, status, { details });
  }
  return new ExternalServiceError(message, service, { details });
}

/**
 * `fetch` rejects on DNS, socket, and TLS failures; all of them are transient.
 */
export function networkFailure(service: string, error: unknown): ExternalServiceError {
  const reason = error instanceof Error ? error.message : String(error);
  return new ExternalServiceError(`${service} request failed: ${reason}`, service, { cause: error });
}
