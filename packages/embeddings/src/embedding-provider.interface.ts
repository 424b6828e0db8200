import type { EmbeddingInputType, EmbeddingResult } from "@factvault/types";

/**
 * Remote (or local) text-to-vector model.
 *
 * Implementations signal transient failures with `ExternalServiceError` (retried)
 * and rejected requests with `EmbeddingRequestError` (not retried).
 * `inputType` defaults to `"document"`; models without the distinction ignore it.
 */
export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  embed(text: string, inputType?: EmbeddingInputType): Promise<EmbeddingResult>;
  /** One vector per input, in input order. */
  batchEmbed(texts: string[], inputType?: EmbeddingInputType): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
