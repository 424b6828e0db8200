import {
  EmbeddingUnavailableError,
  PersistenceError,
  type PersistenceOperation,
} from "@factvault/errors";
import type { Embedder } from "@factvault/embeddings";
import { createChildLogger, createSilentLogger, type Logger } from "@factvault/logger";
import type { Document, DocumentInput, DocumentRow, JsonObject } from "@factvault/types";
import type { IVectorStore } from "@factvault/vector-store";
import { toPersistenceError } from "./persistence.js";
import {
  batchInputSchema,
  documentInputSchema,
  idListSchema,
  idSchema,
  isBlank,
  parseInput,
} from "./validation.js";

export const DEFAULT_WRITE_BATCH_SIZE = 20;

export interface DocumentStoreOptions {
  embedder: Embedder;
  store: IVectorStore;
  logger?: Logger;
  /** Documents per embed-and-write round in {@link DocumentStore.upsertBatch}. */
  batchSize?: number;
}

interface BatchEntry {
  id: string;
  content: string;
  metadata: JsonObject;
}

function attemptsOf(error: Error | undefined): number {
  return error instanceof EmbeddingUnavailableError ? error.attempts : 1;
}

/**
 * Write path: validates, embeds and persists documents keyed by caller id.
 */
export class DocumentStore {
  private embedder: Embedder;
  private store: IVectorStore;
  private logger: Logger;
  private batchSize: number;

  constructor(options: DocumentStoreOptions) {
    this.embedder = options.embedder;
    this.store = options.store;
    this.batchSize = options.batchSize ?? DEFAULT_WRITE_BATCH_SIZE;
    this.logger = createChildLogger(options.logger ?? createSilentLogger(), {
      component: "document-store",
    });

    if (!Number.isInteger(this.batchSize) || this.batchSize <= 0) {
      throw new RangeError(`batchSize must be a positive integer, got ${String(this.batchSize)}`);
    }
  }

  async upsert(id: string, content: string, metadata: JsonObject = {}): Promise<Document> {
    const input = parseInput(documentInputSchema, { id, content, metadata }, "Invalid document");
    const vector = await this.embedder.embedOne(input.content);

    const row: DocumentRow = {
      id: input.id,
      content: input.content,
      vector,
      metadata: input.metadata,
    };
    const [stored] = await this.persist("upsert", () => this.store.upsert([row]));
    if (!stored) {
      throw new PersistenceError(`Backend returned no row for document "${input.id}"`, "upsert");
    }

    this.logger.debug({ documentId: stored.id }, "document upserted");
    return stored;
  }

  /**
   * Embed and write documents in chunks. Entries with an empty id or content are
   * skipped; within one chunk the last entry for an id wins. A chunk whose
   * embeddings all fail stops the batch with {@link EmbeddingUnavailableError};
   * a failed write stops it with {@link PersistenceError}. Both report how many
   * documents were already committed.
   */
  async upsertBatch(documents: DocumentInput[]): Promise<Document[]> {
    const entries = parseInput(batchInputSchema, documents, "Invalid document batch");
    const written: Document[] = [];
    let skipped = 0;

    for (let start = 0; start < entries.length; start += this.batchSize) {
      const chunk = new Map<string, BatchEntry>();
      for (const entry of entries.slice(start, start + this.batchSize)) {
        if (isBlank(entry.id) || isBlank(entry.content)) {
          skipped++;
          continue;
        }
        chunk.set(entry.id, entry);
      }
      if (chunk.size === 0) {
        continue;
      }

      const pending = [...chunk.values()];
      const outcome = await this.embedder.embedMany(pending.map((entry) => entry.content));

      if (outcome.embeddedCount === 0) {
        const cause = outcome.failures[0]?.error;
        throw new EmbeddingUnavailableError(
          `No document in chunk starting at ${String(start)} could be embedded; ` +
            `${String(written.length)} already written`,
          attemptsOf(cause),
          { cause, details: { committed: written.length } },
        );
      }

      for (const failure of outcome.failures) {
        this.logger.warn(
          {
            err: failure.error,
            documentIds: failure.indices.map((index) => pending[index]?.id),
          },
          "documents not written, embedding failed",
        );
      }

      const rows: DocumentRow[] = outcome.embeddings.flatMap(({ index, vector }) => {
        const entry = pending[index];
        return entry
          ? [{ id: entry.id, content: entry.content, vector, metadata: entry.metadata }]
          : [];
      });

      const stored = await this.persist(
        "upsertBatch",
        () => this.store.upsert(rows),
        written.length,
      );
      written.push(...stored);
    }

    this.logger.info(
      { requested: documents.length, written: written.length, skipped },
      "batch upsert complete",
    );
    return written;
  }

  /** True when a document was removed. */
  async delete(id: string): Promise<boolean> {
    const validId = parseInput(idSchema, id, "Invalid document id");
    const removed = await this.persist("delete", () => this.store.delete([validId]));
    return removed.length > 0;
  }

  /** Removes all matching ids in one call and returns how many existed. */
  async deleteBatch(ids: string[]): Promise<number> {
    const validIds = parseInput(idListSchema, ids, "Invalid document ids");
    if (validIds.length === 0) {
      return 0;
    }
    const removed = await this.persist("deleteBatch", () => this.store.delete(validIds));
    this.logger.debug(
      { requested: validIds.length, removed: removed.length },
      "batch delete complete",
    );
    return removed.length;
  }

  async get(id: string): Promise<Document | null> {
    const validId = parseInput(idSchema, id, "Invalid document id");
    return this.persist("get", () => this.store.get(validId));
  }

  async count(): Promise<number> {
    return this.persist("count", () => this.store.count());
  }

  private async persist<T>(
    operation: PersistenceOperation,
    fn: () => Promise<T>,
    committed = 0,
  ): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      this.logger.error({ err: error, operation, committed }, "persistence operation failed");
      throw toPersistenceError(error, operation, committed);
    }
  }
}
