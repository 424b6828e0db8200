import {
  asc,
  count,
  cosineDistance,
  eq,
  getTableColumns,
  gte,
  ilike,
  inArray,
  sql,
} from "drizzle-orm";
import {
  applySchema,
  checkDatabaseSetup,
  DEFAULT_EMBEDDING_DIMENSIONS,
  documents,
  type DbClient,
  type DocumentRecord,
} from "@factvault/db";
import type { Document, DocumentRow } from "@factvault/types";
import type {
  IVectorStore,
  ScoredDocument,
  SimilarityQuery,
} from "./vector-store.interface.js";
import { assertVectorDimensions, parseMetadata } from "./rows.js";

export interface PgVectorStoreOptions {
  dimensions?: number;
}

function toDocument(record: DocumentRecord): Document {
  return {
    id: record.id,
    content: record.content,
    vector: record.embedding,
    metadata: parseMetadata(record.metadata),
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  };
}

/**
 * PostgreSQL + pgvector backend. Similarity is `1 - (embedding <=> query)`.
 */
export class PgVectorStore implements IVectorStore {
  readonly dimensions: number;
  private db: DbClient;

  constructor(db: DbClient, options: PgVectorStoreOptions = {}) {
    this.db = db;
    this.dimensions = options.dimensions ?? DEFAULT_EMBEDDING_DIMENSIONS;
  }

  async upsert(rows: DocumentRow[]): Promise<Document[]> {
    if (rows.length === 0) {
      return [];
    }
    assertVectorDimensions(rows, this.dimensions);

    const records = await this.db
      .insert(documents)
      .values(
        rows.map((row) => ({
          id: row.id,
          content: row.content,
          embedding: row.vector,
          metadata: row.metadata,
        })),
      )
      .onConflictDoUpdate({
        target: documents.id,
        set: {
          content: sql`excluded.content`,
          embedding: sql`excluded.embedding`,
          metadata: sql`excluded.metadata`,
          updatedAt: sql`now()`,
        },
      })
      .returning();

    const byId = new Map(records.map((record) => [record.id, toDocument(record)]));
    return rows.flatMap((row) => {
      const stored = byId.get(row.id);
      return stored ? [stored] : [];
    });
  }

  async delete(ids: string[]): Promise<string[]> {
    if (ids.length === 0) {
      return [];
    }
    const removed = await this.db
      .delete(documents)
      .where(inArray(documents.id, ids))
      .returning({ id: documents.id });
    return removed.map((row) => row.id);
  }

  async get(id: string): Promise<Document | null> {
    const [record] = await this.db.select().from(documents).where(eq(documents.id, id)).limit(1);
    return record ? toDocument(record) : null;
  }

  async count(): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(documents);
    return row?.value ?? 0;
  }

  async similaritySearch(query: SimilarityQuery): Promise<ScoredDocument[]> {
    const distance = cosineDistance(documents.embedding, query.vector);
    const score = sql<number>`1 - (${distance})`.mapWith(Number);

    const records = await this.db
      .select({ ...getTableColumns(documents), score })
      .from(documents)
      .where(query.scoreThreshold === undefined ? undefined : gte(score, query.scoreThreshold))
      .orderBy(asc(distance), asc(documents.seq))
      .limit(query.topK);

    return records.map(({ score: rowScore, ...record }) => ({
      document: toDocument(record),
      score: rowScore,
    }));
  }

  async findByContentPattern(pattern: string, limit: number): Promise<Document[]> {
    const records = await this.db
      .select()
      .from(documents)
      .where(ilike(documents.content, pattern))
      .orderBy(asc(documents.seq))
      .limit(limit);
    return records.map(toDocument);
  }

  async list(limit: number): Promise<Document[]> {
    const records = await this.db.select().from(documents).orderBy(asc(documents.seq)).limit(limit);
    return records.map(toDocument);
  }

  async ensureSchema(): Promise<void> {
    await applySchema(this.db, this.dimensions);
  }

  async healthCheck(): Promise<boolean> {
    const status = await checkDatabaseSetup(this.db, this.dimensions);
    return status.ok;
  }
}
