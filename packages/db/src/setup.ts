import { sql, type SQL } from "drizzle-orm";

/**
 * Anything that can run a drizzle SQL fragment. Satisfied by {@link DbClient}.
 */
export interface SqlExecutor {
  execute(query: SQL): PromiseLike<unknown>;
}

export interface SetupStatus {
  ok: boolean;
  /** Why the check failed; absent when `ok`. */
  reason?: string;
}

/**
 * DDL for the documents table, one statement per entry.
 * The ivfflat index needs rows to train on; it is still valid on an empty table.
 */
export function getSchemaStatements(dimensions: number, lists = 100): string[] {
  if (!Number.isInteger(dimensions) || dimensions <= 0) {
    throw new RangeError(`dimensions must be a positive integer, got ${String(dimensions)}`);
  }

  return [
    "CREATE EXTENSION IF NOT EXISTS vector",
    `CREATE TABLE IF NOT EXISTS documents (
  seq SERIAL NOT NULL,
  id TEXT PRIMARY KEY,
  content TEXT NOT NULL,
  embedding VECTOR(${String(dimensions)}) NOT NULL,
  metadata JSONB NOT NULL DEFAULT '{}'::JSONB,
  created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
)`,
    `CREATE INDEX IF NOT EXISTS documents_embedding_idx ON documents
  USING ivfflat (embedding vector_cosine_ops) WITH (lists = ${String(lists)})`,
  ];
}

export function getSchemaSql(dimensions: number, lists = 100): string {
  return getSchemaStatements(dimensions, lists)
    .map((statement) => `${statement};`)
    .join("\n\n");
}

export async function applySchema(db: SqlExecutor, dimensions: number): Promise<void> {
  for (const statement of getSchemaStatements(dimensions)) {
    await db.execute(sql.raw(statement));
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Verify that the documents table exists and that the pgvector cosine operator works on it.
 */
export async function checkDatabaseSetup(db: SqlExecutor, dimensions: number): Promise<SetupStatus> {
  try {
    await db.execute(sql`SELECT count(*) FROM documents`);
  } catch (error: unknown) {
    return { ok: false, reason: `documents table is not readable: ${messageOf(error)}` };
  }

  const probe = JSON.stringify(new Array<number>(dimensions).fill(0));
  try {
    await db.execute(
      sql`SELECT 1 FROM documents WHERE embedding <=> ${probe}::vector IS NOT NULL LIMIT 1`,
    );
  } catch (error: unknown) {
    return { ok: false, reason: `pgvector operator failed: ${messageOf(error)}` };
  }

  return { ok: true };
}
