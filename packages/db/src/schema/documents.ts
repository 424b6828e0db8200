import { pgTable, serial, text, timestamp, jsonb, vector, index } from "drizzle-orm/pg-core";
import type { JsonObject } from "@factvault/types";

export const DEFAULT_EMBEDDING_DIMENSIONS = 1536;

export const documents = pgTable(
  "documents",
  {
    seq: serial("seq").notNull(),
    id: text("id").primaryKey(),
    content: text("content").notNull(),
    embedding: vector("embedding", { dimensions: DEFAULT_EMBEDDING_DIMENSIONS }).notNull(),
    metadata: jsonb("metadata").notNull().default({}).$type<JsonObject | string>(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index("documents_embedding_idx").using("ivfflat", table.embedding.op("vector_cosine_ops")),
  ],
);

export type DocumentRecord = typeof documents.$inferSelect;
export type NewDocumentRecord = typeof documents.$inferInsert;
