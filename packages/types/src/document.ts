import type { JsonObject } from "./json.js";

export interface Document {
  id: string;
  content: string;
  vector: number[];
  metadata: JsonObject;
  createdAt: Date;
  updatedAt: Date;
}

export interface DocumentInput {
  id: string;
  content: string;
  metadata?: JsonObject;
}

/**
 * Row handed to the persistence backend. Timestamps are assigned by the store.
 */
export interface DocumentRow {
  id: string;
  content: string;
  vector: number[];
  metadata: JsonObject;
}
