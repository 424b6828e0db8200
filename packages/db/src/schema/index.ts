export { documents, DEFAULT_EMBEDDING_DIMENSIONS } from "./documents.js";
export type { DocumentRecord, NewDocumentRecord } from "./documents.js";
