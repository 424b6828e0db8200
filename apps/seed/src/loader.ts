import { readFile } from "node:fs/promises";
import { batchInputSchema, parseInput } from "@factvault/core";
import { ValidationError } from "@factvault/errors";
import type { DocumentInput } from "@factvault/types";

/**
 * Parse seed file text: a JSON array of `{ id, content, metadata? }`.
 */
export function parseSeedDocuments(text: string, source = "seed file"): DocumentInput[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error: unknown) {
    throw new ValidationError(`${source} is not valid JSON`, {
      file: error instanceof Error ? error.message : String(error),
    });
  }
  return parseInput(batchInputSchema, raw, `${source} does not hold a list of documents`);
}

export async function loadSeedDocuments(path: string): Promise<DocumentInput[]> {
  const text = await readFile(path, "utf8");
  return parseSeedDocuments(text, path);
}
