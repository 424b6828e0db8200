import { IntegrityError } from "@factvault/errors";
import type { DocumentRow, JsonObject, JsonValue } from "@factvault/types";

export function assertVectorDimensions(rows: DocumentRow[], dimensions: number): void {
  for (const row of rows) {
    if (row.vector.length !== dimensions) {
      throw new IntegrityError(
        `Vector for document "${row.id}" has ${String(row.vector.length)} dimensions, expected ${String(dimensions)}`,
        { details: { id: row.id } },
      );
    }
  }
}

function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Older writers stored metadata as a JSON-encoded string. Decode those; a string
 * that is not an encoded object is kept under `raw`.
 */
export function parseMetadata(value: JsonObject | string | null): JsonObject {
  if (value === null) {
    return {};
  }
  if (typeof value !== "string") {
    return value;
  }
  try {
    const decoded: JsonValue = JSON.parse(value);
    return isJsonObject(decoded) ? decoded : { raw: value };
  } catch {
    return { raw: value };
  }
}
