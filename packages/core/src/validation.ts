import { z } from "zod";
import { ValidationError } from "@factvault/errors";
import type { JsonObject, JsonValue } from "@factvault/types";

const nonBlank = (label: string) =>
  z.string().refine((value) => value.trim().length > 0, `${label} must not be empty`);

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const metadataSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

export const documentInputSchema = z.object({
  id: nonBlank("Document id"),
  content: nonBlank("Document content"),
  metadata: metadataSchema.default({}),
});

/** Batch entries may carry empty ids or content; those are skipped, not rejected. */
export const batchInputSchema = z.array(
  z.object({
    id: z.string(),
    content: z.string(),
    metadata: metadataSchema.default({}),
  }),
);

export const searchInputSchema = z.object({
  query: nonBlank("Query"),
  topK: z.number().int().positive(),
  scoreThreshold: z.number().finite().optional(),
});

export const idSchema = nonBlank("Document id");

export const idListSchema = z.array(z.string());

/**
 * Parse `value` or throw a {@link ValidationError} whose `fields` map each
 * failing path to its message.
 */
export function parseInput<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  value: unknown,
  message: string,
): z.output<TSchema> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const fields: Record<string, string> = {};
  for (const issue of result.error.issues) {
    const path = issue.path.length > 0 ? issue.path.join(".") : "input";
    fields[path] ??= issue.message;
  }
  throw new ValidationError(message, fields);
}

export function isBlank(text: string): boolean {
  return text.trim().length === 0;
}
