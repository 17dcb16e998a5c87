/**
 * Shape checks for the files leadlink owns
 *
 * Only the container shape is enforced (array vs object, index fields are
 * integers); row contents stay schema-free.
 */

import { z } from "zod";
import { TypeMismatchError } from "../errors.js";
import type { JsonValue } from "../types.js";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

export const JsonObjectSchema = z.record(z.string(), JsonValueSchema);

export const MappingFileSchema = z
  .object({
    leads: z.array(JsonObjectSchema).default([]),
  })
  .passthrough();

export const RegisteredFileSchema = z.object({
  fields: z.array(z.string()),
  index_field: z.string(),
});

export const RegistryFileSchema = z.object({
  files: z.record(z.string(), RegisteredFileSchema).default({}),
  fields: z.record(z.string(), z.string()).default({}),
});

export const ResultRecordSchema = JsonObjectSchema.and(
  z.object({ index: z.number().int().nonnegative() })
);

export const ResultRecordsSchema = z.array(ResultRecordSchema);

/**
 * Parse `data` against `schema`, reporting failures as TypeMismatchError
 * @param what - Description of the file for the error message
 */
export function parseShape<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  what: string
): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join(", ");
    throw new TypeMismatchError(`${what} has an unexpected shape (${issues})`, {
      cause: result.error,
    });
  }
  return result.data;
}
