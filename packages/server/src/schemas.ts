/**
 * Zod schemas for validating tool inputs
 * Provides runtime type safety and detailed validation errors
 */

import { z } from "zod";

// Names stay inside the workspace root: no separators, no leading dot
const fileNamePattern = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
// Same shape a where clause accepts
const fieldPattern = /^\w+$/;

export const FileNameSchema = z
  .string()
  .min(1)
  .superRefine((val, ctx) => {
    if (!fileNamePattern.test(val) || val.includes("..")) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          "name must start with a letter or digit and contain only letters, digits, dots, underscores and hyphens",
      });
    }
  });

export const FieldNameSchema = z
  .string()
  .min(1)
  .superRefine((val, ctx) => {
    if (!fieldPattern.test(val)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "field must contain only letters, digits and underscores",
      });
    }
  });

export const PathSchema = z.string().min(1, "path must be non-empty");

export const IndexSchema = z.number().int().min(0);

export const IndexListSchema = z.array(IndexSchema).min(1, "at least one index is required");

export const LiteralSchema = z.union([z.boolean(), z.number(), z.string()]);

// Tool input schemas

export const ExtractInputSchema = z
  .object({
    source: FileNameSchema,
    path: PathSchema.optional(),
    fields: z.record(z.string().min(1), PathSchema).optional(),
    where: z.string().min(1).optional(),
    offset: z.number().int().min(0).optional(),
    limit: z.number().int().min(0).optional(),
    saveAs: FileNameSchema.optional(),
  })
  .superRefine((input, ctx) => {
    if ((input.path === undefined) === (input.fields === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Provide exactly one of 'path' or 'fields'",
      });
    }
  });

export const InitMappingInputSchema = z.object({
  source: FileNameSchema,
  indexField: FieldNameSchema.optional(),
});

export const UpdateMappingInputSchema = z.object({
  indexField: FieldNameSchema,
  indices: IndexListSchema,
  field: FieldNameSchema,
  value: LiteralSchema,
});

export const LinkIndicesInputSchema = z.object({
  sourceIndexField: FieldNameSchema,
  sourceIndices: IndexListSchema,
  targetIndexField: FieldNameSchema,
});

export const RegisterOutputInputSchema = z.object({
  outputFile: FileNameSchema,
  fields: z.array(FieldNameSchema).min(1, "at least one field is required"),
  indexField: FieldNameSchema,
});

export const LookupFieldInputSchema = z.object({
  field: FieldNameSchema,
  index: IndexSchema,
});

export const ListDatasetsInputSchema = z.object({});

// Export types
export type ExtractInput = z.infer<typeof ExtractInputSchema>;
export type InitMappingInput = z.infer<typeof InitMappingInputSchema>;
export type UpdateMappingInput = z.infer<typeof UpdateMappingInputSchema>;
export type LinkIndicesInput = z.infer<typeof LinkIndicesInputSchema>;
export type RegisterOutputInput = z.infer<typeof RegisterOutputInputSchema>;
export type LookupFieldInput = z.infer<typeof LookupFieldInputSchema>;
