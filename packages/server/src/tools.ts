/**
 * MCP tool implementations for leadlink
 * Every tool returns two text items: a one-line summary and the JSON result
 */

import { LeadLinkError } from "@leadlink/sdk";
import {
  ExtractInputSchema,
  InitMappingInputSchema,
  UpdateMappingInputSchema,
  LinkIndicesInputSchema,
  RegisterOutputInputSchema,
  LookupFieldInputSchema,
  ListDatasetsInputSchema,
} from "./schemas.js";
import { leadLinkService } from "./service/leadlink.js";
import { logger } from "./observability/logger.js";
import { recordToolExecution } from "./observability/metrics.js";

export type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

export type ToolHandler = (args: unknown) => Promise<ToolResult>;

type StatusResult = { status: string; error?: string; code?: string };

export class ToolTimeoutError extends Error {
  readonly code = "ETIMEDOUT";

  constructor(timeoutMs: number) {
    super(`Tool execution timeout after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
  }
}

/**
 * Stable code of a thrown value, when it carries one
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof LeadLinkError) {
    return err.code;
  }
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

// Helper to wrap tool execution with timeout, logging, and metrics
async function executeTool<T extends StatusResult>(
  toolName: string,
  timeoutMs: number,
  handler: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();
  let success = false;
  let errCode: string | undefined;
  let errMessage: string | undefined;
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => reject(new ToolTimeoutError(timeoutMs)), timeoutMs);
    });

    const result = await Promise.race([handler(), timeoutPromise]);
    success = result.status !== "error";
    if (!success) {
      errCode = result.code;
      errMessage = result.error;
    }
    return result;
  } catch (err) {
    errCode = errorCode(err);
    errMessage = err instanceof Error ? err.message : String(err);
    throw err;
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
    const duration = Date.now() - startTime;
    logger.toolCall(toolName, duration, success, errCode, errMessage);
    recordToolExecution(toolName, duration, success, errCode);
  }
}

/**
 * Summary line plus the JSON result; error results are flagged for the client
 */
function toToolResult(summary: string, result: StatusResult): ToolResult {
  const failed = result.status === "error";
  return {
    content: [
      { type: "text", text: failed ? `Failed: ${result.error ?? "unknown error"}` : summary },
      { type: "text", text: JSON.stringify(result, null, 2) },
    ],
    ...(failed ? { isError: true } : {}),
  };
}

/**
 * extract: Indexed values from a dataset
 */
export async function extract(args: unknown): Promise<ToolResult> {
  const input = ExtractInputSchema.parse(args);

  const result = await executeTool("extract", 10000, () => leadLinkService().extract(input));
  const summary =
    result.status === "success"
      ? `Extracted ${result.count} values from ${input.source}${result.savedTo ? ` (saved to ${result.savedTo})` : ""}`
      : "";
  return toToolResult(summary, result);
}

/**
 * init_mapping: One lead per dataset row
 */
export async function initMapping(args: unknown): Promise<ToolResult> {
  const { source, indexField } = InitMappingInputSchema.parse(args);

  const result = await executeTool("init_mapping", 5000, () =>
    leadLinkService().initMapping(source, indexField)
  );
  const summary =
    result.status === "success"
      ? `Created ${result.created} leads (${result.skipped} already present, ${result.totalLeads} total)`
      : "";
  return toToolResult(summary, result);
}

/**
 * update_mapping: Set a field on selected leads
 */
export async function updateMapping(args: unknown): Promise<ToolResult> {
  const { indexField, indices, field, value } = UpdateMappingInputSchema.parse(args);

  const result = await executeTool("update_mapping", 5000, () =>
    leadLinkService().updateMapping(indexField, indices, field, value)
  );
  const summary = result.status === "success" ? `Updated ${field} on ${result.updated} leads` : "";
  return toToolResult(summary, result);
}

/**
 * link_indices: Allocate target indices for source rows
 */
export async function linkIndices(args: unknown): Promise<ToolResult> {
  const { sourceIndexField, sourceIndices, targetIndexField } = LinkIndicesInputSchema.parse(args);

  const result = await executeTool("link_indices", 5000, () =>
    leadLinkService().link(sourceIndexField, sourceIndices, targetIndexField)
  );
  const summary =
    result.status === "success"
      ? `Linked ${result.linked.length} ${sourceIndexField} values to ${targetIndexField}` +
        (result.targetStart === null ? "" : ` starting at ${result.targetStart}`)
      : "";
  return toToolResult(summary, result);
}

/**
 * register_output: Record an output file as authoritative for its fields
 */
export async function registerOutput(args: unknown): Promise<ToolResult> {
  const { outputFile, fields, indexField } = RegisterOutputInputSchema.parse(args);

  const result = await executeTool("register_output", 5000, () =>
    leadLinkService().register(outputFile, fields, indexField)
  );
  const summary =
    result.status === "success" ? `Registered ${result.outputFile} for ${result.fields.join(", ")}` : "";
  return toToolResult(summary, result);
}

/**
 * lookup_field: A registered field's value for one index
 */
export async function lookupField(args: unknown): Promise<ToolResult> {
  const { field, index } = LookupFieldInputSchema.parse(args);

  const result = await executeTool("lookup_field", 2000, () => leadLinkService().lookup(field, index));
  const summary = result.status === "success" ? `${field}[${index}] = ${JSON.stringify(result.value)}` : "";
  return toToolResult(summary, result);
}

/**
 * list_datasets: Dataset files in the workspace (capped at 5000)
 */
export async function listDatasets(args: unknown): Promise<ToolResult> {
  ListDatasetsInputSchema.parse(args ?? {});

  const result = await executeTool("list_datasets", 2000, () => leadLinkService().listDatasets());
  const summary = result.status === "success" ? `Found ${result.datasets.length} datasets` : "";
  return toToolResult(summary, result);
}

const fieldProperty = (description: string) => ({ type: "string", description });
const indicesProperty = (description: string) => ({
  type: "array",
  items: { type: "integer", minimum: 0 },
  description,
});

/**
 * Tool definitions for MCP server
 */
export const toolDefinitions = [
  {
    name: "extract",
    description:
      "Extract {index, value} pairs from a dataset by path or labelled projection, optionally filtered by a field=value where clause",
    inputSchema: {
      type: "object",
      properties: {
        source: { type: "string", description: "Dataset name, e.g. 'postData' (.json optional)" },
        path: { type: "string", description: "Path into each row, e.g. '[*].author.name'" },
        fields: {
          type: "object",
          description: "Projection of label to path; use instead of 'path'",
          additionalProperties: { type: "string" },
        },
        where: { type: "string", description: "Qualification such as 'isHiring=true'" },
        offset: { type: "integer", minimum: 0, description: "Skip N qualified rows" },
        limit: { type: "integer", minimum: 0, description: "Return at most N rows" },
        saveAs: { type: "string", description: "Save the extracted values as a new dataset" },
      },
      required: ["source"],
    },
  },
  {
    name: "init_mapping",
    description: "Create one lead per dataset row (idempotent: existing leads are skipped)",
    inputSchema: {
      type: "object",
      properties: {
        source: { type: "string", description: "Dataset name" },
        indexField: fieldProperty("Index field, default derived from the name (postData -> postIndex)"),
      },
      required: ["source"],
    },
  },
  {
    name: "update_mapping",
    description: "Set a field to a value on every lead whose index field is in the given indices",
    inputSchema: {
      type: "object",
      properties: {
        indexField: fieldProperty("Index field the indices belong to"),
        indices: indicesProperty("Indices to update"),
        field: fieldProperty("Field to set"),
        value: { type: ["boolean", "number", "string"], description: "Value to set" },
      },
      required: ["indexField", "indices", "field", "value"],
    },
  },
  {
    name: "link_indices",
    description:
      "Allocate consecutive target indices for source rows that have no target yet; partial progress is kept on failure",
    inputSchema: {
      type: "object",
      properties: {
        sourceIndexField: fieldProperty("Source index field, e.g. 'postIndex'"),
        sourceIndices: indicesProperty("Source indices to link, in order"),
        targetIndexField: fieldProperty("Target index field, e.g. 'profileIndex'"),
      },
      required: ["sourceIndexField", "sourceIndices", "targetIndexField"],
    },
  },
  {
    name: "register_output",
    description: "Register an output file as the authoritative source of its fields",
    inputSchema: {
      type: "object",
      properties: {
        outputFile: { type: "string", description: "Output file name, e.g. 'postData_isHiring.json'" },
        fields: { type: "array", items: { type: "string" }, description: "Fields the file provides" },
        indexField: fieldProperty("Index field of the file's index values"),
      },
      required: ["outputFile", "fields", "indexField"],
    },
  },
  {
    name: "lookup_field",
    description: "Look up a registered field's value for one index in the field's own index domain",
    inputSchema: {
      type: "object",
      properties: {
        field: fieldProperty("Registered field"),
        index: { type: "integer", minimum: 0, description: "Index" },
      },
      required: ["field", "index"],
    },
  },
  {
    name: "list_datasets",
    description: "List dataset files in the workspace (capped at 5000)",
    inputSchema: {
      type: "object",
      properties: {},
    },
  },
];

/**
 * Tools that never write to the workspace
 */
export const READONLY_TOOLS = ["extract", "lookup_field", "list_datasets"];

/**
 * Tool handlers map
 */
export const toolHandlers: Record<string, ToolHandler> = {
  extract,
  init_mapping: initMapping,
  update_mapping: updateMapping,
  link_indices: linkIndices,
  register_output: registerOutput,
  lookup_field: lookupField,
  list_datasets: listDatasets,
};
