/**
 * Error types for leadlink operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - Errors never escape a public workspace operation; they are folded into
 *   `{ status: "error", error, code }` by `toErrorResult`
 */

import type { ErrorResult } from "./types.js";

/**
 * Base class for all leadlink errors
 */
export abstract class LeadLinkError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a dataset or output file does not exist
 */
export class NotFoundError extends LeadLinkError {
  readonly code = "ENOENT";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Dataset not found: ${filePath}`, options);
  }
}

/**
 * Thrown when a path expression cannot be parsed
 */
export class MalformedPathError extends LeadLinkError {
  readonly code = "E_PATH";

  constructor(
    public readonly path: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Malformed path "${path}": ${reason}`, options);
  }
}

/**
 * Thrown when a value does not have the shape a segment (or file) requires
 */
export class TypeMismatchError extends LeadLinkError {
  readonly code = "E_TYPE";
}

/**
 * Thrown when an index segment points past the end of an array
 */
export class OutOfRangeError extends LeadLinkError {
  readonly code = "E_RANGE";

  constructor(
    public readonly position: number,
    public readonly length: number,
    options?: ErrorOptions
  ) {
    super(`Index [${position}] out of range for array of length ${length}`, options);
  }
}

/**
 * Thrown when a where clause is not of the form `field=value`
 */
export class InvalidFilterError extends LeadLinkError {
  readonly code = "E_FILTER";

  constructor(clause: string, options?: ErrorOptions) {
    super(`Invalid where clause: ${clause}`, options);
  }
}

/**
 * Thrown when appending results would repeat an index already in the output file
 */
export class DuplicateIndexError extends LeadLinkError {
  readonly code = "E_DUPLICATE";

  constructor(
    public readonly outputFile: string,
    public readonly indices: number[],
    options?: ErrorOptions
  ) {
    super(
      `Duplicate index error: indices [${indices.join(", ")}] already exist in ${outputFile}. ` +
        `Remove them from the batch or clear the output file to retry.`,
      options
    );
  }
}

/**
 * Thrown when annotations name indices that were not in the batch sent
 */
export class UnexpectedIndexError extends LeadLinkError {
  readonly code = "E_INDEX";

  constructor(
    what: string,
    public readonly indices: number[],
    sent: number[],
    options?: ErrorOptions
  ) {
    super(`${what}: indices [${indices.join(", ")}] were not in the batch sent (${sent.join(", ")})`, options);
  }
}

/**
 * Thrown when an operation is called with an inconsistent set of options
 */
export class ConfigurationError extends LeadLinkError {
  readonly code = "E_CONFIG";
}

/**
 * Thrown when a target dataset's length no longer matches the next index the
 * mapping would hand out for it
 */
export class TargetDriftError extends LeadLinkError {
  readonly code = "E_DRIFT";

  constructor(
    public readonly target: string,
    public readonly indexField: string,
    public readonly expected: number,
    public readonly actual: number,
    options?: ErrorOptions
  ) {
    super(
      `Target ${target} holds ${actual} rows but the next ${indexField} in the mapping is ${expected}; ` +
        `new rows would be linked to the wrong leads`,
      options
    );
  }
}

/**
 * Thrown when an actor returns more items than it was given inputs
 */
export class ActorOutputError extends LeadLinkError {
  readonly code = "E_ACTOR";

  constructor(actorId: string, inputs: number, items: number, options?: ErrorOptions) {
    super(`Actor ${actorId} returned ${items} items for ${inputs} inputs; expected at most one item per input`, options);
  }
}

/**
 * Thrown when a file exists but cannot be read or decoded
 */
export class DocumentReadError extends LeadLinkError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read document: ${filePath}`, options);
  }
}

/**
 * Thrown when a write operation fails
 */
export class DocumentWriteError extends LeadLinkError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write document: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends LeadLinkError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Thrown when the workspace lock cannot be acquired in time
 */
export class LockTimeoutError extends LeadLinkError {
  readonly code = "E_LOCK";

  constructor(lockPath: string, timeoutMs: number, options?: ErrorOptions) {
    super(
      `Failed to acquire lock after ${timeoutMs}ms. Lock file: ${lockPath}. ` +
        `This may indicate a stale lock from a crashed process - ` +
        `manually delete the lock file if safe.`,
      options
    );
  }
}

/**
 * Fold any thrown value into the failure half of a status result
 */
export function toErrorResult(err: unknown): ErrorResult {
  if (err instanceof LeadLinkError) {
    return { status: "error", error: err.message, code: err.code };
  }
  if (err instanceof Error) {
    return { status: "error", error: err.message, code: "UNKNOWN" };
  }
  return { status: "error", error: String(err), code: "UNKNOWN" };
}
