/**
 * CLI error handling and exit code mapping
 */

import { LeadLinkError } from "@leadlink/sdk";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Exit code for an error result's code
 * - 2: dataset or output file not found
 * - 1: anything else
 */
export function exitCodeForResult(code: string): number {
  return code === "ENOENT" ? 2 : 1;
}

/**
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/IO/unknown error
 * - 2: dataset not found
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof LeadLinkError) {
    return exitCodeForResult(error.code);
  }

  return 1;
}

const MAX_MESSAGE_LENGTH = 2000;

/**
 * Format an error for CLI output
 *
 * SDK errors are prefixed with their code. Verbose mode adds the cause
 * chain and the stack.
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  let message = error.message;
  if (message.length > MAX_MESSAGE_LENGTH) {
    message = message.substring(0, MAX_MESSAGE_LENGTH) + "... (truncated)";
  }
  if (error instanceof LeadLinkError) {
    message = `[${error.code}] ${message}`;
  }
  if (!verbose) {
    return message;
  }

  const lines = [message];
  let cause: unknown = error.cause;
  while (cause !== undefined) {
    lines.push(`  Cause: ${cause instanceof Error ? cause.message : String(cause)}`);
    cause = cause instanceof Error ? cause.cause : undefined;
  }
  if (error.stack) {
    lines.push(error.stack);
  }
  return lines.join("\n");
}
