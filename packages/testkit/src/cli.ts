/**
 * CLI testing utilities
 */

import { execa } from "execa";

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code (null if process was killed by signal) */
  exitCode: number | null;
  /** Terminating signal when the process didn't exit normally */
  signal: string | null;
}

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Current working directory */
  cwd?: string;
  /** Environment variables */
  env?: Record<string, string>;
  /** Input to pass to stdin */
  input?: string;
}

/**
 * Execute the CLI from its TypeScript source through the tsx loader
 * @param cliPath - Absolute path to the CLI entry (e.g. packages/cli/src/cli.ts)
 * @param args - Command arguments
 * @param options - Execution options
 * @returns CLI result with stdout, stderr, exitCode; never rejects on a non-zero exit
 */
export async function runCli(
  cliPath: string,
  args: string[],
  options: CliExecOptions = {}
): Promise<CliResult> {
  const { cwd, env, input } = options;

  const result = await execa("node", ["--import", "tsx", cliPath, ...args], {
    cwd,
    env: { ...process.env, ...env },
    input: input ?? "",
    reject: false,
  });

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode ?? null,
    signal: result.signal ?? null,
  };
}

/**
 * Parse JSON output from CLI
 * @param stdout - Standard output from CLI
 * @returns Parsed JSON value
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
