/**
 * Per-command metric lines on stderr, in verbose mode only
 */

import { isVerbose } from "./env.js";

const NEWLINES = /[\r\n]+/g;

export type MetricValue = string | number | boolean | undefined;

function clean(value: MetricValue): string {
  return String(value).replace(NEWLINES, " ").trim();
}

/**
 * `metric <key> k=v ...`; undefined fields are left out
 */
export function formatMetric(key: string, fields: Record<string, MetricValue>): string {
  const parts = [`metric ${clean(key)}`];
  for (const [name, value] of Object.entries(fields)) {
    if (value !== undefined) {
      parts.push(`${clean(name)}=${clean(value)}`);
    }
  }
  return parts.join(" ");
}

export function emitMetric(key: string, fields: Record<string, MetricValue>): void {
  if (isVerbose()) {
    process.stderr.write(formatMetric(key, fields) + "\n");
  }
}

export interface CommandOutcome {
  status: string;
  code?: string;
}

/**
 * Time a command and report its outcome: the result's status and code when
 * it returns one, `thrown` when it throws
 */
export async function timeCommand(
  command: string,
  fn: () => Promise<CommandOutcome | void>
): Promise<CommandOutcome | void> {
  const start = Date.now();
  let status = "thrown";
  let code: string | undefined;

  try {
    const result = await fn();
    status = result ? result.status : "success";
    code = result ? result.code : undefined;
    return result;
  } finally {
    emitMetric(`cli.${command}`, { duration_ms: Date.now() - start, status, code });
  }
}
