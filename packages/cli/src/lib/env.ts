/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { defaultRoot } from "@leadlink/sdk";

/**
 * Expand a leading `~` or `~/` to the home directory; `~user` is left as is
 */
export function expandHome(input: string, home: string = homedir()): string {
  if (input === "~") {
    return home;
  }
  if (input.startsWith("~/") || input.startsWith("~\\")) {
    return path.join(home, input.slice(2));
  }
  return input;
}

/**
 * Resolve the workspace root directory
 * Priority: --root > LEADLINK_ROOT > ".tmp"
 */
export function resolveRoot(cliRoot?: string, env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(expandHome(cliRoot ?? defaultRoot(env)));
}

/**
 * Verbose diagnostics (metric lines, error causes) under LEADLINK_CLI_DEBUG=1
 */
export function isVerbose(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.LEADLINK_CLI_DEBUG === "1";
}
