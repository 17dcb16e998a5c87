/**
 * Output rendering helpers
 */

type Color = "red" | "green" | "yellow";

const ANSI: Record<Color, string> = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
};

/**
 * Print an operation result to stdout as 2-space indented JSON
 */
export function printResult(result: object): void {
  process.stdout.write(JSON.stringify(result, null, 2) + "\n");
}

/**
 * Print dataset file names, one per line
 */
export function printDatasetNames(names: string[]): void {
  if (names.length > 0) {
    process.stdout.write(names.join("\n") + "\n");
  }
}

/**
 * Wrap text in an ANSI color when the stream is a terminal
 */
export function colorize(text: string, color: Color, stream: NodeJS.WriteStream = process.stdout): string {
  return stream.isTTY ? `${ANSI[color]}${text}\x1b[0m` : text;
}
