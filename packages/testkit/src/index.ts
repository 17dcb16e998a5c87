export { createTempRoot, removeDir, writeDataset, readDataset, withTempWorkspace, withTempDir } from "./fs.js";
export { runCli, parseJsonOutput } from "./cli.js";
export type { CliResult, CliExecOptions } from "./cli.js";
