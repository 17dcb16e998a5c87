#!/usr/bin/env tsx

/**
 * leadlink CLI entry point
 */

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { indexFieldFor, logger, openWorkspace } from "@leadlink/sdk";
import type { JsonValue, Workspace } from "@leadlink/sdk";
import { resolveRoot } from "./lib/env.js";
import {
  parseFieldMap,
  parseFileName,
  parseIndexList,
  parseLiteral,
  parseNameList,
  parseNonNegativeInt,
} from "./lib/arg.js";
import { readRecordInput, type RecordInputOptions } from "./lib/io.js";
import { printResult, printDatasetNames, colorize } from "./lib/render.js";
import { CliError, exitCodeForResult, mapSdkErrorToExitCode, formatCliError } from "./lib/errors.js";
import { timeCommand, type CommandOutcome } from "./lib/telemetry.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

interface GlobalOptions {
  root?: string;
  verbose?: boolean;
  quiet?: boolean;
}

type StatusResult = CommandOutcome & { error?: string };

/**
 * Version from the package manifest next to src/
 */
function readVersion(): string {
  const manifest: JsonValue = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  if (typeof manifest === "object" && manifest !== null && !Array.isArray(manifest)) {
    const version = manifest.version;
    if (typeof version === "string") return version;
  }
  return "0.0.0";
}

const program = new Command();

function workspace(): Workspace {
  return openWorkspace({ root: resolveRoot(program.opts<GlobalOptions>().root) });
}

/**
 * Run a workspace operation, print its result, and fail the command on an
 * error result
 */
async function run(command: string, operation: () => Promise<StatusResult>): Promise<void> {
  await timeCommand(command, async () => {
    const result = await operation();
    printResult(result);
    if (result.status === "error") {
      throw new CliError(result.error ?? "Operation failed", {
        exitCode: exitCodeForResult(result.code ?? ""),
      });
    }
    return result;
  });
}

program
  .configureOutput({
    writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
  })
  .exitOverride((err) => {
    if (err.code !== "commander.help" && err.code !== "commander.version") {
      console.error(`\nError: ${err.message}`);
      process.exit(err.exitCode);
    }
    throw err;
  });

program
  .name("leadlink")
  .description("leadlink - index-stable datasets, lead mapping and field registry for enrichment pipelines")
  .version(readVersion())
  .option("--root <path>", "Workspace root (default: LEADLINK_ROOT or .tmp)")
  .option("--verbose", "Verbose diagnostics")
  .option("--quiet", "Only log errors")
  .hook("preAction", () => {
    const opts = program.opts<GlobalOptions>();
    if (opts.verbose) {
      logger.setLevel("debug");
    } else if (opts.quiet) {
      logger.setLevel("error");
    }
  });

program
  .command("ls")
  .description("List datasets in the workspace")
  .option("--json", "Output the full result as JSON")
  .action(async (options: { json?: boolean }) => {
    if (options.json) {
      await run("ls", () => workspace().listDatasets());
      return;
    }
    await timeCommand("ls", async () => {
      const result = await workspace().listDatasets();
      if (result.status === "error") {
        throw new CliError(result.error, { exitCode: exitCodeForResult(result.code) });
      }
      printDatasetNames(result.datasets);
      return result;
    });
  });

interface ExtractCommandOptions {
  source: string;
  path?: string;
  fields?: Record<string, string>;
  where?: string;
  offset?: number;
  limit?: number;
  saveName?: string;
}

program
  .command("extract")
  .description("Extract indexed values from a dataset")
  .requiredOption("--source <name>", "Dataset name", (val: string) => parseFileName(val, "--source"))
  .option("--path <path>", "Path into each row, e.g. [*].author.name")
  .option("--fields <map>", "Projection label=path,label=path", (val: string) =>
    parseFieldMap(val, "--fields")
  )
  .option("--where <clause>", "Only rows whose field equals a literal, e.g. isHiring=true")
  .option("--offset <n>", "Skip N qualified rows", (val: string) => parseNonNegativeInt(val, "--offset"))
  .option("--limit <n>", "Return at most N rows", (val: string) => parseNonNegativeInt(val, "--limit"))
  .option("--save-name <name>", "Save extracted values as a new dataset", (val: string) =>
    parseFileName(val, "--save-name")
  )
  .action(async (options: ExtractCommandOptions) => {
    await run("extract", () =>
      workspace().extract({
        source: options.source,
        path: options.path,
        fields: options.fields,
        where: options.where,
        offset: options.offset,
        limit: options.limit,
        saveAs: options.saveName,
      })
    );
  });

program
  .command("init-mapping")
  .description("Create one lead per dataset row")
  .requiredOption("--source <name>", "Dataset name", (val: string) => parseFileName(val, "--source"))
  .option("--index-field <field>", "Index field (default: derived from the dataset name)")
  .action(async (options: { source: string; indexField?: string }) => {
    await run("init_mapping", () =>
      workspace().initMapping(options.source, options.indexField ?? indexFieldFor(options.source))
    );
  });

program
  .command("update-mapping")
  .description("Set a field on the leads of the given indices")
  .requiredOption("--index-field <field>", "Index field the indices belong to")
  .requiredOption("--indices <list>", "Comma-separated indices, e.g. 0,2,5", (val: string) =>
    parseIndexList(val, "--indices")
  )
  .requiredOption("--field <name>", "Field to set")
  .requiredOption("--value <value>", "Value (true/false, integer or string)")
  .action(async (options: { indexField: string; indices: number[]; field: string; value: string }) => {
    await run("update_mapping", () =>
      workspace().updateMapping(options.indexField, options.indices, options.field, parseLiteral(options.value))
    );
  });

program
  .command("link-indices")
  .description("Link source rows to newly allocated target indices")
  .requiredOption("--source-index-field <field>", "Source index field, e.g. postIndex")
  .requiredOption("--source-indices <list>", "Comma-separated source indices", (val: string) =>
    parseIndexList(val, "--source-indices")
  )
  .requiredOption("--target-index-field <field>", "Target index field, e.g. profileIndex")
  .action(async (options: { sourceIndexField: string; sourceIndices: number[]; targetIndexField: string }) => {
    await run("link_indices", () =>
      workspace().link(options.sourceIndexField, options.sourceIndices, options.targetIndexField)
    );
  });

program
  .command("register")
  .description("Register an output file as authoritative for its fields")
  .requiredOption("--output-file <name>", "Output file name", (val: string) =>
    parseFileName(val, "--output-file")
  )
  .requiredOption("--fields <list>", "Comma-separated field names", (val: string) =>
    parseNameList(val, "--fields")
  )
  .requiredOption("--index-field <field>", "Index field of the file's index values")
  .action(async (options: { outputFile: string; fields: string[]; indexField: string }) => {
    await run("register", () => workspace().register(options.outputFile, options.fields, options.indexField));
  });

program
  .command("lookup")
  .description("Look up a registered field's value for one index")
  .requiredOption("--field <name>", "Registered field")
  .requiredOption("--index <n>", "Index in the field's own domain", (val: string) =>
    parseNonNegativeInt(val, "--index")
  )
  .action(async (options: { field: string; index: number }) => {
    await run("lookup", () => workspace().lookup(options.field, options.index));
  });

program
  .command("append-results")
  .description("Append {index, ...} records to an output file and register it")
  .requiredOption("--output-file <name>", "Output file name", (val: string) =>
    parseFileName(val, "--output-file")
  )
  .requiredOption("--index-field <field>", "Index field the records' indices belong to")
  .option("--file <path>", "Read records from a JSON file")
  .option("--data <json>", "Inline JSON array of records")
  .action(async (options: RecordInputOptions & { outputFile: string; indexField: string }) => {
    const items = await readRecordInput(options);
    await run("append_results", () => workspace().appendResults(options.outputFile, items, options.indexField));
  });

program
  .command("registry")
  .description("Show registered output files")
  .action(async () => {
    await run("registry", () => workspace().describeRegistry());
  });

program
  .command("unlock")
  .description("Remove a lock file left behind by a crashed writer")
  .action(async () => {
    await run("unlock", () => workspace().unlock());
  });

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const opts = program.opts<GlobalOptions>();
    console.error(`Error: ${formatCliError(err, opts.verbose)}`);
    process.exitCode = mapSdkErrorToExitCode(err);
  }
}

void main();
