import fs from "node:fs";

import { z } from "zod";

import { normalizeRows } from "./batch.js";
import { createUniprotLookup } from "./genes/uniprot.js";
import { validateRows } from "./genes/validate.js";
import {
  DEFAULT_JSON_COLUMNS,
  isWritableEncoding,
  readTargetNames,
  writeRows,
} from "./io/csv.js";
import {
  debugRunLog,
  endRunLog,
  errorRunLog,
  setLogLevel,
  startRunLog,
  stepRunLog,
  warnRunLog,
} from "./telemetry.js";
import type { GeneLookup } from "./types.js";

export const USAGE = `Usage: target-normalizer --input=<csv> --output=<csv> [--column=target_name]
  [--id-column=<col>] [--delimiter=<d>] [--encoding=<e>] [--keep-mutations]
  [--no-mutations] [--mutation-whitelist=<file>] [--taxon=<n>]
  [--json-columns=a,b] [--log-level=debug|info|warn|error]`;

const delimiterSchema = z
  .string()
  .transform((value) => (value === "\\t" || value === "tab" ? "\t" : value))
  .refine((value) => value.length === 1, "delimiter must be a single character");

const cliArgsSchema = z.object({
  input: z.string({ required_error: "--input is required" }).min(1),
  output: z.string({ required_error: "--output is required" }).min(1),
  column: z.string().min(1).default("target_name"),
  idColumn: z.string().min(1).optional(),
  delimiter: delimiterSchema.optional(),
  encoding: z.string().min(1).optional(),
  keepMutations: z.boolean(),
  noMutations: z.boolean(),
  mutationWhitelist: z.string().min(1).optional(),
  taxon: z.coerce.number().int().positive().optional(),
  jsonColumns: z
    .string()
    .transform((value) =>
      value
        .split(",")
        .map((item) => item.trim())
        .filter(Boolean),
    )
    .optional(),
  logLevel: z.enum(["debug", "info", "warn", "error"]).optional(),
});

export type CliArgs = z.infer<typeof cliArgsSchema>;

function getArgValue(argv: readonly string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = argv.find((a) => a.startsWith(prefix));
  if (!arg) return undefined;
  return arg.slice(prefix.length);
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  return cliArgsSchema.parse({
    input: getArgValue(argv, "input"),
    output: getArgValue(argv, "output"),
    column: getArgValue(argv, "column"),
    idColumn: getArgValue(argv, "id-column"),
    delimiter: getArgValue(argv, "delimiter"),
    encoding: getArgValue(argv, "encoding"),
    keepMutations: argv.includes("--keep-mutations"),
    noMutations: argv.includes("--no-mutations"),
    mutationWhitelist: getArgValue(argv, "mutation-whitelist"),
    taxon: getArgValue(argv, "taxon"),
    jsonColumns: getArgValue(argv, "json-columns"),
    logLevel: getArgValue(argv, "log-level"),
  });
}

// one token per line; blank lines ignored
export function readWhitelistFile(path: string): string[] {
  return fs
    .readFileSync(path, "utf8")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

export type CliDeps = {
  lookup?: GeneLookup;
};

/**
 * Runs one normalization job and returns the process exit code. Failures
 * are logged against the run and reported as 1.
 */
export async function runCli(args: CliArgs, deps: CliDeps = {}): Promise<number> {
  if (args.logLevel) setLogLevel(args.logLevel);
  const run = startRunLog("normalize", { input: args.input, output: args.output });

  try {
    const table = readTargetNames(args.input, {
      column: args.column,
      encoding: args.encoding,
      delimiter: args.delimiter,
    });
    stepRunLog(run, "csv.loaded", {
      rows: table.rows.length,
      encoding: table.format.encoding,
      delimiter: table.format.delimiter,
    });
    if (table.rows.length === 0) {
      warnRunLog(run, "csv.empty", { input: args.input });
    }

    const mutationWhitelist = args.mutationWhitelist
      ? readWhitelistFile(args.mutationWhitelist)
      : undefined;

    let rows = normalizeRows(table.rows, args.column, {
      stripMutations: !args.keepMutations,
      detectMutations: !args.noMutations,
      mutationWhitelist,
      taxon: args.taxon,
    });
    stepRunLog(run, "normalize.done", { rows: rows.length });
    debugRunLog(run, "normalize.sample", { sample: rows.slice(0, 5) });

    if (args.idColumn) {
      const lookup = deps.lookup ?? createUniprotLookup();
      rows = await validateRows(rows, args.idColumn, args.column, lookup);
      const matches = rows.filter((row) => row.uniprot_match === true).length;
      stepRunLog(run, "validate.done", {
        idColumn: args.idColumn,
        matches,
        total: rows.length,
      });
    }

    let outputEncoding = args.encoding ?? "utf-8";
    if (!isWritableEncoding(outputEncoding)) {
      warnRunLog(run, "csv.output_encoding_fallback", {
        requested: outputEncoding,
        used: "utf-8",
      });
      outputEncoding = "utf-8";
    }
    writeRows(args.output, rows, {
      encoding: outputEncoding,
      delimiter: args.delimiter ?? ",",
      jsonColumns: args.jsonColumns ?? DEFAULT_JSON_COLUMNS,
    });
    endRunLog(run, { output: args.output, rows: rows.length });
    return 0;
  } catch (error) {
    errorRunLog(run, "run.failed", error);
    return 1;
  }
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    const run = startRunLog("normalize");
    errorRunLog(run, "cli.invalid_args", error, { usage: USAGE });
    return 1;
  }
  return runCli(args);
}
