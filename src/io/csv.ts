import fs from "node:fs";

import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";

import { logEvent, toErrorMessage } from "../telemetry.js";
import type { Row } from "../types.js";

export const CSV_ENCODINGS = ["utf-8", "windows-1251", "latin1"] as const;
export const CSV_DELIMITERS = [",", ";", "\t", "|"] as const;
export const DEFAULT_JSON_COLUMNS = ["hints", "rules_applied"] as const;

export type CsvFormat = {
  encoding: string;
  delimiter: string;
};

export type CsvTable = {
  columns: string[];
  rows: Row[];
  format: CsvFormat;
};

export type ReadTargetNamesOptions = {
  column?: string;
  encoding?: string;
  delimiter?: string;
};

export type WriteRowsOptions = {
  encoding?: string;
  delimiter?: string;
  jsonColumns?: readonly string[];
};

const recordsSchema = z.array(z.array(z.string()));

// fatal, so a wrong guess throws and the next encoding is tried
function decode(bytes: Uint8Array, encoding: string): string {
  return new TextDecoder(encoding, { fatal: true }).decode(bytes);
}

/**
 * Picks the candidate delimiter that occurs most often in the header line.
 * A single-column file falls back to a comma.
 */
export function sniffDelimiter(sample: string): string {
  const header = sample.split(/\r?\n/, 1)[0] ?? "";
  let best: string = ",";
  let bestCount = 0;
  for (const delimiter of CSV_DELIMITERS) {
    const count = header.split(delimiter).length - 1;
    if (count > bestCount) {
      best = delimiter;
      bestCount = count;
    }
  }
  return best;
}

function snippetOf(bytes: Uint8Array): string {
  return new TextDecoder("utf-8").decode(bytes.subarray(0, 200)).replace(/\n/g, "\\n");
}

export function detectCsvFormat(path: string): CsvFormat {
  const bytes = fs.readFileSync(path);
  for (const encoding of CSV_ENCODINGS) {
    try {
      const text = decode(bytes, encoding);
      return { encoding, delimiter: sniffDelimiter(text.slice(0, 4096)) };
    } catch (error) {
      logEvent("debug", "csv.decode_failed", {
        path,
        encoding,
        message: toErrorMessage(error),
      });
    }
  }
  throw new Error(
    `Could not detect CSV encoding or delimiter for ${path}. Snippet: ${JSON.stringify(
      snippetOf(bytes),
    )}. Check the file or pass --encoding and --delimiter.`,
  );
}

export function readCsv(
  path: string,
  options: { encoding?: string; delimiter?: string } = {},
): CsvTable {
  const detected =
    options.encoding && options.delimiter ? undefined : detectCsvFormat(path);
  const encoding = options.encoding ?? detected?.encoding ?? "utf-8";
  const text = decode(fs.readFileSync(path), encoding);
  const delimiter = options.delimiter ?? detected?.delimiter ?? sniffDelimiter(text);

  const records = recordsSchema.parse(
    parse(text, {
      delimiter,
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    }),
  );
  const [header = [], ...body] = records;
  const columns = header.map((name) => name.trim());
  const rows = body.map((cells) => {
    const row: Row = {};
    columns.forEach((name, index) => {
      row[name] = cells[index] ?? "";
    });
    return row;
  });

  return { columns, rows, format: { encoding, delimiter } };
}

/**
 * Reads the input table and checks that the target-name column exists.
 */
export function readTargetNames(
  path: string,
  { column = "target_name", encoding, delimiter }: ReadTargetNamesOptions = {},
): CsvTable {
  const table = readCsv(path, { encoding, delimiter });
  if (!table.columns.includes(column)) {
    throw new Error(
      `Column '${column}' not found in ${path}. Available columns: ${table.columns.join(", ")}`,
    );
  }
  return table;
}

function formatCell(value: unknown, asJson: boolean): string {
  if (asJson) return JSON.stringify(value ?? null);
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

const WRITABLE_ENCODINGS: Readonly<Record<string, BufferEncoding>> = {
  "utf-8": "utf8",
  utf8: "utf8",
  latin1: "latin1",
  "iso-8859-1": "latin1",
};

export function isWritableEncoding(encoding: string): boolean {
  return Object.hasOwn(WRITABLE_ENCODINGS, encoding.trim().toLowerCase());
}

function toBufferEncoding(encoding: string): BufferEncoding {
  const key = encoding.trim().toLowerCase();
  const bufferEncoding = Object.hasOwn(WRITABLE_ENCODINGS, key)
    ? WRITABLE_ENCODINGS[key]
    : undefined;
  if (bufferEncoding === undefined) {
    throw new Error(`Unsupported output encoding '${encoding}'; use utf-8 or latin1`);
  }
  return bufferEncoding;
}

export function collectColumns(rows: readonly Row[]): string[] {
  const columns: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!columns.includes(key)) columns.push(key);
    }
  }
  return columns;
}

export function serializeRows(
  rows: readonly Row[],
  { delimiter = ",", jsonColumns = DEFAULT_JSON_COLUMNS }: WriteRowsOptions = {},
): string {
  const columns = collectColumns(rows);
  const jsonSet = new Set(jsonColumns);
  const body = rows.map((row) =>
    columns.map((column) => formatCell(row[column], jsonSet.has(column))),
  );
  return stringify([columns, ...body], { delimiter });
}

export function writeRows(
  path: string,
  rows: readonly Row[],
  options: WriteRowsOptions = {},
): void {
  const encoding = toBufferEncoding(options.encoding ?? "utf-8");
  fs.writeFileSync(path, serializeRows(rows, options), { encoding });
}
