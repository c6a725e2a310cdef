import { logEvent, toErrorMessage } from "../telemetry.js";
import type { GeneLookup, Row } from "../types.js";

export function cellText(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

export function ensureColumn(rows: readonly Row[], column: string): void {
  if (rows.some((row) => !Object.hasOwn(row, column))) {
    throw new Error(`Column '${column}' is required`);
  }
}

/**
 * True when `name` equals, ignoring case, the protein name or any gene
 * name or synonym of the entry. Unknown accessions never match.
 */
export async function validateGeneName(
  id: string,
  name: string,
  lookup: GeneLookup,
): Promise<boolean> {
  const record = await lookup.lookupGene(id);
  if (!record) return false;
  const needle = name.toLowerCase();
  return [record.name, ...record.synonyms].some(
    (candidate) => candidate.toLowerCase() === needle,
  );
}

export async function validateRows(
  rows: readonly Row[],
  idColumn: string,
  nameColumn: string,
  lookup: GeneLookup,
): Promise<Row[]> {
  ensureColumn(rows, idColumn);
  ensureColumn(rows, nameColumn);

  const out: Row[] = [];
  for (const row of rows) {
    const id = cellText(row[idColumn]);
    let match = false;
    try {
      match = await validateGeneName(id, cellText(row[nameColumn]), lookup);
    } catch (error) {
      logEvent("warn", "validate.lookup_failed", {
        id,
        message: toErrorMessage(error),
      });
    }
    out.push({ ...row, uniprot_match: match });
  }
  return out;
}
