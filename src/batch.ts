import { cellText, ensureColumn } from "./genes/validate.js";
import { normalizeTargetName } from "./normalize/pipeline.js";
import type {
  NormalizationHints,
  NormalizationResult,
  NormalizeOptions,
  Row,
} from "./types.js";

export type SerializedHints = {
  parenthetical: string[];
  dropped: string[];
  mutations: string[];
  mutation_classes: string[];
  mutations_only?: boolean;
};

export type SerializedResult = {
  raw: string;
  clean_text: string;
  clean_text_alt: string;
  query_tokens: string[];
  gene_like_candidates: string[];
  hint_taxon: number;
  hints: SerializedHints;
  rules_applied: string[];
  domains: string[];
};

export function serializeHints(hints: Readonly<NormalizationHints>): SerializedHints {
  const out: SerializedHints = {
    parenthetical: [...hints.parenthetical],
    dropped: [...hints.dropped],
    mutations: [...hints.mutations],
    mutation_classes: [...hints.mutationClasses],
  };
  if (hints.mutationsOnly) out.mutations_only = true;
  return out;
}

// snake_case shape shared by the CSV columns and the MCP tool output
export function serializeResult(result: NormalizationResult): SerializedResult {
  return {
    raw: result.raw,
    clean_text: result.cleanText,
    clean_text_alt: result.cleanTextAlt,
    query_tokens: [...result.queryTokens],
    gene_like_candidates: [...result.geneLikeCandidates],
    hint_taxon: result.hintTaxon,
    hints: serializeHints(result.hints),
    rules_applied: [...result.rulesApplied],
    domains: [...result.domains],
  };
}

/**
 * Normalizes `column` of every row and appends the result columns. Input
 * rows are not modified.
 */
export function normalizeRows(
  rows: readonly Row[],
  column: string,
  options: NormalizeOptions = {},
): Row[] {
  ensureColumn(rows, column);
  return rows.map((row) => {
    const result = normalizeTargetName(cellText(row[column]), options);
    return {
      ...row,
      clean_text: result.cleanText,
      clean_text_alt: result.cleanTextAlt,
      query_tokens: result.queryTokens.join("|"),
      gene_like_candidates: result.geneLikeCandidates.join(" "),
      hints: serializeHints(result.hints),
      mutation_classes: result.hints.mutationClasses.join("|"),
      rules_applied: [...result.rulesApplied],
      hint_taxon: result.hintTaxon,
      domains: result.domains.join("|"),
    };
  });
}
