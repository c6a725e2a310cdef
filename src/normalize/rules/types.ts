import type { CandidateDomain } from "../../types.js";

export type SymbolDeriver = (match: RegExpExecArray) => string[];

/**
 * One row of a declarative candidate table. `soft` rows are broad family
 * guesses and rank after every non-soft hit.
 */
export type PatternRule = {
  pattern: RegExp;
  symbols: readonly string[] | SymbolDeriver;
  soft?: boolean;
};

export type PatternTable = {
  domain: CandidateDomain;
  rules: readonly PatternRule[];
};

// `{n}` in the template is replaced by capture group n
export type ExpansionRule = {
  pattern: RegExp;
  template: string;
};

export type AliasRule = {
  pattern: RegExp;
  symbols: readonly string[];
};

export type FamilyFallbackRule = {
  keywords: readonly string[];
  // any token starting with this already names a subtype
  subtypePrefix: string;
  symbols: readonly string[];
};

export function numbered(
  prefix: string,
  from: number,
  to: number,
  suffix = "",
): string[] {
  const out: string[] = [];
  for (let i = from; i <= to; i++) {
    out.push(`${prefix}${i}${suffix}`);
  }
  return out;
}

function firstCapture(match: RegExpExecArray): string | undefined {
  return match.slice(1).find((group) => group !== undefined);
}

/**
 * Builds a deriver from a capture-to-symbols table, for subtype numbering
 * that does not follow the gene numbering (Nav1.6 is SCN8A).
 */
export function lookupCapture(
  table: Readonly<Record<string, readonly string[]>>,
): SymbolDeriver {
  return (match) => {
    const key = firstCapture(match);
    if (key === undefined) return [];
    return [...(table[key] ?? [])];
  };
}

/**
 * Builds a deriver that formats the first defined capture into each
 * template ("ep{}" with capture "2" gives "ep2").
 */
export function captureTemplate(...templates: string[]): SymbolDeriver {
  return (match) => {
    const key = firstCapture(match);
    if (key === undefined) return [];
    return templates.map((template) => template.replace("{}", key));
  };
}
