import { logEvent, toErrorMessage } from "../telemetry.js";
import type { MutationClass, MutationMatch, VariantParser } from "../types.js";
import { foldRomanNumerals, foldUnicode, translateSpecialsWithSpans } from "./characters.js";
import { tokenize } from "./tokens.js";

type MutationPattern = {
  kind: MutationClass;
  pattern: RegExp;
  // lets a family veto a syntactically valid match
  reject?: (match: RegExpMatchArray) => boolean;
};

const AMINO_ACIDS =
  "Ala|Arg|Asn|Asp|Cys|Gln|Glu|Gly|His|Ile|Leu|Lys|Met|Phe|Pro|Ser|Thr|Trp|Tyr|Val|Sec|Pyl|Xaa";

// A123A names the same residue on both sides and is not a variant
const isSilentSubstitution = (match: RegExpMatchArray): boolean =>
  (match[1] ?? "").toUpperCase() === (match[3] ?? "").toUpperCase();

/**
 * Ordered by priority; earlier families win when matches overlap with equal
 * length.
 */
export const MUTATION_PATTERNS: readonly MutationPattern[] = [
  { kind: "protein_hgvs", pattern: /p\.[A-Z][0-9]+[A-Z]/gi },
  { kind: "protein_hgvs", pattern: /p\.[A-Z][0-9]+(?:\*|Ter)/gi },
  { kind: "protein_hgvs", pattern: /p\.[A-Z][0-9]+(?:_[A-Z][0-9]+)?del/gi },
  { kind: "protein_hgvs", pattern: /p\.[A-Z][0-9]+_[A-Z][0-9]+ins[A-Z]+/gi },
  { kind: "protein_hgvs", pattern: /p\.[A-Z][0-9]+(?:_[A-Z][0-9]+)?dup/gi },
  { kind: "protein_hgvs", pattern: /p\.[A-Z][0-9]+fs(?:\*[0-9]+)?/gi },
  { kind: "protein_hgvs", pattern: /p\.Met1\?/gi },
  { kind: "protein_hgvs", pattern: /p\.\*[0-9]+[A-Z]/gi },
  {
    kind: "protein_hgvs",
    pattern: /p\.[A-Z][0-9]+(?:_[A-Z][0-9]+)?delins[A-Z]+/gi,
  },
  {
    kind: "protein_hgvs",
    pattern: /p\.[A-Z][a-z]{2}[0-9]+(?:[A-Z][a-z]{2}|\*|Ter)/gi,
  },
  {
    kind: "protein_substitution",
    pattern: /\b([A-Z])(\d+)([A-Z])\b/gi,
    reject: isSilentSubstitution,
  },
  {
    kind: "protein_three_letter",
    pattern: new RegExp(
      `(?<!p\\.)\\b(?:${AMINO_ACIDS})[0-9]+(?:${AMINO_ACIDS}|\\*|Ter)\\b`,
      "gi",
    ),
  },
  {
    kind: "nucleotide_hgvs",
    pattern:
      /\b[pcgnmr]\.[0-9]+[+-]?[0-9]*(?:_[+-]?[0-9]+[+-]?[0-9]*)?(?:[ACGTU]>[ACGTU]|(?:delins|del|ins|dup|inv)[ACGTU]*|fs\*?[0-9]*)\b/gi,
  },
  {
    kind: "protein_substitution_combo",
    pattern: /\b[A-Z][0-9]+[A-Z](?:\/[A-Z][0-9]+[A-Z])+\b/gi,
  },
  { kind: "deletion_shorthand", pattern: /(?:Δ|delta)\s?[A-Z][0-9]+/gi },
  { kind: "keyword", pattern: /\b(?:mutant|variant)\b|\bmut\./gi },
];

/**
 * Receptor and subtype names that look like substitutions or indices but
 * must survive mutation stripping.
 */
export const MUTATION_WHITELIST: ReadonlySet<string> = new Set([
  "m2",
  "h3",
  "d2",
  "p2x",
  "p2x7",
  "p2y",
  "5-ht1a",
  "alpha1",
  "beta2",
  "a2b",
  "c3a",
  "c5a",
  "d1r",
  "d2r",
  "d3r",
  "d4r",
  "d5r",
  "h1r",
  "h2r",
  "h3r",
  "h4r",
  "y1r",
  "y2r",
  "y4r",
  "y5r",
  "s1p",
  "v1a",
  "v1b",
  "m1r",
  "m2r",
  "m3r",
  "m4r",
  "m5r",
  "b1r",
  "b2r",
  "a1r",
  "a3r",
]);

export type MutationDetectionOptions = {
  // resolved whitelist, see buildMutationWhitelist
  whitelist?: ReadonlySet<string>;
  variantParser?: VariantParser;
};

export function buildMutationWhitelist(
  extra: Iterable<string> = [],
): Set<string> {
  const whitelist = new Set(MUTATION_WHITELIST);
  for (const token of extra) {
    const normalized = token.trim().toLowerCase();
    if (normalized) whitelist.add(normalized);
  }
  return whitelist;
}

function acceptMatch(accepted: MutationMatch[], candidate: MutationMatch): MutationMatch[] {
  const lower = candidate.text.toLowerCase();
  if (accepted.some((item) => item.text.toLowerCase().includes(lower))) {
    return accepted;
  }
  // a longer match swallows shorter ones found earlier
  const kept = accepted.filter((item) => !lower.includes(item.text.toLowerCase()));
  kept.push(candidate);
  return kept;
}

function parserAccepts(parser: VariantParser, token: string): boolean {
  try {
    return parser.tryParseVariant(token);
  } catch (error) {
    logEvent("debug", "mutations.parser_failed", {
      token,
      message: toErrorMessage(error),
    });
    return false;
  }
}

/**
 * Finds mutation notations in original-case text, in family priority order
 * and then left to right.
 */
export function detectMutations(
  text: string,
  options: MutationDetectionOptions = {},
): MutationMatch[] {
  const whitelist = options.whitelist ?? MUTATION_WHITELIST;
  let accepted: MutationMatch[] = [];

  for (const family of MUTATION_PATTERNS) {
    for (const match of text.matchAll(family.pattern)) {
      if (family.reject?.(match)) continue;
      const token = match[0];
      if (whitelist.has(token.toLowerCase())) continue;
      accepted = acceptMatch(accepted, { text: token, kind: family.kind });
    }
  }

  const parser = options.variantParser;
  if (parser) {
    for (const token of text.split(/\s+/)) {
      if (!token) continue;
      const lower = token.toLowerCase();
      if (whitelist.has(lower)) continue;
      if (accepted.some((item) => item.text.toLowerCase().includes(lower))) continue;
      if (parserAccepts(parser, token)) {
        accepted = acceptMatch(accepted, { text: token, kind: "external" });
      }
    }
  }

  return accepted;
}

export function findMutations(
  text: string,
  options: MutationDetectionOptions = {},
): string[] {
  return detectMutations(text, options).map((item) => item.text);
}

/**
 * Runs each mutation through the same folding as the working text so the
 * resulting tokens can be subtracted from the token streams.
 */
export function mutationTokenSet(mutations: readonly string[]): Set<string> {
  const tokens = new Set<string>();
  for (const mutation of mutations) {
    const translated = translateSpecialsWithSpans(foldUnicode(mutation));
    const folded = foldRomanNumerals(translated.text, translated.spans);
    for (const token of tokenize(folded)) {
      tokens.add(token);
    }
  }
  return tokens;
}
