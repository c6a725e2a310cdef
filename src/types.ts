export type MutationClass =
  | "protein_hgvs"
  | "protein_three_letter"
  | "protein_substitution"
  | "protein_substitution_combo"
  | "nucleotide_hgvs"
  | "deletion_shorthand"
  | "keyword"
  | "external";

export type MutationMatch = {
  text: string;
  kind: MutationClass;
};

export type CandidateDomain =
  | "receptor"
  | "gpcr"
  | "gpcr_extra"
  | "custom"
  | "ion_channel"
  | "family"
  | "alias"
  | "expansion";

export type NormalizationHints = {
  readonly parenthetical: readonly string[];
  readonly dropped: readonly string[];
  readonly mutations: readonly string[];
  readonly mutationClasses: readonly MutationClass[];
  readonly mutationsOnly?: boolean;
};

export type NormalizationResult = {
  readonly raw: string;
  readonly cleanText: string;
  readonly cleanTextAlt: string;
  readonly queryTokens: readonly string[];
  readonly geneLikeCandidates: readonly string[];
  readonly hintTaxon: number;
  readonly hints: Readonly<NormalizationHints>;
  readonly rulesApplied: readonly string[];
  readonly domains: readonly CandidateDomain[];
};

/**
 * Optional HGVS-style grammar check used as a supplementary mutation
 * detector. Implementations should return false for anything they cannot
 * parse.
 */
export interface VariantParser {
  tryParseVariant(token: string): boolean;
}

export type GeneRecord = {
  name: string;
  synonyms: string[];
};

export interface GeneLookup {
  lookupGene(id: string): Promise<GeneRecord | null>;
}

export type NormalizeOptions = {
  stripMutations?: boolean;
  mutationWhitelist?: readonly string[];
  detectMutations?: boolean;
  taxon?: number;
  variantParser?: VariantParser;
};

// Tabular row: raw input columns plus whatever the batch steps append
export type Row = Record<string, unknown>;
