import { appConfig } from "../config.js";
import type {
  MutationClass,
  MutationMatch,
  NormalizationHints,
  NormalizationResult,
  NormalizeOptions,
} from "../types.js";
import { generateCandidates } from "./candidates.js";
import {
  foldRomanNumerals,
  foldUnicode,
  sanitize,
  translateSpecialsWithSpans,
} from "./characters.js";
import {
  buildMutationWhitelist,
  detectMutations,
  mutationTokenSet,
} from "./mutations.js";
import { applyReceptorRules } from "./receptors.js";
import { extractParenthetical, glueHyphens } from "./structure.js";
import {
  buildVariantStrings,
  detectHyphenVariants,
  generateLetterDigitVariants,
  removeStopWords,
  tokenize,
  uniqueOrdered,
} from "./tokens.js";

// a stream made only of these carries no target name once mutations are gone
const residueTokenPattern = /^(?:[a-z]|\d+)$/;

type TokenStreams = {
  query: string[];
  alt: string[];
  baseQuery: string[];
  baseAlt: string[];
};

function filterStreams(
  streams: TokenStreams,
  mutationTokens: ReadonlySet<string>,
  whitelist: ReadonlySet<string>,
): { streams: TokenStreams; removed: boolean } {
  let removed = false;
  const keep = (token: string) => {
    if (!mutationTokens.has(token) || whitelist.has(token)) return true;
    removed = true;
    return false;
  };
  const filtered: TokenStreams = {
    query: streams.query.filter(keep),
    alt: streams.alt.filter(keep),
    baseQuery: streams.baseQuery.filter(keep),
    baseAlt: streams.baseAlt.filter(keep),
  };
  return { streams: filtered, removed };
}

function joinVariants(variants: readonly string[]): string {
  return variants.join("|");
}

/**
 * Normalizes one free-text target name into lookup strings, query tokens
 * and an ordered list of gene-like candidates. Never throws.
 */
export function normalizeTargetName(
  name: string,
  options: NormalizeOptions = {},
): NormalizationResult {
  const stripMutations = options.stripMutations ?? appConfig.normalizer.stripMutations;
  const runDetector = options.detectMutations ?? appConfig.normalizer.detectMutations;
  const taxon = options.taxon ?? appConfig.normalizer.taxon;
  const whitelist = buildMutationWhitelist([
    ...appConfig.normalizer.mutationWhitelist,
    ...(options.mutationWhitelist ?? []),
  ]);

  const raw = name;
  let stage = sanitize(name);

  const detected: MutationMatch[] =
    stripMutations && runDetector
      ? detectMutations(stage, { whitelist, variantParser: options.variantParser })
      : [];
  const mutations = detected.map((item) => item.text);
  const mutationClasses: MutationClass[] = [];
  for (const { kind } of detected) {
    if (!mutationClasses.includes(kind)) mutationClasses.push(kind);
  }

  const translated = translateSpecialsWithSpans(foldUnicode(stage));
  stage = foldRomanNumerals(translated.text, translated.spans);

  const parenthetical = extractParenthetical(stage);
  stage = parenthetical.text;
  if (parenthetical.keepTokens.length > 0) {
    stage = `${stage} ${parenthetical.keepTokens.join(" ")}`;
  }
  stage = glueHyphens(stage.replace(/\s+/g, " ").trim());

  const receptor = applyReceptorRules(stage);
  stage = receptor.text;

  const substitutions = [
    ...detectHyphenVariants(stage),
    ...generateLetterDigitVariants(tokenize(stage)),
  ];
  const baseTokens = tokenize(stage);
  const { kept, dropped } = removeStopWords(baseTokens);
  const variantTokens = substitutions.map((sub) => sub.variant);

  const original: TokenStreams = {
    query: [...kept, ...variantTokens],
    alt: [...uniqueOrdered(baseTokens), ...variantTokens],
    baseQuery: kept,
    baseAlt: uniqueOrdered(baseTokens),
  };

  let streams = original;
  let mutationsOnly = false;
  if (mutations.length > 0) {
    const result = filterStreams(original, mutationTokenSet(mutations), whitelist);
    const informative = result.streams.query.filter(
      (token) => !residueTokenPattern.test(token),
    );
    if (result.removed && informative.length === 0) {
      mutationsOnly = true;
    } else {
      streams = result.streams;
    }
  }

  const queryTokens = uniqueOrdered(streams.query);
  const cleanText = joinVariants(
    buildVariantStrings(streams.baseQuery.join(" "), substitutions, parenthetical.keepTokens),
  );
  const cleanTextAlt = joinVariants(
    buildVariantStrings(streams.baseAlt.join(" "), substitutions, parenthetical.keepTokens),
  );

  const candidates = generateCandidates(
    cleanTextAlt || cleanText,
    queryTokens,
    receptor.candidates,
  );

  const hints: NormalizationHints = Object.freeze({
    parenthetical: Object.freeze(parenthetical.hints),
    dropped: Object.freeze(dropped),
    mutations: Object.freeze(mutations),
    mutationClasses: Object.freeze(mutationClasses),
    ...(mutationsOnly ? { mutationsOnly: true } : {}),
  });

  return Object.freeze({
    raw,
    cleanText,
    cleanTextAlt,
    queryTokens: Object.freeze(queryTokens),
    geneLikeCandidates: Object.freeze(candidates.symbols),
    hintTaxon: taxon,
    hints,
    rulesApplied: Object.freeze(receptor.applied),
    domains: Object.freeze(candidates.domains),
  });
}
