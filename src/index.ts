export { normalizeTargetName } from "./normalize/pipeline.js";
export {
  foldRomanNumerals,
  foldUnicode,
  sanitize,
  translateSpecials,
  translateSpecialsWithSpans,
} from "./normalize/characters.js";
export { extractParenthetical, glueHyphens } from "./normalize/structure.js";
export {
  buildMutationWhitelist,
  detectMutations,
  findMutations,
  mutationTokenSet,
  MUTATION_WHITELIST,
} from "./normalize/mutations.js";
export { applyReceptorRules, RECEPTOR_RULES } from "./normalize/receptors.js";
export {
  buildVariantStrings,
  detectHyphenVariants,
  generateLetterDigitVariants,
  removeStopWords,
  STOP_WORDS,
  tokenize,
  uniqueOrdered,
} from "./normalize/tokens.js";
export { generateCandidates, type CandidateSet } from "./normalize/candidates.js";
export { normalizeRows, serializeResult } from "./batch.js";
export { createUniprotLookup, extractNames, noopGeneLookup } from "./genes/uniprot.js";
export { validateGeneName, validateRows } from "./genes/validate.js";
export { detectCsvFormat, readTargetNames, writeRows } from "./io/csv.js";
export { appConfig } from "./config.js";
export type * from "./types.js";
