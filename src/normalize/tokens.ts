export type Substitution = {
  variant: string;
  base: string;
};

export const STOP_WORDS: ReadonlySet<string> = new Set([
  "protein",
  "receptor",
  "channel",
  "isoform",
  "fragment",
  "subunit",
  "chain",
  "precursor",
  "like",
  "putative",
  "probable",
  "predicted",
  "family",
]);

// periods and commas only split when they are not inside a number (1.5, 10,000)
const tokenSplitPattern = /(?:[\s\-_/:;]|(?<!\d)[.,]|[.,](?!\d))+/;
const hyphenTokenPattern = /\b[a-z0-9]+(?:-[a-z0-9]+)+\b/g;
// "h 3" or "3 h": joining did not happen
const letterDigitResiduePattern = /\b(?:[a-z]\s+\d+|\d+\s+[a-z])\b/;
const alphabeticPattern = /^\p{L}+$/u;
const numericPattern = /^\d+$/;

export function tokenize(text: string): string[] {
  return text.split(tokenSplitPattern).filter((token) => token.length > 0);
}

export function removeStopWords(tokens: readonly string[]): {
  kept: string[];
  dropped: string[];
} {
  const kept: string[] = [];
  const dropped: string[] = [];
  for (const token of tokens) {
    if (STOP_WORDS.has(token)) {
      dropped.push(token);
    } else {
      kept.push(token);
    }
  }
  return { kept, dropped };
}

/**
 * For every adjacent alphabetic/numeric pair ("h", "3") emits the joined
 * forms "h3" and "h-3", each tagged with the space-separated base "h 3".
 */
export function generateLetterDigitVariants(
  tokens: readonly string[],
): Substitution[] {
  const variants: Substitution[] = [];
  for (let i = 0; i < tokens.length - 1; i++) {
    const left = tokens[i] ?? "";
    const right = tokens[i + 1] ?? "";
    if (alphabeticPattern.test(left) && numericPattern.test(right)) {
      const base = `${left} ${right}`;
      variants.push({ variant: `${left}${right}`, base });
      variants.push({ variant: `${left}-${right}`, base });
    }
  }
  return variants;
}

export function detectHyphenVariants(text: string): Substitution[] {
  const variants: Substitution[] = [];
  for (const match of text.matchAll(hyphenTokenPattern)) {
    const token = match[0];
    const base = token.replace(/-/g, " ");
    variants.push({ variant: token, base });
    variants.push({ variant: token.replace(/-/g, ""), base });
  }
  return variants;
}

export function uniqueOrdered(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of values) {
    if (seen.has(value)) continue;
    seen.add(value);
    out.push(value);
  }
  return out;
}

/**
 * Builds the ordered set of canonical renderings of `base`. The base itself
 * is left out while it still holds a split letter/digit pair.
 */
export function buildVariantStrings(
  base: string,
  substitutions: readonly Substitution[],
  extra: readonly string[] = [],
): string[] {
  const trimmedBase = base.trim();
  const variants: string[] = [];
  if (trimmedBase && !letterDigitResiduePattern.test(trimmedBase)) {
    variants.push(trimmedBase);
  }
  for (const { variant, base: pattern } of substitutions) {
    if (trimmedBase && trimmedBase.includes(pattern)) {
      variants.push(trimmedBase.replaceAll(pattern, variant));
    }
    variants.push(variant);
  }
  variants.push(...extra);

  return uniqueOrdered(
    variants.map((value) => value.trim()).filter((value) => value.length > 0),
  );
}
