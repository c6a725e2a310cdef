import { readFileSync } from "node:fs";
import { z } from "zod";

const characterTablesSchema = z.object({
  greek: z.record(z.string(), z.string()),
  superscripts: z.record(z.string(), z.string()),
});

export type CharacterMap = Readonly<Record<string, string>>;

const characterTables = characterTablesSchema.parse(
  JSON.parse(
    readFileSync(new URL("../../data/characters.json", import.meta.url), "utf8"),
  ),
);

export const GREEK_LETTERS: CharacterMap = Object.freeze(characterTables.greek);
export const SUPERSCRIPTS: CharacterMap = Object.freeze(
  characterTables.superscripts,
);

const DEFAULT_SPECIALS: CharacterMap = Object.freeze({
  ...GREEK_LETTERS,
  ...SUPERSCRIPTS,
});

// i, v and x stay untouched: they are valid gene-symbol letters
export const ROMAN_NUMERALS: Readonly<Record<string, string>> = Object.freeze({
  ii: "2",
  iii: "3",
  iv: "4",
  vi: "6",
  vii: "7",
  viii: "8",
  ix: "9",
  xi: "11",
  xii: "12",
  xiii: "13",
  xiv: "14",
  xv: "15",
  xvi: "16",
  xvii: "17",
  xviii: "18",
  xix: "19",
  xx: "20",
});

const controlCharsPattern = /[\u0000-\u001F\u007F]/g;
const typographicQuotesPattern = /[“”«»„’‘]/g;
const longDashPattern = /[–—]/g;
const romanNumeralPattern = new RegExp(
  `\\b(${Object.keys(ROMAN_NUMERALS)
    .sort((a, b) => b.length - a.length)
    .join("|")})\\b`,
  "g",
);

/**
 * Strips control characters, BOM and NBSP, then collapses whitespace.
 */
export function sanitize(text: string): string {
  return text
    .replace(controlCharsPattern, "")
    .replace(/\uFEFF/g, "")
    .replace(/\u00A0/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * NFKC-normalizes and lowercases, mapping typographic quotes to `'` and
 * en/em dashes to `-`. Applying it twice gives the same string.
 */
export function foldUnicode(text: string): string {
  return text
    .normalize("NFKC")
    .toLowerCase()
    .replace(typographicQuotesPattern, "'")
    .replace(longDashPattern, "-");
}

export type TextSpan = {
  start: number;
  end: number;
};

/**
 * translateSpecials that also reports where each substitution landed in the
 * output, so later folds can tell spelled-out letters from typed ones.
 */
export function translateSpecialsWithSpans(
  text: string,
  greek?: CharacterMap,
  superscripts?: CharacterMap,
): { text: string; spans: TextSpan[] } {
  const table =
    greek === undefined && superscripts === undefined
      ? DEFAULT_SPECIALS
      : { ...(greek ?? GREEK_LETTERS), ...(superscripts ?? SUPERSCRIPTS) };

  let out = "";
  const spans: TextSpan[] = [];
  for (const char of text) {
    const replacement = table[char];
    if (replacement === undefined) {
      out += char;
      continue;
    }
    spans.push({ start: out.length, end: out.length + replacement.length });
    out += replacement;
  }
  return { text: out, spans };
}

export function translateSpecials(
  text: string,
  greek?: CharacterMap,
  superscripts?: CharacterMap,
): string {
  return translateSpecialsWithSpans(text, greek, superscripts).text;
}

/**
 * Rewrites whole-word Roman numerals II to XX as Arabic digits. Expects
 * lowercase input. A numeral lying wholly inside one of `keep` (Greek xi
 * spelled out by translateSpecialsWithSpans) is left as it is.
 */
export function foldRomanNumerals(text: string, keep: readonly TextSpan[] = []): string {
  return text.replace(
    romanNumeralPattern,
    (numeral: string, _group: string, offset: number) => {
      const end = offset + numeral.length;
      if (keep.some((span) => span.start <= offset && end <= span.end)) return numeral;
      return ROMAN_NUMERALS[numeral] ?? numeral;
    },
  );
}
