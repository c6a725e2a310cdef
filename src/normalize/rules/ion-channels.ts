import {
  captureTemplate,
  lookupCapture,
  numbered,
  type PatternTable,
  type SymbolDeriver,
} from "./types.js";

// Cav numbering is "<family>.<member>"; the alpha-1 subunit letters are not sequential
const CAV_SUBUNITS: Readonly<Record<string, string>> = {
  "1.1": "cacna1s",
  "1.2": "cacna1c",
  "1.3": "cacna1d",
  "1.4": "cacna1f",
  "2.1": "cacna1a",
  "2.2": "cacna1b",
  "2.3": "cacna1e",
  "3.1": "cacna1g",
  "3.2": "cacna1h",
  "3.3": "cacna1i",
};

const cavSubunit: SymbolDeriver = (match) => {
  const symbol = CAV_SUBUNITS[`${match[1] ?? ""}.${match[2] ?? ""}`];
  return symbol === undefined ? [] : [symbol];
};

const nicotinicAlpha = ["1", "2", "3", "4", "5", "6", "7", "9", "10"].map(
  (n) => `chrna${n}`,
);

export const ION_CHANNEL_RULES: PatternTable = {
  domain: "ion_channel",
  rules: [
    // voltage-gated sodium
    {
      pattern: /\bnav\s*1\.([1-9])\b/,
      symbols: lookupCapture({
        "1": ["scn1a"],
        "2": ["scn2a"],
        "3": ["scn3a"],
        "4": ["scn4a"],
        "5": ["scn5a"],
        "6": ["scn8a"],
        "7": ["scn9a"],
        "8": ["scn10a"],
        "9": ["scn11a"],
      }),
    },
    {
      pattern: /\b(?:voltage-?gated\s+)?sodium\s+channel\b(?!\s*\d)/,
      symbols: [
        "scn1a",
        "scn2a",
        "scn3a",
        "scn4a",
        "scn5a",
        "scn8a",
        "scn9a",
        "scn10a",
        "scn11a",
      ],
      soft: true,
    },
    {
      pattern: /\benac\b|\bepithelial\s+sodium\s+channel\b/,
      symbols: ["scnn1a", "scnn1b", "scnn1g", "scnn1d"],
      soft: true,
    },

    // voltage-gated calcium
    { pattern: /\bcav\s*([123])\.([1-4])\b/, symbols: cavSubunit },
    {
      pattern: /\bl-?type\s+calcium\b/,
      symbols: ["cacna1s", "cacna1c", "cacna1d", "cacna1f"],
      soft: true,
    },
    {
      pattern: /\bt-?type\s+calcium\b/,
      symbols: ["cacna1g", "cacna1h", "cacna1i"],
      soft: true,
    },
    { pattern: /\bn-?type\s+calcium\b/, symbols: ["cacna1b"] },
    { pattern: /\bp\s*q-?type\s+calcium\b/, symbols: ["cacna1a"] },

    // voltage-gated potassium
    {
      pattern: /\bkv\s*1\.([1-8])\b/,
      symbols: lookupCapture({
        "1": ["kcna1"],
        "2": ["kcna2"],
        "3": ["kcna3"],
        "4": ["kcna4"],
        "5": ["kcna5"],
        "6": ["kcna6"],
        "7": ["kcna7"],
        "8": ["kcna10"],
      }),
    },
    {
      pattern: /\bkv\s*7\.([1-5])\b|\bkcnq\s*([1-5])\b/,
      symbols: captureTemplate("kcnq{}"),
    },
    { pattern: /\bh-?erg\b|\bkv\s*11\.1\b/, symbols: ["kcnh2"] },

    // inward rectifiers
    {
      pattern: /\bkir\s*6\.([12])\b/,
      symbols: lookupCapture({ "1": ["kcnj8"], "2": ["kcnj11"] }),
    },
    { pattern: /\bkir\s*2\.1\b/, symbols: ["kcnj2"] },
    {
      pattern: /\bk-?atp\b/,
      symbols: ["kcnj8", "kcnj11", "abcc8", "abcc9"],
      soft: true,
    },

    // calcium-activated potassium
    {
      pattern: /\bbk\s*(?:ca|channel)\b|\bmaxi-?k\b|\bkcnma1\b/,
      symbols: ["kcnma1"],
    },
    { pattern: /\bsk\s*([1-3])\b/, symbols: captureTemplate("kcnn{}") },
    { pattern: /\bik\s*ca\b|\bsk\s*4\b/, symbols: ["kcnn4"] },
    {
      pattern: /\bsk\s+channel\b|\bsmall\s+conductance\b/,
      symbols: ["kcnn1", "kcnn2", "kcnn3"],
      soft: true,
    },

    // two-pore domain potassium
    { pattern: /\btrek[\s-]*1\b/, symbols: ["kcnk2"] },
    { pattern: /\btrek[\s-]*2\b/, symbols: ["kcnk10"] },
    { pattern: /\btask[\s-]*1\b/, symbols: ["kcnk3"] },
    { pattern: /\btask[\s-]*3\b/, symbols: ["kcnk9"] },
    { pattern: /\btraak\b/, symbols: ["kcnk4"] },

    // HCN, ASIC
    { pattern: /\bhcn\s*([1-4])\b/, symbols: captureTemplate("hcn{}") },
    {
      pattern: /\bhcn\s+channel\b|\bhyperpolarization-?activated\b/,
      symbols: numbered("hcn", 1, 4),
      soft: true,
    },
    { pattern: /\basic\s*([1-4])[ab]?\b/, symbols: captureTemplate("asic{}") },
    {
      pattern: /\bacid-?sensing\s+ion\s+channel\b(?!\s*\d)/,
      symbols: numbered("asic", 1, 4),
      soft: true,
    },

    // ligand-gated
    {
      pattern:
        /\bnicotinic\b.*?\balpha\s*(10|[1-9])\b|\balpha\s*(10|[1-9])[\s-]*nicotinic\b/,
      symbols: captureTemplate("chrna{}"),
    },
    {
      pattern: /\bnicotinic\b.*?\bbeta\s*([1-4])\b/,
      symbols: captureTemplate("chrnb{}"),
    },
    {
      pattern: /\bnicotinic\s+(?:acetylcholine\s+)?receptor\b|\bnachr\b/,
      symbols: [...nicotinicAlpha, ...numbered("chrnb", 1, 4)],
      soft: true,
    },
    {
      pattern: /\bgaba-?a\s+receptor\b|\bgabaa\b/,
      symbols: [
        ...numbered("gabra", 1, 6),
        ...numbered("gabrb", 1, 3),
        ...numbered("gabrg", 1, 3),
        "gabrd",
      ],
      soft: true,
    },
    { pattern: /\bgaba-?b\b/, symbols: ["gabbr1", "gabbr2"] },
    {
      pattern: /\bglycine\s+receptor\b.*?\balpha\s*([1-4])\b|\bglra\s*([1-4])\b/,
      symbols: captureTemplate("glra{}"),
    },
    {
      pattern: /\bglycine\s+receptor\b(?!\s*\d)/,
      symbols: [...numbered("glra", 1, 4), "glrb"],
      soft: true,
    },
    { pattern: /\bp2x\s*([1-7])\b/, symbols: captureTemplate("p2rx{}") },
    {
      pattern: /\bp2x\s+receptor\b(?!\s*\d)/,
      symbols: numbered("p2rx", 1, 7),
      soft: true,
    },

    // intracellular release channels
    {
      pattern: /\bryr\s*([1-3])\b|\bryanodine\s+receptor\s*([1-3])\b/,
      symbols: captureTemplate("ryr{}"),
    },
    {
      pattern: /\bryanodine\s+receptor\b(?!\s*\d)/,
      symbols: numbered("ryr", 1, 3),
      soft: true,
    },
    {
      pattern: /\bip3r\s*([1-3])\b|\bitpr\s*([1-3])\b/,
      symbols: captureTemplate("itpr{}"),
    },
    {
      pattern: /\b(?:ip3|inositol\s+trisphosphate)\s+receptor\b(?!\s*\d)/,
      symbols: numbered("itpr", 1, 3),
      soft: true,
    },

    // miscellaneous
    { pattern: /\bpiezo\s*([12])\b/, symbols: captureTemplate("piezo{}") },
    { pattern: /\borai\s*([1-3])\b/, symbols: captureTemplate("orai{}") },
    { pattern: /\bcrac\s+channel\b/, symbols: ["orai1", "stim1"], soft: true },
    { pattern: /\btmem16a\b|\bano\s*1\b|\banoctamin-?1\b/, symbols: ["ano1"] },
    {
      pattern: /\bcftr\b|\bcystic\s+fibrosis\s+transmembrane\b/,
      symbols: ["cftr"],
    },
  ],
};
