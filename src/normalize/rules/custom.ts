import {
  captureTemplate,
  lookupCapture,
  numbered,
  type PatternTable,
  type SymbolDeriver,
} from "./types.js";

const alphaAdrenergic: SymbolDeriver = (match) => {
  const subtype = match[1] ?? match[3];
  const letter = match[2] ?? match[4];
  if (subtype === undefined) return [];
  if (letter !== undefined) return [`adra${subtype}${letter}`];
  return subtype === "1"
    ? ["adra1a", "adra1b", "adra1d"]
    : ["adra2a", "adra2b", "adra2c"];
};

export const CUSTOM_RULES: PatternTable = {
  domain: "custom",
  rules: [
    // sigma binding sites are not classical receptors: SIGMAR1 and TMEM97
    {
      pattern: /\bsigma\s+(?:receptor|binding\s+site)\b(?!\s*\d)/,
      symbols: ["sigmar1", "tmem97"],
      soft: true,
    },
    {
      pattern: /\bsigma[\s-]*([12])\b/,
      symbols: lookupCapture({ "1": ["sigmar1"], "2": ["tmem97"] }),
    },

    // opioids
    {
      pattern: /\bopioid\s+receptor\b/,
      symbols: ["oprm1", "oprd1", "oprk1", "oprl1"],
      soft: true,
    },
    { pattern: /\bmu[\s-]*opioid\b/, symbols: ["oprm1"] },
    { pattern: /\bdelta[\s-]*opioid\b/, symbols: ["oprd1"] },
    { pattern: /\bkappa[\s-]*opioid\b/, symbols: ["oprk1"] },

    // adrenergic
    {
      pattern: /\badrenergic\s+receptor\b|\badrenoceptor\b/,
      symbols: [
        "adrb1",
        "adrb2",
        "adrb3",
        "adra1a",
        "adra1b",
        "adra1d",
        "adra2a",
        "adra2b",
        "adra2c",
      ],
      soft: true,
    },
    {
      pattern: /\bbeta\s*([1-3])[\s-]*adrenergic\b|\badrenergic\s+beta\s*([1-3])\b/,
      symbols: captureTemplate("adrb{}"),
    },
    {
      pattern:
        /\balpha\s*([12])([abcd])?[\s-]*adrenergic\b|\badrenergic\s+alpha\s*([12])([abcd])?\b/,
      symbols: alphaAdrenergic,
    },

    // monoamine receptors named by family and index
    {
      pattern: /\bhistamine\b.*?\bh\s*([1-4])\b/,
      symbols: captureTemplate("hrh{}"),
    },
    {
      pattern: /\bhistamine\s+receptor\b(?!\s*\d)/,
      symbols: numbered("hrh", 1, 4),
      soft: true,
    },
    {
      pattern: /\bdopamine\b.*?\bd\s*([1-5])\b/,
      symbols: captureTemplate("drd{}"),
    },
    {
      pattern: /\bdopamine\s+receptor\b(?!\s*\d)/,
      symbols: numbered("drd", 1, 5),
      soft: true,
    },
    {
      pattern: /\bmuscarinic\b.*?\bm\s*([1-5])r?\b|\bm([1-5])r?\s+muscarinic\b/,
      symbols: captureTemplate("chrm{}"),
    },
    {
      pattern: /\bmuscarinic\s+(?:acetylcholine\s+)?receptor\b(?!\s*\d)/,
      symbols: numbered("chrm", 1, 5),
      soft: true,
    },

    // cannabinoid
    { pattern: /\bcb\s*([12])\b/, symbols: captureTemplate("cnr{}") },
    {
      pattern: /\bcannabinoid\s+receptor\b(?!\s*\d)/,
      symbols: ["cnr1", "cnr2"],
      soft: true,
    },

    // orexin / hypocretin
    {
      pattern: /\borexin[\s-]*([12])\b|\box\s*([12])\s*r\b|\bhcrtr\s*([12])\b/,
      symbols: captureTemplate("hcrtr{}"),
    },
    {
      pattern: /\b(?:orexin|hypocretin)\s+receptor\b(?!\s*\d)/,
      symbols: ["hcrtr1", "hcrtr2"],
      soft: true,
    },

    // angiotensin, endothelin, bradykinin
    { pattern: /\bat\s*([12])\s*r?\b/, symbols: captureTemplate("agtr{}") },
    {
      pattern: /\bangiotensin(?:\s+2)?\s+receptor\b(?!\s*\d)/,
      symbols: ["agtr1", "agtr2"],
      soft: true,
    },
    {
      pattern: /\bendothelin[\s-]*([ab])\b|\bednr\s*([ab])\b/,
      symbols: captureTemplate("ednr{}"),
    },
    {
      pattern: /\bendothelin\s+receptor\b(?!\s*[ab]\b)/,
      symbols: ["ednra", "ednrb"],
      soft: true,
    },
    {
      pattern: /\bbradykinin\s+b\s*([12])\b|\bb([12])\s+bradykinin\b/,
      symbols: captureTemplate("bdkrb{}"),
    },
    {
      pattern: /\bbradykinin\s+receptor\b(?!\s*\d)/,
      symbols: ["bdkrb1", "bdkrb2"],
      soft: true,
    },

    // vasopressin / oxytocin
    { pattern: /\bv\s*1\s*a\b/, symbols: ["avpr1a"] },
    { pattern: /\bv\s*1\s*b\b|\bv\s*3\b(?=.*vasopressin)/, symbols: ["avpr1b"] },
    { pattern: /\bvasopressin\s+v\s*2\b|\bv\s*2\s+vasopressin\b/, symbols: ["avpr2"] },
    {
      pattern: /\bvasopressin\s+receptor\b(?!\s*\d)/,
      symbols: ["avpr1a", "avpr1b", "avpr2"],
      soft: true,
    },
    { pattern: /\boxytocin\s+receptor\b|\boxtr\b/, symbols: ["oxtr"] },

    // somatostatin, melatonin, CRF
    {
      pattern: /\bsstr?\s*([1-5])\b|\bsomatostatin\s+(?:receptor\s+)?([1-5])\b/,
      symbols: captureTemplate("sstr{}"),
    },
    {
      pattern: /\bsomatostatin\s+receptor\b(?!\s*\d)/,
      symbols: numbered("sstr", 1, 5),
      soft: true,
    },
    {
      pattern: /\bmt\s*([12])\b/,
      symbols: lookupCapture({ "1": ["mtnr1a"], "2": ["mtnr1b"] }),
    },
    {
      pattern: /\bmelatonin\s+receptor\b(?!\s*\d)/,
      symbols: ["mtnr1a", "mtnr1b"],
      soft: true,
    },
    {
      pattern: /\bcrf\s*([12])\b|\bcrhr\s*([12])\b/,
      symbols: captureTemplate("crhr{}"),
    },
    {
      pattern:
        /\bcorticotropin[\s-]*releasing\s+(?:factor|hormone)\s+receptor\b(?!\s*\d)/,
      symbols: ["crhr1", "crhr2"],
      soft: true,
    },

    // incretins and glucagon
    { pattern: /\bglp[\s-]*1\s*r?\b/, symbols: ["glp1r"] },
    { pattern: /\bglp[\s-]*2\s*r?\b/, symbols: ["glp2r"] },
    { pattern: /\bgip\s+receptor\b|\bgipr\b/, symbols: ["gipr"] },
    { pattern: /\bglucagon\s+receptor\b|\bgcgr\b/, symbols: ["gcgr"] },

    // lysophospholipids
    { pattern: /\bs1p\s*([1-5])\b/, symbols: captureTemplate("s1pr{}") },
    {
      pattern: /\bsphingosine[\s-]*1[\s-]*phosphate\s+receptor\b(?!\s*\d)/,
      symbols: numbered("s1pr", 1, 5),
      soft: true,
    },
    { pattern: /\blpa\s*([1-6])\b/, symbols: captureTemplate("lpar{}") },
  ],
};
