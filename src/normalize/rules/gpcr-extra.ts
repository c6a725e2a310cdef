import { captureTemplate, numbered, type PatternTable } from "./types.js";

// Peptide and lipid GPCR families that need RAMP partners or deorphanized names
export const GPCR_EXTRA_RULES: PatternTable = {
  domain: "gpcr_extra",
  rules: [
    // calcitonin / CGRP / amylin
    {
      pattern: /\b(?:calcitonin|cgrp|amylin)\s+receptor\b(?!\s*\d)|\bcalcrl?\b/,
      symbols: ["calcr", "calcrl", "ramp1", "ramp2", "ramp3"],
      soft: true,
    },
    { pattern: /\bcgrp\b/, symbols: ["calcrl", "ramp1", "ramp2", "ramp3"] },
    { pattern: /\bamylin\b/, symbols: ["calcr", "ramp1", "ramp2", "ramp3"] },

    // parathyroid hormone
    {
      pattern:
        /\bparathyroid\s+hormone\s+receptor\b(?!\s*\d)|\bpth\s*receptor\b(?!\s*\d)/,
      symbols: ["pth1r", "pth2r"],
      soft: true,
    },
    { pattern: /\bpth\s*1\s*r?\b/, symbols: ["pth1r"] },
    { pattern: /\bpth\s*2\s*r?\b/, symbols: ["pth2r"] },

    // neuropeptide S / FF / B-W, neuromedin U
    {
      pattern:
        /\bneuropeptide\s*s\s+receptor\b(?!\s*\d)|\bnps\s*receptor\b(?!\s*\d)|\bnpsr1\b/,
      symbols: ["npsr1"],
    },
    {
      pattern: /\bneuropeptide\s*ff\s+receptor\b(?!\s*\d)|\bnpffr\b/,
      symbols: ["npffr1", "npffr2"],
      soft: true,
    },
    { pattern: /\bnpffr\s*([12])\b/, symbols: captureTemplate("npffr{}") },
    {
      pattern: /\bneuropeptide\s*[bw]\s+receptor\b(?!\s*\d)|\bnpbwr\b/,
      symbols: ["npbwr1", "npbwr2"],
      soft: true,
    },
    { pattern: /\bnpbwr\s*([12])\b/, symbols: captureTemplate("npbwr{}") },
    {
      pattern: /\bneuromedin\s*u\s+receptor\b(?!\s*\d)|\bnmur\b/,
      symbols: ["nmur1", "nmur2"],
      soft: true,
    },
    { pattern: /\bnmur\s*([12])\b/, symbols: captureTemplate("nmur{}") },

    // single-member peptide receptors
    {
      pattern: /\bkisspeptin\s+receptor\b|\bgpr54\b|\bkiss1r\b/,
      symbols: ["kiss1r", "gpr54"],
    },
    { pattern: /\bghrelin\s+receptor\b|\bghsr\b/, symbols: ["ghsr"] },
    {
      pattern: /\bmotilin\s+receptor\b|\bmlnr\b|\bgpr38\b/,
      symbols: ["mlnr", "gpr38"],
    },
    {
      pattern:
        /\bprolactin-?releasing\s+peptide\s+receptor\b|\bprlhr\b|\bgpr10\b/,
      symbols: ["prlhr", "gpr10"],
    },

    // melanin-concentrating hormone
    {
      pattern:
        /\bmelanin-?concentrating\s+hormone\s+receptor\b(?!\s*\d)|\bmchr\b/,
      symbols: ["mchr1", "mchr2"],
      soft: true,
    },
    { pattern: /\bmchr\s*([12])\b/, symbols: captureTemplate("mchr{}") },

    // fractalkine and XC chemokine receptors
    {
      pattern: /\bfractalkine\s+receptor\b(?!\s*\d)|\bcx3cr1\b/,
      symbols: ["cx3cr1"],
    },
    {
      pattern: /\bxcr\s*1\b|\bxc\s*chemokine\s+receptor\s*1\b/,
      symbols: ["xcr1"],
    },

    {
      pattern: /\bplatelet-?activating\s+factor\s+receptor\b(?!\s*\d)|\bptafr\b/,
      symbols: ["ptafr"],
    },

    // formyl peptide
    {
      pattern: /\bformyl\s+peptide\s+receptor\b(?!\s*\d)|\bfpr\b/,
      symbols: ["fpr1", "fpr2", "fpr3"],
      soft: true,
    },
    { pattern: /\bfpr\s*([1-3])\b/, symbols: captureTemplate("fpr{}") },
    { pattern: /\balx\b/, symbols: ["fpr2"] },

    // free fatty acid
    {
      pattern: /\bfree\s+fatty\s+acid\s+receptor\b(?!\s*\d)|\bffar\b/,
      symbols: ["ffar1", "ffar2", "ffar3", "ffar4", "gpr84"],
      soft: true,
    },
    { pattern: /\bffar\s*([1-4])\b/, symbols: captureTemplate("ffar{}") },
    { pattern: /\bgpr\s*120\b/, symbols: ["ffar4", "gpr120"] },
    { pattern: /\bgpr\s*40\b/, symbols: ["ffar1", "gpr40"] },
    { pattern: /\bgpr\s*41\b/, symbols: ["ffar3", "gpr41"] },
    { pattern: /\bgpr\s*43\b/, symbols: ["ffar2", "gpr43"] },
    { pattern: /\bgpr\s*84\b/, symbols: ["gpr84"] },

    // hydroxycarboxylic acid
    {
      pattern: /\bhydroxycarboxylic\s+acid\s+receptor\b(?!\s*\d)|\bhcar\b/,
      symbols: ["hcar1", "hcar2", "hcar3"],
      soft: true,
    },
    { pattern: /\bhcar\s*([1-3])\b/, symbols: captureTemplate("hcar{}") },
    { pattern: /\bgpr\s*81\b/, symbols: ["hcar1", "gpr81"] },
    { pattern: /\bgpr\s*109\s*a\b|\bhcar2\b/, symbols: ["hcar2", "gpr109a"] },
    { pattern: /\bgpr\s*109\s*b\b|\bhcar3\b/, symbols: ["hcar3", "gpr109b"] },

    // trace amine-associated
    {
      pattern: /\btrace\s+amine-?associated\s+receptor\b(?!\s*\d)|\btaar\b/,
      symbols: numbered("taar", 1, 9),
      soft: true,
    },
    { pattern: /\btaar\s*([1-9])\b/, symbols: captureTemplate("taar{}") },

    {
      pattern: /\bbile\s+acid\s+receptor\b(?!\s*\d)|\btgr5\b|\bgpbar1\b/,
      symbols: ["gpbar1", "tgr5"],
    },
    // "urotensin ii" is already "urotensin 2" after numeral folding
    {
      pattern: /\burotensin[\s-]*(?:ii|2)\s+receptor\b|\buts2r\b/,
      symbols: ["uts2r"],
    },
    { pattern: /\bapelin\s+receptor\b|\baplnr\b|\bagtrl1\b/, symbols: ["aplnr"] },
  ],
};
