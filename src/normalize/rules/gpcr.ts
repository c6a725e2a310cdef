import { captureTemplate, type PatternTable } from "./types.js";

export const GPCR_RULES: PatternTable = {
  domain: "gpcr",
  rules: [
    // adenosine
    {
      pattern: /\badenosine\s+receptor\b/,
      symbols: ["adora1", "adora2a", "adora2b", "adora3"],
      soft: true,
    },
    {
      pattern: /\badenosine\s+a\s*1\b|\ba1\b(?=.*adenosine)/,
      symbols: ["a1", "adora1"],
    },
    {
      pattern: /\badenosine\s+a\s*2\s*a\b|\ba2a\b(?=.*adenosine)/,
      symbols: ["a2a", "adora2a"],
    },
    {
      pattern: /\badenosine\s+a\s*2\s*b\b|\ba2b\b(?=.*adenosine)/,
      symbols: ["a2b", "adora2b"],
    },
    {
      pattern: /\badenosine\s+a\s*3\b|\ba3\b(?=.*adenosine)/,
      symbols: ["a3", "adora3"],
    },

    // nociceptin / orphanin FQ
    {
      pattern:
        /\bnociceptin\s+receptor\b|\borphanin\s*fq\s+receptor\b|\bnop\b|\borl1\b/,
      symbols: ["nop", "orl1", "oprl1"],
    },

    // neuropeptide Y
    {
      pattern: /\bneuropeptide\s*y\s+receptor\b|\bnpy\s+receptor\b/,
      symbols: ["npy1r", "npy2r", "npy4r", "npy5r"],
      soft: true,
    },
    { pattern: /\b(?:y\s*1|npy\s*1)\b/, symbols: ["y1", "npy1r"] },
    { pattern: /\b(?:y\s*2|npy\s*2)\b/, symbols: ["y2", "npy2r"] },
    { pattern: /\b(?:y\s*4|npy\s*4)\b/, symbols: ["y4", "npy4r"] },
    { pattern: /\b(?:y\s*5|npy\s*5)\b/, symbols: ["y5", "npy5r"] },

    // melanocortin
    {
      pattern: /\bmelanocortin\s+receptor\b|\bmcr\b/,
      symbols: ["mc1r", "mc2r", "mc3r", "mc4r", "mc5r"],
      soft: true,
    },
    {
      pattern: /\bmc\s*([1-5])\s*r?\b|\bmelanocortin[\s-]*([1-5])\b/,
      symbols: captureTemplate("mc{}r"),
    },

    // prostanoids
    {
      pattern: /\bprostaglandin\s+receptor\b/,
      symbols: [
        "ptger1",
        "ptger2",
        "ptger3",
        "ptger4",
        "ptgdr",
        "ptgdr2",
        "ptgfr",
        "ptgir",
        "tbxa2r",
      ],
      soft: true,
    },
    { pattern: /\bep\s*([1-4])\b/, symbols: captureTemplate("ep{}", "ptger{}") },
    { pattern: /\bdp\s*1\b/, symbols: ["dp1", "ptgdr"] },
    {
      pattern: /\bdp\s*2\b|\bcrth2\b|\bgpr44\b/,
      symbols: ["dp2", "crth2", "ptgdr2"],
    },
    { pattern: /\bfp\b|\bpgf\s*2\s*a\b/, symbols: ["fp", "ptgfr"] },
    {
      pattern: /\bip\b(?![v3])|\bprostacyclin\s+receptor\b/,
      symbols: ["ip", "ptgir"],
    },
    {
      pattern: /\btp\b|\bthromboxane\s+receptor\b/,
      symbols: ["tp", "tbxa2r"],
    },
  ],
};
