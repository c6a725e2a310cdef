import type { AliasRule } from "./types.js";

// Ligand and legacy names that point at their receptor genes
export const ALIAS_RULES: readonly AliasRule[] = [
  { pattern: /\bsdf[- ]?1(?:\s*alpha)?\b/, symbols: ["cxcr4"] },
  { pattern: /\bil[- ]?8\b|\bcxcl8\b/, symbols: ["cxcr1", "cxcr2"] },
  { pattern: /\brantes\b|\bccl5\b/, symbols: ["ccr1", "ccr3", "ccr5"] },
  { pattern: /\bfractalkine\b|\bcx3cl1\b/, symbols: ["cx3cr1"] },
  { pattern: /\bmcp[- ]?1\b|\bccl2\b/, symbols: ["ccr2"] },
  { pattern: /\beotaxin\b|\bccl11\b/, symbols: ["ccr3"] },
  { pattern: /\bmip[- ]?1\s*alpha\b|\bccl3\b/, symbols: ["ccr1", "ccr5"] },
  { pattern: /\bsubstance\s+p\b|\bnk[- ]?1\b/, symbols: ["tacr1"] },
  { pattern: /\bangiotensin\s+2\b/, symbols: ["agtr1", "agtr2"] },
  { pattern: /\bleptin\b/, symbols: ["lepr"] },
];
