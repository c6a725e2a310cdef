export type ReceptorRule = {
  pattern: RegExp;
  replacement: string;
  candidate: string;
};

export const RECEPTOR_RULES: readonly ReceptorRule[] = [
  {
    pattern: /beta2\s+adrenergic\s+receptor/g,
    replacement: "beta2 adrenergic",
    candidate: "adrb2",
  },
  {
    pattern: /dopamine\s+d2\s+receptor/g,
    replacement: "dopamine d2",
    candidate: "drd2",
  },
  {
    pattern: /serotonin\s+5-ht1a\s+receptor/g,
    replacement: "5-ht1a serotonin",
    candidate: "htr1a",
  },
  {
    pattern: /histamine\s+h3\s+receptor/g,
    replacement: "histamine h3",
    candidate: "hrh3",
  },
  {
    pattern: /mu\s+opioid\s+receptor/g,
    replacement: "mu opioid",
    candidate: "oprm1",
  },
  {
    pattern: /cannabinoid\s+cb1\s+receptor/g,
    replacement: "cannabinoid cb1",
    candidate: "cnr1",
  },
];

export type ReceptorRuleOutcome = {
  text: string;
  candidates: string[];
  applied: string[];
};

/**
 * Applies the literal receptor phrases in table order. Each hit rewrites the
 * text and records its candidate plus the pattern source for auditing.
 */
export function applyReceptorRules(text: string): ReceptorRuleOutcome {
  let current = text;
  const candidates: string[] = [];
  const applied: string[] = [];

  for (const rule of RECEPTOR_RULES) {
    if (current.search(rule.pattern) === -1) continue;
    current = current.replace(rule.pattern, rule.replacement);
    candidates.push(rule.candidate);
    applied.push(rule.pattern.source);
  }

  return { text: current, candidates, applied };
}
