import type { ExpansionRule } from "./types.js";

// Every match is expanded, so these patterns carry the g flag and are only used with matchAll
export const EXPANSION_RULES: readonly ExpansionRule[] = [
  { pattern: /\bhistamine\s+h(\d+)\b/g, template: "hrh{1}" },
  { pattern: /\bdopamine\s+d(\d+)\b/g, template: "drd{1}" },
  { pattern: /\badrenergic\s+beta(\d+)\b/g, template: "adrb{1}" },
  { pattern: /\bp2x(\d+)\b/g, template: "p2rx{1}" },
  { pattern: /\b5[- ]?ht(\d+[a-z]?)\b/g, template: "htr{1}" },
  { pattern: /\bgaba\s*a\s+alpha(\d+)\b/g, template: "gabra{1}" },
  // TRP channels: trpv, trpm, trpc, trpa, trpk
  { pattern: /\btrp\s*([vmcak])\s*(\d+)\b/g, template: "trp{1}{2}" },
  // ionotropic glutamate
  { pattern: /\bglua(\d)\b/g, template: "gria{1}" },
  { pattern: /\bgluk(\d)\b/g, template: "grik{1}" },
  { pattern: /\bnr(1|2[a-d]|3[ab])\b/g, template: "grin{1}" },
  { pattern: /\bmglur(\d)\b/g, template: "grm{1}" },
  // chemokine receptors, short and long forms
  { pattern: /\bccr\s*(\d+)\b/g, template: "ccr{1}" },
  { pattern: /\bcxcr\s*(\d+)\b/g, template: "cxcr{1}" },
  { pattern: /\bchemokine\s+cc\s*(\d+)\b/g, template: "ccr{1}" },
  { pattern: /\bchemokine\s+cxc\s*(\d+)\b/g, template: "cxcr{1}" },
];
