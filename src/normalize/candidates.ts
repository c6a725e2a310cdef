import type { CandidateDomain } from "../types.js";
import { ALIAS_RULES } from "./rules/aliases.js";
import { CUSTOM_RULES } from "./rules/custom.js";
import { EXPANSION_RULES } from "./rules/expansion.js";
import { FAMILY_FALLBACK_RULES } from "./rules/family.js";
import { GPCR_EXTRA_RULES } from "./rules/gpcr-extra.js";
import { GPCR_RULES } from "./rules/gpcr.js";
import { ION_CHANNEL_RULES } from "./rules/ion-channels.js";
import type { PatternRule, PatternTable } from "./rules/types.js";

export type CandidateSet = {
  symbols: string[];
  domains: CandidateDomain[];
};

export const DECLARATIVE_TABLES: readonly PatternTable[] = [
  GPCR_RULES,
  GPCR_EXTRA_RULES,
  CUSTOM_RULES,
  ION_CHANNEL_RULES,
];

type Hit = { domain: CandidateDomain; symbols: readonly string[] };

class CandidateCollector {
  private readonly seen = new Set<string>();
  readonly symbols: string[] = [];
  readonly domains: CandidateDomain[] = [];

  add(domain: CandidateDomain, symbols: Iterable<string>): void {
    let produced = false;
    for (const raw of symbols) {
      const symbol = raw.toLowerCase().replace(/\s+/g, "");
      if (!symbol) continue;
      produced = true;
      if (this.seen.has(symbol)) continue;
      this.seen.add(symbol);
      this.symbols.push(symbol);
    }
    if (produced && !this.domains.includes(domain)) {
      this.domains.push(domain);
    }
  }

  toSet(): CandidateSet {
    return { symbols: [...this.symbols], domains: [...this.domains] };
  }
}

function ruleSymbols(rule: PatternRule, match: RegExpExecArray): readonly string[] {
  return typeof rule.symbols === "function" ? rule.symbols(match) : rule.symbols;
}

/**
 * Runs every declarative table over `text`, first match per entry. Returns
 * the non-soft hits followed by the soft ones, each tier in table order.
 */
export function matchDeclarativeTables(
  text: string,
  tables: readonly PatternTable[] = DECLARATIVE_TABLES,
): Hit[] {
  const hard: Hit[] = [];
  const soft: Hit[] = [];
  for (const table of tables) {
    for (const rule of table.rules) {
      const match = rule.pattern.exec(text);
      if (!match) continue;
      const hit = { domain: table.domain, symbols: ruleSymbols(rule, match) };
      (rule.soft ? soft : hard).push(hit);
    }
  }
  return [...hard, ...soft];
}

export function familyFallbacks(tokens: readonly string[]): string[] {
  const present = new Set(tokens);
  const out: string[] = [];
  for (const rule of FAMILY_FALLBACK_RULES) {
    if (!rule.keywords.every((keyword) => present.has(keyword))) continue;
    if (tokens.some((token) => token.startsWith(rule.subtypePrefix))) continue;
    out.push(...rule.symbols);
  }
  return out;
}

export function aliasCandidates(joined: string): string[] {
  const out: string[] = [];
  for (const rule of ALIAS_RULES) {
    if (rule.pattern.test(joined)) out.push(...rule.symbols);
  }
  return out;
}

export function expansionCandidates(joined: string): string[] {
  const out: string[] = [];
  for (const rule of EXPANSION_RULES) {
    for (const match of joined.matchAll(rule.pattern)) {
      out.push(
        rule.template.replace(/\{(\d+)\}/g, (_, group: string) => match[Number(group)] ?? ""),
      );
    }
  }
  return out;
}

/**
 * Infers gene-like symbols. Declarative tables read `text` (the "|"-joined
 * variant string); family fallbacks, aliases and expansions read the token
 * stream. `leading` candidates (from the receptor phrases) always come first.
 */
export function generateCandidates(
  text: string,
  tokens: readonly string[],
  leading: readonly string[] = [],
): CandidateSet {
  const collector = new CandidateCollector();
  collector.add("receptor", leading);

  for (const hit of matchDeclarativeTables(text)) {
    collector.add(hit.domain, hit.symbols);
  }
  collector.add("family", familyFallbacks(tokens));

  const joined = tokens.join(" ");
  collector.add("alias", aliasCandidates(joined));
  collector.add("expansion", expansionCandidates(joined));

  return collector.toSet();
}
