import { numbered, type FamilyFallbackRule } from "./types.js";

/**
 * Glutamate receptor families named without a subtype. A rule is skipped
 * as soon as any token already carries its subtype prefix.
 */
export const FAMILY_FALLBACK_RULES: readonly FamilyFallbackRule[] = [
  { keywords: ["ampa"], subtypePrefix: "glua", symbols: numbered("gria", 1, 4) },
  {
    keywords: ["nmda"],
    subtypePrefix: "nr",
    symbols: ["grin1", "grin2a", "grin2b", "grin2c", "grin2d", "grin3a", "grin3b"],
  },
  { keywords: ["kainate"], subtypePrefix: "gluk", symbols: numbered("grik", 1, 5) },
  {
    keywords: ["metabotropic", "glutamate"],
    subtypePrefix: "mglur",
    symbols: numbered("grm", 1, 8),
  },
];
