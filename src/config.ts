import fs from "node:fs";
import path from "node:path";
import { config as loadDotenv } from "dotenv";

const envCandidates = [
  path.resolve(process.cwd(), ".env.local"),
  path.resolve(process.cwd(), ".env"),
];

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    loadDotenv({ path: envPath, override: false });
  }
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export const parseNumber = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) return fallback;
  return parsed;
};

export const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") return true;
  if (normalized === "0" || normalized === "false" || normalized === "no") return false;
  return fallback;
};

export const parseList = (value: string | undefined): string[] => {
  if (!value) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
};

export const parseLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  if (normalized === "warning") return "warn";
  return "info";
};

export const appConfig = {
  normalizer: {
    // NCBI taxonomy id, passed through to results untouched
    taxon: Math.trunc(parseNumber(process.env.NORMALIZER_TAXON, 9606)),
    stripMutations: parseBoolean(process.env.NORMALIZER_STRIP_MUTATIONS, true),
    detectMutations: parseBoolean(process.env.NORMALIZER_DETECT_MUTATIONS, true),
    mutationWhitelist: parseList(process.env.NORMALIZER_MUTATION_WHITELIST),
  },
  uniprot: {
    baseUrl:
      process.env.UNIPROT_API_BASE ?? "https://rest.uniprot.org/uniprotkb",
    timeoutMs: parseNumber(process.env.UNIPROT_TIMEOUT_MS, 10_000),
  },
  cache: {
    ttlMs: parseNumber(process.env.CACHE_TTL_MS, 60 * 60 * 1000),
    maxEntries: parseNumber(process.env.CACHE_MAX_ENTRIES, 500),
  },
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
};
