import { z } from "zod";

import { createTTLCache } from "../cache/lru.js";
import { appConfig } from "../config.js";
import { fetchJson, HttpStatusError, type FetchLike } from "../http.js";
import { logEvent } from "../telemetry.js";
import type { GeneLookup, GeneRecord } from "../types.js";

const textValueSchema = z.object({ value: z.string() });

// Only the fields name validation reads; the rest of the entry is dropped
export const uniprotRecordSchema = z.object({
  primaryAccession: z.string().optional(),
  proteinDescription: z
    .object({
      recommendedName: z.object({ fullName: textValueSchema }).optional(),
      submissionNames: z.array(z.object({ fullName: textValueSchema })).optional(),
    })
    .optional(),
  genes: z
    .array(
      z.object({
        geneName: textValueSchema.optional(),
        synonyms: z.array(textValueSchema).optional(),
      }),
    )
    .optional(),
});

export type UniprotRecord = z.infer<typeof uniprotRecordSchema>;

/**
 * Protein name plus every gene name and synonym, in entry order.
 */
export function extractNames(record: UniprotRecord): GeneRecord {
  const description = record.proteinDescription;
  const name =
    description?.recommendedName?.fullName.value ??
    description?.submissionNames?.[0]?.fullName.value ??
    "";

  const synonyms: string[] = [];
  for (const gene of record.genes ?? []) {
    if (gene.geneName?.value) synonyms.push(gene.geneName.value);
    for (const synonym of gene.synonyms ?? []) {
      if (synonym.value) synonyms.push(synonym.value);
    }
  }

  return { name, synonyms };
}

export type UniprotLookupOptions = {
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
};

type CachedRecord = { record: GeneRecord | null };

export function createUniprotLookup(options: UniprotLookupOptions = {}): GeneLookup {
  const baseUrl = (options.baseUrl ?? appConfig.uniprot.baseUrl).replace(/\/+$/, "");
  const timeoutMs = options.timeoutMs ?? appConfig.uniprot.timeoutMs;
  const cache = createTTLCache<string, CachedRecord>();

  async function fetchRecord(accession: string): Promise<GeneRecord | null> {
    const url = `${baseUrl}/${encodeURIComponent(accession)}.json`;
    logEvent("debug", "uniprot.fetch", { accession, url });
    try {
      const record = await fetchJson(url, uniprotRecordSchema, {
        timeoutMs,
        fetchImpl: options.fetchImpl,
      });
      return extractNames(record);
    } catch (error) {
      if (error instanceof HttpStatusError && error.status === 404) {
        return null;
      }
      throw error;
    }
  }

  return {
    async lookupGene(id: string) {
      const accession = id.trim().toUpperCase();
      if (!accession) return null;

      const cached = cache.get(accession);
      if (cached) return cached.record;

      const record = await fetchRecord(accession);
      cache.set(accession, { record });
      return record;
    },
  };
}

export const noopGeneLookup: GeneLookup = {
  async lookupGene() {
    return null;
  },
};
