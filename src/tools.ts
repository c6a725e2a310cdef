import { z } from "zod";

import { serializeResult } from "./batch.js";
import { validateGeneName } from "./genes/validate.js";
import { normalizeTargetName } from "./normalize/pipeline.js";
import { logEvent, toErrorMessage } from "./telemetry.js";
import type { GeneLookup } from "./types.js";

export function createMCPResponse(text: string) {
  return {
    content: [
      {
        type: "text" as const,
        text,
      },
    ],
  };
}

export function createErrorResponse(operation: string, error: unknown) {
  logEvent("warn", "mcp.tool_failed", { operation, message: toErrorMessage(error) });
  return createMCPResponse(`Error ${operation}: ${toErrorMessage(error)}`);
}

export const normalizeTargetNameParams = {
  name: z.string().describe("Free-text target name, e.g. 'histamine H3 receptor'"),
  keepMutations: z
    .boolean()
    .optional()
    .describe("Keep mutation tokens such as V600E in the query tokens"),
  detectMutations: z
    .boolean()
    .optional()
    .describe("Run mutation detection (default true)"),
  mutationWhitelist: z
    .array(z.string())
    .optional()
    .describe("Extra tokens that must never be treated as mutations"),
  taxon: z.number().int().positive().optional().describe("NCBI taxonomy id"),
};

export const validateGeneNameParams = {
  uniprotId: z.string().min(1).describe("UniProt accession, e.g. P68871"),
  name: z.string().min(1).describe("Protein or gene name to check"),
};

type NormalizeTargetNameArgs = z.infer<z.ZodObject<typeof normalizeTargetNameParams>>;
type ValidateGeneNameArgs = z.infer<z.ZodObject<typeof validateGeneNameParams>>;

export function handleNormalizeTargetName(args: NormalizeTargetNameArgs) {
  try {
    const result = normalizeTargetName(args.name, {
      stripMutations: args.keepMutations === undefined ? undefined : !args.keepMutations,
      detectMutations: args.detectMutations,
      mutationWhitelist: args.mutationWhitelist,
      taxon: args.taxon,
    });
    return createMCPResponse(JSON.stringify(serializeResult(result), null, 2));
  } catch (error) {
    return createErrorResponse("normalizing target name", error);
  }
}

export async function handleValidateGeneName(
  args: ValidateGeneNameArgs,
  lookup: GeneLookup,
) {
  try {
    const match = await validateGeneName(args.uniprotId, args.name, lookup);
    return createMCPResponse(
      JSON.stringify({ uniprot_id: args.uniprotId, name: args.name, match }, null, 2),
    );
  } catch (error) {
    return createErrorResponse("validating gene name", error);
  }
}
