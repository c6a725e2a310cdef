#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { createUniprotLookup } from "./genes/uniprot.js";
import { logEvent, routeLogsToStderr, toErrorMessage } from "./telemetry.js";
import {
  handleNormalizeTargetName,
  handleValidateGeneName,
  normalizeTargetNameParams,
  validateGeneNameParams,
} from "./tools.js";

routeLogsToStderr();

const lookup = createUniprotLookup();

const server = new McpServer(
  {
    name: "target-normalizer",
    version: "0.1.0",
  },
  {
    capabilities: {
      tools: {},
    },
  },
);

server.tool(
  "normalize-target-name",
  "Normalize a biomedical target name and infer candidate gene symbols",
  normalizeTargetNameParams,
  async (args) => handleNormalizeTargetName(args),
);

server.tool(
  "validate-gene-name",
  "Check a protein or gene name against a UniProt entry",
  validateGeneNameParams,
  async (args) => handleValidateGeneName(args, lookup),
);

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logEvent("info", "mcp.ready", { transport: "stdio" });
}

main().catch((error: unknown) => {
  logEvent("error", "mcp.fatal", { message: toErrorMessage(error) });
  process.exit(1);
});
