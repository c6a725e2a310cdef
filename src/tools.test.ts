import { afterEach, describe, it, mock } from "node:test";
import assert from "node:assert";

import {
  createErrorResponse,
  handleNormalizeTargetName,
  handleValidateGeneName,
} from "./tools.js";
import type { GeneLookup } from "./types.js";

const fakeLookup: GeneLookup = {
  async lookupGene(id) {
    if (id === "P68871") return { name: "Hemoglobin subunit beta", synonyms: ["HBB"] };
    if (id === "FAIL") throw new Error("network down");
    return null;
  },
};

function payloadOf(response: { content: { text: string }[] }): unknown {
  return JSON.parse(response.content[0]?.text ?? "null");
}

describe("handleNormalizeTargetName", () => {
  it("returns the serialized result", () => {
    const payload = payloadOf(handleNormalizeTargetName({ name: "BRAF V600E" }));
    assert.ok(payload && typeof payload === "object");
    assert.deepStrictEqual(
      {
        clean_text: Reflect.get(payload, "clean_text"),
        gene_like_candidates: Reflect.get(payload, "gene_like_candidates"),
        mutations: Reflect.get(Reflect.get(payload, "hints"), "mutations"),
      },
      { clean_text: "braf", gene_like_candidates: [], mutations: ["V600E"] },
    );
  });

  it("keeps mutations on request", () => {
    const payload = payloadOf(
      handleNormalizeTargetName({ name: "BRAF V600E", keepMutations: true }),
    );
    assert.ok(payload && typeof payload === "object");
    assert.strictEqual(Reflect.get(payload, "clean_text"), "braf v600e");
  });
});

describe("handleValidateGeneName", () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it("reports a match", async () => {
    const response = await handleValidateGeneName(
      { uniprotId: "P68871", name: "HBB" },
      fakeLookup,
    );
    assert.deepStrictEqual(payloadOf(response), {
      uniprot_id: "P68871",
      name: "HBB",
      match: true,
    });
  });

  it("turns lookup failures into an error message", async () => {
    mock.method(console, "warn", () => {});
    const response = await handleValidateGeneName(
      { uniprotId: "FAIL", name: "HBB" },
      fakeLookup,
    );
    assert.strictEqual(response.content[0]?.text, "Error validating gene name: network down");
  });
});

describe("createErrorResponse", () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it("prefixes the operation", () => {
    mock.method(console, "warn", () => {});
    assert.deepStrictEqual(createErrorResponse("x", "boom"), {
      content: [{ type: "text", text: "Error x: boom" }],
    });
  });
});
