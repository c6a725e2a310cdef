import { afterEach, describe, it, mock } from "node:test";
import assert from "node:assert";

import type { GeneLookup } from "../types.js";
import { validateGeneName, validateRows } from "./validate.js";

const fakeLookup: GeneLookup = {
  async lookupGene(id) {
    if (id === "P68871") {
      return { name: "Hemoglobin subunit beta", synonyms: ["HBB"] };
    }
    if (id === "FAIL") throw new Error("network down");
    return null;
  },
};

describe("validateGeneName", () => {
  it("matches the protein name or a gene name, ignoring case", async () => {
    assert.strictEqual(await validateGeneName("P68871", "hbb", fakeLookup), true);
    assert.strictEqual(
      await validateGeneName("P68871", "HEMOGLOBIN SUBUNIT BETA", fakeLookup),
      true,
    );
    assert.strictEqual(await validateGeneName("P68871", "HBA1", fakeLookup), false);
  });

  it("never matches an unknown accession", async () => {
    assert.strictEqual(await validateGeneName("P69905", "HBA1", fakeLookup), false);
  });
});

describe("validateRows", () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it("adds uniprot_match and records failed lookups as false", async () => {
    const warn = mock.method(console, "warn", () => {});
    const rows = await validateRows(
      [
        { uniprot_id: "P68871", protein_name: "Hemoglobin subunit beta" },
        { uniprot_id: "P69905", protein_name: "Hemoglobin subunit alpha" },
        { uniprot_id: "FAIL", protein_name: "anything" },
      ],
      "uniprot_id",
      "protein_name",
      fakeLookup,
    );

    assert.deepStrictEqual(
      rows.map((row) => row.uniprot_match),
      [true, false, false],
    );
    assert.strictEqual(warn.mock.callCount(), 1);
    const line = JSON.parse(String(warn.mock.calls[0]?.arguments[0]));
    assert.strictEqual(line.event, "validate.lookup_failed");
    assert.strictEqual(line.id, "FAIL");
    assert.strictEqual(line.message, "network down");
  });

  it("rejects missing columns", async () => {
    await assert.rejects(
      validateRows([{ uniprot_id: "P68871" }], "uniprot_id", "protein_name", fakeLookup),
      /Column 'protein_name' is required/,
    );
  });
});
