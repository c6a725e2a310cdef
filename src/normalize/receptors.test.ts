import { describe, it } from "node:test";
import assert from "node:assert";

import { applyReceptorRules } from "./receptors.js";

describe("applyReceptorRules", () => {
  it("rewrites a literal receptor phrase and records it", () => {
    assert.deepStrictEqual(applyReceptorRules("dopamine d2 receptor"), {
      text: "dopamine d2",
      candidates: ["drd2"],
      applied: ["dopamine\\s+d2\\s+receptor"],
    });
  });

  it("applies several rules in table order", () => {
    const outcome = applyReceptorRules("mu opioid receptor and histamine h3 receptor");
    assert.strictEqual(outcome.text, "mu opioid and histamine h3");
    assert.deepStrictEqual(outcome.candidates, ["hrh3", "oprm1"]);
  });

  it("gives the same answer on repeated calls", () => {
    const first = applyReceptorRules("cannabinoid cb1 receptor");
    const second = applyReceptorRules("cannabinoid cb1 receptor");
    assert.deepStrictEqual(first, second);
    assert.deepStrictEqual(first.candidates, ["cnr1"]);
  });

  it("leaves unrelated text untouched", () => {
    assert.deepStrictEqual(applyReceptorRules("tyrosine kinase"), {
      text: "tyrosine kinase",
      candidates: [],
      applied: [],
    });
  });
});
