import { describe, it } from "node:test";
import assert from "node:assert";

import { extractParenthetical, glueHyphens } from "./structure.js";

describe("extractParenthetical", () => {
  it("records the segment and keeps a short receptor index", () => {
    const result = extractParenthetical("histamine receptor (h3)");
    assert.strictEqual(result.text.trim(), "histamine receptor");
    assert.deepStrictEqual(result.hints, ["h3"]);
    assert.deepStrictEqual(result.keepTokens, ["h3"]);
  });

  it("handles square and curly brackets", () => {
    const result = extractParenthetical("protein [long description here] {x}");
    assert.deepStrictEqual(result.hints, ["long description here", "x"]);
    assert.deepStrictEqual(result.keepTokens, ["x"]);
    assert.strictEqual(result.text.trim(), "protein");
  });

  it("keeps serotonin and P2X style indices as written", () => {
    assert.deepStrictEqual(extractParenthetical("receptor (5-HT1A)").keepTokens, ["5-HT1A"]);
    assert.deepStrictEqual(extractParenthetical("receptor (p2x7)").keepTokens, ["p2x7"]);
  });

  it("does not keep descriptive phrases or blank segments", () => {
    const described = extractParenthetical("kinase (membrane bound)");
    assert.deepStrictEqual(described.hints, ["membrane bound"]);
    assert.deepStrictEqual(described.keepTokens, []);

    const blank = extractParenthetical("a ( ) b");
    assert.deepStrictEqual(blank.hints, []);
    assert.strictEqual(blank.text, "a   b");
  });
});

describe("glueHyphens", () => {
  it("removes spaces around hyphens", () => {
    assert.strictEqual(glueHyphens("beta2 - adrenergic"), "beta2-adrenergic");
    assert.strictEqual(glueHyphens("gaba -a"), "gaba-a");
  });
});
