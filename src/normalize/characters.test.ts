import { describe, it } from "node:test";
import assert from "node:assert";

import {
  foldRomanNumerals,
  foldUnicode,
  sanitize,
  translateSpecials,
  translateSpecialsWithSpans,
} from "./characters.js";

describe("sanitize", () => {
  it("strips control characters before translation", () => {
    assert.strictEqual(translateSpecials(sanitize("\u0000β receptor")), "beta receptor");
  });

  it("drops BOM, turns NBSP into a space and collapses whitespace", () => {
    assert.strictEqual(sanitize("\uFEFFa\u00A0 b\t\tc "), "a b c");
  });
});

describe("foldUnicode", () => {
  it("lowercases and maps quotes and long dashes", () => {
    assert.strictEqual(foldUnicode("“Héllo” – TEST ’x’"), "'héllo' - test 'x'");
  });

  it("applies NFKC compatibility mappings", () => {
    assert.strictEqual(foldUnicode("ﬁbronectin"), "fibronectin");
  });

  it("is idempotent", () => {
    for (const sample of ["“Héllo” – TEST", "Na⁺/K⁺-ATPase", "«GABA» — A"]) {
      const once = foldUnicode(sample);
      assert.strictEqual(foldUnicode(once), once);
    }
  });
});

describe("translateSpecials", () => {
  it("spells out Greek letters and flattens super/subscript digits", () => {
    assert.strictEqual(translateSpecials("α1 and ω"), "alpha1 and omega");
    assert.strictEqual(translateSpecials("x² h₃"), "x2 h3");
  });

  it("uses an overriding map in place of the built-in Greek table", () => {
    assert.strictEqual(translateSpecials("α1 and ω²", { α: "a" }), "a1 and ω2");
  });
});

describe("translateSpecialsWithSpans", () => {
  it("reports where each spelled-out character landed", () => {
    assert.deepStrictEqual(translateSpecialsWithSpans("ξ and β2"), {
      text: "xi and beta2",
      spans: [
        { start: 0, end: 2 },
        { start: 7, end: 11 },
      ],
    });
  });
});

describe("foldRomanNumerals", () => {
  it("rewrites whole-word numerals", () => {
    assert.strictEqual(foldRomanNumerals("urotensin ii receptor"), "urotensin 2 receptor");
    assert.strictEqual(foldRomanNumerals("type viii and xiv"), "type 8 and 14");
  });

  it("leaves single letters and embedded letters alone", () => {
    assert.strictEqual(foldRomanNumerals("complex i v x"), "complex i v x");
    assert.strictEqual(foldRomanNumerals("civil ivory"), "civil ivory");
  });

  it("leaves numerals spelled out from Greek letters alone", () => {
    assert.strictEqual(foldRomanNumerals("xi and xi", [{ start: 0, end: 2 }]), "xi and 11");

    const translated = translateSpecialsWithSpans("factor xi ξ");
    assert.strictEqual(
      foldRomanNumerals(translated.text, translated.spans),
      "factor 11 xi",
    );
  });
});
