import { describe, it } from "node:test";
import assert from "node:assert";

import { appConfig, parseBoolean, parseList, parseLogLevel, parseNumber } from "./config.js";

describe("config parsing", () => {
  it("falls back to the default for missing or malformed numbers", () => {
    assert.strictEqual(parseNumber(undefined, 5), 5);
    assert.strictEqual(parseNumber("", 5), 5);
    assert.strictEqual(parseNumber("abc", 5), 5);
    assert.strictEqual(parseNumber("12", 5), 12);
  });

  it("accepts the usual boolean spellings", () => {
    assert.strictEqual(parseBoolean("yes", false), true);
    assert.strictEqual(parseBoolean(" TRUE ", false), true);
    assert.strictEqual(parseBoolean("0", true), false);
    assert.strictEqual(parseBoolean("no", true), false);
    assert.strictEqual(parseBoolean("maybe", true), true);
    assert.strictEqual(parseBoolean(undefined, false), false);
  });

  it("splits comma lists and drops blanks", () => {
    assert.deepStrictEqual(parseList(" a, ,b "), ["a", "b"]);
    assert.deepStrictEqual(parseList(undefined), []);
  });

  it("maps log level names", () => {
    assert.strictEqual(parseLogLevel("WARNING"), "warn");
    assert.strictEqual(parseLogLevel("Debug"), "debug");
    assert.strictEqual(parseLogLevel("error"), "error");
    assert.strictEqual(parseLogLevel("loud"), "info");
    assert.strictEqual(parseLogLevel(undefined), "info");
  });

  it("exposes integer taxon and positive cache settings", () => {
    assert.ok(Number.isInteger(appConfig.normalizer.taxon));
    assert.ok(appConfig.cache.ttlMs > 0);
    assert.ok(appConfig.cache.maxEntries > 0);
    assert.ok(appConfig.uniprot.baseUrl.startsWith("http"));
  });
});
