import { after, afterEach, beforeEach, describe, it, mock } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { main, parseCliArgs, readWhitelistFile, runCli } from "./cli.js";
import { readCsv } from "./io/csv.js";
import type { GeneLookup } from "./types.js";

const workDir = fs.mkdtempSync(path.join(os.tmpdir(), "target-normalizer-cli-"));

after(() => {
  fs.rmSync(workDir, { recursive: true, force: true });
});

function writeFixture(name: string, contents: string): string {
  const file = path.join(workDir, name);
  fs.writeFileSync(file, contents);
  return file;
}

const fakeLookup: GeneLookup = {
  async lookupGene(id) {
    if (id === "P15056") {
      return { name: "Serine/threonine-protein kinase B-raf", synonyms: ["BRAF"] };
    }
    return null;
  },
};

describe("parseCliArgs", () => {
  it("applies defaults", () => {
    const args = parseCliArgs(["--input=in.csv", "--output=out.csv"]);
    assert.strictEqual(args.input, "in.csv");
    assert.strictEqual(args.output, "out.csv");
    assert.strictEqual(args.column, "target_name");
    assert.strictEqual(args.keepMutations, false);
    assert.strictEqual(args.noMutations, false);
    assert.strictEqual(args.delimiter, undefined);
    assert.strictEqual(args.idColumn, undefined);
  });

  it("reads every flag", () => {
    const args = parseCliArgs([
      "--input=in.csv",
      "--output=out.csv",
      "--column=name",
      "--id-column=uniprot_id",
      "--delimiter=\\t",
      "--encoding=latin1",
      "--keep-mutations",
      "--no-mutations",
      "--mutation-whitelist=keep.txt",
      "--taxon=10090",
      "--json-columns=hints, extra",
      "--log-level=warn",
    ]);
    assert.strictEqual(args.column, "name");
    assert.strictEqual(args.idColumn, "uniprot_id");
    assert.strictEqual(args.delimiter, "\t");
    assert.strictEqual(args.encoding, "latin1");
    assert.strictEqual(args.keepMutations, true);
    assert.strictEqual(args.noMutations, true);
    assert.strictEqual(args.mutationWhitelist, "keep.txt");
    assert.strictEqual(args.taxon, 10090);
    assert.deepStrictEqual(args.jsonColumns, ["hints", "extra"]);
    assert.strictEqual(args.logLevel, "warn");
  });

  it("rejects missing paths and long delimiters", () => {
    assert.throws(() => parseCliArgs(["--output=out.csv"]), /--input is required/);
    assert.throws(
      () => parseCliArgs(["--input=a", "--output=b", "--delimiter=;;"]),
      /delimiter must be a single character/,
    );
  });
});

describe("readWhitelistFile", () => {
  it("reads one token per line", () => {
    const file = writeFixture("whitelist.txt", "v600e\r\n\n  g12c \n");
    assert.deepStrictEqual(readWhitelistFile(file), ["v600e", "g12c"]);
  });
});

describe("runCli", () => {
  beforeEach(() => {
    mock.method(console, "log", () => {});
    mock.method(console, "warn", () => {});
    mock.method(console, "error", () => {});
  });

  afterEach(() => {
    mock.restoreAll();
  });

  it("normalizes, validates and writes the table", async () => {
    const input = writeFixture(
      "targets.csv",
      "target_name,uniprot_id\nBRAF,P15056\nhistamine receptor (h3),Q9Y5N1\n",
    );
    const output = path.join(workDir, "targets.out.csv");

    const code = await runCli(
      parseCliArgs([`--input=${input}`, `--output=${output}`, "--id-column=uniprot_id"]),
      { lookup: fakeLookup },
    );

    assert.strictEqual(code, 0);
    const rows = readCsv(output).rows;
    assert.strictEqual(rows.length, 2);
    assert.strictEqual(rows[0]?.clean_text, "braf");
    assert.strictEqual(rows[0]?.uniprot_match, "true");
    assert.strictEqual(rows[1]?.clean_text, "histamine h3|h3");
    assert.strictEqual(rows[1]?.gene_like_candidates, "hrh3 hrh1 hrh2 hrh4");
    assert.strictEqual(rows[1]?.uniprot_match, "false");
    const hints = JSON.parse(String(rows[1]?.hints));
    assert.deepStrictEqual(hints.parenthetical, ["h3"]);
  });

  it("keeps whitelisted mutation tokens", async () => {
    const input = writeFixture("mutants.csv", "target_name\nBRAF V600E\n");
    const whitelist = writeFixture("keep.txt", "v600e\n");
    const output = path.join(workDir, "mutants.out.csv");

    const code = await runCli(
      parseCliArgs([
        `--input=${input}`,
        `--output=${output}`,
        `--mutation-whitelist=${whitelist}`,
      ]),
    );

    assert.strictEqual(code, 0);
    const [row] = readCsv(output).rows;
    assert.strictEqual(row?.clean_text, "braf v600e");
    assert.strictEqual(row?.query_tokens, "braf|v600e");
  });

  it("returns 1 when the name column is missing", async () => {
    const input = writeFixture("wrong.csv", "name\nBRAF\n");
    const code = await runCli(
      parseCliArgs([`--input=${input}`, `--output=${path.join(workDir, "wrong.out.csv")}`]),
    );
    assert.strictEqual(code, 1);
    assert.ok(!fs.existsSync(path.join(workDir, "wrong.out.csv")));
  });
});

describe("main", () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it("returns 1 on invalid arguments", async () => {
    mock.method(console, "log", () => {});
    const error = mock.method(console, "error", () => {});
    assert.strictEqual(await main(["--output=x.csv"]), 1);
    assert.strictEqual(error.mock.callCount(), 1);
  });
});
