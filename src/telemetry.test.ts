import { afterEach, beforeEach, describe, it, mock } from "node:test";
import assert from "node:assert";

import {
  endRunLog,
  errorRunLog,
  logEvent,
  setLogLevel,
  startRunLog,
  stepRunLog,
  toErrorMessage,
} from "./telemetry.js";

function linesOf(calls: ReadonlyArray<{ arguments: unknown[] }>) {
  return calls.map((call) => JSON.parse(String(call.arguments[0])));
}

describe("telemetry", () => {
  beforeEach(() => {
    setLogLevel("info");
  });

  afterEach(() => {
    mock.restoreAll();
    setLogLevel("info");
  });

  it("writes one JSON line per event with ts, level and fields", () => {
    const log = mock.method(console, "log", () => {});
    logEvent("info", "test.event", { rows: 3 });

    assert.strictEqual(log.mock.callCount(), 1);
    const [line] = linesOf(log.mock.calls);
    assert.strictEqual(line.level, "info");
    assert.strictEqual(line.event, "test.event");
    assert.strictEqual(line.rows, 3);
    assert.strictEqual(typeof line.ts, "string");
  });

  it("drops events below the active level", () => {
    const log = mock.method(console, "log", () => {});
    const warn = mock.method(console, "warn", () => {});
    setLogLevel("warn");

    logEvent("info", "quiet");
    logEvent("debug", "quieter");
    logEvent("warn", "loud");

    assert.strictEqual(log.mock.callCount(), 0);
    assert.strictEqual(warn.mock.callCount(), 1);
    assert.strictEqual(linesOf(warn.mock.calls)[0].event, "loud");
  });

  it("sends errors to console.error", () => {
    const error = mock.method(console, "error", () => {});
    const run = startRunLogQuietly();
    errorRunLog(run, "run.failed", new Error("disk   full"));

    const [line] = linesOf(error.mock.calls);
    assert.strictEqual(line.event, "run.failed");
    assert.strictEqual(line.message, "disk full");
    assert.strictEqual(line.runId, run.runId);
  });

  it("tags run lines with the run id and command", () => {
    const log = mock.method(console, "log", () => {});
    const run = startRunLog("normalize", { input: "in.csv" });
    stepRunLog(run, "csv.loaded", { rows: 2 });
    endRunLog(run);

    const lines = linesOf(log.mock.calls);
    assert.deepStrictEqual(
      lines.map((line) => line.event),
      ["run.start", "csv.loaded", "run.end"],
    );
    assert.strictEqual(run.runId.length, 8);
    assert.ok(lines.every((line) => line.runId === run.runId));
    assert.strictEqual(lines[0].input, "in.csv");
    assert.strictEqual(lines[1].command, "normalize");
    assert.strictEqual(typeof lines[2].elapsedMs, "number");
  });

  it("compacts unknown errors", () => {
    assert.strictEqual(toErrorMessage(new Error("a\n   b")), "a b");
    assert.strictEqual(toErrorMessage("plain"), "plain");
    assert.strictEqual(toErrorMessage(42), "unknown error");
    assert.strictEqual(toErrorMessage("x".repeat(300)).length, 240);
  });
});

function startRunLogQuietly() {
  setLogLevel("warn");
  const run = startRunLog("normalize");
  setLogLevel("info");
  return run;
}
