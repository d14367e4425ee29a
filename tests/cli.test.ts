import { test } from "node:test";
import assert from "node:assert/strict";
import { DEMO_NAMES, parseCliArgs, runDemo } from "../src/cli/run.js";

test("no command or a help flag shows help", () => {
  assert.deepEqual(parseCliArgs([]), { kind: "help" });
  assert.deepEqual(parseCliArgs(["help"]), { kind: "help" });
  assert.deepEqual(parseCliArgs(["demo", "timeout", "--help"]), { kind: "help" });
  assert.deepEqual(parseCliArgs(["-h"]), { kind: "help" });
});

test("unknown commands and demos are reported", () => {
  assert.deepEqual(parseCliArgs(["run"]), { kind: "error", message: "Unknown command: run" });
  assert.deepEqual(parseCliArgs(["demo", "nope"]), { kind: "error", message: "Unknown demo: nope" });
  assert.deepEqual(parseCliArgs(["demo"]), {
    kind: "error",
    message: "Missing demo name (one of: timeout, cancel, deadline, value, all)",
  });
});

test("demo names, all, unit and quiet are parsed", () => {
  assert.deepEqual(parseCliArgs(["demo", "cancel", "--unit", "100", "--quiet"]), {
    kind: "demo",
    demos: ["cancel"],
    unitMs: 100,
    quiet: true,
  });
  assert.deepEqual(parseCliArgs(["demo", "value", "all"]), {
    kind: "demo",
    demos: ["value", "timeout", "cancel", "deadline"],
    unitMs: 1000,
    quiet: false,
  });
  assert.deepEqual(DEMO_NAMES, ["timeout", "cancel", "deadline", "value"]);
});

test("--unit needs a positive number", () => {
  const expected = { kind: "error", message: "--unit requires a positive number of milliseconds" };
  assert.deepEqual(parseCliArgs(["demo", "value", "--unit"]), expected);
  assert.deepEqual(parseCliArgs(["demo", "value", "--unit", "0"]), expected);
  assert.deepEqual(parseCliArgs(["demo", "value", "--unit", "fast"]), expected);
});

test("the value demo prints masked credentials", async () => {
  const lines: string[] = [];
  await runDemo("value", { log: (line) => lines.push(line) });

  assert.equal(lines.length, 8);
  assert.equal(lines[0], "[Without scope] Start processing");
  assert.equal(lines[1], "[Without scope] Username: demo-user, password: *********** is valid");
  assert.equal(lines[6], "[With scope] Username: demo-user, password: *********** is saved");
  assert.equal(lines[7], "[With scope] Finish");
});
