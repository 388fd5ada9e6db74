import assert from "node:assert/strict";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import test from "node:test";
import { withTempDir } from "@psistat/testkit";
import { createDebugLog, formatLogLine } from "../log.js";

const at = new Date(Date.UTC(2026, 9, 18, 12, 0, 0, 0));

test("formatLogLine prefixes an ISO timestamp and serializes the detail", () => {
  assert.equal(formatLogLine("tick", { sequence: 4 }, at), '2026-10-18T12:00:00.000Z tick {"sequence":4}\n');
  assert.equal(formatLogLine("boot", undefined, at), "2026-10-18T12:00:00.000Z boot\n");
  assert.equal(formatLogLine("note", "plain", at), "2026-10-18T12:00:00.000Z note plain\n");
});

test("formatLogLine keeps the name and message of errors", () => {
  const line = formatLogLine("fatal", new Error("read failed"), at);
  assert.equal(line.startsWith('2026-10-18T12:00:00.000Z fatal {"name":"Error","message":"read failed"'), true);
});

test("createDebugLog appends one line per call", async () => {
  await withTempDir((dir) => {
    const path = join(dir, "debug.log");
    const log = createDebugLog(path);
    log("first");
    log("second", { n: 2 });
    const lines = readFileSync(path, "utf8").trimEnd().split("\n");
    assert.equal(lines.length, 2);
    assert.equal(lines[0]?.endsWith(" first"), true);
    assert.equal(lines[1]?.endsWith(' second {"n":2}'), true);
  });
});

test("createDebugLog without a path does nothing and a bad path does not throw", () => {
  createDebugLog(undefined)("ignored");
  createDebugLog("/nonexistent-dir/psistat/debug.log")("ignored");
});
