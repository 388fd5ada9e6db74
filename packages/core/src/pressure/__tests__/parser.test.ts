import { assert, describe, readFixture, test } from "@psistat/testkit";
import { parsePressureLine, parsePressureRecord } from "../parser.js";

describe("parsePressureLine", () => {
  test("reads kind, total and the kernel averages", () => {
    const parsed = parsePressureLine("some avg10=1.25 avg60=0.80 avg300=0.42 total=1500000");
    assert.deepEqual(parsed, {
      ok: true,
      value: {
        kind: "some",
        totalMicros: 1500000,
        averages: { avg10: 1.25, avg60: 0.8, avg300: 0.42 },
      },
    });
  });

  test("accepts a line carrying only the total", () => {
    const parsed = parsePressureLine("full total=0");
    assert.deepEqual(parsed, { ok: true, value: { kind: "full", totalMicros: 0, averages: {} } });
  });

  test("reports each malformed shape with its own code", () => {
    const cases: readonly (readonly [string, string])[] = [
      ["", "EMPTY_LINE"],
      ["partial avg10=0.00 total=1", "UNKNOWN_KIND"],
      ["some avg10=1.25 total", "MALFORMED_FIELD"],
      ["some avg10==1 total=3", "MALFORMED_FIELD"],
      ["some =1 total=3", "MALFORMED_FIELD"],
      ["some avg10=1.25 avg60=0.80", "MISSING_TOTAL"],
      ["some total=5 avg10=1.00", "MISSING_TOTAL"],
      ["some", "MISSING_TOTAL"],
      ["some total=12x", "INVALID_NUMBER"],
      ["some avg10=abc total=5", "INVALID_NUMBER"],
    ];
    for (const [line, code] of cases) {
      const parsed = parsePressureLine(line);
      assert.equal(parsed.ok, false, line);
      if (!parsed.ok) assert.equal(parsed.error.code, code, line);
    }
  });
});

describe("parsePressureRecord", () => {
  test("maps both kinds of a record to series keys", () => {
    const record = parsePressureRecord("io", readFixture("pressure/healthy/io"));
    assert.equal(record.issues.length, 0);
    assert.equal(record.series.get("io.some")?.totalMicros, 250000);
    assert.equal(record.series.get("io.full")?.totalMicros, 120000);
    assert.equal(record.series.get("io.full")?.averages.avg60, 0.02);
  });

  test("skips a malformed line and keeps the valid one", () => {
    const record = parsePressureRecord("cpu", readFixture("pressure/malformed/cpu"));
    assert.equal(record.series.has("cpu.some"), false);
    assert.equal(record.series.get("cpu.full")?.totalMicros, 0);
    assert.equal(record.issues.length, 1);
    assert.equal(record.issues[0]?.tag, "cpu");
    assert.equal(record.issues[0]?.issue.code, "MALFORMED_FIELD");
  });

  test("first valid line per kind wins and blank lines are ignored", () => {
    const record = parsePressureRecord("memory", "\nsome total=10\nsome total=99\n\n");
    assert.equal(record.series.get("memory.some")?.totalMicros, 10);
    assert.equal(record.series.size, 1);
    assert.equal(record.issues.length, 0);
  });
});
