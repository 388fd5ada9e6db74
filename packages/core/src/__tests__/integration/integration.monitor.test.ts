import { assert, describe, test } from "@psistat/testkit";
import { normalizeMonitorConfig } from "../../config.js";
import { createSurfaceTarget } from "../../render/targets.js";
import { TickScheduler } from "../../scheduler/tickScheduler.js";
import {
  ManualClock,
  MemorySurface,
  ScriptedCounterSource,
  ScriptedKeySource,
  pressureRecord,
} from "../../testing/index.js";

type Half = readonly [cells: string, series: string];

/** Painted table row: both halves, series names padded, trailing blanks trimmed. */
function row(full: Half, some: Half): string {
  return `${full[0]}  ${full[1].padEnd(11)}     ${some[0]}  ${some[1]}`;
}

describe("integration - monitor on a text surface", () => {
  test("a cpu stall shows up in the table and as an event row", async () => {
    const clock = new ManualClock(0, new Date(2026, 9, 18, 9, 30, 0, 0).getTime());
    const surface = new MemorySurface({ cols: 120, rows: 10 });
    const scheduler = new TickScheduler({
      config: normalizeMonitorConfig(),
      source: new ScriptedCounterSource([
        { cpu: pressureRecord({ some: 0, full: 0 }), io: pressureRecord({ some: 0, full: 0 }) },
        {
          cpu: pressureRecord({ some: 450_000, full: 100_000 }),
          io: pressureRecord({ some: 0, full: 0 }),
        },
      ]),
      clock,
      keys: new ScriptedKeySource(clock),
      target: createSurfaceTarget(surface),
      maxTicks: 2,
    });

    await scheduler.run();
    const lines = surface.lines();

    assert.equal(lines[0], "PSISTAT | [tT]hresh=20% [i]tvl=1s [b]rief [d]ump ?:help q:quit");
    assert.equal(
      lines[2],
      row(["  10.0   n/a   n/a   0.0   0.0", "cpu.full"], ["  45.0   n/a   n/a   0.0   0.0", "cpu.some"]),
    );
    assert.equal(
      lines[3],
      row(["   0.0   n/a   n/a   0.0   0.0", "io.full"], ["   0.0   n/a   n/a   0.0   0.0", "io.some"]),
    );
    assert.equal(
      lines[4],
      row(
        ["   n/a   n/a   n/a   n/a   n/a", "memory.full"],
        ["   n/a   n/a   n/a   n/a   n/a", "memory.some"],
      ),
    );
    assert.equal(
      lines[5],
      `    0s: 10-18 09:30:01.000${" ".repeat(20)}    cpu.some  45.000   >=20 i=1s`,
    );
    assert.equal(lines.length, 10);
    assert.equal(lines[6], "");
  });

  test("brief and help toggles change the painted layout", async () => {
    const clock = new ManualClock();
    const surface = new MemorySurface({ cols: 80, rows: 12 });
    const scheduler = new TickScheduler({
      config: normalizeMonitorConfig(),
      source: new ScriptedCounterSource([{ memory: pressureRecord({ some: 0, full: 0 }) }]),
      clock,
      keys: new ScriptedKeySource(clock, [
        { atMs: 100, key: "b" },
        { atMs: 200, key: "?" },
      ]),
      target: createSurfaceTarget(surface),
      maxTicks: 2,
    });

    await scheduler.run();
    const lines = surface.lines();

    assert.equal(lines[1], "Keys:");
    assert.equal(lines[8], "  q / ctrl+c     quit");
    assert.equal(surface.commits, 4);
  });
});
