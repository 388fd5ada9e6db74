import assert from "node:assert/strict";
import { EventEmitter } from "node:events";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { PassThrough } from "node:stream";
import test from "node:test";
import { ManualClock } from "@psistat/core/testing";
import { fixturePath, withTempDir } from "@psistat/testkit";
import type { CliOptions } from "../cli/args.js";
import { EXIT_FATAL, EXIT_OK, runPsistat } from "../cli/run.js";

function sink(extra: { columns?: number; rows?: number } = {}) {
  const chunks: string[] = [];
  return {
    ...extra,
    chunks,
    write(chunk: string): boolean {
      chunks.push(chunk);
      return true;
    },
  };
}

function fakeIo(stdoutSize?: { columns: number; rows: number }) {
  const emitter = new EventEmitter();
  const stdout = sink(stdoutSize);
  const stderr = sink();
  return {
    emitter,
    stdout,
    stderr,
    io: {
      stdin: new PassThrough(),
      stdout,
      stderr,
      process: {
        on: (event: string, listener: (...args: unknown[]) => void) => emitter.on(event, listener),
        off: (event: string, listener: (...args: unknown[]) => void) => emitter.off(event, listener),
        exit: () => {},
      },
      clock: new ManualClock(),
    },
  };
}

function options(overrides: Partial<CliOptions>): CliOptions {
  return {
    threshold: 20,
    debug: false,
    pressureDir: fixturePath("pressure/healthy"),
    help: false,
    ...overrides,
  };
}

test("runPsistat exits 1 without touching stdout when the records are missing", async () => {
  await withTempDir(async (dir) => {
    const fake = fakeIo();
    const code = await runPsistat(options({ pressureDir: dir }), fake.io);

    assert.equal(code, EXIT_FATAL);
    assert.deepEqual(fake.stdout.chunks, []);
    assert.deepEqual(fake.stderr.chunks, [
      `psistat: cannot open ${join(dir, "cpu")} (ENOENT); pressure stall information needs Linux 4.20+ with CONFIG_PSI\n`,
    ]);
  });
});

test("debug mode prints each frame as plain text", async () => {
  const fake = fakeIo();
  const code = await runPsistat(options({ debug: true, ticks: 1, threshold: 10 }), fake.io);

  assert.equal(code, EXIT_OK);
  assert.deepEqual(fake.stdout.chunks.slice(0, 1), [
    "PSISTAT | [tT]hresh=10% [i]tvl=1s [b]rief [d]ump ?:help q:quit\n",
  ]);
  assert.equal(
    fake.stdout.chunks[2],
    "   n/a   n/a   n/a   0.0   0.0  cpu.full        " + "   n/a   n/a   n/a   0.8   0.4  cpu.some   \n",
  );
  assert.equal(fake.stdout.chunks.length, 6);
  assert.equal(fake.stdout.chunks[5], "\n");
});

test("interactive mode paints inside the alternate screen and restores it", async () => {
  const fake = fakeIo({ columns: 80, rows: 8 });
  const code = await runPsistat(options({ ticks: 1 }), fake.io);

  assert.equal(code, EXIT_OK);
  assert.equal(fake.stdout.chunks.length, 3);
  assert.equal(fake.stdout.chunks[0], "\x1b[?1049h\x1b[?25l");
  assert.equal(
    fake.stdout.chunks[1]?.startsWith("\x1b[H\x1b[1;1H\x1b[7mPSISTAT | [tT]hresh=20%"),
    true,
  );
  assert.equal(fake.stdout.chunks[2], "\x1b[?25h\x1b[?1049l");
  assert.equal(fake.emitter.listenerCount("SIGTERM"), 0);
});

test("the bin entry runs from its TypeScript source under tsx", () => {
  const source = readFileSync(new URL("../cli/main.ts", import.meta.url), "utf8");
  assert.equal(source.split("\n")[0], "#!/usr/bin/env tsx");
});
