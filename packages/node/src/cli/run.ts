import {
  type DebugLog,
  type KeySource,
  type MonitorConfig,
  type MonotonicClock,
  TickScheduler,
  createPrintTarget,
  createSurfaceTarget,
  describeError,
  isPsiStatError,
  normalizeMonitorConfig,
} from "@psistat/core";
import { createNodeClock } from "../clock.js";
import { ProcPressureSource } from "../counters/procPressure.js";
import { createDebugLog } from "../log.js";
import { AnsiSurface, type TerminalOutput } from "../terminal/ansiSurface.js";
import { StreamKeySource, createPauseKeySource } from "../terminal/keys.js";
import {
  type SessionProcess,
  type TerminalInput,
  type TerminalSession,
  withTerminalSession,
} from "../terminal/session.js";
import type { CliOptions } from "./args.js";

export type PsistatIo = Readonly<{
  stdin: TerminalInput;
  stdout: TerminalOutput;
  stderr: Readonly<{ write(chunk: string): boolean }>;
  process: SessionProcess;
  clock?: MonotonicClock;
}>;

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

const DUMP_FOOTER = "-- end of event history; press any key to return --";

async function dumpHistory(
  session: TerminalSession,
  keys: KeySource,
  io: PsistatIo,
  lines: readonly string[],
): Promise<void> {
  session.suspend();
  try {
    io.stdout.write("\n");
    for (const line of lines.length > 0 ? lines : ["(no events recorded)"]) {
      io.stdout.write(`${line}\n`);
    }
    io.stdout.write(`${DUMP_FOOTER}\n`);
    await keys.nextKey(Number.POSITIVE_INFINITY);
  } finally {
    session.resume();
  }
}

async function runDebug(
  config: MonitorConfig,
  source: ProcPressureSource,
  io: PsistatIo,
  log: DebugLog,
  ticks: number | undefined,
): Promise<void> {
  const scheduler = new TickScheduler({
    config,
    source,
    clock: io.clock ?? createNodeClock(),
    keys: createPauseKeySource(),
    target: createPrintTarget((line) => io.stdout.write(`${line}\n`)),
    log,
    ...(ticks !== undefined ? { maxTicks: ticks } : {}),
  });
  const exit = await scheduler.run();
  log("scheduler.exit", exit);
}

async function runInteractive(
  config: MonitorConfig,
  source: ProcPressureSource,
  io: PsistatIo,
  log: DebugLog,
  ticks: number | undefined,
): Promise<void> {
  await withTerminalSession(
    {
      stdin: io.stdin,
      stdout: io.stdout,
      process: io.process,
      reportFault: (kind, error) => {
        log(kind, error);
        io.stderr.write(`psistat: ${kind}: ${describeError(error)}\n`);
      },
    },
    async (session) => {
      const keys = new StreamKeySource(io.stdin);
      keys.attach();
      try {
        const scheduler = new TickScheduler({
          config,
          source,
          clock: io.clock ?? createNodeClock(),
          keys,
          target: createSurfaceTarget(new AnsiSurface(io.stdout)),
          log,
          onDumpHistory: (lines) => dumpHistory(session, keys, io, lines),
          ...(ticks !== undefined ? { maxTicks: ticks } : {}),
        });
        const exit = await scheduler.run();
        log("scheduler.exit", exit);
      } finally {
        keys.detach();
      }
    },
  );
}

/**
 * Open the counter source, then run the dashboard (or the plain-text debug
 * loop) until quit. Resolves with the process exit code; a source that cannot
 * be opened is reported once, before any terminal mode changes.
 */
export async function runPsistat(options: CliOptions, io: PsistatIo): Promise<number> {
  const log = createDebugLog(options.logPath);
  log("boot", { options });

  let source: ProcPressureSource;
  try {
    source = ProcPressureSource.open(options.pressureDir);
  } catch (error) {
    if (!isPsiStatError(error, "PSI_SOURCE_UNAVAILABLE")) throw error;
    log("source.unavailable", error);
    io.stderr.write(`psistat: ${error.message}\n`);
    return EXIT_FATAL;
  }

  try {
    const config = normalizeMonitorConfig({ initialThreshold: options.threshold });
    if (options.debug) {
      await runDebug(config, source, io, log, options.ticks);
    } else {
      await runInteractive(config, source, io, log, options.ticks);
    }
    return EXIT_OK;
  } catch (error) {
    if (!isPsiStatError(error, "PSI_SOURCE_READ_FAILED")) throw error;
    log("source.read-failed", error);
    io.stderr.write(`psistat: ${error.message}\n`);
    return EXIT_FATAL;
  } finally {
    source.close();
  }
}
