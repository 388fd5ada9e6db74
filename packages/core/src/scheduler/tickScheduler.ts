/**
 * packages/core/src/scheduler/tickScheduler.ts: Sample, detect, render, wait.
 *
 * Why: One logical thread owns the ring, the history and the view. Sampling and
 * rendering run inline; the only suspension point is the bounded keystroke
 * wait, which doubles as the idle sleep until the next deadline.
 *
 * Phases per tick:
 *   sampling -> rendering -> awaiting-input -> (next tick | terminating)
 */

import type { MonitorConfig } from "../config.js";
import { detectEvents } from "../events/detector.js";
import type { ControlAction } from "../keybindings/controls.js";
import { resolveControlAction } from "../keybindings/controls.js";
import type { MonitorState, MonitorView } from "../model/state.js";
import { createMonitorState, reduceMonitorView } from "../model/state.js";
import { formatHistory } from "../render/frame.js";
import type { FrameTarget } from "../render/targets.js";
import type { CounterSource, DebugLog, KeySource, MonotonicClock, SampleBatch } from "../types.js";
import { advanceDeadline, remainingMs } from "./deadline.js";

export type SchedulerPhase = "idle" | "sampling" | "rendering" | "awaiting-input" | "terminating";

export type ExitReason =
  | Readonly<{ kind: "quit"; ticks: number }>
  | Readonly<{ kind: "tick-limit"; ticks: number }>;

export type TickSchedulerOptions = Readonly<{
  config: MonitorConfig;
  source: CounterSource;
  clock: MonotonicClock;
  keys: KeySource;
  target: FrameTarget;
  log?: DebugLog;
  /** Receives every formatted history row, newest first, on "dump-history". */
  onDumpHistory?: (lines: readonly string[]) => Promise<void> | void;
  /** Stop after this many ticks; unbounded when omitted. */
  maxTicks?: number;
}>;

const noopLog: DebugLog = () => {};

export class TickScheduler {
  private readonly state: MonitorState;
  private readonly log: DebugLog;
  private phaseValue: SchedulerPhase = "idle";
  private deadlineMs = 0;
  private tickCount = 0;
  private running = false;

  constructor(private readonly opts: TickSchedulerOptions) {
    this.state = createMonitorState(opts.config);
    this.log = opts.log ?? noopLog;
  }

  get phase(): SchedulerPhase {
    return this.phaseValue;
  }

  get ticks(): number {
    return this.tickCount;
  }

  get view(): MonitorView {
    return this.state.view;
  }

  get monitor(): Readonly<MonitorState> {
    return this.state;
  }

  async run(): Promise<ExitReason> {
    if (this.running) {
      throw new Error("TickScheduler.run() is already active");
    }
    this.running = true;
    this.deadlineMs = this.opts.clock.nowMs();
    this.log("scheduler.start", { periodMs: this.opts.config.periodMs });

    try {
      while (true) {
        this.tick();
        if (this.opts.maxTicks !== undefined && this.tickCount >= this.opts.maxTicks) {
          this.phaseValue = "terminating";
          return { kind: "tick-limit", ticks: this.tickCount };
        }
        const exit = await this.awaitInput();
        if (exit) return exit;
      }
    } catch (error) {
      this.phaseValue = "terminating";
      this.log("scheduler.fatal", error);
      throw error;
    } finally {
      this.running = false;
    }
  }

  /** One sampling + detection + render cycle. Synchronous by contract. */
  tick(): SampleBatch {
    const { clock, source } = this.opts;
    const { ring, history, view } = this.state;

    this.phaseValue = "sampling";
    const snapshot = source.sample();
    for (const skipped of snapshot.issues) {
      this.log("sample.skip-line", skipped);
    }
    const batch = ring.push(snapshot, clock.nowMs(), clock.wallMs());

    this.phaseValue = "rendering";
    const events = detectEvents(ring, {
      threshold: view.threshold,
      window: view.eventWindow,
      monoMs: batch.monoMs,
      wallMs: batch.wallMs,
    });
    history.insertBatch(events);
    if (events.length > 0) {
      this.log("events.detected", { sequence: batch.sequence, count: events.length });
    }
    this.render();

    this.tickCount++;
    return batch;
  }

  private render(): void {
    const { config, view, ring, history } = this.state;
    this.opts.target.render({ config, view, ring, history, nowMs: this.opts.clock.nowMs() });
  }

  private async awaitInput(): Promise<ExitReason | undefined> {
    const { clock, config, keys } = this.opts;
    const advanced = advanceDeadline(this.deadlineMs, config.periodMs, clock.nowMs());
    if (advanced.missedPeriods > 0) {
      this.log("tick.overrun", { missedPeriods: advanced.missedPeriods });
    }
    this.deadlineMs = advanced.deadlineMs;
    this.phaseValue = "awaiting-input";

    let remaining = remainingMs(this.deadlineMs, clock.nowMs());
    while (remaining > 0) {
      const key = await keys.nextKey(remaining);
      if (key !== null) {
        const action = resolveControlAction(key);
        if (action) {
          const exit = await this.dispatch(action);
          if (exit) return exit;
        }
      }
      remaining = remainingMs(this.deadlineMs, clock.nowMs());
    }
    return undefined;
  }

  /** Apply a control action; resolves with an exit reason for "quit". */
  async dispatch(action: ControlAction): Promise<ExitReason | undefined> {
    this.log("control.action", { action });

    if (action === "quit") {
      this.phaseValue = "terminating";
      return { kind: "quit", ticks: this.tickCount };
    }

    if (action === "dump-history") {
      const { history, config } = this.state;
      const lines = formatHistory(history, this.opts.clock.nowMs(), config.periodMs);
      await this.opts.onDumpHistory?.(lines);
    } else {
      this.state.view = reduceMonitorView(this.state.view, action, this.state.config.lags);
    }

    this.render();
    return undefined;
  }
}
