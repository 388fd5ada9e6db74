export type DeadlineAdvance = Readonly<{
  deadlineMs: number;
  /** Whole periods skipped because the previous cycle overran. */
  missedPeriods: number;
}>;

function sanitizePeriodMs(periodMs: number): number {
  if (!Number.isFinite(periodMs) || periodMs <= 0) return 1000;
  return periodMs;
}

/**
 * Step the deadline forward by whole periods until it lies strictly after
 * `nowMs`. The deadline accumulates from its previous value rather than being
 * reset to `now + period`, so the long-run tick rate stays at one per period.
 */
export function advanceDeadline(deadlineMs: number, periodMs: number, nowMs: number): DeadlineAdvance {
  const period = sanitizePeriodMs(periodMs);
  let next = deadlineMs;
  let steps = 0;
  while (next <= nowMs) {
    next += period;
    steps++;
  }
  return Object.freeze({ deadlineMs: next, missedPeriods: Math.max(0, steps - 1) });
}

export function remainingMs(deadlineMs: number, nowMs: number): number {
  return deadlineMs - nowMs;
}
