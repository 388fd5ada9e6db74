import { windowLabel } from "../config.js";
import type { EventWindow } from "../types.js";

export const AVERAGE_LABELS: Readonly<Record<"avg60" | "avg300", string>> = Object.freeze({
  avg60: "60s",
  avg300: "300s",
});

const AVERAGE_WINDOWS: readonly EventWindow[] = Object.freeze([
  Object.freeze({ kind: "average", field: "avg60" } as const),
  Object.freeze({ kind: "average", field: "avg300" } as const),
]);

export function lagWindow(lag: number): EventWindow {
  return Object.freeze({ kind: "lag", lag });
}

/** Every selectable event window: the configured lags, then the kernel averages. */
export function eventWindows(lags: readonly number[]): readonly EventWindow[] {
  return [...lags.map(lagWindow), ...AVERAGE_WINDOWS];
}

export function sameWindow(a: EventWindow, b: EventWindow): boolean {
  if (a.kind === "lag") return b.kind === "lag" && a.lag === b.lag;
  return b.kind === "average" && a.field === b.field;
}

/** Window after `current` in selection order, wrapping to the first. */
export function nextEventWindow(lags: readonly number[], current: EventWindow): EventWindow {
  const windows = eventWindows(lags);
  const index = windows.findIndex((window) => sameWindow(window, current));
  return windows[(index + 1) % windows.length] ?? current;
}

export function eventWindowLabel(window: EventWindow, periodMs: number): string {
  if (window.kind === "lag") return windowLabel(window.lag, periodMs);
  return AVERAGE_LABELS[window.field];
}
