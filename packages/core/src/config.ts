import { PsiStatError } from "./errors.js";
import { normalizeThreshold } from "./threshold.js";

export const DEFAULT_PERIOD_MS = 1000;
export const DEFAULT_LAGS: readonly number[] = Object.freeze([1, 3, 10]);
export const DEFAULT_HISTORY_CAPACITY = 100;
export const DEFAULT_THRESHOLD = 20;

export type MonitorConfig = Readonly<{
  periodMs: number;
  /** Sample-step lags, ascending and unique. */
  lags: readonly number[];
  historyCapacity: number;
  /** Ring capacity: largest lag + 1. */
  ringCapacity: number;
  initialThreshold: number;
}>;

export type MonitorConfigInput = Readonly<{
  periodMs?: number;
  lags?: readonly number[];
  historyCapacity?: number;
  initialThreshold?: number;
}>;

function invalid(detail: string): PsiStatError {
  return new PsiStatError("PSI_INVALID_CONFIG", `Invalid monitor config: ${detail}`);
}

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw invalid(`${name} must be a positive integer (got ${String(value)})`);
  }
  return value;
}

function normalizeLags(lags: readonly number[]): readonly number[] {
  if (lags.length === 0) throw invalid("lags must not be empty");
  for (const lag of lags) requirePositiveInteger("lag", lag);
  const unique = [...new Set(lags)].sort((a, b) => a - b);
  return Object.freeze(unique);
}

export function normalizeMonitorConfig(input: MonitorConfigInput = {}): MonitorConfig {
  const periodMs = requirePositiveInteger("periodMs", input.periodMs ?? DEFAULT_PERIOD_MS);
  const lags = normalizeLags(input.lags ?? DEFAULT_LAGS);
  const historyCapacity = requirePositiveInteger(
    "historyCapacity",
    input.historyCapacity ?? DEFAULT_HISTORY_CAPACITY,
  );
  const rawThreshold = input.initialThreshold ?? DEFAULT_THRESHOLD;
  if (!Number.isFinite(rawThreshold)) {
    throw invalid(`initialThreshold must be a finite number (got ${String(rawThreshold)})`);
  }
  const largestLag = lags[lags.length - 1] ?? 1;

  return Object.freeze({
    periodMs,
    lags,
    historyCapacity,
    ringCapacity: largestLag + 1,
    initialThreshold: normalizeThreshold(rawThreshold),
  });
}

/** Approximate window covered by `lag` steps, e.g. "1s", "10s", "500ms". */
export function windowLabel(lag: number, periodMs: number): string {
  const totalMs = lag * periodMs;
  if (totalMs % 1000 === 0) return `${String(totalMs / 1000)}s`;
  if (totalMs < 1000) return `${String(totalMs)}ms`;
  return `${(totalMs / 1000).toFixed(1)}s`;
}
