const DURATION_DIVISORS: readonly number[] = Object.freeze([60, 60, 24, 7, 52, 9_999_999]);
const DURATION_UNITS: readonly string[] = Object.freeze(["s", "m", "h", "d", "w", "y"]);

/**
 * Two-unit cascading elapsed time: the coarsest unit pair whose higher part
 * still fits its divisor. 65 -> "1m5s", 5025 -> "1h23m". When the higher part
 * is zero it is replaced by four blanks, 8 -> "    8s"; callers trim.
 * Negative input is treated as its magnitude.
 */
export function formatCompactDuration(seconds: number): string {
  const total = Number.isFinite(seconds) ? Math.max(0, Math.round(Math.abs(seconds))) : 0;
  let low = total % 60;
  let high = Math.floor(total / 60);
  let unit = 1;

  for (const divisor of DURATION_DIVISORS.slice(1)) {
    if (high < divisor) break;
    low = high % divisor;
    high = Math.floor(high / divisor);
    unit++;
  }

  const lowPart = `${String(low)}${DURATION_UNITS[unit - 1] ?? ""}`;
  if (high === 0) return `    ${lowPart}`;
  return `${String(high)}${DURATION_UNITS[unit] ?? ""}${lowPart}`;
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local wall-clock time as `MM-DD HH:MM:SS.mmm`. */
export function formatWallClock(epochMs: number): string {
  const d = new Date(epochMs);
  const date = `${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
  const time = `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
  return `${date} ${time}.${String(d.getMilliseconds()).padStart(3, "0")}`;
}

/** Fixed one-decimal rate cell, `n/a` when undefined. */
export function formatRateCell(value: number | undefined, width = 5): string {
  if (value === undefined || !Number.isFinite(value)) return "n/a".padStart(width);
  return value.toFixed(1).padStart(width);
}
