/**
 * packages/core/src/pressure/parser.ts: Tokenize pressure-stall records.
 *
 * Record format (one line per stall kind):
 *   some avg10=0.00 avg60=0.12 avg300=0.05 total=123456
 *   full avg10=0.00 avg60=0.00 avg300=0.00 total=7890
 *
 * Every field is validated; a line that does not fit is reported as an issue
 * and skipped so the remaining lines still produce readings.
 */

import type {
  ParseIssue,
  ResourceTag,
  SeriesAverages,
  SeriesKey,
  SeriesSample,
  SourceIssue,
  StallKind,
} from "../types.js";
import { seriesKey } from "../types.js";

export type PressureLine = Readonly<{
  kind: StallKind;
  totalMicros: number;
  averages: SeriesAverages;
}>;

export type ParsePressureLineResult =
  | Readonly<{ ok: true; value: PressureLine }>
  | Readonly<{ ok: false; error: ParseIssue }>;

const INTEGER_RE = /^\d+$/;
const DECIMAL_RE = /^\d+(?:\.\d+)?$/;

function fail(code: ParseIssue["code"], detail: string): ParsePressureLineResult {
  return { ok: false, error: { code, detail } };
}

function isStallKind(value: string): value is StallKind {
  return value === "some" || value === "full";
}

export function parsePressureLine(line: string): ParsePressureLineResult {
  const tokens = line.trim().split(/\s+/);
  const head = tokens[0];
  if (head === undefined || head.length === 0) {
    return fail("EMPTY_LINE", "line has no tokens");
  }
  if (!isStallKind(head)) {
    return fail("UNKNOWN_KIND", `unknown stall kind "${head}"`);
  }

  const fields = new Map<string, string>();
  for (const token of tokens.slice(1)) {
    const eq = token.indexOf("=");
    if (eq <= 0 || eq === token.length - 1 || token.indexOf("=", eq + 1) !== -1) {
      return fail("MALFORMED_FIELD", `field "${token}" is not key=value`);
    }
    fields.set(token.slice(0, eq), token.slice(eq + 1));
  }

  const last = tokens[tokens.length - 1] ?? "";
  const total = fields.get("total");
  if (tokens.length < 2 || !last.startsWith("total=") || total === undefined) {
    return fail("MISSING_TOTAL", "last field must be total=<micros>");
  }
  if (!INTEGER_RE.test(total)) {
    return fail("INVALID_NUMBER", `total "${total}" is not an integer`);
  }

  const averages: { avg10?: number; avg60?: number; avg300?: number } = {};
  for (const name of ["avg10", "avg60", "avg300"] as const) {
    const raw = fields.get(name);
    if (raw === undefined) continue;
    if (!DECIMAL_RE.test(raw)) {
      return fail("INVALID_NUMBER", `${name} "${raw}" is not a decimal`);
    }
    averages[name] = Number.parseFloat(raw);
  }

  return {
    ok: true,
    value: { kind: head, totalMicros: Number.parseInt(total, 10), averages },
  };
}

export type PressureRecord = Readonly<{
  series: ReadonlyMap<SeriesKey, SeriesSample>;
  issues: readonly SourceIssue[];
}>;

/**
 * Parse a whole record for one resource. Blank lines are ignored; the first
 * valid line for each kind wins.
 */
export function parsePressureRecord(tag: ResourceTag, text: string): PressureRecord {
  const series = new Map<SeriesKey, SeriesSample>();
  const issues: SourceIssue[] = [];

  for (const line of text.split(/\r?\n/)) {
    if (line.trim().length === 0) continue;
    const parsed = parsePressureLine(line);
    if (!parsed.ok) {
      issues.push({ tag, line, issue: parsed.error });
      continue;
    }
    const key = seriesKey(tag, parsed.value.kind);
    if (series.has(key)) continue;
    series.set(key, { totalMicros: parsed.value.totalMicros, averages: parsed.value.averages });
  }

  return { series, issues };
}
