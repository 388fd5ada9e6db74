/**
 * packages/core/src/types.ts: Shared data model for pressure sampling.
 *
 * Series keys, readings and events shared by the ring, the rate calculator,
 * the detector and the renderer.
 */

export type ResourceTag = "cpu" | "io" | "memory";
export type StallKind = "some" | "full";
export type SeriesKey = `${ResourceTag}.${StallKind}`;

export const RESOURCE_TAGS: readonly ResourceTag[] = Object.freeze(["cpu", "io", "memory"]);
export const STALL_KINDS: readonly StallKind[] = Object.freeze(["full", "some"]);

/** Every series, in display and detection order. */
export const SERIES_KEYS: readonly SeriesKey[] = Object.freeze(
  RESOURCE_TAGS.flatMap((tag) => STALL_KINDS.map((kind): SeriesKey => `${tag}.${kind}`)),
);

export function seriesKey(tag: ResourceTag, kind: StallKind): SeriesKey {
  return `${tag}.${kind}`;
}

/**
 * Kernel-computed running averages, displayed as given.
 * A field is undefined when the record line did not carry it.
 */
export type SeriesAverages = Readonly<{
  avg10?: number;
  avg60?: number;
  avg300?: number;
}>;

export type SeriesSample = Readonly<{
  totalMicros: number;
  averages: SeriesAverages;
}>;

export type ParseIssueCode =
  | "EMPTY_LINE"
  | "UNKNOWN_KIND"
  | "MALFORMED_FIELD"
  | "MISSING_TOTAL"
  | "INVALID_NUMBER";

export type ParseIssue = Readonly<{
  code: ParseIssueCode;
  detail: string;
}>;

export type SourceIssue = Readonly<{
  tag: ResourceTag;
  line: string;
  issue: ParseIssue;
}>;

/** One `CounterSource.sample()` result. Series whose line failed to parse are absent. */
export type CounterSnapshot = Readonly<{
  series: ReadonlyMap<SeriesKey, SeriesSample>;
  issues: readonly SourceIssue[];
}>;

/**
 * Reads the cumulative stall counters. Called exactly once per tick and must
 * not suspend; a thrown error is fatal for the tick loop.
 */
export interface CounterSource {
  sample(): CounterSnapshot;
}

export type Reading = Readonly<{
  tag: ResourceTag;
  kind: StallKind;
  totalMicros: number;
  averages: SeriesAverages;
  /** Sequence of the batch the value was actually read in (older when carried forward). */
  sequence: number;
}>;

export type SampleBatch = Readonly<{
  sequence: number;
  monoMs: number;
  wallMs: number;
  readings: ReadonlyMap<SeriesKey, Reading>;
}>;

/**
 * Window a series is judged over: a rate across `lag` sample steps, or one of
 * the kernel's own longer averages taken as given.
 */
export type EventWindow =
  | Readonly<{ kind: "lag"; lag: number }>
  | Readonly<{ kind: "average"; field: "avg60" | "avg300" }>;

export type StallEvent = Readonly<{
  monoMs: number;
  sequence: number;
  tag: ResourceTag;
  kind: StallKind;
  percent: number;
  threshold: number;
  window: EventWindow;
  wallMs: number;
}>;

export interface MonotonicClock {
  /** Monotonic milliseconds, sub-millisecond precision allowed. */
  nowMs(): number;
  /** Wall-clock epoch milliseconds. */
  wallMs(): number;
}

/**
 * Bounded keystroke wait. Resolves with a key name (see keybindings) or null
 * once `timeoutMs` elapses without input.
 */
export interface KeySource {
  nextKey(timeoutMs: number): Promise<string | null>;
}

/** Best-effort diagnostic sink; must never throw. */
export type DebugLog = (step: string, detail?: unknown) => void;
