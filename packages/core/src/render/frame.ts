/**
 * packages/core/src/render/frame.ts: Compose and paint the dashboard.
 *
 * Row order is fixed: header, rate table (unless brief), then either the key
 * legend (help mode) or the event list, newest first, until the surface runs
 * out of rows.
 */

import type { MonitorConfig } from "../config.js";
import { windowLabel } from "../config.js";
import type { EventHistory } from "../events/history.js";
import { AVERAGE_LABELS, eventWindowLabel } from "../events/window.js";
import { formatCompactDuration, formatRateCell, formatWallClock } from "../format/formatters.js";
import { KEY_LEGEND } from "../keybindings/controls.js";
import type { MonitorView } from "../model/state.js";
import { computeRates } from "../sampling/rate.js";
import type { SampleRing } from "../sampling/ring.js";
import type { ResourceTag, SeriesKey, StallEvent, StallKind } from "../types.js";
import { RESOURCE_TAGS, STALL_KINDS, seriesKey } from "../types.js";
import type { SurfaceSize, TextSurface } from "./surface.js";

export type FrameLine = Readonly<{
  text: string;
  highlight?: boolean;
}>;

export type FrameInput = Readonly<{
  config: MonitorConfig;
  view: MonitorView;
  ring: SampleRing;
  history: EventHistory;
  /** Monotonic "now" used for event ages. */
  nowMs: number;
  /** Stop adding event rows once this many lines exist. */
  maxRows?: number;
}>;

const CELL_WIDTH = 5;
const SERIES_WIDTH = 11;
const HALF_SEPARATOR = "     ";
const KIND_TITLES: Readonly<Record<StallKind, string>> = Object.freeze({
  full: "Full.Stall%",
  some: "Some.Stall%",
});
const PASSTHROUGH_FIELDS = Object.freeze(["avg60", "avg300"] as const);

export function headerLine(config: MonitorConfig, view: MonitorView): string {
  const interval = eventWindowLabel(view.eventWindow, config.periodMs);
  return `PSISTAT | [tT]hresh=${String(view.threshold)}% [i]tvl=${interval} [b]rief [d]ump ?:help q:quit`;
}

function columnLabels(config: MonitorConfig): readonly string[] {
  return [
    ...config.lags.map((lag) => windowLabel(lag, config.periodMs)),
    ...PASSTHROUGH_FIELDS.map((field) => AVERAGE_LABELS[field]),
  ];
}

export function tableHeaderLine(config: MonitorConfig): string {
  const cells = columnLabels(config)
    .map((label) => ` ${label.padStart(CELL_WIDTH, "-")}`)
    .join("");
  return STALL_KINDS.map((kind) => `${cells}  ${KIND_TITLES[kind].padStart(SERIES_WIDTH)}`).join(
    HALF_SEPARATOR,
  );
}

function seriesCells(ring: SampleRing, config: MonitorConfig, key: SeriesKey): string {
  const rates = computeRates(ring, key, config.lags).values();
  const averages = ring.newest()?.readings.get(key)?.averages;
  const passthrough = PASSTHROUGH_FIELDS.map((field) => averages?.[field]);
  return [...rates, ...passthrough].map((value) => ` ${formatRateCell(value, CELL_WIDTH)}`).join("");
}

export function tableRow(ring: SampleRing, config: MonitorConfig, tag: ResourceTag): string {
  return STALL_KINDS.map((kind) => {
    const key = seriesKey(tag, kind);
    return `${seriesCells(ring, config, key)}  ${key.padEnd(SERIES_WIDTH)}`;
  }).join(HALF_SEPARATOR);
}

function eventChunk(event: StallEvent): string {
  const key = seriesKey(event.tag, event.kind);
  return ` ${key.padStart(SERIES_WIDTH)} ${event.percent.toFixed(3).padStart(7)}`;
}

const BLANK_CHUNK = " ".repeat(1 + SERIES_WIDTH + 1 + 7);

/**
 * Events of one tick and one resource share a row: full first, then some,
 * with the full column left blank when only some fired.
 */
export function groupEvents(events: Iterable<StallEvent>): readonly (readonly StallEvent[])[] {
  const groups: StallEvent[][] = [];
  let current: StallEvent[] | undefined;
  for (const event of events) {
    const head = current?.[0];
    if (current && head && head.sequence === event.sequence && head.tag === event.tag) {
      current.push(event);
      continue;
    }
    current = [event];
    groups.push(current);
  }
  return groups;
}

export function formatEventRow(
  group: readonly StallEvent[],
  nowMs: number,
  periodMs: number,
): string {
  const first = group[0];
  if (!first) return "";
  const ago = formatCompactDuration((nowMs - first.monoMs) / 1000).trim();
  let text = `${ago.padStart(6)}: ${formatWallClock(first.wallMs)}`;
  if (!group.some((event) => event.kind === "full")) text += BLANK_CHUNK;
  for (const kind of STALL_KINDS) {
    for (const event of group) {
      if (event.kind === kind) text += eventChunk(event);
    }
  }
  return `${text}   >=${String(first.threshold)} i=${eventWindowLabel(first.window, periodMs)}`;
}

/** Every history entry formatted, newest first; used by the full dump. */
export function formatHistory(history: EventHistory, nowMs: number, periodMs: number): string[] {
  return groupEvents(history).map((group) => formatEventRow(group, nowMs, periodMs));
}

export function composeFrame(input: FrameInput): FrameLine[] {
  const { config, view, ring, history, nowMs } = input;
  const maxRows = input.maxRows ?? Number.POSITIVE_INFINITY;
  const lines: FrameLine[] = [{ text: headerLine(config, view), highlight: true }];

  if (!view.brief) {
    lines.push({ text: tableHeaderLine(config) });
    for (const tag of RESOURCE_TAGS) {
      lines.push({ text: tableRow(ring, config, tag) });
    }
  }

  if (view.showHelp) {
    lines.push({ text: "Keys:" });
    for (const entry of KEY_LEGEND) {
      lines.push({ text: `  ${entry.keys.padEnd(14)} ${entry.description}` });
    }
    return lines;
  }

  for (const group of groupEvents(history)) {
    if (lines.length >= maxRows) break;
    lines.push({ text: formatEventRow(group, nowMs, config.periodMs) });
  }
  return lines;
}

function drawLines(surface: TextSurface, size: SurfaceSize, lines: readonly FrameLine[]): number {
  let drawn = 0;
  for (let row = 0; row < lines.length && row < size.rows; row++) {
    const line = lines[row];
    if (!line) break;
    const opts = { width: size.cols, highlight: line.highlight === true };
    if (surface.drawText(row, 0, line.text, opts)) drawn++;
  }
  surface.commit();
  return drawn;
}

/**
 * Draw lines top-down, each padded to the surface width. Rows past the bottom
 * are dropped; the surface size is re-queried for every frame.
 */
export function paintFrame(surface: TextSurface, lines: readonly FrameLine[]): number {
  return drawLines(surface, surface.begin(), lines);
}

/** Compose only as many rows as the surface currently shows, then paint them. */
export function renderDashboard(surface: TextSurface, input: FrameInput): number {
  const size = surface.begin();
  return drawLines(surface, size, composeFrame({ ...input, maxRows: size.rows }));
}
