import { LineBufferSurface, type SurfaceRow, type SurfaceSize } from "@psistat/core";
import terminalSize from "terminal-size";

const CSI = "\x1b[";
const REVERSE_ON = `${CSI}7m`;
const REVERSE_OFF = `${CSI}27m`;

export type TerminalOutput = {
  write(chunk: string): boolean;
  columns?: number;
  rows?: number;
};

function toPositiveIntOr(v: unknown, fallback: number): number {
  if (typeof v !== "number" || !Number.isInteger(v) || v <= 0) return fallback;
  return v;
}

/** Size from the stream when it knows it, else from the controlling terminal. */
export function queryTerminalSize(output: TerminalOutput): SurfaceSize {
  const cols = toPositiveIntOr(output.columns, 0);
  const rows = toPositiveIntOr(output.rows, 0);
  if (cols > 0 && rows > 0) return { cols, rows };
  try {
    const size = terminalSize();
    return { cols: toPositiveIntOr(size.columns, 80), rows: toPositiveIntOr(size.rows, 24) };
  } catch {
    return { cols: 80, rows: 24 };
  }
}

function encodeRow(row: SurfaceRow): string {
  if (row.highlights.length === 0) return row.text;
  let out = "";
  let cursor = 0;
  for (const [start, end] of row.highlights) {
    if (start < cursor) continue;
    out += row.text.slice(cursor, start);
    out += `${REVERSE_ON}${row.text.slice(start, end)}${REVERSE_OFF}`;
    cursor = end;
  }
  return out + row.text.slice(cursor);
}

/**
 * Full-frame ANSI painter. A committed frame always spans every terminal row;
 * each row is repositioned and its tail cleared, with no erase below.
 */
export class AnsiSurface extends LineBufferSurface {
  constructor(private readonly output: TerminalOutput) {
    super(() => queryTerminalSize(output));
  }

  protected override present(rows: readonly SurfaceRow[]): void {
    let frame = `${CSI}H`;
    rows.forEach((row, index) => {
      frame += `${CSI}${String(index + 1)};1H${encodeRow(row)}${CSI}K`;
    });
    this.output.write(frame);
  }
}
