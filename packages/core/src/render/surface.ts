/**
 * packages/core/src/render/surface.ts: Line-oriented text surface.
 *
 * The renderer only writes whole text runs at a row/column. Hosts differ in
 * how a committed frame leaves the process; clipping and padding live here.
 */

export type SurfaceSize = Readonly<{ cols: number; rows: number }>;

export type DrawTextOptions = Readonly<{
  highlight?: boolean;
  /** Pad (or clip) the run to exactly this many columns. */
  width?: number;
  /** "start" pads on the trailing side, "end" on the leading side. */
  align?: "start" | "end";
}>;

export interface TextSurface {
  /** Re-query the current size and start a new frame. */
  begin(): SurfaceSize;
  /** Returns false when the run fell entirely outside the surface. */
  drawText(row: number, col: number, text: string, opts?: DrawTextOptions): boolean;
  commit(): void;
}

export type SurfaceRow = Readonly<{
  text: string;
  /** Highlighted column ranges, half-open [start, end). */
  highlights: readonly (readonly [number, number])[];
}>;

export function fitText(text: string, width: number, align: "start" | "end" = "start"): string {
  if (width <= 0) return "";
  if (text.length >= width) return text.slice(0, width);
  return align === "end" ? text.padStart(width) : text.padEnd(width);
}

type MutableRow = { chars: string[]; highlights: [number, number][] };

/**
 * In-memory frame buffer implementing the clipping rules. Hosts extend it and
 * override `present()` to emit the committed rows.
 */
export class LineBufferSurface implements TextSurface {
  private size: SurfaceSize = { cols: 0, rows: 0 };
  private frame: MutableRow[] = [];
  private committed: readonly SurfaceRow[] = [];

  constructor(private readonly querySize: () => SurfaceSize) {}

  begin(): SurfaceSize {
    const next = this.querySize();
    this.size = {
      cols: Math.max(0, Math.floor(next.cols)),
      rows: Math.max(0, Math.floor(next.rows)),
    };
    this.frame = Array.from({ length: this.size.rows }, () => ({
      chars: [],
      highlights: [],
    }));
    return this.size;
  }

  drawText(row: number, col: number, text: string, opts: DrawTextOptions = {}): boolean {
    const { cols, rows } = this.size;
    if (row < 0 || row >= rows || col < 0 || col >= cols) return false;
    const target = this.frame[row];
    if (!target) return false;

    const fitted = opts.width === undefined ? text : fitText(text, opts.width, opts.align);
    const run = fitted.slice(0, cols - col);

    while (target.chars.length < col) target.chars.push(" ");
    for (let i = 0; i < run.length; i++) {
      target.chars[col + i] = run.charAt(i);
    }
    if (opts.highlight === true && run.length > 0) {
      target.highlights.push([col, col + run.length]);
    }
    return true;
  }

  commit(): void {
    this.committed = Object.freeze(
      this.frame.map((row) =>
        Object.freeze({
          text: row.chars.join(""),
          highlights: Object.freeze(row.highlights.map((h) => Object.freeze([h[0], h[1]] as const))),
        }),
      ),
    );
    this.present(this.committed, this.size);
  }

  /** Rows of the last committed frame. */
  rows(): readonly SurfaceRow[] {
    return this.committed;
  }

  /** Text of the last committed frame, trailing blanks trimmed. */
  lines(): readonly string[] {
    return this.committed.map((row) => row.text.trimEnd());
  }

  protected present(_rows: readonly SurfaceRow[], _size: SurfaceSize): void {}
}
