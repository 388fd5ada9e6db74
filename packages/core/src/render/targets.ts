import { composeFrame, renderDashboard } from "./frame.js";
import type { FrameInput } from "./frame.js";
import type { TextSurface } from "./surface.js";

/** Where a composed frame goes once per tick (and after every control action). */
export interface FrameTarget {
  render(input: FrameInput): void;
}

export function createSurfaceTarget(surface: TextSurface): FrameTarget {
  return {
    render: (input) => {
      renderDashboard(surface, input);
    },
  };
}

/**
 * Plain-text target for running without a surface: every line of the frame is
 * written as-is, followed by a blank separator line.
 */
export function createPrintTarget(writeLine: (line: string) => void): FrameTarget {
  return {
    render: (input) => {
      for (const line of composeFrame(input)) {
        writeLine(line.text);
      }
      writeLine("");
    },
  };
}
