import { performance } from "node:perf_hooks";
import type { MonotonicClock } from "@psistat/core";

export function createNodeClock(): MonotonicClock {
  return {
    nowMs: () => performance.now(),
    wallMs: () => Date.now(),
  };
}
