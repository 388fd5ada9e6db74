/**
 * @psistat/core
 *
 * Runtime-agnostic sampling, event and rendering core for psistat.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports);
 * counter files, the terminal and the keyboard are supplied by the host.
 */

// =============================================================================
// Data model
// =============================================================================

export {
  RESOURCE_TAGS,
  SERIES_KEYS,
  STALL_KINDS,
  seriesKey,
  type CounterSnapshot,
  type CounterSource,
  type DebugLog,
  type EventWindow,
  type KeySource,
  type MonotonicClock,
  type ParseIssue,
  type ParseIssueCode,
  type Reading,
  type ResourceTag,
  type SampleBatch,
  type SeriesAverages,
  type SeriesKey,
  type SeriesSample,
  type SourceIssue,
  type StallEvent,
  type StallKind,
} from "./types.js";

export { PsiStatError, describeError, isPsiStatError, type PsiStatErrorCode } from "./errors.js";

export {
  DEFAULT_HISTORY_CAPACITY,
  DEFAULT_LAGS,
  DEFAULT_PERIOD_MS,
  DEFAULT_THRESHOLD,
  normalizeMonitorConfig,
  windowLabel,
  type MonitorConfig,
  type MonitorConfigInput,
} from "./config.js";

export {
  THRESHOLD_MAX,
  THRESHOLD_MIN,
  THRESHOLD_STEP,
  adjustThreshold,
  normalizeThreshold,
} from "./threshold.js";

// =============================================================================
// Sampling and events
// =============================================================================

export {
  parsePressureLine,
  parsePressureRecord,
  type ParsePressureLineResult,
  type PressureLine,
  type PressureRecord,
} from "./pressure/parser.js";

export { SampleRing } from "./sampling/ring.js";
export { computeRate, computeRates, stallPercent, type SeriesRates } from "./sampling/rate.js";
export { detectEvents, roundPercent, type DetectionContext } from "./events/detector.js";
export { EventHistory } from "./events/history.js";
export {
  AVERAGE_LABELS,
  eventWindowLabel,
  eventWindows,
  lagWindow,
  nextEventWindow,
  sameWindow,
} from "./events/window.js";

// =============================================================================
// State, controls and rendering
// =============================================================================

export {
  createMonitorState,
  reduceMonitorView,
  type MonitorState,
  type MonitorView,
} from "./model/state.js";

export {
  KEY_LEGEND,
  resolveControlAction,
  type ControlAction,
  type KeyLegendEntry,
} from "./keybindings/controls.js";

export { formatCompactDuration, formatRateCell, formatWallClock } from "./format/formatters.js";

export {
  LineBufferSurface,
  fitText,
  type DrawTextOptions,
  type SurfaceRow,
  type SurfaceSize,
  type TextSurface,
} from "./render/surface.js";

export {
  composeFrame,
  formatEventRow,
  formatHistory,
  groupEvents,
  headerLine,
  paintFrame,
  renderDashboard,
  tableHeaderLine,
  tableRow,
  type FrameInput,
  type FrameLine,
} from "./render/frame.js";

export { createPrintTarget, createSurfaceTarget, type FrameTarget } from "./render/targets.js";

// =============================================================================
// Scheduling
// =============================================================================

export { advanceDeadline, remainingMs, type DeadlineAdvance } from "./scheduler/deadline.js";
export {
  TickScheduler,
  type ExitReason,
  type SchedulerPhase,
  type TickSchedulerOptions,
} from "./scheduler/tickScheduler.js";
