import type { MonitorConfig } from "../config.js";
import { EventHistory } from "../events/history.js";
import { lagWindow, nextEventWindow } from "../events/window.js";
import type { ControlAction } from "../keybindings/controls.js";
import { SampleRing } from "../sampling/ring.js";
import { adjustThreshold } from "../threshold.js";
import type { EventWindow } from "../types.js";

/** User-adjustable presentation and detection settings. */
export type MonitorView = Readonly<{
  threshold: number;
  /** Window used by the event detector: a configured lag or a kernel average. */
  eventWindow: EventWindow;
  brief: boolean;
  showHelp: boolean;
}>;

/**
 * Everything the tick loop mutates. Owned by a single TickScheduler; nothing
 * here is shared through module-level state.
 */
export type MonitorState = {
  readonly config: MonitorConfig;
  view: MonitorView;
  readonly ring: SampleRing;
  readonly history: EventHistory;
};

export function createMonitorState(config: MonitorConfig): MonitorState {
  return {
    config,
    view: {
      threshold: config.initialThreshold,
      eventWindow: lagWindow(config.lags[0] ?? 1),
      brief: false,
      showHelp: false,
    },
    ring: new SampleRing(config.ringCapacity),
    history: new EventHistory(config.historyCapacity),
  };
}

/**
 * Apply a control action to the view. Actions handled by the host
 * ("dump-history", "quit") leave the view unchanged.
 */
export function reduceMonitorView(
  view: MonitorView,
  action: ControlAction,
  lags: readonly number[],
): MonitorView {
  if (action === "threshold-down") {
    return { ...view, threshold: adjustThreshold(view.threshold, -1) };
  }

  if (action === "threshold-up") {
    return { ...view, threshold: adjustThreshold(view.threshold, 1) };
  }

  if (action === "cycle-interval") {
    return { ...view, eventWindow: nextEventWindow(lags, view.eventWindow) };
  }

  if (action === "toggle-brief") {
    return { ...view, brief: !view.brief };
  }

  if (action === "toggle-help") {
    return { ...view, showHelp: !view.showHelp };
  }

  return view;
}
