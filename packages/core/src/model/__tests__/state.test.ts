import { assert, describe, test } from "@psistat/testkit";
import { normalizeMonitorConfig } from "../../config.js";
import { lagWindow } from "../../events/window.js";
import { resolveControlAction } from "../../keybindings/controls.js";
import { createMonitorState, reduceMonitorView } from "../state.js";

describe("createMonitorState", () => {
  test("starts from the configured threshold and shortest lag", () => {
    const state = createMonitorState(normalizeMonitorConfig({ lags: [10, 3], initialThreshold: 40 }));
    assert.deepEqual(state.view, {
      threshold: 40,
      eventWindow: { kind: "lag", lag: 3 },
      brief: false,
      showHelp: false,
    });
    assert.equal(state.ring.capacity, 11);
    assert.equal(state.history.capacity, 100);
  });
});

describe("reduceMonitorView", () => {
  const lags = [1, 3, 10];
  const view = { threshold: 20, eventWindow: lagWindow(1), brief: false, showHelp: false };

  test("toggles flip and threshold steps are clamped", () => {
    assert.equal(reduceMonitorView(view, "toggle-brief", lags).brief, true);
    assert.equal(reduceMonitorView(view, "toggle-help", lags).showHelp, true);
    assert.equal(reduceMonitorView({ ...view, threshold: 95 }, "threshold-up", lags).threshold, 95);
    assert.equal(reduceMonitorView({ ...view, threshold: 5 }, "threshold-down", lags).threshold, 5);
  });

  test("cycle-interval steps through the lags, then the kernel averages, then wraps", () => {
    const seen: string[] = [];
    let current = view;
    for (let i = 0; i < 6; i++) {
      current = reduceMonitorView(current, "cycle-interval", lags);
      const window = current.eventWindow;
      seen.push(window.kind === "lag" ? `lag ${String(window.lag)}` : window.field);
    }
    assert.deepEqual(seen, ["lag 3", "lag 10", "avg60", "avg300", "lag 1", "lag 3"]);
  });

  test("host-handled actions leave the view untouched", () => {
    assert.equal(reduceMonitorView(view, "dump-history", lags), view);
    assert.equal(reduceMonitorView(view, "quit", lags), view);
  });
});

describe("resolveControlAction", () => {
  test("maps every documented key", () => {
    const expected: readonly (readonly [string, string])[] = [
      ["t", "threshold-down"],
      ["-", "threshold-down"],
      ["down", "threshold-down"],
      ["T", "threshold-up"],
      ["+", "threshold-up"],
      ["=", "threshold-up"],
      ["up", "threshold-up"],
      ["i", "cycle-interval"],
      ["b", "toggle-brief"],
      ["?", "toggle-help"],
      ["h", "toggle-help"],
      ["d", "dump-history"],
      ["q", "quit"],
      ["Q", "quit"],
      ["ctrl+c", "quit"],
    ];
    for (const [key, action] of expected) {
      assert.equal(resolveControlAction(key), action, key);
    }
  });

  test("unknown keys and prototype names resolve to nothing", () => {
    assert.equal(resolveControlAction("B"), undefined);
    assert.equal(resolveControlAction("toString"), undefined);
  });
});
