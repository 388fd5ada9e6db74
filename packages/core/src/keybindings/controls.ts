export type ControlAction =
  | "threshold-down"
  | "threshold-up"
  | "cycle-interval"
  | "toggle-brief"
  | "toggle-help"
  | "dump-history"
  | "quit";

/**
 * Key names are case-sensitive: `t` lowers and `T` raises the threshold.
 * Named keys ("up", "ctrl+c", ...) come from the host's input decoder.
 */
const ACTION_BY_KEY: Readonly<Record<string, ControlAction>> = Object.freeze({
  t: "threshold-down",
  "-": "threshold-down",
  down: "threshold-down",
  T: "threshold-up",
  "+": "threshold-up",
  "=": "threshold-up",
  up: "threshold-up",
  i: "cycle-interval",
  b: "toggle-brief",
  "?": "toggle-help",
  h: "toggle-help",
  d: "dump-history",
  q: "quit",
  Q: "quit",
  "ctrl+c": "quit",
});

export function resolveControlAction(key: string): ControlAction | undefined {
  return Object.prototype.hasOwnProperty.call(ACTION_BY_KEY, key) ? ACTION_BY_KEY[key] : undefined;
}

export type KeyLegendEntry = Readonly<{ keys: string; description: string }>;

export const KEY_LEGEND: readonly KeyLegendEntry[] = Object.freeze([
  { keys: "t / - / down", description: "lower threshold by 5" },
  { keys: "T / + / up", description: "raise threshold by 5" },
  { keys: "i", description: "cycle event interval" },
  { keys: "b", description: "toggle brief mode (hide rate table)" },
  { keys: "d", description: "dump full event history" },
  { keys: "? / h", description: "toggle this help" },
  { keys: "q / ctrl+c", description: "quit" },
]);
