export {
  ManualClock,
  MemorySurface,
  ScriptedCounterSource,
  ScriptedKeySource,
  pressureRecord,
  snapshotOf,
} from "./fakes.js";
export type { PressureValues, RecordFrame, ScriptedKey } from "./fakes.js";
