export { createNodeClock } from "./clock.js";
export { DEFAULT_PRESSURE_DIR, ProcPressureSource } from "./counters/procPressure.js";
export { createDebugLog, formatLogLine, stderrLog } from "./log.js";
export { AnsiSurface, queryTerminalSize, type TerminalOutput } from "./terminal/ansiSurface.js";
export { StreamKeySource, createPauseKeySource, decodeKeys } from "./terminal/keys.js";
export {
  TerminalSession,
  withTerminalSession,
  type ScopedSessionOptions,
  type SessionProcess,
  type TerminalInput,
  type TerminalSessionOptions,
} from "./terminal/session.js";
export { HELP_TEXT, parseArgs, type CliOptions } from "./cli/args.js";
export { EXIT_FATAL, EXIT_OK, EXIT_USAGE, runPsistat, type PsistatIo } from "./cli/run.js";
