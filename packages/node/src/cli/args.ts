import { DEFAULT_THRESHOLD, PsiStatError, normalizeThreshold } from "@psistat/core";
import { DEFAULT_PRESSURE_DIR } from "../counters/procPressure.js";

export type CliOptions = {
  /** Already rounded to a multiple of 5 and clamped to [5, 95]. */
  threshold: number;
  debug: boolean;
  pressureDir: string;
  logPath?: string;
  /** Stop after this many ticks. */
  ticks?: number;
  help: boolean;
};

type EnvMap = Readonly<Record<string, string | undefined>>;

function usage(message: string): PsiStatError {
  return new PsiStatError("PSI_USAGE", message);
}

function parseInteger(flag: string, raw: string | undefined): number {
  if (raw === undefined) throw usage(`Missing value for ${flag}`);
  if (!/^-?\d+$/.test(raw.trim())) throw usage(`${flag} expects an integer (got "${raw}")`);
  return Number.parseInt(raw, 10);
}

function envText(env: EnvMap, key: string): string | undefined {
  const value = env[key];
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function parseArgs(argv: readonly string[], env: EnvMap = {}): CliOptions {
  let rawThreshold = DEFAULT_THRESHOLD;
  const options: CliOptions = {
    threshold: DEFAULT_THRESHOLD,
    debug: false,
    pressureDir: envText(env, "PSISTAT_PRESSURE_DIR") ?? DEFAULT_PRESSURE_DIR,
    help: false,
  };
  const logFromEnv = envText(env, "PSISTAT_DEBUG_LOG");
  if (logFromEnv !== undefined) options.logPath = logFromEnv;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--help" || arg === "-h") {
      options.help = true;
      continue;
    }
    if (arg === "--debug" || arg === "-D") {
      options.debug = true;
      continue;
    }
    if (arg === "--threshold-pct" || arg === "-t") {
      rawThreshold = parseInteger(arg, argv[i + 1]);
      i++;
      continue;
    }
    if (arg.startsWith("--threshold-pct=")) {
      rawThreshold = parseInteger("--threshold-pct", arg.slice("--threshold-pct=".length));
      continue;
    }
    if (arg === "--pressure-dir") {
      const value = argv[i + 1];
      if (!value) throw usage("Missing value for --pressure-dir");
      options.pressureDir = value;
      i++;
      continue;
    }
    if (arg === "--log") {
      const value = argv[i + 1];
      if (!value) throw usage("Missing value for --log");
      options.logPath = value;
      i++;
      continue;
    }
    if (arg === "--ticks" || arg === "-n") {
      const ticks = parseInteger(arg, argv[i + 1]);
      if (ticks <= 0) throw usage(`${arg} must be positive (got ${String(ticks)})`);
      options.ticks = ticks;
      i++;
      continue;
    }
    if (arg.startsWith("-")) {
      throw usage(`Unknown option: ${arg}`);
    }
    throw usage(`Unexpected argument: ${arg}`);
  }

  options.threshold = normalizeThreshold(rawThreshold);
  return options;
}

export const HELP_TEXT = [
  "psistat - live pressure stall monitor",
  "",
  "Usage:",
  "  psistat [options]",
  "",
  "Options:",
  "  -t, --threshold-pct <n>   event threshold percent (min=5, max=95, default=20)",
  "  -D, --debug               print plain text each tick instead of the dashboard",
  "  -n, --ticks <n>           stop after n ticks",
  "      --pressure-dir <dir>  directory holding cpu/io/memory records (default /proc/pressure)",
  "      --log <file>          append diagnostics to <file> (or PSISTAT_DEBUG_LOG)",
  "  -h, --help                show this help",
  "",
].join("\n");
