#!/usr/bin/env tsx
import process, { argv, env, exit, stderr, stdin, stdout } from "node:process";
import { describeError, isPsiStatError } from "@psistat/core";
import { stderrLog } from "../log.js";
import { type CliOptions, HELP_TEXT, parseArgs } from "./args.js";
import { EXIT_FATAL, EXIT_USAGE, runPsistat } from "./run.js";

async function main(): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv.slice(2), env);
  } catch (error) {
    if (!isPsiStatError(error, "PSI_USAGE")) throw error;
    stderrLog(`psistat: ${error.message}`);
    stderrLog("Run `psistat --help` for usage.");
    return EXIT_USAGE;
  }

  if (options.help) {
    stdout.write(HELP_TEXT);
    return 0;
  }

  return runPsistat(options, { stdin, stdout, stderr, process });
}

main().then(
  (code) => exit(code),
  (error: unknown) => {
    stderrLog(`psistat: ${describeError(error)}`);
    if (error instanceof Error && error.stack) stderrLog(error.stack);
    exit(EXIT_FATAL);
  },
);
