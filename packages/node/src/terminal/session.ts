/**
 * packages/node/src/terminal/session.ts: Scoped terminal acquisition.
 *
 * Why: Raw mode, the alternate screen and a hidden cursor must be undone on
 * every way out of the process (quit, thrown error, uncaught fault, signal)
 * or the user's shell is left without echo. `withTerminalSession` owns that
 * guarantee; nothing else touches the TTY modes.
 */

import type { Readable } from "node:stream";
import type { TerminalOutput } from "./ansiSurface.js";

const CSI = "\x1b[";
const ENTER_ALT_SCREEN = `${CSI}?1049h`;
const LEAVE_ALT_SCREEN = `${CSI}?1049l`;
const HIDE_CURSOR = `${CSI}?25l`;
const SHOW_CURSOR = `${CSI}?25h`;

export type TerminalInput = Readable & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export type TerminalSessionOptions = Readonly<{
  stdin: TerminalInput;
  stdout: TerminalOutput;
}>;

function setRawMode(stdin: TerminalInput, enabled: boolean): void {
  if (stdin.isTTY === true && typeof stdin.setRawMode === "function") {
    stdin.setRawMode(enabled);
  }
}

export class TerminalSession {
  private state: "idle" | "active" | "suspended" | "released" = "idle";

  constructor(private readonly opts: TerminalSessionOptions) {}

  acquire(): void {
    if (this.state !== "idle") return;
    setRawMode(this.opts.stdin, true);
    this.opts.stdout.write(`${ENTER_ALT_SCREEN}${HIDE_CURSOR}`);
    this.state = "active";
  }

  /** Hand the normal screen back temporarily; raw input stays on. */
  suspend(): void {
    if (this.state !== "active") return;
    this.opts.stdout.write(`${SHOW_CURSOR}${LEAVE_ALT_SCREEN}`);
    this.state = "suspended";
  }

  resume(): void {
    if (this.state !== "suspended") return;
    this.opts.stdout.write(`${ENTER_ALT_SCREEN}${HIDE_CURSOR}`);
    this.state = "active";
  }

  /** Idempotent; safe to call from signal and fault handlers. */
  release(): void {
    if (this.state === "idle" || this.state === "released") return;
    const wasActive = this.state === "active";
    this.state = "released";
    if (wasActive) {
      this.opts.stdout.write(`${SHOW_CURSOR}${LEAVE_ALT_SCREEN}`);
    }
    setRawMode(this.opts.stdin, false);
  }
}

export type SessionProcess = Readonly<{
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  off(event: string, listener: (...args: unknown[]) => void): unknown;
  exit(code?: number): unknown;
}>;

export type ScopedSessionOptions = TerminalSessionOptions &
  Readonly<{
    process: SessionProcess;
    /** Reports a fault after the terminal has been restored. */
    reportFault: (kind: string, error: unknown) => void;
  }>;

const SIGNAL_EXIT_CODES: Readonly<Record<string, number>> = Object.freeze({
  SIGHUP: 129,
  SIGINT: 130,
  SIGTERM: 143,
});

/**
 * Acquire the terminal, run `body`, and release the terminal on every exit
 * path. Signals and uncaught faults release first, then report and exit.
 */
export async function withTerminalSession<T>(
  opts: ScopedSessionOptions,
  body: (session: TerminalSession) => Promise<T>,
): Promise<T> {
  const session = new TerminalSession(opts);
  const proc = opts.process;

  const signalHandlers = Object.entries(SIGNAL_EXIT_CODES).map(([signal, code]) => {
    const handler = (): void => {
      session.release();
      proc.exit(code);
    };
    return [signal, handler] as const;
  });
  const onFault = (kind: string) => (error: unknown) => {
    session.release();
    opts.reportFault(kind, error);
    proc.exit(1);
  };
  const faultHandlers = [
    ["uncaughtException", onFault("uncaughtException")],
    ["unhandledRejection", onFault("unhandledRejection")],
  ] as const;

  for (const [event, handler] of [...signalHandlers, ...faultHandlers]) proc.on(event, handler);
  session.acquire();
  try {
    return await body(session);
  } finally {
    session.release();
    for (const [event, handler] of [...signalHandlers, ...faultHandlers]) proc.off(event, handler);
  }
}
