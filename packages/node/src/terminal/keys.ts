import type { Readable } from "node:stream";
import type { KeySource } from "@psistat/core";

const ESCAPE_SEQUENCES: Readonly<Record<string, string>> = Object.freeze({
  "\x1b[A": "up",
  "\x1b[B": "down",
  "\x1b[C": "right",
  "\x1b[D": "left",
  "\x1bOA": "up",
  "\x1bOB": "down",
  "\x1bOC": "right",
  "\x1bOD": "left",
});

/**
 * Split a raw-mode input chunk into key names: printable characters map to
 * themselves, arrows to "up"/"down"/..., Ctrl+C to "ctrl+c". Unrecognized
 * escape sequences are dropped whole.
 */
export function decodeKeys(chunk: string): string[] {
  const keys: string[] = [];
  let i = 0;
  while (i < chunk.length) {
    const ch = chunk.charAt(i);

    if (ch === "\x1b") {
      const seq = chunk.slice(i, i + 3);
      const named = ESCAPE_SEQUENCES[seq];
      if (named !== undefined) {
        keys.push(named);
        i += 3;
        continue;
      }
      const next = chunk.charAt(i + 1);
      if (next === "[" || next === "O") {
        // CSI/SS3: skip parameters up to the final byte
        let j = i + 2;
        while (j < chunk.length && !/[@-~]/.test(chunk.charAt(j))) j++;
        i = j + 1;
        continue;
      }
      keys.push("escape");
      i++;
      continue;
    }

    if (ch === "\x03") keys.push("ctrl+c");
    else if (ch === "\r" || ch === "\n") keys.push("enter");
    else if (ch >= " " && ch !== "\x7f") keys.push(ch);
    i++;
  }
  return keys;
}

/**
 * Single-consumer key channel over a raw-mode input stream. Input arriving
 * while nobody waits is queued; `nextKey` hands out one key per call.
 */
export class StreamKeySource implements KeySource {
  private readonly queue: string[] = [];
  private waiter: ((key: string | null) => void) | null = null;
  private attached = false;

  constructor(private readonly input: Readable) {}

  private readonly onData = (chunk: string | Buffer): void => {
    const text = typeof chunk === "string" ? chunk : chunk.toString("utf8");
    for (const key of decodeKeys(text)) {
      const waiter = this.waiter;
      if (waiter) {
        this.waiter = null;
        waiter(key);
      } else {
        this.queue.push(key);
      }
    }
  };

  attach(): void {
    if (this.attached) return;
    this.attached = true;
    this.input.setEncoding("utf8");
    this.input.on("data", this.onData);
    this.input.resume();
  }

  detach(): void {
    if (!this.attached) return;
    this.attached = false;
    this.input.off("data", this.onData);
    this.input.pause();
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.(null);
  }

  /** Resolves with the next key, or null after `timeoutMs` (never, for Infinity). */
  nextKey(timeoutMs: number): Promise<string | null> {
    const queued = this.queue.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (timeoutMs <= 0) return Promise.resolve(null);

    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      if (Number.isFinite(timeoutMs)) {
        timer = setTimeout(() => {
          this.waiter = null;
          resolve(null);
        }, Math.ceil(timeoutMs));
      }
      this.waiter = (key) => {
        if (timer !== undefined) clearTimeout(timer);
        resolve(key);
      };
    });
  }
}

/** Key source that never yields a key: each wait is a plain pause. */
export function createPauseKeySource(): KeySource {
  return {
    nextKey: (timeoutMs) =>
      new Promise((resolve) => {
        setTimeout(() => resolve(null), Math.max(0, Math.ceil(timeoutMs)));
      }),
  };
}
