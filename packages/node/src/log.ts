import { appendFileSync } from "node:fs";
import type { DebugLog } from "@psistat/core";

function serializeDetail(detail: unknown): string {
  if (detail instanceof Error) {
    return JSON.stringify({
      name: detail.name,
      message: detail.message,
      stack: detail.stack,
    });
  }
  if (typeof detail === "string") return detail;
  try {
    return JSON.stringify(detail);
  } catch {
    return String(detail);
  }
}

export function formatLogLine(step: string, detail: unknown, at: Date): string {
  const payload = detail === undefined ? "" : ` ${serializeDetail(detail)}`;
  return `${at.toISOString()} ${step}${payload}\n`;
}

/**
 * Append-only diagnostic log. Without a path it is a no-op; write failures
 * are swallowed so logging can never take the tick loop down.
 */
export function createDebugLog(path: string | undefined): DebugLog {
  if (path === undefined || path.length === 0) return () => {};
  return (step, detail) => {
    try {
      appendFileSync(path, formatLogLine(step, detail, new Date()));
    } catch {
      // best-effort diagnostics only
    }
  };
}

export function stderrLog(message: string): void {
  try {
    process.stderr.write(`${message}\n`);
  } catch {
    // best-effort diagnostics only
  }
}
