import { closeSync, openSync, readSync } from "node:fs";
import { join } from "node:path";
import {
  type CounterSnapshot,
  type CounterSource,
  PsiStatError,
  RESOURCE_TAGS,
  type ResourceTag,
  type SeriesKey,
  type SeriesSample,
  type SourceIssue,
  parsePressureRecord,
} from "@psistat/core";

export const DEFAULT_PRESSURE_DIR = "/proc/pressure";

const READ_CHUNK_BYTES = 4096;

type OpenRecord = Readonly<{ tag: ResourceTag; path: string; fd: number }>;

function errorCode(error: unknown): string {
  if (!error || typeof error !== "object" || !("code" in error)) return "UNKNOWN";
  return typeof error.code === "string" ? error.code : "UNKNOWN";
}

/** Read the whole file from offset 0; the descriptor's own position is never used. */
function readWhole(fd: number): string {
  const chunks: Buffer[] = [];
  let position = 0;
  while (true) {
    const buffer = Buffer.allocUnsafe(READ_CHUNK_BYTES);
    const bytesRead = readSync(fd, buffer, 0, READ_CHUNK_BYTES, position);
    if (bytesRead <= 0) break;
    chunks.push(buffer.subarray(0, bytesRead));
    position += bytesRead;
  }
  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Counter source over `/proc/pressure/{cpu,io,memory}`.
 *
 * Descriptors are opened once; every `sample()` re-reads each record in full.
 */
export class ProcPressureSource implements CounterSource {
  private closed = false;

  private constructor(private readonly records: readonly OpenRecord[]) {}

  /**
   * Open every record under `dir`. Any record that cannot be opened is the
   * fatal `PSI_SOURCE_UNAVAILABLE` error; descriptors already opened are closed.
   */
  static open(dir: string = DEFAULT_PRESSURE_DIR): ProcPressureSource {
    const records: OpenRecord[] = [];
    for (const tag of RESOURCE_TAGS) {
      const path = join(dir, tag);
      try {
        records.push({ tag, path, fd: openSync(path, "r") });
      } catch (error) {
        for (const record of records) closeSync(record.fd);
        throw new PsiStatError(
          "PSI_SOURCE_UNAVAILABLE",
          `cannot open ${path} (${errorCode(error)}); pressure stall information needs Linux 4.20+ with CONFIG_PSI`,
          { cause: error },
        );
      }
    }
    return new ProcPressureSource(records);
  }

  get paths(): readonly string[] {
    return this.records.map((record) => record.path);
  }

  sample(): CounterSnapshot {
    if (this.closed) {
      throw new PsiStatError("PSI_SOURCE_READ_FAILED", "pressure source is closed");
    }
    const series = new Map<SeriesKey, SeriesSample>();
    const issues: SourceIssue[] = [];

    for (const record of this.records) {
      let text: string;
      try {
        text = readWhole(record.fd);
      } catch (error) {
        throw new PsiStatError(
          "PSI_SOURCE_READ_FAILED",
          `cannot read ${record.path} (${errorCode(error)})`,
          { cause: error },
        );
      }
      const parsed = parsePressureRecord(record.tag, text);
      for (const [key, sample] of parsed.series) series.set(key, sample);
      issues.push(...parsed.issues);
    }

    return { series, issues };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const record of this.records) {
      closeSync(record.fd);
    }
  }
}
