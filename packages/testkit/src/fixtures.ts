import { cpSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

const FIXTURES_ROOT = fileURLToPath(new URL("../fixtures/", import.meta.url));

/** Absolute path of a file or directory under `packages/testkit/fixtures`. */
export function fixturePath(relativePath: string): string {
  return join(FIXTURES_ROOT, relativePath);
}

export function readFixture(relativePath: string): string {
  return readFileSync(fixturePath(relativePath), "utf8");
}

/**
 * Run `fn` with a fresh temp directory that is removed afterwards. When
 * `seedFixture` names a fixture directory, its contents are copied in first.
 */
export async function withTempDir<T>(
  fn: (dir: string) => Promise<T> | T,
  seedFixture?: string,
): Promise<T> {
  const dir = mkdtempSync(join(tmpdir(), "psistat-test-"));
  try {
    if (seedFixture !== undefined) {
      cpSync(fixturePath(seedFixture), dir, { recursive: true });
    }
    return await fn(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}
