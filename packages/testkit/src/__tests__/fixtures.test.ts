import { existsSync, readdirSync } from "node:fs";
import { assert, describe, fixturePath, readFixture, test, withTempDir } from "../index.js";

describe("fixtures", () => {
  test("readFixture returns the file text", () => {
    assert.equal(
      readFixture("pressure/healthy/memory"),
      "some avg10=0.00 avg60=0.00 avg300=0.00 total=3000\nfull avg10=0.00 avg60=0.00 avg300=0.00 total=1000\n",
    );
  });

  test("withTempDir seeds a copy and removes it afterwards", async () => {
    const seen = await withTempDir((dir) => {
      assert.deepEqual(readdirSync(dir).sort(), ["cpu", "io", "memory"]);
      return dir;
    }, "pressure/malformed");
    assert.equal(existsSync(seen), false);
    assert.equal(existsSync(fixturePath("pressure/malformed/cpu")), true);
  });
});
