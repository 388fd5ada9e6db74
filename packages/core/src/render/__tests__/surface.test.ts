import { assert, describe, test } from "@psistat/testkit";
import { MemorySurface } from "../../testing/index.js";
import { fitText } from "../surface.js";

describe("fitText", () => {
  test("pads or clips to the width", () => {
    assert.equal(fitText("ab", 4), "ab  ");
    assert.equal(fitText("ab", 4, "end"), "  ab");
    assert.equal(fitText("abcdef", 3), "abc");
    assert.equal(fitText("abc", 0), "");
  });
});

describe("LineBufferSurface", () => {
  test("clips runs at the right edge", () => {
    const surface = new MemorySurface({ cols: 10, rows: 2 });
    surface.begin();
    assert.equal(surface.drawText(0, 0, "hello"), true);
    assert.equal(surface.drawText(0, 3, "XYZWVUTS"), true);
    surface.commit();
    assert.deepEqual(surface.lines(), ["helXYZWVUT", ""]);
  });

  test("draws outside the surface are refused", () => {
    const surface = new MemorySurface({ cols: 10, rows: 2 });
    surface.begin();
    assert.equal(surface.drawText(2, 0, "x"), false);
    assert.equal(surface.drawText(0, 10, "x"), false);
    assert.equal(surface.drawText(-1, 0, "x"), false);
    surface.commit();
    assert.deepEqual(surface.lines(), ["", ""]);
  });

  test("records highlighted ranges and aligned runs", () => {
    const surface = new MemorySurface({ cols: 10, rows: 2 });
    surface.begin();
    surface.drawText(1, 0, "hi", { highlight: true });
    surface.drawText(1, 2, "ab", { width: 4, align: "end" });
    surface.commit();
    const row = surface.rows()[1];
    assert.equal(row?.text, "hi  ab");
    assert.deepEqual(row?.highlights, [[0, 2]]);
    assert.equal(surface.commits, 1);
  });

  test("size is re-queried on every frame", () => {
    const surface = new MemorySurface({ cols: 10, rows: 2 });
    assert.deepEqual(surface.begin(), { cols: 10, rows: 2 });
    surface.resize({ cols: 4, rows: 1 });
    assert.deepEqual(surface.begin(), { cols: 4, rows: 1 });
    surface.drawText(0, 0, "abcdef");
    assert.equal(surface.drawText(1, 0, "x"), false);
    surface.commit();
    assert.deepEqual(surface.lines(), ["abcd"]);
  });
});
