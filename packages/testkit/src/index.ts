export { fixturePath, readFixture, withTempDir } from "./fixtures.js";
export { assert, describe, test } from "./nodeTest.js";
