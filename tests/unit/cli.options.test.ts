"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { InvalidArgumentError } from "commander";
import { parseIndex, parsePictureType } from "../../src/cli-options.js";

void test("parsePictureType accepts the picture types 0 to 20", () => {
  assert.strictEqual(parsePictureType("0"), 0);
  assert.strictEqual(parsePictureType("3"), 3);
  assert.strictEqual(parsePictureType("20"), 20);
});

void test("parsePictureType rejects other values", () => {
  for (const value of ["21", "-1", "2.5", "cover", ""]) {
    assert.throws(() => parsePictureType(value), (error: unknown) => {
      assert.ok(error instanceof InvalidArgumentError);
      assert.strictEqual(error.message, "Picture type must be an integer from 0 to 20.");
      return true;
    });
  }
});

void test("parseIndex accepts non-negative integers", () => {
  assert.strictEqual(parseIndex("0"), 0);
  assert.strictEqual(parseIndex("12"), 12);
});

void test("parseIndex rejects other values", () => {
  for (const value of ["-1", "1.5", "first", " "]) {
    assert.throws(() => parseIndex(value), {
      name: "InvalidArgumentError",
      message: "Index must be a non-negative integer."
    });
  }
});
