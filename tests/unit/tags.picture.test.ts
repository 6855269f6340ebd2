"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { PictureType } from "../../src/constants/picture-types.js";
import {
  createPicture,
  parsePictureBlock,
  pictureFromBase64,
  pictureToBase64,
  serializePictureBlock
} from "../../src/picture.js";
import { MalformedPictureError, Utf8Error } from "../../src/types/errors.js";
import type { PictureBlock } from "../../src/types/picture-block.js";
import { PNG_SIGNATURE } from "../fixtures/opus-fixtures.js";

const FRONT_COVER_HEX =
  "00000003" +
  "00000009" + "696d6167652f706e67" +
  "00000005" + "46726f6e74" +
  "00000001" + "00000001" + "00000018" + "00000000" +
  "00000008" + "89504e470d0a1a0a";

const frontCover: PictureBlock = {
  pictureType: PictureType.CoverFront,
  mimeType: "image/png",
  description: "Front",
  width: 1,
  height: 1,
  colorDepth: 24,
  indexedColors: 0,
  data: Buffer.from(PNG_SIGNATURE)
};

const backCover: PictureBlock = {
  pictureType: PictureType.CoverBack,
  mimeType: "image/jpeg",
  description: "Back",
  width: 0,
  height: 0,
  colorDepth: 0,
  indexedColors: 0,
  data: Buffer.from([0xff, 0xd8, 0xff])
};

void test("serializePictureBlock writes big-endian fields", () => {
  assert.strictEqual(serializePictureBlock(frontCover).toString("hex"), FRONT_COVER_HEX);
});

void test("parsePictureBlock reads every field", () => {
  assert.deepStrictEqual(parsePictureBlock(Buffer.from(FRONT_COVER_HEX, "hex")), frontCover);
});

void test("pictureToBase64 pads its output", () => {
  assert.strictEqual(
    pictureToBase64(frontCover),
    "AAAAAwAAAAlpbWFnZS9wbmcAAAAFRnJvbnQAAAABAAAAAQAAABgAAAAAAAAACIlQTkcNChoK"
  );
  assert.strictEqual(
    pictureToBase64(backCover),
    "AAAABAAAAAppbWFnZS9qcGVnAAAABEJhY2sAAAAAAAAAAAAAAAAAAAAAAAAAA//Y/w=="
  );
});

void test("pictureFromBase64 accepts padded and unpadded values", () => {
  const padded = pictureToBase64(backCover);
  assert.deepStrictEqual(pictureFromBase64(padded), backCover);
  assert.deepStrictEqual(pictureFromBase64(padded.replace(/=+$/, "")), backCover);
});

void test("pictureFromBase64 rejects values outside the base64 alphabet", () => {
  assert.throws(() => pictureFromBase64("not base64!"), {
    name: "MalformedPictureError",
    message: "Picture comment is not valid base64"
  });
  assert.throws(() => pictureFromBase64("A"), MalformedPictureError);
});

void test("parsePictureBlock rejects picture types above 20", () => {
  const block = Buffer.from(FRONT_COVER_HEX, "hex");
  block.writeUInt32BE(21, 0);
  assert.throws(() => parsePictureBlock(block), {
    name: "MalformedPictureError",
    message: "Picture type 21 is greater than 20"
  });
});

void test("parsePictureBlock reports truncated fields", () => {
  const block = Buffer.from(FRONT_COVER_HEX, "hex").subarray(0, 50);
  assert.throws(() => parsePictureBlock(block), {
    name: "MalformedPictureError",
    message: "Picture data needs 8 bytes at offset 46 but only 4 remain"
  });
});

void test("parsePictureBlock rejects a non-ASCII MIME type", () => {
  const block = Buffer.from(FRONT_COVER_HEX, "hex");
  block[8] = 0xe9;
  assert.throws(() => parsePictureBlock(block), { message: "MIME type is not ASCII" });
  assert.throws(() => serializePictureBlock({ ...frontCover, mimeType: "image/pñg" }), MalformedPictureError);
});

void test("parsePictureBlock rejects a description that is not UTF-8", () => {
  const block = Buffer.from(FRONT_COVER_HEX, "hex");
  block[21] = 0xc3;
  block[22] = 0x28;
  assert.throws(() => parsePictureBlock(block), Utf8Error);
});

void test("serializePictureBlock rejects dimensions beyond 32 bits", () => {
  assert.throws(() => serializePictureBlock({ ...frontCover, width: 2 ** 32 }), MalformedPictureError);
});

void test("createPicture sniffs the MIME type and fills defaults", () => {
  const picture = createPicture(Buffer.from(PNG_SIGNATURE));
  assert.deepStrictEqual(picture, {
    pictureType: PictureType.CoverFront,
    mimeType: "image/png",
    description: "",
    width: 0,
    height: 0,
    colorDepth: 0,
    indexedColors: 0,
    data: Buffer.from(PNG_SIGNATURE)
  });
});

void test("createPicture uses the given metadata", () => {
  const picture = createPicture(Buffer.from([1, 2, 3]), {
    pictureType: PictureType.BandLogo,
    mimeType: "image/x-custom",
    description: "Logo",
    width: 64
  });
  assert.strictEqual(picture.pictureType, PictureType.BandLogo);
  assert.strictEqual(picture.mimeType, "image/x-custom");
  assert.strictEqual(picture.description, "Logo");
  assert.strictEqual(picture.width, 64);
});

void test("createPicture fails when the MIME type cannot be determined", () => {
  assert.throws(() => createPicture(Buffer.from([1, 2, 3])), {
    name: "MalformedPictureError",
    message: "Unable to determine the MIME type of the picture data"
  });
});
