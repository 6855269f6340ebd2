"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { OggBinary } from "../../src/ogg-binary.js";
import { reassemblePackets } from "../../src/packet-reassembler.js";
import { lacePacket, writePages } from "../../src/page-writer.js";
import type { WritablePacket } from "../../src/page-writer.js";
import { expectDefined } from "../helpers/expect-defined.js";

const packet = (data: Buffer, granulePosition: bigint, endsPage = false): WritablePacket => ({
  data,
  granulePosition,
  endsPage
});

void test("lacePacket splits lengths into 255-byte segments", () => {
  assert.deepStrictEqual(lacePacket(0), [0]);
  assert.deepStrictEqual(lacePacket(254), [254]);
  assert.deepStrictEqual(lacePacket(255), [255, 0]);
  assert.deepStrictEqual(lacePacket(300), [255, 45]);
  assert.deepStrictEqual(lacePacket(510), [255, 255, 0]);
});

void test("writePages puts packets without page breaks on one page", () => {
  const pages = writePages(
    [packet(Buffer.from([1, 2, 3]), 10n), packet(Buffer.from([4, 5, 6, 7]), 20n)],
    { serial: 9, firstSequence: 0, endOfStream: false }
  );
  assert.strictEqual(pages.length, 1);
  const page = expectDefined(pages[0]);
  assert.deepStrictEqual(page.segments, [3, 4]);
  assert.deepStrictEqual(page.payload, Buffer.from([1, 2, 3, 4, 5, 6, 7]));
  assert.strictEqual(page.granulePosition, 20n);
  assert.deepStrictEqual(page.flags, { continued: false, beginningOfStream: true, endOfStream: false });
});

void test("writePages closes a page after a packet that ends one", () => {
  const pages = writePages(
    [packet(Buffer.from([1]), 0n, true), packet(Buffer.from([2]), 0n, true), packet(Buffer.from([3]), 960n)],
    { serial: 9, firstSequence: 4, endOfStream: true }
  );
  assert.deepStrictEqual(
    pages.map(page => [page.sequence, page.segments.length, page.flags.beginningOfStream, page.flags.endOfStream]),
    [
      [4, 1, true, false],
      [5, 1, false, false],
      [6, 1, false, true]
    ]
  );
  assert.strictEqual(expectDefined(pages[2]).granulePosition, 960n);
});

void test("writePages continues a packet that fills 255 segments onto a new page", () => {
  const data = Buffer.alloc(255 * 255, 0x33);
  const pages = writePages([packet(data, 480n, true)], { serial: 2, firstSequence: 1, endOfStream: false });

  assert.strictEqual(pages.length, 2);
  const [first, second] = [expectDefined(pages[0]), expectDefined(pages[1])];
  assert.strictEqual(first.segments.length, 255);
  assert.strictEqual(first.payload.length, 255 * 255);
  assert.strictEqual(first.flags.continued, false);
  assert.strictEqual(first.granulePosition, 0n);
  assert.deepStrictEqual(second.segments, [0]);
  assert.strictEqual(second.flags.continued, true);
  assert.strictEqual(second.granulePosition, 480n);
  assert.strictEqual(second.sequence, 2);
});

void test("writePages carries the last granule position over pages with no completed packet", () => {
  const pages = writePages(
    [packet(Buffer.from([1]), 100n, true), packet(Buffer.alloc(255 * 300, 7), 200n, true)],
    { serial: 2, firstSequence: 0, endOfStream: false }
  );
  assert.deepStrictEqual(
    pages.map(page => page.granulePosition),
    [100n, 100n, 200n]
  );
});

void test("writePages output parses back with valid checksums", () => {
  const inputs = [
    packet(Buffer.from("first"), 0n, true),
    packet(Buffer.alloc(700, 0x41), 0n, true),
    packet(Buffer.from([9, 8, 7]), 960n)
  ];
  const pages = writePages(inputs, { serial: 0xabcd, firstSequence: 0, endOfStream: true });
  const bytes = OggBinary.serializePages({ pages });
  const parsed = OggBinary.readPages({ data: bytes });

  assert.deepStrictEqual(
    parsed.map(page => page.checksum),
    pages.map(page => page.checksum)
  );
  const packets = reassemblePackets(parsed, { strict: true });
  assert.deepStrictEqual(
    packets.map(entry => entry.data),
    inputs.map(entry => entry.data)
  );
});

void test("writePages leaves an incomplete packet without its terminating segment", () => {
  const pages = writePages(
    [packet(Buffer.from([1]), 40n, true), { ...packet(Buffer.alloc(510, 2), 0xffffffffffffffffn, true), incomplete: true }],
    { serial: 2, firstSequence: 0, endOfStream: false }
  );
  assert.deepStrictEqual(
    pages.map(page => [page.segments, page.granulePosition]),
    [
      [[1], 40n],
      [[255, 255], 40n]
    ]
  );
});
