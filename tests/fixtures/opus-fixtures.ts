import { oggChecksum } from "../../src/ogg-crc.js";

const textEncoder = new TextEncoder();

export interface PageFixture {
  serial?: number;
  sequence: number;
  granule?: bigint;
  continued?: boolean;
  bos?: boolean;
  eos?: boolean;
  segments: number[];
  payload: Uint8Array;
}

/**
 * Lacing values for a complete packet.
 */
export const lacing = (length: number): number[] => {
  const laces: number[] = [];
  let remaining = length;
  while (remaining >= 255) {
    laces.push(255);
    remaining -= 255;
  }
  laces.push(remaining);
  return laces;
};

export const buildPage = (fixture: PageFixture): Buffer => {
  const headerLength = 27 + fixture.segments.length;
  const page = Buffer.alloc(headerLength + fixture.payload.length);
  page.write("OggS", 0, "latin1");
  page[4] = 0;
  page[5] = (fixture.continued ? 1 : 0) | (fixture.bos ? 2 : 0) | (fixture.eos ? 4 : 0);
  page.writeBigUInt64LE(fixture.granule ?? 0n, 6);
  page.writeUInt32LE(fixture.serial ?? 0x1234, 14);
  page.writeUInt32LE(fixture.sequence, 18);
  page.writeUInt32LE(0, 22);
  page[26] = fixture.segments.length;
  fixture.segments.forEach((length, index) => {
    page[27 + index] = length;
  });
  page.set(fixture.payload, headerLength);
  page.writeUInt32LE(oggChecksum(page), 22);
  return page;
};

/**
 * Page carrying complete packets only.
 */
export const buildPacketPage = (
  packets: Uint8Array[],
  fixture: Omit<PageFixture, "segments" | "payload">
): Buffer =>
  buildPage({
    ...fixture,
    segments: packets.flatMap(packet => lacing(packet.length)),
    payload: Buffer.concat(packets)
  });

export const buildOpusHead = (): Buffer => {
  const head = Buffer.alloc(19);
  head.write("OpusHead", 0, "latin1");
  head[8] = 1;
  head[9] = 2;
  head.writeUInt16LE(312, 10);
  head.writeUInt32LE(48000, 12);
  head.writeInt16LE(0, 16);
  head[18] = 0;
  return head;
};

export const buildOpusTags = (vendor: string, comments: string[], trailer: number[] = []): Buffer => {
  const parts: number[] = [];
  const pushUint32 = (value: number): void => {
    parts.push(value & 0xff, (value >> 8) & 0xff, (value >> 16) & 0xff, (value >>> 24) & 0xff);
  };
  parts.push(...textEncoder.encode("OpusTags"));
  const vendorBytes = textEncoder.encode(vendor);
  pushUint32(vendorBytes.length);
  parts.push(...vendorBytes);
  pushUint32(comments.length);
  comments.forEach(comment => {
    const bytes = textEncoder.encode(comment);
    pushUint32(bytes.length);
    parts.push(...bytes);
  });
  parts.push(...trailer);
  return Buffer.from(parts);
};

export const AUDIO_PACKET = Buffer.from([0xfc, 0xff, 0xfe, 0x01, 0x02]);

export interface OpusFileFixture {
  bytes: Buffer;
  head: Buffer;
  tags: Buffer;
  audio: Buffer[];
}

/**
 * Three pages: OpusHead, OpusTags (vendor "test", TITLE=Song) and one audio page.
 */
export const createMinimalOpusFile = (comments: string[] = ["TITLE=Song"]): OpusFileFixture => {
  const head = buildOpusHead();
  const tags = buildOpusTags("test", comments);
  const bytes = Buffer.concat([
    buildPacketPage([head], { sequence: 0, bos: true }),
    buildPacketPage([tags], { sequence: 1 }),
    buildPacketPage([AUDIO_PACKET], { sequence: 2, granule: 960n, eos: true })
  ]);
  return { bytes, head, tags, audio: [AUDIO_PACKET] };
};

/**
 * OpusHead, OpusTags, then two audio pages: one holding two packets and one
 * holding a 600-byte packet.
 */
export const createMultiPacketOpusFile = (): OpusFileFixture => {
  const head = buildOpusHead();
  const tags = buildOpusTags("test", ["TITLE=Song", "ARTIST=Someone"]);
  const first = Buffer.from([0x08, 0x01, 0x02]);
  const second = Buffer.from([0x08, 0x03, 0x04, 0x05]);
  const large = Buffer.alloc(600, 0x5a);
  const bytes = Buffer.concat([
    buildPacketPage([head], { sequence: 0, bos: true }),
    buildPacketPage([tags], { sequence: 1 }),
    buildPacketPage([first, second], { sequence: 2, granule: 1920n }),
    buildPacketPage([large], { sequence: 3, granule: 2880n, eos: true })
  ]);
  return { bytes, head, tags, audio: [first, second, large] };
};

export const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
