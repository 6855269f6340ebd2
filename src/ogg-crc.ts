/**
 * Ogg page checksum: CRC-32 with generator 0x04c11db7, unreflected,
 * zero initial value and no final XOR.
 */
import { CHECKSUM_OFFSET } from './constants/opus.js';

const OGG_CRC_POLYNOMIAL = 0x04c11db7;

function buildTable(): Uint32Array {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let crc = n << 24;
    for (let k = 0; k < 8; k++) {
      crc = (crc & 0x80000000) ? ((crc << 1) ^ OGG_CRC_POLYNOMIAL) : (crc << 1);
    }
    table[n] = crc >>> 0;
  }
  return table;
}

const OGG_CRC_TABLE: Readonly<Uint32Array> = buildTable();

function step(crc: number, byte: number): number {
  return ((crc << 8) ^ OGG_CRC_TABLE[((crc >>> 24) ^ byte) & 0xff]) >>> 0;
}

/**
 * Computes the Ogg CRC over a byte range.
 *
 * @param bytes - Data to checksum
 * @returns Unsigned 32-bit checksum
 */
export function oggChecksum(bytes: Uint8Array): number {
  let crc = 0;
  for (let i = 0; i < bytes.length; i++) {
    crc = step(crc, bytes[i]);
  }
  return crc;
}

/**
 * Computes the checksum of a serialized page as if its checksum field were zero.
 * The input is not modified.
 *
 * @param pageBytes - Complete page: header, segment table and payload
 */
export function computePageChecksum(pageBytes: Uint8Array): number {
  let crc = 0;
  for (let i = 0; i < pageBytes.length; i++) {
    const inChecksumField = i >= CHECKSUM_OFFSET && i < CHECKSUM_OFFSET + 4;
    crc = step(crc, inChecksumField ? 0 : pageBytes[i]);
  }
  return crc;
}
