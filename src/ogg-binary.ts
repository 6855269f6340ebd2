/**
 * Ogg page binary helpers.
 */
import {
  CAPTURE_PATTERN,
  CHECKSUM_OFFSET,
  FLAG_BEGINNING_OF_STREAM,
  FLAG_CONTINUED,
  FLAG_END_OF_STREAM,
  MAX_SEGMENTS_PER_PAGE,
  OGG_STREAM_VERSION,
  PAGE_HEADER_SIZE,
} from './constants/opus.js';
import { computePageChecksum } from './ogg-crc.js';
import type { OggPage, OggPageFlags } from './types/ogg-page.js';
import { MalformedContainerError } from './types/errors.js';

const VERSION_OFFSET = 4;
const HEADER_TYPE_OFFSET = 5;
const GRANULE_OFFSET = 6;
const SERIAL_OFFSET = 14;
const SEQUENCE_OFFSET = 18;
const SEGMENT_COUNT_OFFSET = 26;

function toBuffer(data: Uint8Array): Buffer {
  return Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

function decodeFlags(headerType: number): OggPageFlags {
  return {
    continued: (headerType & FLAG_CONTINUED) !== 0,
    beginningOfStream: (headerType & FLAG_BEGINNING_OF_STREAM) !== 0,
    endOfStream: (headerType & FLAG_END_OF_STREAM) !== 0,
  };
}

function encodeFlags(flags: OggPageFlags): number {
  return (flags.continued ? FLAG_CONTINUED : 0)
    | (flags.beginningOfStream ? FLAG_BEGINNING_OF_STREAM : 0)
    | (flags.endOfStream ? FLAG_END_OF_STREAM : 0);
}

/**
 * Validates the capture pattern at an expected page boundary.
 * @throws {MalformedContainerError} If "OggS" is not present at the offset
 */
function ensureCapturePattern(buffer: Buffer, offset: number): void {
  if (offset + 4 > buffer.length || buffer.toString('latin1', offset, offset + 4) !== CAPTURE_PATTERN) {
    throw new MalformedContainerError(`Missing Ogg capture pattern at offset ${offset}`);
  }
}

/**
 * Parses one page starting at `offset` and verifies its checksum.
 *
 * @param buffer - Whole input
 * @param offset - Offset of the capture pattern
 * @returns The page and the offset just past it
 * @throws {MalformedContainerError} If the page is truncated, has an unknown version or a bad checksum
 */
function parsePage(buffer: Buffer, offset: number): { readonly page: OggPage; readonly next: number } {
  ensureCapturePattern(buffer, offset);
  if (offset + PAGE_HEADER_SIZE > buffer.length) {
    throw new MalformedContainerError(`Truncated page header at offset ${offset}`);
  }

  const version: number = buffer.readUInt8(offset + VERSION_OFFSET);
  if (version !== OGG_STREAM_VERSION) {
    throw new MalformedContainerError(`Unsupported Ogg stream structure version ${version} at offset ${offset}`);
  }

  const segmentCount: number = buffer.readUInt8(offset + SEGMENT_COUNT_OFFSET);
  const tableStart = offset + PAGE_HEADER_SIZE;
  if (tableStart + segmentCount > buffer.length) {
    throw new MalformedContainerError(`Segment table runs past end of input at offset ${offset}`);
  }
  const segments: number[] = Array.from(buffer.subarray(tableStart, tableStart + segmentCount));
  const payloadLength = segments.reduce((sum, length) => sum + length, 0);
  const payloadStart = tableStart + segmentCount;
  const end = payloadStart + payloadLength;
  if (end > buffer.length) {
    throw new MalformedContainerError(`Page payload runs past end of input at offset ${offset}: needs ${payloadLength} bytes, ${buffer.length - payloadStart} available`);
  }

  const checksum: number = buffer.readUInt32LE(offset + CHECKSUM_OFFSET);
  const computed = computePageChecksum(buffer.subarray(offset, end));
  if (computed !== checksum) {
    throw new MalformedContainerError(`Checksum mismatch at offset ${offset}: stored 0x${checksum.toString(16)}, computed 0x${computed.toString(16)}`);
  }

  const page: OggPage = {
    version,
    flags: decodeFlags(buffer.readUInt8(offset + HEADER_TYPE_OFFSET)),
    granulePosition: buffer.readBigUInt64LE(offset + GRANULE_OFFSET),
    serial: buffer.readUInt32LE(offset + SERIAL_OFFSET),
    sequence: buffer.readUInt32LE(offset + SEQUENCE_OFFSET),
    checksum,
    segments,
    payload: buffer.subarray(payloadStart, end),
    offset,
  };
  return { page, next: end };
}

/**
 * Ogg container processing utilities.
 * Reads byte streams into pages and writes pages back to bytes.
 */
export class OggBinary {
  /** Error class for container-level failures. */
  static readonly Error: typeof MalformedContainerError = MalformedContainerError;

  /**
   * Parses a complete Ogg byte stream into its pages.
   * Pages must follow each other back to back; every checksum is verified.
   *
   * @param data - Entire file contents
   * @returns Pages in file order
   * @throws {MalformedContainerError} If the input is empty, a page is missing, truncated or corrupt
   */
  static readPages({ data }: { readonly data: Uint8Array }): OggPage[] {
    const buffer: Buffer = toBuffer(data);
    if (buffer.length === 0) {
      throw new MalformedContainerError('Input is empty');
    }
    const pages: OggPage[] = [];
    let offset = 0;
    while (offset < buffer.length) {
      const { page, next } = parsePage(buffer, offset);
      pages.push(page);
      offset = next;
    }
    return pages;
  }

  /**
   * Serializes one page, computing its checksum after every other field is in place.
   * The stored `checksum` of the page is ignored.
   *
   * @param page - Page to encode
   * @returns Page bytes
   * @throws {MalformedContainerError} If the segment table does not describe the payload
   */
  static serializePage({ page }: { readonly page: OggPage }): Buffer {
    if (page.segments.length > MAX_SEGMENTS_PER_PAGE) {
      throw new MalformedContainerError(`Page ${page.sequence} has ${page.segments.length} segments`);
    }
    const payloadLength = page.segments.reduce((sum, length) => sum + length, 0);
    if (payloadLength !== page.payload.length) {
      throw new MalformedContainerError(`Page ${page.sequence} segment table describes ${payloadLength} bytes but payload holds ${page.payload.length}`);
    }

    const tableStart = PAGE_HEADER_SIZE;
    const payloadStart = tableStart + page.segments.length;
    const buffer: Buffer = Buffer.alloc(payloadStart + payloadLength);

    buffer.write(CAPTURE_PATTERN, 0, 'latin1');
    buffer.writeUInt8(page.version, VERSION_OFFSET);
    buffer.writeUInt8(encodeFlags(page.flags), HEADER_TYPE_OFFSET);
    buffer.writeBigUInt64LE(page.granulePosition, GRANULE_OFFSET);
    buffer.writeUInt32LE(page.serial >>> 0, SERIAL_OFFSET);
    buffer.writeUInt32LE(page.sequence >>> 0, SEQUENCE_OFFSET);
    buffer.writeUInt32LE(0, CHECKSUM_OFFSET);
    buffer.writeUInt8(page.segments.length, SEGMENT_COUNT_OFFSET);
    page.segments.forEach((length, index) => buffer.writeUInt8(length, tableStart + index));
    page.payload.copy(buffer, payloadStart);

    buffer.writeUInt32LE(computePageChecksum(buffer), CHECKSUM_OFFSET);
    return buffer;
  }

  /**
   * Flattens pages to a single byte stream.
   *
   * @param pages - Pages in output order
   * @returns Concatenated page bytes
   */
  static serializePages({ pages }: { readonly pages: readonly OggPage[] }): Buffer {
    return Buffer.concat(pages.map((page: OggPage) => OggBinary.serializePage({ page })));
  }
}
