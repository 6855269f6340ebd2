/**
 * Length-prefixed binary reading and writing shared by the comment and picture codecs.
 * Vorbis comments use little-endian lengths, picture blocks big-endian ones.
 */

import { Utf8Error } from '../types/errors.js';

export type Endianness = 'le' | 'be';

const MAX_UINT32 = 0xffffffff;
const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Growable output buffer.
 */
export class BinaryWriter {
  private buffer: Buffer;
  private offset: number;

  constructor(private readonly endianness: Endianness, initialSize = 1024) {
    this.buffer = Buffer.alloc(initialSize);
    this.offset = 0;
  }

  writeUint32(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > MAX_UINT32) {
      throw new RangeError(`Value ${value} does not fit in 32 bits`);
    }
    this.ensureCapacity(4);
    if (this.endianness === 'le') {
      this.buffer.writeUInt32LE(value, this.offset);
    } else {
      this.buffer.writeUInt32BE(value, this.offset);
    }
    this.offset += 4;
  }

  writeBytes(bytes: Uint8Array): void {
    this.ensureCapacity(bytes.length);
    this.buffer.set(bytes, this.offset);
    this.offset += bytes.length;
  }

  /**
   * Writes a 32-bit length followed by the bytes.
   */
  writeLengthPrefixed(bytes: Uint8Array): void {
    this.writeUint32(bytes.length);
    this.writeBytes(bytes);
  }

  private ensureCapacity(additionalBytes: number): void {
    const requiredSize = this.offset + additionalBytes;
    if (requiredSize > this.buffer.length) {
      const newSize = Math.max(requiredSize, this.buffer.length * 2);
      const newBuffer = Buffer.alloc(newSize);
      this.buffer.copy(newBuffer);
      this.buffer = newBuffer;
    }
  }

  getBuffer(): Buffer {
    return Buffer.from(this.buffer.subarray(0, this.offset));
  }
}

/**
 * Bounds-checked cursor over a buffer. Running past the end raises the error
 * produced by `onTruncated`, so each codec reports its own failure type.
 */
export class BinaryReader {
  private offset: number;

  constructor(
    private readonly buffer: Buffer,
    private readonly endianness: Endianness,
    private readonly onTruncated: (message: string) => Error,
    startOffset = 0
  ) {
    this.offset = startOffset;
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  readUint32(field: string): number {
    this.require(4, field);
    const value = this.endianness === 'le'
      ? this.buffer.readUInt32LE(this.offset)
      : this.buffer.readUInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  readBytes(length: number, field: string): Buffer {
    this.require(length, field);
    const bytes = this.buffer.subarray(this.offset, this.offset + length);
    this.offset += length;
    return bytes;
  }

  /**
   * Reads a 32-bit length and that many bytes.
   */
  readLengthPrefixed(field: string): Buffer {
    const length = this.readUint32(`${field} length`);
    return this.readBytes(length, field);
  }

  readRest(): Buffer {
    return this.readBytes(this.remaining, 'trailing data');
  }

  private require(length: number, field: string): void {
    if (this.offset + length > this.buffer.length) {
      throw this.onTruncated(`${field} needs ${length} bytes at offset ${this.offset} but only ${this.remaining} remain`);
    }
  }
}

/**
 * Strict UTF-8 decoding.
 * @throws {Utf8Error} If the bytes are not valid UTF-8
 */
export function decodeUtf8(bytes: Uint8Array, field: string): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch (error) {
    throw new Utf8Error(`${field} is not valid UTF-8`, error);
  }
}

export function isAscii(text: string): boolean {
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) > 0x7f) return false;
  }
  return true;
}
