/**
 * OpusTags packet codec: "OpusTags" magic followed by a Vorbis comment vector
 * with little-endian length fields.
 */

import { OPUS_TAGS_MAGIC } from './constants/opus.js';
import { BinaryReader, BinaryWriter, decodeUtf8 } from './utils/binary-serializer.js';
import type { CommentEntry, VorbisComment } from './types/vorbis-comment.js';
import { MalformedTagError } from './types/errors.js';

const MAGIC_BYTES: Buffer = Buffer.from(OPUS_TAGS_MAGIC, 'latin1');

/**
 * Splits a `KEY=VALUE` comment at its first `=`.
 * @throws {MalformedTagError} If the separator is missing
 */
export function splitComment(comment: string): CommentEntry {
  const separator = comment.indexOf('=');
  if (separator < 0) {
    throw new MalformedTagError(`Comment is not in KEY=VALUE form: "${comment}"`);
  }
  return { key: comment.slice(0, separator), value: comment.slice(separator + 1) };
}

/**
 * Parses an OpusTags packet.
 *
 * Data after the comment list is kept only when the least significant bit of
 * its first byte is set; otherwise it is padding.
 *
 * @param packet - Complete OpusTags packet including its magic
 * @returns Vendor string, ordered entries and any preserved trailer
 * @throws {MalformedTagError} If the magic is missing, a length overruns the packet or an entry lacks `=`
 * @throws {Utf8Error} If the vendor string or an entry is not valid UTF-8
 */
export function parseOpusTags(packet: Uint8Array): VorbisComment {
  const buffer = Buffer.isBuffer(packet) ? packet : Buffer.from(packet.buffer, packet.byteOffset, packet.byteLength);
  if (buffer.length < MAGIC_BYTES.length || !buffer.subarray(0, MAGIC_BYTES.length).equals(MAGIC_BYTES)) {
    throw new MalformedTagError('Packet does not start with the OpusTags signature');
  }

  const reader = new BinaryReader(buffer, 'le', (message: string) => new MalformedTagError(message), MAGIC_BYTES.length);
  const vendor = decodeUtf8(reader.readLengthPrefixed('Vendor string'), 'Vendor string');
  const count = reader.readUint32('Comment count');

  const entries: CommentEntry[] = [];
  for (let index = 0; index < count; index++) {
    const raw = reader.readLengthPrefixed(`Comment ${index}`);
    entries.push(splitComment(decodeUtf8(raw, `Comment ${index}`)));
  }

  const rest = reader.readRest();
  const trailer = rest.length > 0 && (rest[0] & 0x01) === 1 ? Buffer.from(rest) : Buffer.alloc(0);
  return { vendor, entries, trailer };
}

/**
 * Serializes a comment vector into an OpusTags packet. Inverse of {@link parseOpusTags}.
 *
 * @throws {MalformedTagError} If a key contains `=` or a field exceeds 32-bit lengths
 */
export function serializeOpusTags(comment: VorbisComment): Buffer {
  const writer = new BinaryWriter('le');
  writer.writeBytes(MAGIC_BYTES);
  try {
    writer.writeLengthPrefixed(Buffer.from(comment.vendor, 'utf8'));
    writer.writeUint32(comment.entries.length);
    for (const entry of comment.entries) {
      if (entry.key.includes('=')) {
        throw new MalformedTagError(`Comment key "${entry.key}" contains "="`);
      }
      writer.writeLengthPrefixed(Buffer.from(`${entry.key}=${entry.value}`, 'utf8'));
    }
  } catch (error) {
    if (error instanceof RangeError) {
      throw new MalformedTagError('Comment vector is too large for 32-bit length fields', error);
    }
    throw error;
  }
  writer.writeBytes(comment.trailer);
  return writer.getBuffer();
}
