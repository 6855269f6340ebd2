/**
 * METADATA_BLOCK_PICTURE codec.
 *
 * The block uses the FLAC PICTURE layout with big-endian fields, unlike the
 * little-endian comment vector that carries it, and is stored base64-encoded
 * as the value of a METADATA_BLOCK_PICTURE comment.
 */

import { isPictureType, MAX_PICTURE_TYPE, PictureType } from './constants/picture-types.js';
import { BinaryReader, BinaryWriter, decodeUtf8, isAscii } from './utils/binary-serializer.js';
import { sniffImageMime } from './utils/image-mime.js';
import type { PictureBlock } from './types/picture-block.js';
import { MalformedPictureError } from './types/errors.js';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}(?:==)?|[A-Za-z0-9+/]{3}=?)?$/;

/**
 * Options for {@link createPicture}. Dimensions default to 0 (unknown).
 */
export interface CreatePictureOptions {
  readonly pictureType?: PictureType;
  /** Sniffed from the data when omitted. */
  readonly mimeType?: string;
  readonly description?: string;
  readonly width?: number;
  readonly height?: number;
  readonly colorDepth?: number;
  readonly indexedColors?: number;
}

/**
 * Decodes a binary picture block.
 *
 * @param bytes - Block bytes (already base64-decoded)
 * @returns Parsed picture
 * @throws {MalformedPictureError} On truncated fields, an unknown picture type or a non-ASCII MIME type
 * @throws {Utf8Error} If the description is not valid UTF-8
 */
export function parsePictureBlock(bytes: Uint8Array): PictureBlock {
  const buffer = Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const reader = new BinaryReader(buffer, 'be', (message: string) => new MalformedPictureError(message));

  const rawType = reader.readUint32('Picture type');
  if (!isPictureType(rawType)) {
    throw new MalformedPictureError(`Picture type ${rawType} is greater than ${MAX_PICTURE_TYPE}`);
  }
  const mimeBytes = reader.readLengthPrefixed('MIME type');
  if (mimeBytes.some(byte => byte > 0x7f)) {
    throw new MalformedPictureError('MIME type is not ASCII');
  }
  const mimeType = mimeBytes.toString('latin1');
  const description = decodeUtf8(reader.readLengthPrefixed('Description'), 'Picture description');
  const width = reader.readUint32('Width');
  const height = reader.readUint32('Height');
  const colorDepth = reader.readUint32('Color depth');
  const indexedColors = reader.readUint32('Indexed color count');
  const data = Buffer.from(reader.readLengthPrefixed('Picture data'));

  return { pictureType: rawType, mimeType, description, width, height, colorDepth, indexedColors, data };
}

/**
 * Encodes a picture into the binary block layout.
 * @throws {MalformedPictureError} If the MIME type is not ASCII or a field does not fit in 32 bits
 */
export function serializePictureBlock(picture: PictureBlock): Buffer {
  if (!isAscii(picture.mimeType)) {
    throw new MalformedPictureError(`MIME type "${picture.mimeType}" is not ASCII`);
  }
  const writer = new BinaryWriter('be', 64 + picture.data.length);
  try {
    writer.writeUint32(picture.pictureType);
    writer.writeLengthPrefixed(Buffer.from(picture.mimeType, 'latin1'));
    writer.writeLengthPrefixed(Buffer.from(picture.description, 'utf8'));
    writer.writeUint32(picture.width);
    writer.writeUint32(picture.height);
    writer.writeUint32(picture.colorDepth);
    writer.writeUint32(picture.indexedColors);
    writer.writeLengthPrefixed(picture.data);
  } catch (error) {
    if (error instanceof RangeError) {
      throw new MalformedPictureError(`Picture field out of range: ${error.message}`, error);
    }
    throw error;
  }
  return writer.getBuffer();
}

/**
 * Encodes a picture as the value of a METADATA_BLOCK_PICTURE comment
 * (standard alphabet, padded).
 */
export function pictureToBase64(picture: PictureBlock): string {
  return serializePictureBlock(picture).toString('base64');
}

/**
 * Decodes the value of a METADATA_BLOCK_PICTURE comment.
 * Unpadded input is accepted.
 *
 * @throws {MalformedPictureError} If the value is not base64 or the block is malformed
 */
export function pictureFromBase64(value: string): PictureBlock {
  if (!BASE64_PATTERN.test(value)) {
    throw new MalformedPictureError('Picture comment is not valid base64');
  }
  return parsePictureBlock(Buffer.from(value, 'base64'));
}

/**
 * Builds a picture from raw image bytes.
 *
 * @param data - Image file contents
 * @param options - Picture metadata; the type defaults to Cover (front)
 * @throws {MalformedPictureError} If no MIME type is given and none can be sniffed
 */
export function createPicture(data: Uint8Array, options: CreatePictureOptions = {}): PictureBlock {
  const buffer = Buffer.from(data);
  const mimeType = options.mimeType ?? sniffImageMime(buffer);
  if (mimeType === null) {
    throw new MalformedPictureError('Unable to determine the MIME type of the picture data');
  }
  return {
    pictureType: options.pictureType ?? PictureType.CoverFront,
    mimeType,
    description: options.description ?? '',
    width: options.width ?? 0,
    height: options.height ?? 0,
    colorDepth: options.colorDepth ?? 0,
    indexedColors: options.indexedColors ?? 0,
    data: buffer,
  };
}
