/**
 * Ogg Opus tags - Main entry point
 *
 * Reads and rewrites the comment header of Ogg Opus files without touching the audio packets.
 */

// Tag facade
export { OpusTag, loadTag, saveTag } from './tag.js';

// Codecs
export { parseOpusTags, serializeOpusTags, splitComment } from './comment-codec.js';
export { parsePictureBlock, serializePictureBlock, pictureFromBase64, pictureToBase64, createPicture } from './picture.js';
export type { CreatePictureOptions } from './picture.js';

// Container layers
export { OggBinary } from './ogg-binary.js';
export { oggChecksum, computePageChecksum } from './ogg-crc.js';
export { reassemblePackets, findOpusStream } from './packet-reassembler.js';
export type { OpusStream } from './packet-reassembler.js';
export { writePages, lacePacket } from './page-writer.js';
export type { PageWriterOptions, WritablePacket } from './page-writer.js';

// Types and constants
export { PictureType, pictureTypeLabel, isPictureType } from './constants/picture-types.js';
export { PICTURE_BLOCK_KEY } from './constants/opus.js';
export type { OggPage, OggPageFlags } from './types/ogg-page.js';
export type { OpusPacket } from './types/opus-packet.js';
export type { CommentEntry, VorbisComment } from './types/vorbis-comment.js';
export type { PictureBlock } from './types/picture-block.js';
export type { CodecOptions } from './types/options.js';
export {
  OpusTagError,
  MalformedContainerError,
  NotOpusStreamError,
  MalformedTagError,
  MalformedPictureError,
  Utf8Error,
  isOpusTagError,
} from './types/errors.js';
export type { OpusTagErrorKind } from './types/errors.js';
