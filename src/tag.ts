/**
 * Tag facade - loads the comment vector of an Ogg Opus file, edits it in memory
 * and rewrites the file with a new OpusTags packet.
 */

import { PAGE_HEADER_SIZE, MAX_SEGMENT_SIZE, PICTURE_BLOCK_KEY } from './constants/opus.js';
import type { PictureType } from './constants/picture-types.js';
import { parseOpusTags, serializeOpusTags } from './comment-codec.js';
import { OggBinary } from './ogg-binary.js';
import { findOpusStream } from './packet-reassembler.js';
import { writePages } from './page-writer.js';
import type { WritablePacket } from './page-writer.js';
import { pictureFromBase64, pictureToBase64 } from './picture.js';
import type { OggPage } from './types/ogg-page.js';
import type { CodecOptions, WarningSink } from './types/options.js';
import { defaultWarningSink } from './types/options.js';
import type { PictureBlock } from './types/picture-block.js';
import type { CommentEntry, VorbisComment } from './types/vorbis-comment.js';
import { MalformedPictureError, MalformedTagError } from './types/errors.js';

const PICTURE_KEY_FOLDED = PICTURE_BLOCK_KEY.toLowerCase();

/** ASCII-only case folding used for key lookups. */
function foldKey(key: string): string {
  return key.replace(/[A-Z]/g, letter => letter.toLowerCase());
}

function ensureTextKey(key: string): void {
  if (key.includes('=')) {
    throw new MalformedTagError(`Comment key "${key}" contains "="`);
  }
  if (foldKey(key) === PICTURE_KEY_FOLDED) {
    throw new MalformedTagError(`${PICTURE_BLOCK_KEY} is reserved for pictures`);
  }
}

const ignoreWarning: WarningSink = () => undefined;

function countTerminators(page: OggPage): number {
  return page.segments.filter(length => length < MAX_SEGMENT_SIZE).length;
}

function pageBytes(source: Buffer, page: OggPage): Buffer {
  return source.subarray(page.offset, page.offset + PAGE_HEADER_SIZE + page.segments.length + page.payload.length);
}

/**
 * In-memory Opus comment set: vendor string, ordered `KEY=VALUE` entries and
 * the pictures stored under METADATA_BLOCK_PICTURE.
 *
 * Lookups are case-insensitive; keys keep the case they were stored with.
 */
export class OpusTag {
  private vendorString: string;
  private commentEntries: CommentEntry[];
  private readonly trailer: Buffer;
  /** Recoverable framing problems seen while loading. */
  readonly warnings: readonly string[];

  constructor(comment?: VorbisComment, warnings: readonly string[] = []) {
    this.vendorString = comment?.vendor ?? '';
    this.commentEntries = comment ? [...comment.entries] : [];
    this.trailer = comment ? Buffer.from(comment.trailer) : Buffer.alloc(0);
    this.warnings = warnings;
  }

  /**
   * Reads the tag of an Ogg Opus stream.
   *
   * @param data - Entire file contents
   * @param options - Reassembly strictness and warning hook
   * @returns Tag holding the parsed comment vector
   * @throws {MalformedContainerError} If the Ogg framing is broken
   * @throws {NotOpusStreamError} If no Opus stream with an OpusTags packet is present
   * @throws {MalformedTagError} If the comment vector is malformed
   * @throws {MalformedPictureError} If a picture entry cannot be decoded
   * @throws {Utf8Error} If text fields are not valid UTF-8
   */
  static load(data: Uint8Array, options: CodecOptions = {}): OpusTag {
    const warnings: string[] = [];
    const forward = options.onWarning ?? defaultWarningSink;
    const onWarning = (message: string): void => {
      warnings.push(message);
      forward(message);
    };

    const pages = OggBinary.readPages({ data });
    const stream = findOpusStream(pages, { ...options, onWarning });
    const comment = parseOpusTags(stream.packets[1].data);

    comment.entries.forEach((entry, index) => {
      if (foldKey(entry.key) !== PICTURE_KEY_FOLDED) return;
      try {
        pictureFromBase64(entry.value);
      } catch (error) {
        if (error instanceof MalformedPictureError) {
          throw new MalformedPictureError(`Comment ${index} (${entry.key}): ${error.message}`, error);
        }
        throw error;
      }
    });

    return new OpusTag(comment, warnings);
  }

  /**
   * Produces a copy of `original` carrying this tag. Only the OpusTags packet
   * changes; every other packet keeps its bytes. Pages of the Opus stream are
   * rewritten with new sequence numbers and checksums; pages of other logical
   * streams are copied as they are.
   *
   * @param original - The file the tag was loaded from (not modified)
   * @param options - Reassembly strictness and warning hook; warnings are dropped without a hook
   * @returns New file contents
   */
  save(original: Uint8Array, options: CodecOptions = {}): Buffer {
    const source = Buffer.from(original.buffer, original.byteOffset, original.byteLength);
    const pages = OggBinary.readPages({ data: source });
    // Load already reported framing warnings to the default sink.
    const stream = findOpusStream(pages, { strict: options.strict, onWarning: options.onWarning ?? ignoreWarning });
    const tagsPacket = serializeOpusTags(this.comment());

    // Header packets each end their own page so audio starts on a fresh one.
    const packets: WritablePacket[] = stream.packets.map((packet, index) => {
      if (index === 1) return { ...packet, data: tagsPacket, endsPage: true };
      if (index === 0) return { ...packet, endsPage: true };
      return packet;
    });
    const rewritten = writePages(packets, {
      serial: stream.serial,
      firstSequence: stream.firstSequence,
      endOfStream: stream.endOfStream,
    });

    // Foreign pages follow the same number of completed Opus packets as before.
    const ownPages = new Set(stream.pageIndices);
    const foreign: { readonly anchor: number; readonly bytes: Buffer }[] = [];
    pages.forEach((page, index) => {
      if (ownPages.has(index)) return;
      const anchor = stream.packets.filter(packet => !packet.incomplete && packet.lastPage < index).length;
      foreign.push({ anchor, bytes: pageBytes(source, page) });
    });

    const output: Buffer[] = [];
    let completed = 0;
    let next = 0;
    for (const page of rewritten) {
      while (next < foreign.length && foreign[next].anchor <= completed) {
        output.push(foreign[next].bytes);
        next++;
      }
      output.push(OggBinary.serializePage({ page }));
      completed += countTerminators(page);
    }
    for (; next < foreign.length; next++) {
      output.push(foreign[next].bytes);
    }
    return Buffer.concat(output);
  }

  get vendor(): string {
    return this.vendorString;
  }

  set vendor(vendor: string) {
    this.vendorString = vendor;
  }

  /**
   * All values stored under a key, in order.
   */
  get(key: string): string[] {
    const folded = foldKey(key);
    return this.commentEntries.filter(entry => foldKey(entry.key) === folded).map(entry => entry.value);
  }

  getOne(key: string): string | undefined {
    return this.get(key)[0];
  }

  /**
   * Replaces every value of a key with a single value. The entry keeps the
   * position of the key's first occurrence, or is appended.
   */
  set(key: string, value: string): void {
    this.setAll(key, [value]);
  }

  /**
   * Replaces every value of a key.
   *
   * @returns The values that were replaced
   */
  setAll(key: string, values: readonly string[]): string[] {
    ensureTextKey(key);
    const folded = foldKey(key);
    const position = this.commentEntries.findIndex(entry => foldKey(entry.key) === folded);
    const removed = this.remove(key);
    const replacement: CommentEntry[] = values.map(value => ({ key, value }));
    if (position < 0) {
      this.commentEntries.push(...replacement);
    } else {
      this.commentEntries.splice(position, 0, ...replacement);
    }
    return removed;
  }

  add(key: string, value: string): void {
    ensureTextKey(key);
    this.commentEntries.push({ key, value });
  }

  addMany(key: string, values: readonly string[]): void {
    ensureTextKey(key);
    this.commentEntries.push(...values.map(value => ({ key, value })));
  }

  /**
   * Removes every entry of a key.
   *
   * @returns The removed values
   */
  remove(key: string): string[] {
    const folded = foldKey(key);
    const removed: string[] = [];
    this.commentEntries = this.commentEntries.filter(entry => {
      if (foldKey(entry.key) !== folded) return true;
      removed.push(entry.value);
      return false;
    });
    return removed;
  }

  /**
   * Text entries in stored order, excluding picture entries.
   */
  entries(): CommentEntry[] {
    return this.commentEntries.filter(entry => foldKey(entry.key) !== PICTURE_KEY_FOLDED).map(entry => ({ ...entry }));
  }

  /**
   * Distinct text keys, in the case of their first occurrence.
   */
  keys(): string[] {
    const seen = new Map<string, string>();
    for (const entry of this.entries()) {
      const folded = foldKey(entry.key);
      if (!seen.has(folded)) seen.set(folded, entry.key);
    }
    return Array.from(seen.values());
  }

  /**
   * Snapshot of the full comment vector, pictures included.
   */
  comment(): VorbisComment {
    return {
      vendor: this.vendorString,
      entries: this.commentEntries.map(entry => ({ ...entry })),
      trailer: Buffer.from(this.trailer),
    };
  }

  pictures(): PictureBlock[] {
    return this.pictureEntryIndices().map(index => pictureFromBase64(this.commentEntries[index].value));
  }

  hasPictures(): boolean {
    return this.pictureEntryIndices().length > 0;
  }

  /**
   * Appends a picture as a new METADATA_BLOCK_PICTURE entry.
   * @throws {MalformedPictureError} If the picture cannot be encoded
   */
  addPicture(picture: PictureBlock): void {
    this.commentEntries.push({ key: PICTURE_BLOCK_KEY, value: pictureToBase64(picture) });
  }

  /**
   * Adds a picture after removing the first picture of the same type.
   *
   * @returns The picture that was replaced, or null
   */
  setPicture(picture: PictureBlock): PictureBlock | null {
    const value = pictureToBase64(picture);
    const removed = this.removePictureType(picture.pictureType);
    this.commentEntries.push({ key: PICTURE_BLOCK_KEY, value });
    return removed;
  }

  /**
   * Removes the picture at a position of {@link pictures}.
   *
   * @returns The removed picture, or null when the index is out of range
   */
  removePicture(index: number): PictureBlock | null {
    const indices = this.pictureEntryIndices();
    if (!Number.isInteger(index) || index < 0 || index >= indices.length) return null;
    const [entry] = this.commentEntries.splice(indices[index], 1);
    return pictureFromBase64(entry.value);
  }

  getPictureType(pictureType: PictureType): PictureBlock | null {
    return this.pictures().find(picture => picture.pictureType === pictureType) ?? null;
  }

  /**
   * Removes the first picture of a type.
   *
   * @returns The removed picture, or null when none has that type
   */
  removePictureType(pictureType: PictureType): PictureBlock | null {
    const index = this.pictures().findIndex(picture => picture.pictureType === pictureType);
    return index < 0 ? null : this.removePicture(index);
  }

  private pictureEntryIndices(): number[] {
    const indices: number[] = [];
    this.commentEntries.forEach((entry, index) => {
      if (foldKey(entry.key) === PICTURE_KEY_FOLDED) indices.push(index);
    });
    return indices;
  }
}

/**
 * Reads the tag of an Ogg Opus file. See {@link OpusTag.load}.
 */
export function loadTag(data: Uint8Array, options?: CodecOptions): OpusTag {
  return OpusTag.load(data, options);
}

/**
 * Writes `tag` into a copy of `original`. See {@link OpusTag.save}.
 */
export function saveTag(tag: OpusTag, original: Uint8Array, options?: CodecOptions): Buffer {
  return tag.save(original, options);
}
