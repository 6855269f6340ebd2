/**
 * Framing constants for Ogg pages and Opus header packets.
 */

export const CAPTURE_PATTERN = 'OggS';
export const OGG_STREAM_VERSION = 0;
export const PAGE_HEADER_SIZE = 27;
export const CHECKSUM_OFFSET = 22;
export const MAX_SEGMENTS_PER_PAGE = 255;
export const MAX_SEGMENT_SIZE = 255;
/** 255 segments of 255 bytes. */
export const MAX_PAGE_PAYLOAD = MAX_SEGMENTS_PER_PAGE * MAX_SEGMENT_SIZE;

export const FLAG_CONTINUED = 0x01;
export const FLAG_BEGINNING_OF_STREAM = 0x02;
export const FLAG_END_OF_STREAM = 0x04;

/** Granule position of a page on which no packet completes. */
export const NO_GRANULE_POSITION = 0xffffffffffffffffn;

export const OPUS_HEAD_MAGIC = 'OpusHead';
export const OPUS_TAGS_MAGIC = 'OpusTags';

/** Reserved comment key holding base64 picture blocks. */
export const PICTURE_BLOCK_KEY = 'METADATA_BLOCK_PICTURE';
