/**
 * A single Ogg page with its framing fields and payload preserved.
 */

export interface OggPageFlags {
  /** The page opens in the middle of a packet begun on an earlier page. */
  readonly continued: boolean;
  /** First page of a logical stream. */
  readonly beginningOfStream: boolean;
  /** Last page of a logical stream. */
  readonly endOfStream: boolean;
}

export interface OggPage {
  readonly version: number;
  readonly flags: OggPageFlags;
  /** Opaque 64-bit position; all ones means no packet completes on the page. */
  readonly granulePosition: bigint;
  readonly serial: number;
  readonly sequence: number;
  readonly checksum: number;
  /** Lacing values, 0–255 entries of 0–255 each. */
  readonly segments: readonly number[];
  readonly payload: Buffer;
  /** Byte offset of the capture pattern in the source, or -1 for pages built in memory. */
  readonly offset: number;
}
