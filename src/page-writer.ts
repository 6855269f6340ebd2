/**
 * Page writer - re-segments packets into Ogg pages with fresh sequence numbers
 * and checksums.
 */

import { CHECKSUM_OFFSET, MAX_SEGMENT_SIZE, MAX_SEGMENTS_PER_PAGE, OGG_STREAM_VERSION } from './constants/opus.js';
import { OggBinary } from './ogg-binary.js';
import type { OggPage } from './types/ogg-page.js';
import type { OpusPacket } from './types/opus-packet.js';

/**
 * Stream-level facts the writer cannot derive from the packets themselves.
 */
export interface PageWriterOptions {
  readonly serial: number;
  /** Sequence number given to the first page written. */
  readonly firstSequence: number;
  /** Set end-of-stream on the final page. */
  readonly endOfStream: boolean;
}

/**
 * Packet data and the page-break hints the writer honours. An incomplete
 * packet is written without its terminating lacing value.
 */
export type WritablePacket = Pick<OpusPacket, 'data' | 'granulePosition' | 'endsPage'> & {
  readonly incomplete?: boolean;
};

interface DraftPage {
  readonly continued: boolean;
  readonly segments: number[];
  readonly chunks: Buffer[];
  granulePosition: bigint | null;
}

/**
 * Lacing values for a packet: 255 for each full segment, then one terminating
 * value of 0–254. A length that is a multiple of 255 ends with a 0 segment.
 */
export function lacePacket(length: number): number[] {
  const laces: number[] = new Array<number>(Math.floor(length / MAX_SEGMENT_SIZE)).fill(MAX_SEGMENT_SIZE);
  laces.push(length % MAX_SEGMENT_SIZE);
  return laces;
}

function finalizePage(draft: DraftPage, index: number, isLast: boolean, granulePosition: bigint, options: PageWriterOptions): OggPage {
  const page: OggPage = {
    version: OGG_STREAM_VERSION,
    flags: {
      continued: draft.continued,
      beginningOfStream: index === 0,
      endOfStream: isLast && options.endOfStream,
    },
    granulePosition,
    serial: options.serial,
    sequence: (options.firstSequence + index) >>> 0,
    checksum: 0,
    segments: draft.segments,
    payload: Buffer.concat(draft.chunks),
    offset: -1,
  };
  const checksum = OggBinary.serializePage({ page }).readUInt32LE(CHECKSUM_OFFSET);
  return { ...page, checksum };
}

/**
 * Packs packets into pages.
 *
 * A page is closed when it holds 255 segments, or after a packet whose
 * `endsPage` is set. A page on which a packet completes takes the granule
 * position of the last packet completing on it; otherwise the last known
 * granule position (initially 0) is carried forward. An incomplete packet
 * leaves its last page ending on a 255 segment, as it was read.
 *
 * @param packets - Packets of one logical stream, in order
 * @param options - Serial, first sequence number and end-of-stream marking
 * @returns Pages with checksums computed after every other field was set
 */
export function writePages(packets: readonly WritablePacket[], options: PageWriterOptions): OggPage[] {
  const drafts: DraftPage[] = [];
  let current: DraftPage | null = null;

  const openPage = (continued: boolean): DraftPage => {
    const draft: DraftPage = { continued, segments: [], chunks: [], granulePosition: null };
    drafts.push(draft);
    return draft;
  };

  for (const packet of packets) {
    const laces = lacePacket(packet.data.length);
    if (packet.incomplete) laces.pop();
    let offset = 0;
    for (let index = 0; index < laces.length; index++) {
      const length = laces[index];
      if (!current || current.segments.length === MAX_SEGMENTS_PER_PAGE) {
        current = openPage(index > 0);
      }
      current.segments.push(length);
      current.chunks.push(packet.data.subarray(offset, offset + length));
      offset += length;
    }

    if (current && !packet.incomplete) {
      current.granulePosition = packet.granulePosition;
      if (packet.endsPage) current = null;
    }
  }

  let lastGranule = 0n;
  return drafts.map((draft, index) => {
    if (draft.granulePosition !== null) lastGranule = draft.granulePosition;
    return finalizePage(draft, index, index === drafts.length - 1, lastGranule, options);
  });
}
