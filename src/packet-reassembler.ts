/**
 * Packet reassembly - rebuilds logical packets from Ogg page lacing.
 *
 * Pages of every logical stream are folded in file order, with one in-progress
 * packet buffer per stream serial.
 */

import { MAX_SEGMENT_SIZE, NO_GRANULE_POSITION, OPUS_HEAD_MAGIC, OPUS_TAGS_MAGIC } from './constants/opus.js';
import type { OggPage } from './types/ogg-page.js';
import type { OpusPacket } from './types/opus-packet.js';
import type { CodecOptions, WarningSink } from './types/options.js';
import { defaultWarningSink } from './types/options.js';
import { MalformedContainerError, NotOpusStreamError } from './types/errors.js';

interface PendingPacket {
  readonly chunks: Buffer[];
  readonly firstPage: number;
}

/**
 * The Opus logical stream located inside an Ogg container.
 */
export interface OpusStream {
  readonly serial: number;
  /** Packets of the Opus stream only; 0 is OpusHead, 1 is OpusTags. */
  readonly packets: readonly OpusPacket[];
  /** Indices (into the page list) of the pages belonging to the stream. */
  readonly pageIndices: readonly number[];
  /** Sequence number of the stream's first page. */
  readonly firstSequence: number;
  /** The stream's last page carried the end-of-stream flag. */
  readonly endOfStream: boolean;
}

/**
 * Reports a continued-flag disagreement, or throws when strict.
 */
function reportMismatch(message: string, strict: boolean, warn: WarningSink): void {
  if (strict) {
    throw new MalformedContainerError(message);
  }
  warn(message);
}

function startsWithMagic(data: Buffer, magic: string): boolean {
  return data.length >= magic.length && data.toString('latin1', 0, magic.length) === magic;
}

/**
 * Folds one page into the packets list, returning the packet still open at its end.
 */
function foldPage(
  page: OggPage,
  pageIndex: number,
  pending: PendingPacket | undefined,
  packets: OpusPacket[],
  strict: boolean,
  warn: WarningSink
): PendingPacket | undefined {
  if (page.flags.continued && !pending) {
    reportMismatch(`Page ${page.sequence} of stream ${page.serial} is flagged as continued but no packet is open`, strict, warn);
  } else if (!page.flags.continued && pending) {
    reportMismatch(`Page ${page.sequence} of stream ${page.serial} is not flagged as continued but a packet is open; following the lacing`, strict, warn);
  }

  let lastTerminator = -1;
  page.segments.forEach((length, index) => {
    if (length < MAX_SEGMENT_SIZE) lastTerminator = index;
  });

  let current: PendingPacket | undefined = pending;
  let offset = 0;
  page.segments.forEach((length, index) => {
    const open: PendingPacket = current ?? { chunks: [], firstPage: pageIndex };
    open.chunks.push(page.payload.subarray(offset, offset + length));
    offset += length;

    if (length < MAX_SEGMENT_SIZE) {
      packets.push({
        serial: page.serial,
        data: Buffer.concat(open.chunks),
        granulePosition: page.granulePosition,
        endsPage: index === lastTerminator,
        endsStream: page.flags.endOfStream,
        firstPage: open.firstPage,
        lastPage: pageIndex,
        incomplete: false,
      });
      current = undefined;
    } else {
      current = open;
    }
  });
  return current;
}

/**
 * Rebuilds the packets of every logical stream in the order they complete.
 *
 * A lacing value of 255 continues the packet into the next segment (or the next
 * page of the same stream); a value below 255 terminates it.
 *
 * @param pages - Pages in file order
 * @param options - `strict` turns continued-flag mismatches into errors
 * @returns Packets of all streams, tagged with their serial
 * @throws {MalformedContainerError} On a continued-flag mismatch in strict mode
 */
export function reassemblePackets(pages: readonly OggPage[], options: CodecOptions = {}): OpusPacket[] {
  const strict = options.strict ?? false;
  const warn: WarningSink = options.onWarning ?? defaultWarningSink;
  const pendingBySerial = new Map<number, PendingPacket>();
  const packets: OpusPacket[] = [];

  pages.forEach((page, pageIndex) => {
    const open = foldPage(page, pageIndex, pendingBySerial.get(page.serial), packets, strict, warn);
    if (open) {
      pendingBySerial.set(page.serial, open);
    } else {
      pendingBySerial.delete(page.serial);
    }
  });

  for (const [serial, open] of pendingBySerial) {
    warn(`Stream ${serial} ends inside a packet; keeping ${open.chunks.reduce((sum, chunk) => sum + chunk.length, 0)} bytes as an incomplete packet`);
    packets.push({
      serial,
      data: Buffer.concat(open.chunks),
      granulePosition: NO_GRANULE_POSITION,
      endsPage: true,
      endsStream: false,
      firstPage: open.firstPage,
      lastPage: pages.length - 1,
      incomplete: true,
    });
  }

  return packets;
}

/**
 * Locates the first logical stream whose first packet is OpusHead and whose
 * second packet is OpusTags.
 *
 * @param pages - Pages in file order
 * @param options - Reassembly options
 * @returns The Opus stream with its packets and page positions
 * @throws {NotOpusStreamError} If no such stream exists
 */
export function findOpusStream(pages: readonly OggPage[], options: CodecOptions = {}): OpusStream {
  const packets = reassemblePackets(pages, options);

  const seenSerials = new Set<number>();
  let serial: number | null = null;
  for (const packet of packets) {
    if (seenSerials.has(packet.serial)) continue;
    seenSerials.add(packet.serial);
    if (startsWithMagic(packet.data, OPUS_HEAD_MAGIC)) {
      serial = packet.serial;
      break;
    }
  }
  if (serial === null) {
    throw new NotOpusStreamError('No logical stream starts with an OpusHead packet');
  }

  const streamSerial: number = serial;
  const streamPackets = packets.filter(packet => packet.serial === streamSerial);
  const tags = streamPackets[1];
  if (!tags || tags.incomplete) {
    throw new NotOpusStreamError(`Opus stream ${streamSerial} has no complete second packet`);
  }
  if (!startsWithMagic(tags.data, OPUS_TAGS_MAGIC)) {
    throw new NotOpusStreamError(`Second packet of Opus stream ${streamSerial} is not OpusTags`);
  }

  const pageIndices: number[] = [];
  pages.forEach((page, index) => {
    if (page.serial === streamSerial) pageIndices.push(index);
  });
  const firstPage = pages[pageIndices[0]];
  const lastPage = pages[pageIndices[pageIndices.length - 1]];

  return {
    serial: streamSerial,
    packets: streamPackets,
    pageIndices,
    firstSequence: firstPage.sequence,
    endOfStream: lastPage.flags.endOfStream,
  };
}
