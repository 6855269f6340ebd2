/**
 * A logical packet rebuilt from Ogg lacing, with the framing facts the page writer needs.
 */
export interface OpusPacket {
  readonly serial: number;
  readonly data: Buffer;
  /** Granule position of the page on which the packet ends. */
  readonly granulePosition: bigint;
  /** The packet was the last one completed on its page. */
  readonly endsPage: boolean;
  /** The page on which the packet ends carried the end-of-stream flag. */
  readonly endsStream: boolean;
  /** Index of the page on which the packet started. */
  readonly firstPage: number;
  /** Index of the page on which the packet ended. */
  readonly lastPage: number;
  /** The input ended before the packet's lacing terminated it. */
  readonly incomplete: boolean;
}
