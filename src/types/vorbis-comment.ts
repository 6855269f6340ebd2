/**
 * Vorbis comment vector as carried by the OpusTags packet.
 */

export interface CommentEntry {
  readonly key: string;
  readonly value: string;
}

export interface VorbisComment {
  readonly vendor: string;
  /** Ordered entries; keys may repeat. */
  readonly entries: readonly CommentEntry[];
  /** Binary data kept after the comment list, empty when there is none. */
  readonly trailer: Buffer;
}
