/**
 * Error taxonomy for the Ogg Opus tag codec.
 */

export type OpusTagErrorKind = 'MalformedContainer' | 'NotOpusStream' | 'MalformedTag' | 'MalformedPicture' | 'Utf8';

/**
 * Base class for every failure raised by the codec.
 */
export class OpusTagError extends Error {
  constructor(message: string, public readonly kind: OpusTagErrorKind, public readonly cause?: unknown) {
    super(message);
    this.name = 'OpusTagError';
  }
}

/**
 * Bad capture pattern, checksum mismatch or truncated page.
 */
export class MalformedContainerError extends OpusTagError {
  constructor(message: string, cause?: unknown) {
    super(message, 'MalformedContainer', cause);
    this.name = 'MalformedContainerError';
  }
}

/**
 * The Ogg container holds no OpusHead/OpusTags stream.
 */
export class NotOpusStreamError extends OpusTagError {
  constructor(message: string, cause?: unknown) {
    super(message, 'NotOpusStream', cause);
    this.name = 'NotOpusStreamError';
  }
}

/**
 * Comment vector framing violated.
 */
export class MalformedTagError extends OpusTagError {
  constructor(message: string, cause?: unknown) {
    super(message, 'MalformedTag', cause);
    this.name = 'MalformedTagError';
  }
}

/**
 * Picture block framing violated or invalid base64.
 */
export class MalformedPictureError extends OpusTagError {
  constructor(message: string, cause?: unknown) {
    super(message, 'MalformedPicture', cause);
    this.name = 'MalformedPictureError';
  }
}

export class Utf8Error extends OpusTagError {
  constructor(message: string, cause?: unknown) {
    super(message, 'Utf8', cause);
    this.name = 'Utf8Error';
  }
}

export function isOpusTagError(value: unknown): value is OpusTagError {
  return value instanceof OpusTagError;
}
