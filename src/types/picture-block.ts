/**
 * METADATA_BLOCK_PICTURE contents.
 */
import type { PictureType } from '../constants/picture-types.js';

export interface PictureBlock {
  readonly pictureType: PictureType;
  readonly mimeType: string;
  readonly description: string;
  /** Advisory dimensions, never checked against the image bytes. */
  readonly width: number;
  readonly height: number;
  readonly colorDepth: number;
  /** Number of palette colors for indexed images, 0 otherwise. */
  readonly indexedColors: number;
  readonly data: Buffer;
}
