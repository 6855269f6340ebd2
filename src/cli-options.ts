/**
 * Argument parsers for the CLI options.
 */

import { InvalidArgumentError } from 'commander';
import { isPictureType } from './constants/picture-types.js';
import type { PictureType } from './constants/picture-types.js';

/**
 * @throws {InvalidArgumentError} Unless the value is an integer from 0 to 20
 */
export function parsePictureType(value: string): PictureType {
  const parsed = Number(value);
  if (value.trim() === '' || !isPictureType(parsed)) {
    throw new InvalidArgumentError('Picture type must be an integer from 0 to 20.');
  }
  return parsed;
}

/**
 * @throws {InvalidArgumentError} Unless the value is a non-negative integer
 */
export function parseIndex(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Index must be a non-negative integer.');
  }
  return parsed;
}
