/**
 * File helpers around the tag codec, used by the CLI.
 */
import { readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { OpusTag } from './tag.js';
import type { CodecOptions } from './types/options.js';

/**
 * A tag together with the bytes it was read from.
 */
export interface LoadedTagFile {
  readonly filePath: string;
  readonly data: Buffer;
  readonly tag: OpusTag;
}

/**
 * Reads an Ogg Opus file and parses its tag.
 *
 * @param filePath - Path to the .opus file
 * @param options - Codec options
 * @returns The tag and the original file contents
 */
export async function readTagFile({ filePath, options }: { readonly filePath: string; readonly options?: CodecOptions }): Promise<LoadedTagFile> {
  const data: Buffer = await readFile(filePath);
  return { filePath, data, tag: OpusTag.load(data, options) };
}

/**
 * Writes a loaded file back with its (edited) tag.
 * The new contents are produced in memory first, then written to a temporary
 * file beside the target and renamed over it, so a failure leaves the target untouched.
 *
 * @param file - Tag and original bytes from {@link readTagFile}
 * @param outputPath - Destination; defaults to the file the tag was read from
 * @param options - Codec options
 */
export async function writeTagFile({ file, outputPath, options }: { readonly file: LoadedTagFile; readonly outputPath?: string; readonly options?: CodecOptions }): Promise<void> {
  const target = outputPath ?? file.filePath;
  const contents: Buffer = file.tag.save(file.data, options);
  const temporary = join(dirname(target), `.${basename(target)}.${process.pid}.tmp`);
  try {
    await writeFile(temporary, contents);
    await rename(temporary, target);
  } catch (error) {
    await rm(temporary, { force: true });
    throw error;
  }
}
