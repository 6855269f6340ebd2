#!/usr/bin/env node
/**
 * Ogg Opus tags - CLI Interface
 *
 * Command-line interface for reading and editing the comments and pictures of Ogg Opus files.
 */

import { Command } from 'commander';
import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parseIndex, parsePictureType } from './cli-options.js';
import { pictureTypeLabel } from './constants/picture-types.js';
import type { PictureType } from './constants/picture-types.js';
import { createPicture } from './picture.js';
import { readTagFile, writeTagFile } from './tag-file.js';
import type { CodecOptions } from './types/options.js';

interface CommonOptions {
  readonly strict?: boolean;
}

interface WriteOptions extends CommonOptions {
  readonly output?: string;
}

interface PictureOptions extends WriteOptions {
  readonly type: PictureType;
  readonly description?: string;
  readonly mime?: string;
  readonly replace?: boolean;
}

const program = new Command();

// Version is set at build time
const version = '0.1.0';

function codecOptions(options: CommonOptions): CodecOptions {
  return { strict: options.strict ?? false };
}

/**
 * Runs a command body, reporting failures the same way for every command.
 */
async function run(action: string, body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (error) {
    console.error(`❌ ${action} failed:`, error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

program
  .name('opus-tags')
  .description('Read and edit the comment header of Ogg Opus files')
  .version(version);

program
  .command('show')
  .description('Print the vendor string, comments and pictures of a file')
  .argument('<file>', 'Ogg Opus file')
  .option('--strict', 'Fail on inconsistent page continuation flags')
  .action(async (file: string, options: CommonOptions) => {
    await run('Show', async () => {
      const { tag } = await readTagFile({ filePath: resolve(file), options: codecOptions(options) });
      console.log(`Vendor: ${tag.vendor}`);
      for (const entry of tag.entries()) {
        console.log(`${entry.key}=${entry.value}`);
      }
      tag.pictures().forEach((picture, index) => {
        const description = picture.description ? ` "${picture.description}"` : '';
        console.log(`Picture ${index}: ${pictureTypeLabel(picture.pictureType)}, ${picture.mimeType}, ${picture.data.length} bytes${description}`);
      });
    });
  });

program
  .command('get')
  .description('Print every value of a comment key')
  .argument('<file>', 'Ogg Opus file')
  .argument('<key>', 'Comment key (case-insensitive)')
  .option('--strict', 'Fail on inconsistent page continuation flags')
  .action(async (file: string, key: string, options: CommonOptions) => {
    await run('Get', async () => {
      const { tag } = await readTagFile({ filePath: resolve(file), options: codecOptions(options) });
      for (const value of tag.get(key)) {
        console.log(value);
      }
    });
  });

program
  .command('set')
  .description('Replace every value of a comment key')
  .argument('<file>', 'Ogg Opus file')
  .argument('<key>', 'Comment key')
  .argument('<values...>', 'New values')
  .option('-o, --output <file>', 'Write to this file instead of replacing the input')
  .option('--strict', 'Fail on inconsistent page continuation flags')
  .action(async (file: string, key: string, values: string[], options: WriteOptions) => {
    await run('Set', async () => {
      const loaded = await readTagFile({ filePath: resolve(file), options: codecOptions(options) });
      loaded.tag.setAll(key, values);
      await writeTagFile({ file: loaded, outputPath: options.output ? resolve(options.output) : undefined, options: codecOptions(options) });
      console.log(`✅ ${key} set to ${values.length} value(s)`);
    });
  });

program
  .command('remove')
  .description('Remove every value of a comment key')
  .argument('<file>', 'Ogg Opus file')
  .argument('<key>', 'Comment key (case-insensitive)')
  .option('-o, --output <file>', 'Write to this file instead of replacing the input')
  .option('--strict', 'Fail on inconsistent page continuation flags')
  .action(async (file: string, key: string, options: WriteOptions) => {
    await run('Remove', async () => {
      const loaded = await readTagFile({ filePath: resolve(file), options: codecOptions(options) });
      const removed = loaded.tag.remove(key);
      await writeTagFile({ file: loaded, outputPath: options.output ? resolve(options.output) : undefined, options: codecOptions(options) });
      console.log(`✅ Removed ${removed.length} value(s) of ${key}`);
    });
  });

program
  .command('vendor')
  .description('Print the vendor string, or replace it when one is given')
  .argument('<file>', 'Ogg Opus file')
  .argument('[vendor]', 'New vendor string')
  .option('-o, --output <file>', 'Write to this file instead of replacing the input')
  .option('--strict', 'Fail on inconsistent page continuation flags')
  .action(async (file: string, vendor: string | undefined, options: WriteOptions) => {
    await run('Vendor', async () => {
      const loaded = await readTagFile({ filePath: resolve(file), options: codecOptions(options) });
      if (vendor === undefined) {
        console.log(loaded.tag.vendor);
        return;
      }
      loaded.tag.vendor = vendor;
      await writeTagFile({ file: loaded, outputPath: options.output ? resolve(options.output) : undefined, options: codecOptions(options) });
      console.log('✅ Vendor string updated');
    });
  });

program
  .command('add-picture')
  .description('Embed an image as a METADATA_BLOCK_PICTURE comment')
  .argument('<file>', 'Ogg Opus file')
  .argument('<image>', 'Image file to embed')
  .option('-t, --type <type>', 'Picture type (0-20)', parsePictureType, 3)
  .option('-d, --description <text>', 'Picture description')
  .option('-m, --mime <type>', 'MIME type; detected from the image when omitted')
  .option('--replace', 'Replace an existing picture of the same type')
  .option('-o, --output <file>', 'Write to this file instead of replacing the input')
  .option('--strict', 'Fail on inconsistent page continuation flags')
  .action(async (file: string, image: string, options: PictureOptions) => {
    await run('Add picture', async () => {
      const loaded = await readTagFile({ filePath: resolve(file), options: codecOptions(options) });
      const picture = createPicture(await readFile(resolve(image)), {
        pictureType: options.type,
        description: options.description,
        mimeType: options.mime,
      });
      if (options.replace) {
        loaded.tag.setPicture(picture);
      } else {
        loaded.tag.addPicture(picture);
      }
      await writeTagFile({ file: loaded, outputPath: options.output ? resolve(options.output) : undefined, options: codecOptions(options) });
      console.log(`✅ Added ${pictureTypeLabel(picture.pictureType)} picture (${picture.mimeType}, ${picture.data.length} bytes)`);
    });
  });

program
  .command('remove-picture')
  .description('Remove the picture at an index (as listed by "show")')
  .argument('<file>', 'Ogg Opus file')
  .argument('<index>', 'Picture index', parseIndex)
  .option('-o, --output <file>', 'Write to this file instead of replacing the input')
  .option('--strict', 'Fail on inconsistent page continuation flags')
  .action(async (file: string, index: number, options: WriteOptions) => {
    await run('Remove picture', async () => {
      const loaded = await readTagFile({ filePath: resolve(file), options: codecOptions(options) });
      const removed = loaded.tag.removePicture(index);
      if (!removed) {
        throw new Error(`No picture at index ${index}`);
      }
      await writeTagFile({ file: loaded, outputPath: options.output ? resolve(options.output) : undefined, options: codecOptions(options) });
      console.log(`✅ Removed ${pictureTypeLabel(removed.pictureType)} picture`);
    });
  });

program
  .command('extract-picture')
  .description('Write the image data of a picture to a file')
  .argument('<file>', 'Ogg Opus file')
  .argument('<index>', 'Picture index', parseIndex)
  .argument('<output>', 'Destination image file')
  .option('--strict', 'Fail on inconsistent page continuation flags')
  .action(async (file: string, index: number, output: string, options: CommonOptions) => {
    await run('Extract picture', async () => {
      const { tag } = await readTagFile({ filePath: resolve(file), options: codecOptions(options) });
      const picture = tag.pictures()[index];
      if (!picture) {
        throw new Error(`No picture at index ${index}`);
      }
      await writeFile(resolve(output), picture.data);
      console.log(`✅ Wrote ${picture.data.length} bytes (${picture.mimeType}) to ${output}`);
    });
  });

program.parseAsync().catch((error: unknown) => {
  console.error('❌', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
