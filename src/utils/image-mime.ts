/**
 * MIME type detection from image signatures.
 */

type MimeProbe = (bytes: Buffer) => string | null;

const detectPng: MimeProbe = bytes =>
  bytes.length >= 8 && bytes.readUInt32BE(0) === 0x89504e47 && bytes.readUInt32BE(4) === 0x0d0a1a0a ? 'image/png' : null;

const detectJpeg: MimeProbe = bytes =>
  bytes.length >= 3 && bytes.readUInt16BE(0) === 0xffd8 && bytes[2] === 0xff ? 'image/jpeg' : null;

const detectGif: MimeProbe = bytes => {
  if (bytes.length < 6) return null;
  const signature = bytes.toString('latin1', 0, 6);
  return signature === 'GIF87a' || signature === 'GIF89a' ? 'image/gif' : null;
};

const detectBmp: MimeProbe = bytes =>
  bytes.length >= 2 && bytes.readUInt16BE(0) === 0x424d ? 'image/bmp' : null;

const detectWebp: MimeProbe = bytes =>
  bytes.length >= 12 && bytes.readUInt32BE(0) === 0x52494646 && bytes.readUInt32BE(8) === 0x57454250 ? 'image/webp' : null;

const detectTiff: MimeProbe = bytes => {
  if (bytes.length < 4) return null;
  const signature = bytes.readUInt32BE(0);
  return signature === 0x49492a00 || signature === 0x4d4d002a ? 'image/tiff' : null;
};

const IMAGE_PROBES: readonly MimeProbe[] = [detectPng, detectJpeg, detectGif, detectBmp, detectWebp, detectTiff];

/**
 * Guesses the MIME type of image data from its leading bytes.
 *
 * @returns MIME type, or null when no known signature matches
 */
export function sniffImageMime(data: Buffer): string | null {
  for (const probe of IMAGE_PROBES) {
    const mime = probe(data);
    if (mime) return mime;
  }
  return null;
}
