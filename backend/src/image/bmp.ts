import { UnsupportedFormatError } from '../errors';

export interface RawImage {
  width: number;
  height: number;
  channels: 3;
  /** Top-down RGB rows, no padding. */
  pixels: Buffer;
}

const BI_RGB = 0;

/**
 * Decodes an uncompressed 24- or 32-bit Windows bitmap into RGB pixels.
 * sharp has no BMP loader, so bitmaps are unpacked here and handed to it raw.
 */
export function decodeBmp(bytes: Buffer): RawImage {
  if (bytes.length < 54 || bytes.toString('latin1', 0, 2) !== 'BM') {
    throw new UnsupportedFormatError('Malformed BMP header');
  }

  const pixelOffset = bytes.readUInt32LE(10);
  const headerSize = bytes.readUInt32LE(14);
  const width = bytes.readInt32LE(18);
  const rawHeight = bytes.readInt32LE(22);
  const bitsPerPixel = bytes.readUInt16LE(28);
  const compression = bytes.readUInt32LE(30);

  if (headerSize < 40) {
    throw new UnsupportedFormatError('Unsupported BMP header version');
  }
  if (compression !== BI_RGB || (bitsPerPixel !== 24 && bitsPerPixel !== 32)) {
    throw new UnsupportedFormatError(
      `Unsupported BMP encoding (${bitsPerPixel}-bit, compression ${compression})`,
    );
  }

  // Negative height marks a top-down bitmap.
  const topDown = rawHeight < 0;
  const height = Math.abs(rawHeight);
  if (width <= 0 || height === 0) {
    throw new UnsupportedFormatError('BMP has no pixels');
  }

  const bytesPerPixel = bitsPerPixel / 8;
  const stride = Math.floor((bitsPerPixel * width + 31) / 32) * 4;
  if (pixelOffset + stride * height > bytes.length) {
    throw new UnsupportedFormatError('BMP pixel data is truncated');
  }

  const pixels = Buffer.alloc(width * height * 3);
  for (let row = 0; row < height; row++) {
    const sourceRow = topDown ? row : height - 1 - row;
    const rowStart = pixelOffset + sourceRow * stride;
    for (let col = 0; col < width; col++) {
      const src = rowStart + col * bytesPerPixel;
      const dst = (row * width + col) * 3;
      // stored as BGR(A)
      pixels[dst] = bytes[src + 2];
      pixels[dst + 1] = bytes[src + 1];
      pixels[dst + 2] = bytes[src];
    }
  }

  return { width, height, channels: 3, pixels };
}
