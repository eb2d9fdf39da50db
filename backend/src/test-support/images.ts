import sharp from 'sharp';

export type Rgb = [number, number, number];

const LEAF_GREEN = { r: 40, g: 140, b: 60 };

export function solidImage(width: number, height: number): sharp.Sharp {
  return sharp({ create: { width, height, channels: 3, background: LEAF_GREEN } });
}

export function makePng(width = 8, height = 6): Promise<Buffer> {
  return solidImage(width, height).png().toBuffer();
}

/** Builds an uncompressed BMP from top-down rows of RGB pixels. */
export function makeBmp(rows: Rgb[][], options: { topDown?: boolean; bitsPerPixel?: number } = {}): Buffer {
  const height = rows.length;
  const width = rows[0].length;
  const stride = Math.floor((24 * width + 31) / 32) * 4;
  const pixelBytes = stride * height;
  const bmp = Buffer.alloc(54 + pixelBytes);

  bmp.write('BM', 0, 'latin1');
  bmp.writeUInt32LE(bmp.length, 2);
  bmp.writeUInt32LE(54, 10);
  bmp.writeUInt32LE(40, 14);
  bmp.writeInt32LE(width, 18);
  bmp.writeInt32LE(options.topDown ? -height : height, 22);
  bmp.writeUInt16LE(1, 26);
  bmp.writeUInt16LE(options.bitsPerPixel ?? 24, 28);
  bmp.writeUInt32LE(0, 30);
  bmp.writeUInt32LE(pixelBytes, 34);

  rows.forEach((row, y) => {
    const fileRow = options.topDown ? y : height - 1 - y;
    row.forEach(([r, g, b], x) => {
      const offset = 54 + fileRow * stride + x * 3;
      bmp[offset] = b;
      bmp[offset + 1] = g;
      bmp[offset + 2] = r;
    });
  });
  return bmp;
}
