import sharp from 'sharp';
import { beforeAll, describe, expect, it } from 'vitest';

import { EmptyUploadError, PayloadTooLargeError, UnsupportedFormatError } from '../errors';
import { makeBmp, makePng, solidImage } from '../test-support/images';
import { encodeImage } from './encoder';

const decode = (data: string) => Buffer.from(data, 'base64');

describe('encodeImage', () => {
  let png: Buffer;

  beforeAll(async () => {
    png = await makePng(8, 6);
  });

  describe('pass-through formats', () => {
    it('encodes a PNG byte for byte', async () => {
      const image = await encodeImage(png, 'image/png');

      expect(decode(image.data).equals(png)).toBe(true);
      expect(image.mediaType).toBe('image/png');
      expect(image.sourceFormat).toBe('png');
      expect(image.normalized).toBe(false);
      expect(image.width).toBe(8);
      expect(image.height).toBe(6);
      expect(image.byteLength).toBe(png.length);
    });

    it('forwards large images unchanged unless a dimension limit is set', async () => {
      const panorama = await makePng(3000, 200);
      const image = await encodeImage(panorama, 'image/png');

      expect(decode(image.data).equals(panorama)).toBe(true);
      expect(image.normalized).toBe(false);
      expect(image.width).toBe(3000);
      expect(image.height).toBe(200);
    });

    it('folds image/jpg onto image/jpeg', async () => {
      const jpeg = await solidImage(10, 10).jpeg().toBuffer();
      const image = await encodeImage(jpeg, 'image/jpg');

      expect(decode(image.data).equals(jpeg)).toBe(true);
      expect(image.mediaType).toBe('image/jpeg');
    });

    it('sniffs WebP when the upload claims a generic type', async () => {
      const webp = await solidImage(12, 4).webp().toBuffer();
      const image = await encodeImage(webp, 'application/octet-stream');

      expect(decode(image.data).equals(webp)).toBe(true);
      expect(image.mediaType).toBe('image/webp');
    });

    it('trusts the bytes over a mismatched content type', async () => {
      const image = await encodeImage(png, 'image/jpeg');
      expect(image.mediaType).toBe('image/png');
    });
  });

  describe('normalization', () => {
    it('transcodes BMP to PNG', async () => {
      const bmp = makeBmp([
        [
          [255, 0, 0],
          [0, 255, 0],
        ],
        [
          [0, 0, 255],
          [255, 255, 255],
        ],
      ]);

      const image = await encodeImage(bmp, 'image/x-ms-bmp');
      const output = decode(image.data);

      expect(image.mediaType).toBe('image/png');
      expect(image.sourceFormat).toBe('bmp');
      expect(image.normalized).toBe(true);
      expect(output.subarray(0, 4).toString('latin1')).toBe('\x89PNG');

      const pixels = await sharp(output).raw().toBuffer();
      expect([...pixels]).toEqual([255, 0, 0, 0, 255, 0, 0, 0, 255, 255, 255, 255]);
    });

    it('transcodes TIFF to PNG', async () => {
      const tiff = await solidImage(5, 5).tiff().toBuffer();
      const image = await encodeImage(tiff, 'image/tiff');

      expect(image.mediaType).toBe('image/png');
      expect(image.sourceFormat).toBe('tiff');
      expect(image.width).toBe(5);
      expect(image.height).toBe(5);
    });

    it('downscales images over the dimension limit, keeping their format', async () => {
      const wide = await makePng(40, 20);
      const image = await encodeImage(wide, 'image/png', { maxDimension: 10 });

      expect(image.mediaType).toBe('image/png');
      expect(image.normalized).toBe(true);
      expect(image.width).toBe(10);
      expect(image.height).toBe(5);

      const metadata = await sharp(decode(image.data)).metadata();
      expect(metadata.width).toBe(10);
      expect(metadata.height).toBe(5);
    });
  });

  describe('validation', () => {
    it('rejects an empty upload', async () => {
      await expect(encodeImage(Buffer.alloc(0), 'image/png')).rejects.toBeInstanceOf(EmptyUploadError);
    });

    it('rejects uploads over the size limit before looking at the content', async () => {
      const error = await encodeImage(Buffer.alloc(11), 'text/plain', { maxBytes: 10 }).catch(
        (reason: unknown) => reason,
      );

      expect(error).toBeInstanceOf(PayloadTooLargeError);
      expect(error).toMatchObject({ status: 413, limitBytes: 10, actualBytes: 11 });
    });

    it('rejects a non-image content type', async () => {
      await expect(encodeImage(png, 'text/plain')).rejects.toThrow('Unsupported media type: text/plain');
    });

    it('rejects formats outside the supported set', async () => {
      const gif = Buffer.from('GIF89a\x01\x00\x01\x00\x00\x00\x00;', 'latin1');
      await expect(encodeImage(gif, undefined)).rejects.toBeInstanceOf(UnsupportedFormatError);
    });

    it('rejects content that only looks like an image', async () => {
      const fake = Buffer.concat([png.subarray(0, 8), Buffer.from('definitely not image data')]);
      await expect(encodeImage(fake, 'image/png')).rejects.toBeInstanceOf(UnsupportedFormatError);
    });
  });
});
