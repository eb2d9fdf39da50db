import sharp from 'sharp';

import { EmptyUploadError, PayloadTooLargeError, UnsupportedFormatError } from '../errors';
import { decodeBmp } from './bmp';
import {
  type ImageFormat,
  type VisionMediaType,
  isVisionFormat,
  normalizeContentType,
  sniffImageFormat,
  visionMediaType,
} from './formats';

type VisionFormat = 'jpeg' | 'png' | 'webp';

export interface EncodeOptions {
  /** Largest accepted upload, in bytes. */
  maxBytes: number;
  /**
   * Longest side, in pixels, sent to the model. Larger images are downscaled.
   * Unset means uploads are never resized.
   */
  maxDimension?: number;
}

export const DEFAULT_ENCODE_OPTIONS: EncodeOptions = {
  maxBytes: 10 * 1024 * 1024,
};

export interface EncodedImage {
  /** Base64 payload, no data-URI prefix. */
  data: string;
  mediaType: VisionMediaType;
  sourceFormat: ImageFormat;
  width: number;
  height: number;
  /** Size of the decoded payload. */
  byteLength: number;
  /** False when `data` is the upload itself, byte for byte. */
  normalized: boolean;
}

interface PreparedImage {
  bytes: Buffer;
  format: VisionFormat;
  width: number;
  height: number;
  normalized: boolean;
}

/**
 * Validates an uploaded image and turns it into a base64 payload for the
 * vision model. Size is checked before the bytes are decoded at all.
 */
export async function encodeImage(
  bytes: Buffer,
  contentType: string | undefined,
  options: Partial<EncodeOptions> = {},
): Promise<EncodedImage> {
  const { maxBytes, maxDimension } = { ...DEFAULT_ENCODE_OPTIONS, ...options };

  if (bytes.length === 0) {
    throw new EmptyUploadError();
  }
  if (bytes.length > maxBytes) {
    throw new PayloadTooLargeError(maxBytes, bytes.length);
  }

  const claimed = normalizeContentType(contentType);
  if (claimed.kind === 'unsupported') {
    throw new UnsupportedFormatError(`Unsupported media type: ${claimed.mime}`);
  }

  const format = sniffImageFormat(bytes);
  if (format === undefined) {
    throw new UnsupportedFormatError('File content is not a JPEG, PNG, WebP, BMP or TIFF image');
  }
  if (claimed.kind === 'image' && claimed.format !== format) {
    console.warn(`[image] upload declared ${claimed.mime} but contains ${format}; using ${format}`);
  }

  const prepared = await prepareImage(bytes, format, maxDimension);
  if (prepared.normalized) {
    console.info(
      `[image] normalized ${format} upload to ${prepared.format} ${prepared.width}x${prepared.height}`,
    );
  }

  return {
    data: prepared.bytes.toString('base64'),
    mediaType: visionMediaType(prepared.format),
    sourceFormat: format,
    width: prepared.width,
    height: prepared.height,
    byteLength: prepared.bytes.length,
    normalized: prepared.normalized,
  };
}

async function prepareImage(
  bytes: Buffer,
  format: ImageFormat,
  maxDimension: number | undefined,
): Promise<PreparedImage> {
  const image = openImage(bytes, format);

  let width: number | undefined;
  let height: number | undefined;
  try {
    ({ width, height } = await image.metadata());
  } catch (error) {
    throw new UnsupportedFormatError(`Could not decode ${format} image`, { cause: error });
  }
  if (!width || !height) {
    throw new UnsupportedFormatError(`Could not read ${format} image dimensions`);
  }

  const limit = maxDimension !== undefined && Math.max(width, height) > maxDimension ? maxDimension : undefined;
  if (isVisionFormat(format) && limit === undefined) {
    return { bytes, format, width, height, normalized: false };
  }

  // The vision API takes JPEG, PNG and WebP only; everything else becomes PNG.
  const target: VisionFormat = isVisionFormat(format) ? format : 'png';
  const pipeline =
    limit === undefined
      ? image
      : image.resize({ width: limit, height: limit, fit: 'inside', withoutEnlargement: true });

  try {
    const { data, info } = await encodeAs(pipeline, target).toBuffer({ resolveWithObject: true });
    return { bytes: data, format: target, width: info.width, height: info.height, normalized: true };
  } catch (error) {
    throw new UnsupportedFormatError(`Could not re-encode ${format} image`, { cause: error });
  }
}

function openImage(bytes: Buffer, format: ImageFormat): sharp.Sharp {
  if (format === 'bmp') {
    const raw = decodeBmp(bytes);
    return sharp(raw.pixels, { raw: { width: raw.width, height: raw.height, channels: raw.channels } });
  }
  return sharp(bytes);
}

function encodeAs(image: sharp.Sharp, format: VisionFormat): sharp.Sharp {
  switch (format) {
    case 'jpeg':
      return image.jpeg({ quality: 90 });
    case 'png':
      return image.png();
    case 'webp':
      return image.webp({ quality: 90 });
  }
}
