export type ImageFormat = 'jpeg' | 'png' | 'webp' | 'bmp' | 'tiff';

/** Media types the vision API accepts for base64 image blocks. */
export type VisionMediaType = 'image/jpeg' | 'image/png' | 'image/webp';

export const MIME_BY_FORMAT: Record<ImageFormat, string> = {
  jpeg: 'image/jpeg',
  png: 'image/png',
  webp: 'image/webp',
  bmp: 'image/bmp',
  tiff: 'image/tiff',
};

const FORMAT_BY_MIME: Partial<Record<string, ImageFormat>> = {
  'image/jpeg': 'jpeg',
  'image/jpg': 'jpeg',
  'image/pjpeg': 'jpeg',
  'image/png': 'png',
  'image/x-png': 'png',
  'image/webp': 'webp',
  'image/bmp': 'bmp',
  'image/x-bmp': 'bmp',
  'image/x-ms-bmp': 'bmp',
  'image/tiff': 'tiff',
  'image/tif': 'tiff',
  'image/x-tiff': 'tiff',
};

// Claims that say nothing about the format; the bytes decide.
const GENERIC_MIME = new Set(['', 'application/octet-stream', 'binary/octet-stream']);

export type ClaimedType =
  | { kind: 'generic' }
  | { kind: 'image'; format: ImageFormat; mime: string }
  | { kind: 'unsupported'; mime: string };

/**
 * Normalizes a Content-Type header value: parameters dropped, lower-cased,
 * aliases such as `image/jpg` folded onto their canonical type.
 */
export function normalizeContentType(contentType: string | undefined): ClaimedType {
  const mime = (contentType ?? '').split(';')[0].trim().toLowerCase();
  if (GENERIC_MIME.has(mime)) {
    return { kind: 'generic' };
  }
  const format = FORMAT_BY_MIME[mime];
  if (format === undefined) {
    return { kind: 'unsupported', mime };
  }
  return { kind: 'image', format, mime: MIME_BY_FORMAT[format] };
}

function startsWith(bytes: Uint8Array, signature: number[], offset = 0): boolean {
  if (bytes.length < offset + signature.length) return false;
  return signature.every((byte, i) => bytes[offset + i] === byte);
}

/** Identifies the image format from its leading signature bytes. */
export function sniffImageFormat(bytes: Uint8Array): ImageFormat | undefined {
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) return 'jpeg';
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) return 'png';
  // RIFF....WEBP
  if (startsWith(bytes, [0x52, 0x49, 0x46, 0x46]) && startsWith(bytes, [0x57, 0x45, 0x42, 0x50], 8)) {
    return 'webp';
  }
  if (startsWith(bytes, [0x42, 0x4d]) && bytes.length >= 26) return 'bmp';
  if (startsWith(bytes, [0x49, 0x49, 0x2a, 0x00]) || startsWith(bytes, [0x4d, 0x4d, 0x00, 0x2a])) {
    return 'tiff';
  }
  return undefined;
}

export function isVisionFormat(format: ImageFormat): format is 'jpeg' | 'png' | 'webp' {
  return format === 'jpeg' || format === 'png' || format === 'webp';
}

export function visionMediaType(format: 'jpeg' | 'png' | 'webp'): VisionMediaType {
  switch (format) {
    case 'jpeg':
      return 'image/jpeg';
    case 'png':
      return 'image/png';
    case 'webp':
      return 'image/webp';
  }
}
