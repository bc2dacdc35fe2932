import sharp from 'sharp';
import { ImageErrorKind } from '../errors.js';
import { ImageMetadata } from '../types.js';
import { config } from '../config.js';
import { logger, errorMessage } from '../utils/logger.js';

export type ProbeResult =
  | { ok: true; metadata: ImageMetadata }
  | { ok: false; kind: ImageErrorKind; error: string };

const FORMAT_MIME: Record<string, string> = {
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  webp: 'image/webp',
  svg: 'image/svg+xml',
  tiff: 'image/tiff',
  heif: 'image/heif',
  jp2: 'image/jp2',
  pdf: 'application/pdf',
};

// Signatures for formats libvips cannot open, so the error names the type
const SIGNATURES: Array<{ mime: string; bytes: number[] }> = [
  { mime: 'image/bmp', bytes: [0x42, 0x4d] },
  { mime: 'image/x-icon', bytes: [0x00, 0x00, 0x01, 0x00] },
  { mime: 'image/vnd.adobe.photoshop', bytes: [0x38, 0x42, 0x50, 0x53] },
];

export function sniffMime(buffer: Buffer): string | null {
  const match = SIGNATURES.find(({ bytes }) => bytes.every((byte, index) => buffer[index] === byte));
  return match?.mime ?? null;
}

/**
 * Read format, dimensions and orientation from the header without decoding
 * the pixel data.
 */
export async function probeImage(buffer: Buffer): Promise<ProbeResult> {
  try {
    const metadata = await sharp(buffer).metadata();

    if (!metadata.width || !metadata.height) {
      return { ok: false, kind: 'decode_failure', error: 'Could not determine image dimensions' };
    }

    const pixels = metadata.width * metadata.height;
    if (pixels > config.maxImagePixels) {
      return {
        ok: false,
        kind: 'decode_failure',
        error: `Image too large: ${pixels} pixels (max: ${config.maxImagePixels})`,
      };
    }

    const format = metadata.format || 'unknown';

    return {
      ok: true,
      metadata: {
        width: metadata.width,
        height: metadata.height,
        format,
        mime: FORMAT_MIME[format] ?? sniffMime(buffer) ?? `image/${format}`,
        size: buffer.length,
        orientation: metadata.orientation ?? 1,
        hasAlpha: metadata.hasAlpha ?? false,
      },
    };
  } catch (error) {
    const mime = sniffMime(buffer);
    if (mime) {
      return { ok: false, kind: 'unsupported_format', error: `${mime} images are not supported` };
    }

    logger.warn('Image probe failed', { error: errorMessage(error) });
    return { ok: false, kind: 'unsupported_format', error: 'Invalid file type' };
  }
}
