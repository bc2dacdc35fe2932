import sharp from 'sharp';
import { ImageError } from '../errors.js';
import { OutputFormat, TransformSpec } from '../types.js';
import { errorMessage } from '../utils/logger.js';

export type EncodeFormat = 'gif' | 'jpeg' | 'png' | 'webp';

export interface RenderOptions {
  format: EncodeFormat;
  quality: number;
  // Keep per-pixel transparency; otherwise alpha is flattened onto black
  preserveAlpha: boolean;
}

export interface RenderedImage {
  buffer: Buffer;
  width: number;
  height: number;
  format: EncodeFormat;
}

const ALPHA_FORMATS: readonly string[] = ['png', 'webp', 'gif'];

export function normalizeFormat(format: OutputFormat): EncodeFormat {
  return format === 'jpg' ? 'jpeg' : format;
}

/** Map a probed sharp format name onto an encodable one, if it is one. */
export function encodeFormatOf(format: string): EncodeFormat | null {
  switch (format) {
    case 'gif':
    case 'jpeg':
    case 'png':
    case 'webp':
      return format;
    case 'jpg':
      return 'jpeg';
    default:
      return null;
  }
}

export function carriesAlpha(format: string): boolean {
  return ALPHA_FORMATS.includes(format);
}

function encode(pipeline: sharp.Sharp, format: EncodeFormat, quality: number): sharp.Sharp {
  switch (format) {
    case 'jpeg':
      return pipeline.jpeg({ quality });
    case 'png':
      // 0-100 quality scale onto zlib's 0-9 compression level
      return pipeline.png({ compressionLevel: Math.min(9, Math.round(quality / 10)) });
    case 'webp':
      return pipeline.webp({ quality });
    case 'gif':
      return pipeline.gif();
  }
}

/**
 * Resample to the render size, take the crop when there is one, and
 * encode. Fractional crop origins are truncated to whole pixels.
 */
export async function renderDerivative(
  buffer: Buffer,
  spec: TransformSpec,
  options: RenderOptions
): Promise<RenderedImage> {
  try {
    let pipeline = sharp(buffer).resize(spec.renderWidth, spec.renderHeight, { fit: 'fill' });

    if (spec.cropRect) {
      pipeline = pipeline.extract({
        left: Math.trunc(spec.cropRect.x),
        top: Math.trunc(spec.cropRect.y),
        width: spec.cropRect.width,
        height: spec.cropRect.height,
      });
    }

    if (!options.preserveAlpha) {
      pipeline = pipeline.flatten({ background: '#000000' });
    }

    const { data, info } = await encode(pipeline, options.format, options.quality).toBuffer({
      resolveWithObject: true,
    });
    return { buffer: data, width: info.width, height: info.height, format: options.format };
  } catch (error) {
    throw new ImageError('encode_failure', `Could not render ${options.format} derivative: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
