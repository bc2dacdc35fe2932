import sharp from 'sharp';
import { ImageError } from '../errors.js';
import { errorMessage } from '../utils/logger.js';

export interface OrientationTransform {
  // Counter-clockwise degrees
  rotation: 0 | 90 | 180 | 270;
  mirror: boolean;
}

export interface OrientedImage {
  buffer: Buffer;
  width: number;
  height: number;
}

const TRANSFORMS: Record<number, OrientationTransform> = {
  2: { rotation: 0, mirror: true },
  3: { rotation: 180, mirror: false },
  4: { rotation: 180, mirror: true },
  5: { rotation: 270, mirror: true },
  6: { rotation: 270, mirror: false },
  7: { rotation: 90, mirror: true },
  8: { rotation: 90, mirror: false },
};

/**
 * Map an EXIF orientation tag to the rotation and horizontal mirror that
 * bring the pixels upright. Returns null for tag 1, a missing tag or any
 * value outside 1-8.
 */
export function orientationTransform(tag: number | undefined): OrientationTransform | null {
  if (tag === undefined) return null;
  return TRANSFORMS[tag] ?? null;
}

/**
 * Rotate then mirror the full-resolution JPEG and re-encode it at `quality`.
 * The output carries no EXIF block, so a later probe reads orientation 1.
 * The caller decides whether the result replaces the source.
 */
export async function correctOrientation(
  buffer: Buffer,
  transform: OrientationTransform,
  quality: number
): Promise<OrientedImage> {
  let pipeline = sharp(buffer);

  // sharp flops before it rotates; mirroring after a counter-clockwise turn of
  // r is the same as mirroring first and then turning r clockwise.
  if (transform.mirror) {
    pipeline = pipeline.flop();
    if (transform.rotation !== 0) {
      pipeline = pipeline.rotate(transform.rotation);
    }
  } else if (transform.rotation !== 0) {
    pipeline = pipeline.rotate(360 - transform.rotation);
  }

  try {
    const { data, info } = await pipeline.jpeg({ quality }).toBuffer({ resolveWithObject: true });
    return { buffer: data, width: info.width, height: info.height };
  } catch (error) {
    throw new ImageError('encode_failure', `Could not correct image orientation: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
