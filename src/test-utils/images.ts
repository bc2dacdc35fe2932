import sharp from 'sharp';
import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';

export type Rgb = [number, number, number];

export const RED: Rgb = [220, 20, 20];
export const BLUE: Rgb = [20, 20, 220];

interface SolidOptions {
  orientation?: number;
  alpha?: boolean;
}

export async function solidImage(
  width: number,
  height: number,
  format: 'jpeg' | 'png' | 'webp' | 'gif',
  options: SolidOptions = {}
): Promise<Buffer> {
  let pipeline = sharp({
    create: {
      width,
      height,
      channels: options.alpha ? 4 : 3,
      background: { r: 40, g: 120, b: 200, alpha: options.alpha ? 0.5 : 1 },
    },
  });

  if (options.orientation) {
    pipeline = pipeline.withMetadata({ orientation: options.orientation });
  }

  return pipeline.toFormat(format).toBuffer();
}

/**
 * JPEG whose left half is `left` and right half is `right`, so tests can
 * tell where columns ended up after a rotation or mirror.
 */
export async function splitJpeg(
  width: number,
  height: number,
  left: Rgb,
  right: Rgb,
  orientation?: number
): Promise<Buffer> {
  const raw = Buffer.alloc(width * height * 3);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const colour = x < width / 2 ? left : right;
      raw.set(colour, (y * width + x) * 3);
    }
  }

  let pipeline = sharp(raw, { raw: { width, height, channels: 3 } });
  if (orientation) {
    pipeline = pipeline.withMetadata({ orientation });
  }
  return pipeline.jpeg({ quality: 95 }).toBuffer();
}

export async function pixelAt(buffer: Buffer, x: number, y: number): Promise<Rgb> {
  const { data, info } = await sharp(buffer).raw().toBuffer({ resolveWithObject: true });
  const index = (y * info.width + x) * info.channels;
  return [data[index], data[index + 1], data[index + 2]];
}

export function isRed([r, , b]: Rgb): boolean {
  return r > 160 && b < 100;
}

export function isBlue([r, , b]: Rgb): boolean {
  return b > 160 && r < 100;
}

// 24-bit uncompressed bitmap; libvips has no BMP loader.
export function bmpImage(width: number, height: number): Buffer {
  const rowSize = Math.ceil((width * 3) / 4) * 4;
  const pixelBytes = rowSize * height;
  const buffer = Buffer.alloc(54 + pixelBytes);

  buffer.write('BM', 0, 'ascii');
  buffer.writeUInt32LE(buffer.length, 2);
  buffer.writeUInt32LE(54, 10);
  buffer.writeUInt32LE(40, 14);
  buffer.writeInt32LE(width, 18);
  buffer.writeInt32LE(height, 22);
  buffer.writeUInt16LE(1, 26);
  buffer.writeUInt16LE(24, 28);
  buffer.writeUInt32LE(pixelBytes, 34);
  buffer.writeInt32LE(2835, 38);
  buffer.writeInt32LE(2835, 42);
  buffer.fill(0x80, 54);

  return buffer;
}

export async function makeTempDir(prefix = 'derivatives-'): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
