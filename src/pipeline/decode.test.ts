import { describe, it, expect } from 'vitest';
import { probeImage, sniffMime } from './decode.js';
import { bmpImage, solidImage } from '../test-utils/images.js';

describe('probeImage', () => {
  it('reads dimensions, type and transparency', async () => {
    const buffer = await solidImage(30, 20, 'png', { alpha: true });

    expect(await probeImage(buffer)).toEqual({
      ok: true,
      metadata: {
        width: 30,
        height: 20,
        format: 'png',
        mime: 'image/png',
        size: buffer.length,
        orientation: 1,
        hasAlpha: true,
      },
    });
  });

  it('reports the EXIF orientation of a JPEG', async () => {
    const result = await probeImage(await solidImage(40, 30, 'jpeg', { orientation: 6 }));

    expect(result.ok && result.metadata).toMatchObject({ width: 40, height: 30, mime: 'image/jpeg', orientation: 6 });
  });

  it('names the type of a recognised but unreadable image', async () => {
    expect(await probeImage(bmpImage(4, 4))).toEqual({
      ok: false,
      kind: 'unsupported_format',
      error: 'image/bmp images are not supported',
    });
  });

  it('rejects bytes that are not an image', async () => {
    expect(await probeImage(Buffer.from('definitely not an image'))).toEqual({
      ok: false,
      kind: 'unsupported_format',
      error: 'Invalid file type',
    });
  });
});

describe('sniffMime', () => {
  it('matches known signatures only', () => {
    expect(sniffMime(Buffer.from([0x38, 0x42, 0x50, 0x53, 0x00]))).toBe('image/vnd.adobe.photoshop');
    expect(sniffMime(Buffer.from([0x00, 0x00, 0x01, 0x00]))).toBe('image/x-icon');
    expect(sniffMime(Buffer.from('GIF89a'))).toBeNull();
  });
});
