import sharp from 'sharp';
import { mkdir, readdir, stat, utimes, writeFile } from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { DerivativeService } from './service.js';
import { FsCacheStore } from './storage/fs-store.js';
import { ImageError } from './errors.js';
import { bmpImage, makeTempDir, removeDir, solidImage } from './test-utils/images.js';

// Refuses writes to one key, like a read-only upload
class SourceLockedStore extends FsCacheStore {
  constructor(private readonly lockedKey: string) {
    super({ fileMode: 0o666, directoryMode: 0o777 });
  }

  async write(key: string, data: Buffer): Promise<void> {
    if (key === this.lockedKey) {
      throw new Error(`EACCES: permission denied, open '${key}'`);
    }
    return super.write(key, data);
  }
}

describe('DerivativeService', () => {
  let root: string;
  let uploads: string;
  let errorImage: string;
  let store: FsCacheStore;
  let service: DerivativeService;

  async function put(relative: string, data: Buffer | string): Promise<string> {
    const file = path.join(root, relative);
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, data);
    return file;
  }

  function createService(overrides: { errorImage?: string; persistOrientedSource?: boolean } = {}) {
    return new DerivativeService({
      store,
      publicRoot: root,
      errorImage: overrides.errorImage ?? errorImage,
      defaultQuality: 90,
      persistOrientedSource: overrides.persistOrientedSource ?? true,
    });
  }

  async function filesUnder(dir: string): Promise<string[]> {
    const entries = await readdir(dir, { recursive: true, withFileTypes: true });
    return entries.filter(entry => entry.isFile()).map(entry => entry.name);
  }

  beforeEach(async () => {
    root = await makeTempDir();
    uploads = path.join(root, 'uploads');
    errorImage = await put('vendor/error.jpg', await solidImage(50, 50, 'jpeg'));
    store = new FsCacheStore({ fileMode: 0o666, directoryMode: 0o777 });
    service = createService();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  describe('resolve', () => {
    it('crops from the top into the size and mode directories', async () => {
      await put('uploads/photo.jpg', await solidImage(800, 600, 'jpeg'));

      const result = await service.resolve(path.join(uploads, 'photo.jpg'), 200, 200, 'crop-top');

      expect(result).toBe('/uploads/200-200/crop-top/photo.jpg');
      expect(service.errors()).toEqual([]);
      const metadata = await sharp(path.join(uploads, '200-200', 'crop-top', 'photo.jpg')).metadata();
      expect([metadata.width, metadata.height, metadata.format]).toEqual([200, 200, 'jpeg']);
    });

    it('fits within the box keeping the aspect ratio', async () => {
      await put('uploads/photo.jpg', await solidImage(800, 600, 'jpeg'));

      const result = await service.resolve(path.join(uploads, 'photo.jpg'), 200, 200, 'fit');

      expect(result).toBe('/uploads/200-200/fit/photo.jpg');
      const metadata = await sharp(path.join(uploads, '200-200', 'fit', 'photo.jpg')).metadata();
      expect([metadata.width, metadata.height]).toEqual([200, 150]);
    });

    it('serves the second identical call from the cache', async () => {
      const source = await put('uploads/photo.jpg', await solidImage(400, 300, 'jpeg'));
      const first = await service.resolve(source, 100, 100, 'crop');
      const derivative = path.join(uploads, '100-100', 'crop', 'photo.jpg');

      const past = new Date('2020-01-01T00:00:00Z');
      await utimes(derivative, past, past);

      const second = await service.resolve(source, 100, 100, 'crop');

      expect(second).toBe(first);
      expect((await stat(derivative)).mtime.getTime()).toBe(past.getTime());
    });

    it('keeps crop and fit derivatives of the same size apart', async () => {
      const source = await put('uploads/photo.jpg', await solidImage(400, 300, 'jpeg'));

      const cropped = await service.resolve(source, 100, 100, 'crop');
      const fitted = await service.resolve(source, 100, 100, 'fit');

      expect(cropped).toBe('/uploads/100-100/crop/photo.jpg');
      expect(fitted).toBe('/uploads/100-100/fit/photo.jpg');
    });

    it('converts to a requested output format', async () => {
      const source = await put('uploads/photo.jpg', await solidImage(400, 300, 'jpeg'));

      const result = await service.resolve(source, 100, 100, 'fit', 80, 'webp');

      expect(result).toBe('/uploads/100-100/fit/photo.webp');
      const metadata = await sharp(path.join(uploads, '100-100', 'fit', 'photo.webp')).metadata();
      expect(metadata.format).toBe('webp');
    });

    it('writes derivatives readable and writable by everyone', async () => {
      const source = await put('uploads/photo.jpg', await solidImage(400, 300, 'jpeg'));

      await service.resolve(source, 100, 100, 'fit');

      const { mode } = await stat(path.join(uploads, '100-100', 'fit', 'photo.jpg'));
      expect(mode & 0o666).toBe(0o666);
      expect(await readdir(path.join(uploads, '100-100', 'fit'))).toEqual(['photo.jpg']);
    });

    it('keeps transparency for PNG sources', async () => {
      const source = await put('uploads/badge.png', await solidImage(60, 60, 'png', { alpha: true }));

      await service.resolve(source, 30, 30, 'fit');

      const metadata = await sharp(path.join(uploads, '30-30', 'fit', 'badge.png')).metadata();
      expect(metadata.hasAlpha).toBe(true);
    });

    it('returns SVG sources untouched', async () => {
      const source = await put('uploads/logo.svg', '<svg xmlns="http://www.w3.org/2000/svg" width="10" height="10"/>');

      const result = await service.resolve(source, 100, 100, 'crop');

      expect(result).toBe('/uploads/logo.svg');
      expect(await readdir(uploads)).toEqual(['logo.svg']);
    });

    it('hands concurrent callers the same derivative', async () => {
      const source = await put('uploads/photo.jpg', await solidImage(400, 300, 'jpeg'));

      const results = await Promise.all([
        service.resolve(source, 120, 80, 'crop'),
        service.resolve(source, 120, 80, 'crop'),
      ]);

      expect(results).toEqual(['/uploads/120-80/crop/photo.jpg', '/uploads/120-80/crop/photo.jpg']);
      const metadata = await sharp(path.join(uploads, '120-80', 'crop', 'photo.jpg')).metadata();
      expect([metadata.width, metadata.height]).toEqual([120, 80]);
    });

    it('renders at least one row for a very wide source', async () => {
      const source = await put('uploads/strip.png', await solidImage(1000, 2, 'png'));

      const result = await service.resolve(source, 100, 100, 'fit-x');

      expect(result).toBe('/uploads/100-100/fit-x/strip.png');
      expect(service.errors()).toEqual([]);
      const metadata = await sharp(path.join(uploads, '100-100', 'fit-x', 'strip.png')).metadata();
      expect([metadata.width, metadata.height]).toEqual([100, 1]);
    });

    it('throws on an unknown mode instead of falling back', async () => {
      const source = await put('uploads/photo.jpg', await solidImage(40, 30, 'jpeg'));

      await expect(service.resolve(source, 10, 10, 'stretch')).rejects.toThrow('Invalid mode: stretch');
    });

    it('throws on non-positive dimensions', async () => {
      const source = await put('uploads/photo.jpg', await solidImage(40, 30, 'jpeg'));

      await expect(service.resolve(source, 0, 10, 'fit')).rejects.toThrow('Invalid dimensions: 0x10');
    });

    it('treats a failure to create the cache directories as fatal', async () => {
      const source = await put('uploads/photo.jpg', await solidImage(40, 30, 'jpeg'));
      // A file where the size directory should be
      await put('uploads/10-10', 'not a directory');

      const attempt = service.resolve(source, 10, 10, 'fit');

      await expect(attempt).rejects.toBeInstanceOf(ImageError);
      await expect(attempt).rejects.toMatchObject({ kind: 'directory_create' });
    });
  });

  describe('orientation', () => {
    it('rotates a tag 6 JPEG upright and rewrites the source', async () => {
      const source = await put('uploads/camera.jpg', await solidImage(40, 30, 'jpeg', { orientation: 6 }));

      const result = await service.resolve(source, 20, 20, 'fit');

      expect(result).toBe('/uploads/20-20/fit/camera.jpg');
      const derivative = await sharp(path.join(uploads, '20-20', 'fit', 'camera.jpg')).metadata();
      expect([derivative.width, derivative.height]).toEqual([15, 20]);

      const rewritten = await sharp(source).metadata();
      expect([rewritten.width, rewritten.height]).toEqual([30, 40]);
      expect(rewritten.orientation ?? 1).toBe(1);
    });

    it('still builds the derivative when the source cannot be rewritten', async () => {
      const source = await put('uploads/camera.jpg', await solidImage(40, 30, 'jpeg', { orientation: 6 }));
      store = new SourceLockedStore(source);
      const locked = createService();

      const result = await locked.resolve(source, 20, 20, 'fit');

      expect(result).toBe('/uploads/20-20/fit/camera.jpg');
      expect(locked.errors()).toEqual([]);
      const derivative = await sharp(path.join(uploads, '20-20', 'fit', 'camera.jpg')).metadata();
      expect([derivative.width, derivative.height]).toEqual([15, 20]);
      const original = await sharp(source).metadata();
      expect([original.width, original.height, original.orientation]).toEqual([40, 30, 6]);
    });

    it('leaves the source alone when persisting is switched off', async () => {
      const source = await put('uploads/camera.jpg', await solidImage(40, 30, 'jpeg', { orientation: 6 }));
      const readOnly = createService({ persistOrientedSource: false });

      await readOnly.resolve(source, 20, 20, 'fit');

      const derivative = await sharp(path.join(uploads, '20-20', 'fit', 'camera.jpg')).metadata();
      expect([derivative.width, derivative.height]).toEqual([15, 20]);
      const original = await sharp(source).metadata();
      expect([original.width, original.height, original.orientation]).toEqual([40, 30, 6]);
    });
  });

  describe('fallback', () => {
    it('answers an unsupported type with the error image and one message', async () => {
      const source = await put('uploads/legacy.bmp', bmpImage(4, 4));

      const result = await service.resolve(source, 100, 100, 'fit');

      expect(result).toBe('/vendor/100-100/fit/error.jpg');
      const errors = service.errors();
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBe('image/bmp images are not supported');
    });

    it('answers a missing source with the error image', async () => {
      const missing = path.join(uploads, 'missing.jpg');

      const result = await service.resolve(missing, 100, 100, 'crop');

      expect(result).toBe('/vendor/100-100/crop/error.jpg');
      expect(service.errors()).toEqual([`Image not found: ${missing}`]);
      const metadata = await sharp(path.join(root, 'vendor', '100-100', 'crop', 'error.jpg')).metadata();
      expect([metadata.width, metadata.height]).toEqual([100, 100]);
    });

    it('rejects an unsupported output format', async () => {
      const source = await put('uploads/photo.jpg', await solidImage(40, 30, 'jpeg'));

      const result = await service.resolve(source, 20, 20, 'fit', 90, 'tiff');

      expect(result).toBe('/vendor/20-20/fit/error.jpg');
      expect(service.errors()).toEqual(['tiff images are not supported']);
    });

    it('returns null when the error image is missing too', async () => {
      const missing = path.join(uploads, 'missing.jpg');
      const withoutFallback = createService({ errorImage: path.join(root, 'vendor', 'absent.jpg') });

      const result = await withoutFallback.resolve(missing, 100, 100, 'fit');

      expect(result).toBeNull();
      expect(withoutFallback.errors()).toEqual([`Image not found: ${missing}`, 'Error image not found.']);
    });

    it('drains the messages once read', async () => {
      await service.resolve(path.join(uploads, 'missing.jpg'), 10, 10, 'fit');

      expect(service.errors()).toHaveLength(1);
      expect(service.errors()).toEqual([]);
    });
  });

  describe('delete', () => {
    it('removes the source and every derivative generated from it', async () => {
      const source = await put('uploads/photo.jpg', await solidImage(400, 300, 'jpeg'));
      const other = await put('uploads/other.jpg', await solidImage(40, 30, 'jpeg'));

      await service.resolve(source, 100, 100, 'crop');
      await service.resolve(source, 50, 50, 'fit');
      await service.resolve(source, 100, 100, 'crop-top', 80, 'webp');
      await service.resolve(other, 100, 100, 'crop');

      await service.delete(source);

      const remaining = await filesUnder(uploads);
      expect(remaining.filter(name => name.startsWith('photo.'))).toEqual([]);
      expect(remaining.sort()).toEqual(['other.jpg', 'other.jpg']);
    });
  });

  describe('uniqueFilename', () => {
    it('slugs the name and avoids taken ones', async () => {
      await put('uploads/my-photo.jpg', 'taken');

      expect(await service.uniqueFilename('Holiday_Pic.JPG', uploads)).toBe('holiday-pic.jpg');
      expect(await service.uniqueFilename('My Photo.jpg', uploads)).toMatch(/^my-photo-[0-9a-f]{13}\.jpg$/);
    });
  });
});
