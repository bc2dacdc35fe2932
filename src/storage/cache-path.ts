import path from 'path';
import { OutputFormat, TransformMode } from '../types.js';
import { CacheStore } from './cache-store.js';

const posix = path.posix;

export interface SourceLocation {
  file: string;
  dir: string;
  // `dir` relative to the public root
  urlBase: string;
  filename: string;
  stem: string;
  extension: string;
}

/** Where a derivative lives, on disk and as served. */
export interface CachePath {
  source: SourceLocation;
  sizeDir: string;
  mode: TransformMode;
  filename: string;
  absolutePath: string;
  publicPath: string;
}

export interface CacheKey {
  sourcePath: string;
  width: number;
  height: number;
  mode: TransformMode;
  format: OutputFormat | null;
}

function toSlashes(value: string): string {
  return value.replace(/\\/g, '/');
}

function stripRoot(dir: string, publicRoot: string): string {
  const root = toSlashes(publicRoot).replace(/\/+$/, '');
  if (!root) return dir;
  if (dir === root) return '';
  return dir.startsWith(`${root}/`) ? dir.slice(root.length) : dir;
}

export function parseSourcePath(sourcePath: string, publicRoot: string): SourceLocation {
  const file = toSlashes(sourcePath);
  const dir = posix.dirname(file);
  const filename = posix.basename(file);
  const extension = posix.extname(filename);

  return {
    file,
    dir,
    urlBase: stripRoot(dir, publicRoot),
    filename,
    stem: extension ? filename.slice(0, -extension.length) : filename,
    extension: extension.slice(1).toLowerCase(),
  };
}

export function derivativeFilename(source: SourceLocation, format: OutputFormat | null): string {
  return format ? `${source.stem}.${format}` : source.filename;
}

export function sizeDirName(width: number, height: number): string {
  return `${width}-${height}`;
}

export function publicPathOf(urlBase: string, ...segments: string[]): string {
  return posix.join('/', urlBase, ...segments);
}

/**
 * Derive the cache location for a derivative. Pure: the same key always
 * yields the same paths, and nothing touches the store.
 */
export function buildCachePath(key: CacheKey, publicRoot: string): CachePath {
  const source = parseSourcePath(key.sourcePath, publicRoot);
  const sizeDir = sizeDirName(key.width, key.height);
  const filename = derivativeFilename(source, key.format);

  return {
    source,
    sizeDir,
    mode: key.mode,
    filename,
    absolutePath: posix.join(source.dir, sizeDir, key.mode, filename),
    publicPath: publicPathOf(source.urlBase, sizeDir, key.mode, filename),
  };
}

export function getPath(cachePath: CachePath, fromRoot = false): string {
  return fromRoot ? cachePath.absolutePath : cachePath.publicPath;
}

/**
 * Create `<width>-<height>` and then `<mode>` beneath the source directory.
 * Existing directories are left alone; any other failure propagates.
 */
export async function ensureCacheDirs(store: CacheStore, cachePath: CachePath): Promise<void> {
  const sizeDir = posix.join(cachePath.source.dir, cachePath.sizeDir);
  await store.ensureDir(sizeDir);
  await store.ensureDir(posix.join(sizeDir, cachePath.mode));
}
