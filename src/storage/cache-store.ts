import { extensionOf } from '../utils/filename.js';

export type EntryKind = 'file' | 'directory';

/**
 * Everything the engine needs from the place sources and derivatives live.
 * Keys are slash-separated: absolute paths for the filesystem store, object
 * keys for a bucket.
 */
export interface CacheStore {
  stat(key: string): Promise<EntryKind | null>;
  exists(key: string): Promise<boolean>;
  read(key: string): Promise<Buffer>;
  // Readers never observe a partially written file
  write(key: string, data: Buffer): Promise<void>;
  // Creates one level; an existing directory is not an error
  ensureDir(key: string): Promise<void>;
  remove(key: string): Promise<void>;
  // Every file key below `dir`, at any depth
  list(dir: string): Promise<string[]>;
}

const CONTENT_TYPES: Record<string, string> = {
  gif: 'image/gif',
  jpeg: 'image/jpeg',
  jpg: 'image/jpeg',
  png: 'image/png',
  webp: 'image/webp',
  svg: 'image/svg+xml',
};

export function contentTypeFor(key: string): string {
  return CONTENT_TYPES[extensionOf(key)] ?? 'application/octet-stream';
}
