import path from 'path';
import { logger } from '../utils/logger.js';
import { CacheStore, EntryKind, contentTypeFor } from './cache-store.js';

interface StorageFailure {
  message: string;
}

// Folder placeholders come back from `list` without an id
export interface StorageEntry {
  name: string;
  id: string | null;
}

/**
 * The subset of a Supabase Storage bucket (`supabase.storage.from(bucket)`)
 * the store calls.
 */
export interface StorageBucket {
  list(
    prefix?: string,
    options?: { limit?: number; offset?: number; search?: string }
  ): PromiseLike<{ data: StorageEntry[] | null; error: StorageFailure | null }>;
  download(key: string): PromiseLike<{ data: Blob | null; error: StorageFailure | null }>;
  upload(
    key: string,
    body: Buffer,
    options?: { contentType?: string; cacheControl?: string; upsert?: boolean }
  ): PromiseLike<{ error: StorageFailure | null }>;
  remove(keys: string[]): PromiseLike<{ error: StorageFailure | null }>;
}

const PAGE_SIZE = 1000;

function normalizeKey(key: string): string {
  const normalized = path.posix.normalize(key).replace(/^\/+/, '').replace(/\/+$/, '');
  return normalized === '.' ? '' : normalized;
}

/**
 * Object-store backend. Buckets have no directories, so `ensureDir` is a
 * no-op and a "directory" is any prefix with objects below it.
 */
export class SupabaseCacheStore implements CacheStore {
  constructor(private readonly bucket: StorageBucket) {}

  async stat(key: string): Promise<EntryKind | null> {
    const normalized = normalizeKey(key);
    const dir = path.posix.dirname(normalized);
    const name = path.posix.basename(normalized);

    const { data, error } = await this.bucket.list(normalizeKey(dir), { search: name, limit: PAGE_SIZE });
    if (error) {
      throw new Error(`Storage list failed: ${error.message}`);
    }

    const entry = data?.find(candidate => candidate.name === name);
    if (!entry) return null;
    return entry.id ? 'file' : 'directory';
  }

  async exists(key: string): Promise<boolean> {
    return (await this.stat(key)) === 'file';
  }

  async read(key: string): Promise<Buffer> {
    const { data, error } = await this.bucket.download(normalizeKey(key));
    if (error || !data) {
      throw new Error(`Download failed: ${error?.message ?? 'empty body'}`);
    }
    return Buffer.from(await data.arrayBuffer());
  }

  // Uploads replace the object in one step, so no temp key is needed
  async write(key: string, data: Buffer): Promise<void> {
    const normalized = normalizeKey(key);
    const { error } = await this.bucket.upload(normalized, data, {
      contentType: contentTypeFor(normalized),
      cacheControl: 'public, max-age=31536000, immutable',
      upsert: true,
    });

    if (error) {
      throw new Error(`Upload failed: ${error.message}`);
    }

    logger.debug('Uploaded object', { key: normalized, bytes: data.length });
  }

  async ensureDir(): Promise<void> {}

  async remove(key: string): Promise<void> {
    const { error } = await this.bucket.remove([normalizeKey(key)]);
    if (error) {
      throw new Error(`Remove failed: ${error.message}`);
    }
  }

  async list(dir: string): Promise<string[]> {
    const files: string[] = [];
    const pending = [normalizeKey(dir)];
    let prefix: string | undefined;

    while ((prefix = pending.pop()) !== undefined) {
      for (let offset = 0; ; offset += PAGE_SIZE) {
        const { data, error } = await this.bucket.list(prefix, { limit: PAGE_SIZE, offset });
        if (error) {
          throw new Error(`Storage list failed: ${error.message}`);
        }

        const entries = data ?? [];
        for (const entry of entries) {
          const key = prefix ? `${prefix}/${entry.name}` : entry.name;
          if (entry.id) {
            files.push(key);
          } else {
            pending.push(key);
          }
        }

        if (entries.length < PAGE_SIZE) break;
      }
    }

    return files.sort();
  }
}
