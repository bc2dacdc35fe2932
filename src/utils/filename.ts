import { randomBytes } from 'crypto';
import path from 'path';
import type { CacheStore } from '../storage/cache-store.js';

export function extensionOf(filename: string): string {
  return path.posix.extname(filename).slice(1).toLowerCase();
}

/**
 * Lowercase, URL-safe filename: underscores become dashes, "@" becomes
 * "-at-", anything but letters, digits, dots and dashes is dropped.
 */
export function slug(filename: string): string {
  return filename
    .replace(/_+/gu, '-')
    .replace(/@/g, '-at-')
    .toLowerCase()
    .replace(/[^\-.\p{L}\p{N}\s]+/gu, '')
    .replace(/[\-\s]+/gu, '-')
    .replace(/^-+|-+$/g, '');
}

function uniqueSuffix(): string {
  return randomBytes(7).toString('hex').slice(0, 13);
}

/**
 * Slug `filename` and, while a file of that name exists in `destination`,
 * append a random suffix to its stem.
 */
export async function uniqueFilename(filename: string, destination: string, store: CacheStore): Promise<string> {
  let candidate = slug(filename);

  while (await store.exists(path.posix.join(destination, candidate))) {
    const extension = path.posix.extname(candidate);
    const stem = extension ? candidate.slice(0, -extension.length) : candidate;
    candidate = `${stem}-${uniqueSuffix()}${extension}`;
  }

  return candidate;
}
