import path from 'path';
import { OUTPUT_FORMATS, TRANSFORM_MODES } from '../types.js';
import { logger } from '../utils/logger.js';
import { CacheStore } from './cache-store.js';
import { SourceLocation, parseSourcePath } from './cache-path.js';

const DERIVATIVE_DIR = new RegExp(`(^|/)\\d+-\\d+/(${TRANSFORM_MODES.join('|')})$`);

function isConvertedDerivative(key: string, source: SourceLocation): boolean {
  const dir = path.posix.dirname(key);
  if (!DERIVATIVE_DIR.test(dir)) return false;

  const filename = path.posix.basename(key);
  const extension = path.posix.extname(filename);
  const format = extension.slice(1);

  return (
    filename.slice(0, -extension.length) === source.stem &&
    OUTPUT_FORMATS.some(candidate => candidate === format)
  );
}

/**
 * Delete a source image and every derivative made from it. Derivatives keep
 * the source's filename (or its stem, when converted), so walking the
 * source's directory tree finds all of them. A converted derivative whose
 * name belongs to another source in the same directory is left alone.
 *
 * Returns the removed keys.
 */
export async function cascadeDelete(store: CacheStore, sourcePath: string): Promise<string[]> {
  const source = parseSourcePath(sourcePath, '');

  const dirKind = source.dir === '.' ? 'directory' : await store.stat(source.dir);
  if (dirKind !== 'directory') {
    logger.warn('Nothing to delete', { sourcePath });
    return [];
  }

  const keys = await store.list(source.dir);
  const matches: string[] = [];

  for (const key of keys) {
    const filename = path.posix.basename(key);
    if (filename === source.filename) {
      matches.push(key);
    } else if (isConvertedDerivative(key, source) && !(await store.exists(path.posix.join(source.dir, filename)))) {
      // photo.png beside photo.jpg owns the photo.png derivatives
      matches.push(key);
    }
  }

  for (const key of matches) {
    await store.remove(key);
  }

  logger.info('Deleted image and derivatives', { sourcePath, removed: matches.length });
  return matches;
}
