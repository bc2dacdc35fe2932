import { randomBytes } from 'crypto';
import { chmod, mkdir, readdir, readFile, rename, rm, stat, unlink, writeFile } from 'fs/promises';
import path from 'path';
import { ImageError } from '../errors.js';
import { logger, errorMessage } from '../utils/logger.js';
import { CacheStore, EntryKind } from './cache-store.js';

export interface FsCacheStoreOptions {
  fileMode: number;
  directoryMode: number;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class FsCacheStore implements CacheStore {
  constructor(private readonly options: FsCacheStoreOptions) {}

  async stat(key: string): Promise<EntryKind | null> {
    try {
      const stats = await stat(key);
      if (stats.isDirectory()) return 'directory';
      return stats.isFile() ? 'file' : null;
    } catch (error) {
      if (errorCode(error) === 'ENOENT' || errorCode(error) === 'ENOTDIR') return null;
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    return (await this.stat(key)) === 'file';
  }

  read(key: string): Promise<Buffer> {
    return readFile(key);
  }

  async write(key: string, data: Buffer): Promise<void> {
    const temp = `${key}.${randomBytes(6).toString('hex')}.tmp`;

    try {
      await writeFile(temp, data, { mode: this.options.fileMode });
      // writeFile's mode is masked by the umask
      await chmod(temp, this.options.fileMode);
      await rename(temp, key);
    } catch (error) {
      await rm(temp, { force: true });
      throw error;
    }
  }

  async ensureDir(key: string): Promise<void> {
    if ((await this.stat(key)) === 'directory') return;

    try {
      await mkdir(key, { mode: this.options.directoryMode });
    } catch (error) {
      // Another request created it first
      if (errorCode(error) === 'EEXIST') return;

      logger.error('Error creating directory', { dir: key, error: errorMessage(error) });
      throw new ImageError('directory_create', `Error creating directory: ${key}`, { cause: error });
    }
  }

  async remove(key: string): Promise<void> {
    try {
      await unlink(key);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') throw error;
    }
  }

  async list(dir: string): Promise<string[]> {
    const files: string[] = [];
    const pending = [dir];
    let current: string | undefined;

    while ((current = pending.pop()) !== undefined) {
      const entries = await readdir(current, { withFileTypes: true });

      for (const entry of entries) {
        const key = path.posix.join(current, entry.name);
        if (entry.isDirectory()) {
          pending.push(key);
        } else if (entry.isFile()) {
          files.push(key);
        }
      }
    }

    return files.sort();
  }
}
