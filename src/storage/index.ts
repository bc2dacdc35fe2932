import { config } from '../config.js';
import { CacheStore } from './cache-store.js';
import { getDerivativesBucket } from './client.js';
import { FsCacheStore } from './fs-store.js';
import { SupabaseCacheStore } from './supabase-store.js';

export function createCacheStore(): CacheStore {
  if (config.storageDriver === 'supabase') {
    return new SupabaseCacheStore(getDerivativesBucket());
  }

  return new FsCacheStore({
    fileMode: config.fileMode,
    directoryMode: config.directoryMode,
  });
}

export type { CacheStore, EntryKind } from './cache-store.js';
