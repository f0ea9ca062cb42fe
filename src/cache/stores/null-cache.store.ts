import { CacheStore, StoreReachability } from '../interfaces/cache-store.interface';

/**
 * Pass-through store used when no cache backend is configured.
 * Every lookup misses and every write is discarded.
 */
export class NullCacheStore implements CacheStore {
  readonly backend = 'none';

  async get(_key: string): Promise<string | null> {
    return null;
  }

  async set(_key: string, _value: string, _ttlSeconds: number): Promise<void> {
    return;
  }

  async delete(_key: string): Promise<boolean> {
    return false;
  }

  async deleteMatching(_pattern: string): Promise<number> {
    return 0;
  }

  async ping(): Promise<StoreReachability> {
    return 'unreachable';
  }

  async close(): Promise<void> {
    return;
  }
}
