export type StoreReachability = 'reachable' | 'unreachable';

/**
 * Uniform key-value surface over the cache backend.
 *
 * Every method rejects with TransientStoreError when the backend cannot be
 * reached, so an absent key (null) is never confused with an outage.
 */
export interface CacheStore {
  readonly backend: string;

  get(key: string): Promise<string | null>;

  /**
   * Upsert; resets the expiration of an existing key
   */
  set(key: string, value: string, ttlSeconds: number): Promise<void>;

  delete(key: string): Promise<boolean>;

  /**
   * Delete every key matching a glob pattern (`*` and `?` wildcards).
   * Keys written concurrently may or may not be removed.
   */
  deleteMatching(pattern: string): Promise<number>;

  ping(): Promise<StoreReachability>;

  close(): Promise<void>;
}

export const CACHE_STORE = Symbol('CACHE_STORE');
