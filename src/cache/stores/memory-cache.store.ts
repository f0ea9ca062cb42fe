import { CacheStore, StoreReachability } from '../interfaces/cache-store.interface';
import { globToRegExp } from './glob-pattern';

interface MemoryEntry {
  value: string;
  expiresAt: number;
}

/**
 * In-process store for single-instance deployments and tests.
 * Expired entries are dropped lazily on access.
 */
export class MemoryCacheStore implements CacheStore {
  readonly backend = 'memory';

  private readonly entries = new Map<string, MemoryEntry>();

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return null;
    }

    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, {
      value,
      expiresAt: Date.now() + ttlSeconds * 1000,
    });
  }

  async delete(key: string): Promise<boolean> {
    const entry = this.entries.get(key);
    this.entries.delete(key);
    return entry !== undefined && !this.isExpired(entry);
  }

  async deleteMatching(pattern: string): Promise<number> {
    const matcher = globToRegExp(pattern);
    let deleted = 0;

    for (const [key, entry] of this.entries) {
      if (!matcher.test(key)) {
        continue;
      }
      this.entries.delete(key);
      if (!this.isExpired(entry)) {
        deleted++;
      }
    }

    return deleted;
  }

  async ping(): Promise<StoreReachability> {
    return 'reachable';
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  private isExpired(entry: MemoryEntry): boolean {
    return Date.now() >= entry.expiresAt;
  }
}
