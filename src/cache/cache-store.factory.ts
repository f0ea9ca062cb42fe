import { FactoryProvider, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { CACHE_STORE, CacheStore } from './interfaces/cache-store.interface';
import { MemoryCacheStore } from './stores/memory-cache.store';
import { NullCacheStore } from './stores/null-cache.store';
import { RedisCacheStore } from './stores/redis-cache.store';

/**
 * Pick the store from configuration.
 *
 * An unreachable Redis at startup does not stop the service: the store is
 * kept, its operations fail fast and count as misses until the client
 * reconnects.
 */
export async function createCacheStore(cache: AppConfig['cache']): Promise<CacheStore> {
  const logger = new Logger('CacheStoreFactory');

  switch (cache.backend) {
    case 'redis': {
      if (!cache.redisUrl) {
        logger.warn('[Cache] backend=redis status=no_url fallback=none');
        return new NullCacheStore();
      }
      const store = new RedisCacheStore({
        url: cache.redisUrl,
        operationTimeoutMs: cache.operationTimeoutMs,
      });
      const connected = await store.connect();
      if (!connected) {
        logger.warn('[Cache] backend=redis status=degraded mode=compute_always');
      }
      return store;
    }

    case 'memory':
      logger.log('[Cache] backend=memory');
      return new MemoryCacheStore();

    case 'none':
      logger.warn('[Cache] backend=none mode=pass_through');
      return new NullCacheStore();
  }
}

export const cacheStoreFactory: FactoryProvider<Promise<CacheStore>> = {
  provide: CACHE_STORE,
  useFactory: (config: AppConfig) => createCacheStore(config.cache),
  inject: [APP_CONFIG],
};
