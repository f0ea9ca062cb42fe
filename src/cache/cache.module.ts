/**
 * Query Cache Module
 * Shared store, tier table, read-through service, stats and invalidation.
 */

import { Global, Inject, Module, OnApplicationShutdown } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { CACHE_STORE, CacheStore } from './interfaces/cache-store.interface';
import { cacheStoreFactory } from './cache-store.factory';
import { TIER_REGISTRY } from './tiers/tier.types';
import { createTierRegistry } from './tiers/tier-policies';
import { TieredCacheService } from './tiered-cache.service';
import { CacheStatsService } from './cache-stats.service';
import { CacheInvalidationService } from './cache-invalidation.service';

@Global()
@Module({
  providers: [
    cacheStoreFactory,
    {
      provide: TIER_REGISTRY,
      useFactory: (config: AppConfig) => createTierRegistry(config.cache.ttlSeconds),
      inject: [APP_CONFIG],
    },
    CacheStatsService,
    TieredCacheService,
    CacheInvalidationService,
  ],
  exports: [CACHE_STORE, TIER_REGISTRY, CacheStatsService, TieredCacheService, CacheInvalidationService],
})
export class QueryCacheModule implements OnApplicationShutdown {
  constructor(@Inject(CACHE_STORE) private readonly cacheStore: CacheStore) {}

  async onApplicationShutdown(): Promise<void> {
    await this.cacheStore.close();
  }
}
