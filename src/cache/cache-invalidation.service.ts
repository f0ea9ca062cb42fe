/**
 * Cache Invalidation Service
 * Pattern-scoped bulk deletion, one tier prefix at a time.
 *
 * Triggered after a successful ingestion (answers only) and by operators.
 * Store failures are raised, never swallowed: the caller decides whether
 * to report or fail. Prefixes are glob-escaped before they reach the store.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { CACHE_STORE, CacheStore } from './interfaces/cache-store.interface';
import { TIER_NAMES, TIER_REGISTRY, TierName, TierRegistry } from './tiers/tier.types';
import { CacheStatsService } from './cache-stats.service';
import { escapeGlob } from './stores/glob-pattern';
import { TransientStoreError, describeError } from '../common/errors/query-cache.errors';

export type InvalidationTarget = TierName | 'all';

export type InvalidationReport = Partial<Record<TierName, number>>;

@Injectable()
export class CacheInvalidationService {
  private readonly logger = new Logger(CacheInvalidationService.name);

  constructor(
    @Inject(CACHE_STORE) private readonly cacheStore: CacheStore,
    @Inject(TIER_REGISTRY) private readonly registry: TierRegistry,
    private readonly stats: CacheStatsService,
  ) {}

  /**
   * Every requested tier is attempted. Tiers whose deletion failed are
   * reported together in one TransientStoreError once the rest are done.
   */
  async invalidate(target: InvalidationTarget): Promise<InvalidationReport> {
    const tiers = target === 'all' ? TIER_NAMES : [target];
    const report: InvalidationReport = {};
    const failures: Array<{ tier: TierName; error: unknown }> = [];

    for (const tier of tiers) {
      const pattern = `${escapeGlob(this.registry[tier].prefix)}:*`;

      try {
        const deleted = await this.cacheStore.deleteMatching(pattern);
        report[tier] = deleted;
        this.stats.recordInvalidation(tier, deleted);
        this.logger.log(`[Invalidate] tier=${tier} pattern=${pattern} deleted=${deleted}`);
      } catch (error) {
        this.stats.recordError(tier);
        this.logger.error(
          `[Invalidate] tier=${tier} pattern=${pattern} status=failed error=${describeError(error)}`,
        );
        failures.push({ tier, error });
      }
    }

    if (failures.length > 0) {
      const [first] = failures;
      throw new TransientStoreError(
        'deleteMatching',
        `failed for ${failures.map(({ tier, error }) => `${tier}: ${describeError(error)}`).join('; ')}`,
        first.error instanceof Error ? first.error : undefined,
      );
    }

    return report;
  }
}
