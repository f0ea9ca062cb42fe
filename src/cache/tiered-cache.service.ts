/**
 * Tiered Cache Service
 *
 * Read-through cache over the shared store. Each tier owns a key prefix,
 * a TTL and a record codec (see tier-policies.ts).
 *
 * Store outages never fail a request: a failed read is a miss, a failed
 * write is dropped. Errors from the compute step propagate unchanged and
 * nothing is cached for them.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { CACHE_STORE, CacheStore } from './interfaces/cache-store.interface';
import {
  CacheOutcome,
  LookupResult,
  TIER_REGISTRY,
  TierInputMap,
  TierName,
  TierPolicy,
  TierRegistry,
  TierValueMap,
} from './tiers/tier.types';
import { CacheStatsService } from './cache-stats.service';
import { fingerprint } from '../fingerprint/fingerprint';
import { InputValidationError, describeError } from '../common/errors/query-cache.errors';

type ReadResult<T> = { status: 'hit'; value: T } | { status: 'miss' } | { status: 'error' };

@Injectable()
export class TieredCacheService {
  private readonly logger = new Logger(TieredCacheService.name);

  constructor(
    @Inject(CACHE_STORE) private readonly cacheStore: CacheStore,
    @Inject(TIER_REGISTRY) private readonly registry: TierRegistry,
    private readonly stats: CacheStatsService,
  ) {}

  policy<K extends TierName>(tier: K): TierPolicy<K> {
    return this.registry[tier];
  }

  keyFor<K extends TierName>(tier: K, input: TierInputMap[K]): string {
    const policy = this.policy(tier);
    return `${policy.prefix}:${fingerprint(policy.canonicalize(input))}`;
  }

  /**
   * Return the cached value, or run compute exactly once and store its result.
   * Concurrent misses on the same key may each compute; the last write wins.
   */
  async lookupOrCompute<K extends TierName>(
    tier: K,
    input: TierInputMap[K],
    compute: () => Promise<TierValueMap[K]>,
  ): Promise<CacheOutcome<TierValueMap[K]>> {
    const key = this.keyFor(tier, input);
    const cached = await this.read(tier, key);

    if (cached.status === 'hit') {
      return { value: cached.value, hit: true, key };
    }

    const value = await compute();
    await this.writeBack(tier, key, value);

    return { value, hit: false, key };
  }

  async lookup<K extends TierName>(
    tier: K,
    input: TierInputMap[K],
  ): Promise<LookupResult<TierValueMap[K]>> {
    const key = this.keyFor(tier, input);
    const cached = await this.read(tier, key);

    return cached.status === 'hit' ? { hit: true, value: cached.value, key } : { hit: false, key };
  }

  /**
   * Best-effort write of a value computed outside lookupOrCompute
   */
  async remember<K extends TierName>(
    tier: K,
    input: TierInputMap[K],
    value: TierValueMap[K],
  ): Promise<string> {
    const key = this.keyFor(tier, input);
    await this.writeBack(tier, key, value);
    return key;
  }

  /**
   * Validate a plain value through the tier codec and write it.
   * Statements that fail the safety classifier are refused before the key is derived.
   * Unlike the read-through path, a store failure is raised to the caller.
   */
  async store<K extends TierName>(
    tier: K,
    input: TierInputMap[K],
    value: unknown,
  ): Promise<{ key: string; ttlSeconds: number }> {
    const policy = this.policy(tier);
    const record = policy.codec.fromPlain(value);
    policy.assertStorable?.(input, record);
    const key = this.keyFor(tier, input);

    try {
      await this.cacheStore.set(key, policy.codec.encode(record), policy.ttlSeconds);
    } catch (error) {
      this.stats.recordError(tier);
      throw error;
    }

    this.logger.log(`[Cache] tier=${tier} key=${key} status=stored ttl=${policy.ttlSeconds}s`);
    return { key, ttlSeconds: policy.ttlSeconds };
  }

  private async read<K extends TierName>(
    tier: K,
    key: string,
  ): Promise<ReadResult<TierValueMap[K]>> {
    const started = Date.now();
    let raw: string | null;

    try {
      raw = await this.cacheStore.get(key);
    } catch (error) {
      this.stats.recordError(tier);
      this.stats.recordMiss(tier, Date.now() - started);
      this.logger.warn(
        `[Cache] tier=${tier} key=${key} status=store_error error=${describeError(error)}`,
      );
      return { status: 'error' };
    }

    const latencyMs = Date.now() - started;

    if (raw === null) {
      this.stats.recordMiss(tier, latencyMs);
      this.logger.debug(`[Cache] tier=${tier} key=${key} status=miss latency=${latencyMs}ms`);
      return { status: 'miss' };
    }

    try {
      const value = this.policy(tier).codec.decode(raw);
      this.stats.recordHit(tier, latencyMs);
      this.logger.debug(`[Cache] tier=${tier} key=${key} status=hit latency=${latencyMs}ms`);
      return { status: 'hit', value };
    } catch (error) {
      if (!(error instanceof InputValidationError)) {
        throw error;
      }
      this.stats.recordMiss(tier, latencyMs);
      this.logger.warn(`[Cache] tier=${tier} key=${key} status=corrupt error=${error.message}`);
      return { status: 'miss' };
    }
  }

  private async writeBack<K extends TierName>(
    tier: K,
    key: string,
    value: TierValueMap[K],
  ): Promise<void> {
    const policy = this.policy(tier);

    try {
      await this.cacheStore.set(key, policy.codec.encode(value), policy.ttlSeconds);
      this.logger.debug(`[Cache] tier=${tier} key=${key} status=stored ttl=${policy.ttlSeconds}s`);
    } catch (error) {
      this.stats.recordError(tier);
      this.logger.warn(
        `[Cache] tier=${tier} key=${key} status=write_skipped error=${describeError(error)}`,
      );
    }
  }
}
