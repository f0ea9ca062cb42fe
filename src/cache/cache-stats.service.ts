import { Injectable } from '@nestjs/common';
import { TIER_NAMES, TierName } from './tiers/tier.types';

interface TierCounters {
  hits: number;
  misses: number;
  errors: number;
  invalidated: number;
  hitLatencyTotalMs: number;
  missLatencyTotalMs: number;
}

export interface TierStats {
  hits: number;
  misses: number;
  errors: number;
  invalidated: number;
  hitRate: number;
  avgLatencyMs: number;
  avgHitLatencyMs: number;
  avgMissLatencyMs: number;
}

export interface CacheStatsSnapshot {
  tiers: Record<TierName, TierStats>;
  totals: TierStats;
}

/**
 * Process-wide cache counters, reset only on restart.
 * Latency is the time spent reading the store, not computing.
 */
@Injectable()
export class CacheStatsService {
  private readonly counters: Record<TierName, TierCounters> = {
    gen: emptyCounters(),
    emb: emptyCounters(),
    ans: emptyCounters(),
    res: emptyCounters(),
  };

  recordHit(tier: TierName, latencyMs: number): void {
    const counters = this.counters[tier];
    counters.hits++;
    counters.hitLatencyTotalMs += latencyMs;
  }

  recordMiss(tier: TierName, latencyMs: number): void {
    const counters = this.counters[tier];
    counters.misses++;
    counters.missLatencyTotalMs += latencyMs;
  }

  recordError(tier: TierName): void {
    this.counters[tier].errors++;
  }

  recordInvalidation(tier: TierName, deleted: number): void {
    this.counters[tier].invalidated += deleted;
  }

  snapshot(): CacheStatsSnapshot {
    const total = emptyCounters();
    const tiers: Record<TierName, TierStats> = {
      gen: summarize(this.counters.gen),
      emb: summarize(this.counters.emb),
      ans: summarize(this.counters.ans),
      res: summarize(this.counters.res),
    };

    for (const tier of TIER_NAMES) {
      const counters = this.counters[tier];
      total.hits += counters.hits;
      total.misses += counters.misses;
      total.errors += counters.errors;
      total.invalidated += counters.invalidated;
      total.hitLatencyTotalMs += counters.hitLatencyTotalMs;
      total.missLatencyTotalMs += counters.missLatencyTotalMs;
    }

    return { tiers, totals: summarize(total) };
  }
}

function emptyCounters(): TierCounters {
  return {
    hits: 0,
    misses: 0,
    errors: 0,
    invalidated: 0,
    hitLatencyTotalMs: 0,
    missLatencyTotalMs: 0,
  };
}

function summarize(counters: TierCounters): TierStats {
  const requests = counters.hits + counters.misses;
  return {
    hits: counters.hits,
    misses: counters.misses,
    errors: counters.errors,
    invalidated: counters.invalidated,
    hitRate: requests > 0 ? round(counters.hits / requests) : 0,
    avgLatencyMs:
      requests > 0
        ? round((counters.hitLatencyTotalMs + counters.missLatencyTotalMs) / requests)
        : 0,
    avgHitLatencyMs: counters.hits > 0 ? round(counters.hitLatencyTotalMs / counters.hits) : 0,
    avgMissLatencyMs:
      counters.misses > 0 ? round(counters.missLatencyTotalMs / counters.misses) : 0,
  };
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}
