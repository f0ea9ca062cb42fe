import { IsDefined, IsIn, IsObject } from 'class-validator';
import { TIER_NAMES, TierName } from '../../cache/tiers/tier.types';
import type { InvalidationTarget } from '../../cache/cache-invalidation.service';

export const INVALIDATION_TARGETS: readonly InvalidationTarget[] = [...TIER_NAMES, 'all'];

/**
 * input is a string for gen, emb and res, and { question, topK } for ans
 */
export class CacheLookupDto {
  @IsIn(TIER_NAMES)
  tier!: TierName;

  @IsDefined()
  input!: unknown;
}

export class CacheStoreDto extends CacheLookupDto {
  @IsObject()
  value!: Record<string, unknown>;
}

export class CacheInvalidateDto {
  @IsIn(INVALIDATION_TARGETS)
  target!: InvalidationTarget;
}
