import type {
  AnswerRecord,
  EmbeddingRecord,
  GeneratedStatementRecord,
  ResultSetRecord,
} from '../records/cache-records';
import type { RecordCodec } from './record-codec';

export type TierName = 'gen' | 'emb' | 'ans' | 'res';

export const TIER_NAMES: readonly TierName[] = ['gen', 'emb', 'ans', 'res'];

export function isTierName(value: string): value is TierName {
  return TIER_NAMES.some((tier) => tier === value);
}

export const DEFAULT_TIER_TTL_SECONDS: Record<TierName, number> = {
  gen: 24 * 60 * 60,
  emb: 7 * 24 * 60 * 60,
  ans: 60 * 60,
  res: 15 * 60,
};

export const TIER_TTL_CONFIG_KEYS: Record<TierName, string> = {
  gen: 'CACHE_TTL_SQL_GEN',
  emb: 'CACHE_TTL_EMBEDDINGS',
  ans: 'CACHE_TTL_ANSWERS',
  res: 'CACHE_TTL_SQL_RESULTS',
};

export interface AnswerTierInput {
  question: string;
  topK: number;
}

/**
 * What each tier is keyed on
 */
export interface TierInputMap {
  gen: string;
  emb: string;
  ans: AnswerTierInput;
  res: string;
}

/**
 * What each tier stores
 */
export interface TierValueMap {
  gen: GeneratedStatementRecord;
  emb: EmbeddingRecord;
  ans: AnswerRecord;
  res: ResultSetRecord;
}

export interface TierPolicy<K extends TierName> {
  name: K;
  prefix: string;
  description: string;
  ttlSeconds: number;
  codec: RecordCodec<TierValueMap[K]>;
  canonicalize(input: TierInputMap[K]): string;
  /** Throws when a value written from outside the pipelines must not be cached */
  assertStorable?(input: TierInputMap[K], value: TierValueMap[K]): void;
}

export type TierRegistry = { [K in TierName]: TierPolicy<K> };

export const TIER_REGISTRY = Symbol('TIER_REGISTRY');

export interface CacheOutcome<T> {
  value: T;
  hit: boolean;
  key: string;
}

export type LookupResult<T> = { hit: true; value: T; key: string } | { hit: false; key: string };
