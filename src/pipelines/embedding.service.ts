/**
 * Embedding Service
 * Text embeddings through the emb tier.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { TieredCacheService } from '../cache/tiered-cache.service';
import { EmbeddingRecord } from '../cache/records/cache-records';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { EMBEDDING_CLIENT, EmbeddingClient } from '../providers/types';
import { TokenCounterService } from '../providers/token-counter.service';
import { callCollaborator } from '../common/utils/call-collaborator';
import { ComputeError } from '../common/errors/query-cache.errors';

export interface EmbeddingOutcome {
  vector: number[];
  hit: boolean;
}

@Injectable()
export class EmbeddingService {
  private readonly logger = new Logger(EmbeddingService.name);

  constructor(
    private readonly cache: TieredCacheService,
    @Inject(EMBEDDING_CLIENT) private readonly client: EmbeddingClient,
    private readonly tokenCounter: TokenCounterService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /**
   * The provider sees the canonical text the emb key is derived from, so
   * inputs that share a key share a vector.
   */
  async embed(text: string): Promise<EmbeddingOutcome> {
    const canonical = this.canonical(text);
    const outcome = await this.cache.lookupOrCompute('emb', text, async () => {
      const vector = await callCollaborator('EmbeddingClient', this.config.collaboratorTimeoutMs, () =>
        this.client.embed(canonical),
      );
      return this.toRecord(canonical, vector);
    });

    return { vector: outcome.value.vector, hit: outcome.hit };
  }

  /**
   * Vectors in input order. Cached texts are read from the tier; the rest
   * go to the provider in a single batch and are written back one by one.
   */
  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const lookups = await Promise.all(texts.map((text) => this.cache.lookup('emb', text)));
    const vectors = new Map<string, number[]>();
    const missing = new Map<string, string>();

    lookups.forEach((lookup, position) => {
      if (lookup.hit) {
        vectors.set(lookup.key, lookup.value.vector);
      } else if (!missing.has(lookup.key)) {
        missing.set(lookup.key, this.canonical(texts[position]));
      }
    });

    if (missing.size > 0) {
      const pending = [...missing.entries()];
      const computed = await callCollaborator(
        'EmbeddingClient',
        this.config.collaboratorTimeoutMs,
        () => this.client.embedBatch(pending.map(([, text]) => text)),
      );

      if (computed.length !== pending.length) {
        throw new ComputeError(
          'EmbeddingClient',
          `returned ${computed.length} vectors for ${pending.length} texts`,
        );
      }

      await Promise.all(
        pending.map(async ([key, text], index) => {
          const record = this.toRecord(text, computed[index]);
          vectors.set(key, record.vector);
          await this.cache.remember('emb', text, record);
        }),
      );
    }

    this.logger.log(
      `[Embed] texts=${texts.length} cached=${lookups.filter((lookup) => lookup.hit).length} computed=${missing.size}`,
    );

    return lookups.map((lookup) => {
      const vector = vectors.get(lookup.key);
      if (!vector) {
        throw new ComputeError('EmbeddingClient', `no vector for ${lookup.key}`);
      }
      return vector;
    });
  }

  private canonical(text: string): string {
    return this.cache.policy('emb').canonicalize(text);
  }

  private toRecord(text: string, vector: number[]): EmbeddingRecord {
    if (vector.length === 0 || !vector.every((component) => Number.isFinite(component))) {
      throw new ComputeError('EmbeddingClient', 'returned an empty or non-finite vector');
    }
    return {
      vector,
      model: this.client.model,
      tokenCount: this.tokenCounter.countTokens(text),
    };
  }
}
