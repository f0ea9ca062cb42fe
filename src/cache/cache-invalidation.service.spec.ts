import { CacheInvalidationService } from './cache-invalidation.service';
import { CacheStatsService } from './cache-stats.service';
import { MemoryCacheStore } from './stores/memory-cache.store';
import { NullCacheStore } from './stores/null-cache.store';
import { createTierRegistry } from './tiers/tier-policies';
import { TransientStoreError } from '../common/errors/query-cache.errors';

describe('CacheInvalidationService', () => {
  let store: MemoryCacheStore;
  let stats: CacheStatsService;
  let service: CacheInvalidationService;

  beforeEach(async () => {
    store = new MemoryCacheStore();
    stats = new CacheStatsService();
    service = new CacheInvalidationService(store, createTierRegistry(), stats);

    for (const key of ['gen:a', 'gen:b', 'emb:a', 'ans:a', 'ans:b', 'ans:c', 'res:a']) {
      await store.set(key, '{}', 3600);
    }
  });

  it('removes every answer key and leaves the other tiers untouched', async () => {
    const report = await service.invalidate('ans');

    expect(report).toEqual({ ans: 3 });
    for (const key of ['ans:a', 'ans:b', 'ans:c']) {
      await expect(store.get(key)).resolves.toBeNull();
    }
    for (const key of ['gen:a', 'gen:b', 'emb:a', 'res:a']) {
      await expect(store.get(key)).resolves.toBe('{}');
    }
    expect(stats.snapshot().tiers.ans.invalidated).toBe(3);
  });

  it('clears every tier for all', async () => {
    const report = await service.invalidate('all');

    expect(report).toEqual({ gen: 2, emb: 1, ans: 3, res: 1 });
    await expect(store.deleteMatching('*')).resolves.toBe(0);
  });

  it('reports zero on the pass-through store', async () => {
    const passThrough = new CacheInvalidationService(
      new NullCacheStore(),
      createTierRegistry(),
      stats,
    );

    await expect(passThrough.invalidate('gen')).resolves.toEqual({ gen: 0 });
  });

  it('raises store failures', async () => {
    jest
      .spyOn(store, 'deleteMatching')
      .mockRejectedValue(new TransientStoreError('deleteMatching', 'connection reset'));

    await expect(service.invalidate('ans')).rejects.toBeInstanceOf(TransientStoreError);
    expect(stats.snapshot().tiers.ans.errors).toBe(1);
  });

  it('attempts every tier before reporting the ones that failed', async () => {
    const deleteMatching = store.deleteMatching.bind(store);
    jest.spyOn(store, 'deleteMatching').mockImplementation(async (pattern: string) => {
      if (pattern === 'gen:*') {
        throw new Error('connection reset');
      }
      return deleteMatching(pattern);
    });

    await expect(service.invalidate('all')).rejects.toThrow(
      'Cache store unavailable during deleteMatching: failed for gen: connection reset',
    );
    for (const key of ['emb:a', 'ans:a', 'res:a']) {
      await expect(store.get(key)).resolves.toBeNull();
    }
    await expect(store.get('gen:a')).resolves.toBe('{}');
    expect(stats.snapshot().tiers.gen.errors).toBe(1);
    expect(stats.snapshot().tiers.ans.invalidated).toBe(3);
  });
});
