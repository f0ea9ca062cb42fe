import { ComputeError, QueryCacheErrorKind } from '../common/errors/query-cache.errors';
import {
  unavailableCompletionClient,
  unavailableEmbeddingClient,
  unavailableSqlExecutor,
  unavailableSqlGenerator,
  unavailableVectorIndex,
} from './unavailable-collaborator';

describe('unavailable collaborators', () => {
  it('fail each call with a compute error naming the missing setting', async () => {
    await expect(unavailableVectorIndex().search([1], 3)).rejects.toThrow(
      'VectorIndex failed: not configured (set QDRANT_URL)',
    );
    await expect(unavailableSqlExecutor().execute('SELECT 1', 1000)).rejects.toThrow(
      'SqlExecutor failed: not configured (set DATABASE_URL)',
    );
    await expect(unavailableSqlGenerator().generate('How many orders?')).rejects.toBeInstanceOf(
      ComputeError,
    );
    await expect(unavailableCompletionClient().complete('system', 'prompt')).rejects.toMatchObject({
      kind: QueryCacheErrorKind.COMPUTE,
    });
  });

  it('keep the configured embedding model name', async () => {
    const client = unavailableEmbeddingClient('text-embedding-3-small');

    expect(client.model).toBe('text-embedding-3-small');
    await expect(client.embedBatch(['a'])).rejects.toBeInstanceOf(ComputeError);
  });
});
