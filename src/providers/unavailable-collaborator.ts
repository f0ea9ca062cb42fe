import { ComputeError } from '../common/errors/query-cache.errors';
import type {
  CompletionClient,
  EmbeddingClient,
  SqlExecutor,
  SqlGenerator,
  VectorIndex,
} from './types';

/**
 * Stand-ins bound when a collaborator has no configuration.
 * The service still starts; requests that need them fail with COMPUTE.
 */
function unavailable(collaborator: string, missing: string): () => Promise<never> {
  return async () => {
    throw new ComputeError(collaborator, `not configured (set ${missing})`);
  };
}

export function unavailableEmbeddingClient(model: string): EmbeddingClient {
  const fail = unavailable('EmbeddingClient', 'OPENAI_API_KEY or EMBEDDING_PROVIDER=ollama');
  return { model, embed: fail, embedBatch: fail };
}

export function unavailableCompletionClient(): CompletionClient {
  return { complete: unavailable('CompletionClient', 'OPENAI_API_KEY or LLM_PROVIDER=ollama') };
}

export function unavailableSqlGenerator(): SqlGenerator {
  return { generate: unavailable('SqlGenerator', 'DATABASE_URL and a chat model') };
}

export function unavailableVectorIndex(): VectorIndex {
  const fail = unavailable('VectorIndex', 'QDRANT_URL');
  return { search: fail, upsert: fail };
}

export function unavailableSqlExecutor(): SqlExecutor {
  return { execute: unavailable('SqlExecutor', 'DATABASE_URL') };
}
