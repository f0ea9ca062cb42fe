import type { Embeddings } from '@langchain/core/embeddings';
import type { EmbeddingClient } from './types';

/**
 * EmbeddingClient over a LangChain Embeddings model
 */
export class LangChainEmbeddingClient implements EmbeddingClient {
  constructor(
    private readonly embeddings: Embeddings,
    readonly model: string,
  ) {}

  embed(text: string): Promise<number[]> {
    return this.embeddings.embedQuery(text);
  }

  embedBatch(texts: string[]): Promise<number[][]> {
    return this.embeddings.embedDocuments(texts);
  }
}
