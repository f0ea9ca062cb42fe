/**
 * Embedding Provider Factory
 * OpenAI or Ollama embeddings, chosen by EMBEDDING_PROVIDER
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import type { Embeddings } from '@langchain/core/embeddings';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import type { EmbeddingProvider } from './types';

// Dimension mapping for the supported models
const DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
  'nomic-embed-text': 768,
  'bge-m3': 1024,
  'bge-m3:567m': 1024,
};

@Injectable()
export class EmbeddingProviderFactory {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  get provider(): EmbeddingProvider {
    return this.config.models.embeddingProvider;
  }

  get model(): string {
    return this.provider === 'openai'
      ? this.config.models.openaiEmbeddingModel
      : this.config.models.ollamaEmbeddingModel;
  }

  getEmbeddingDimensions(): number {
    return DIMENSIONS[this.model] ?? 1536;
  }

  createEmbeddingModel(): Embeddings {
    this.logger.log(
      `Creating embedding model: ${this.provider}/${this.model} (${this.getEmbeddingDimensions()}D)`,
    );

    switch (this.provider) {
      case 'openai':
        return this.createOpenAIEmbeddings();
      case 'ollama':
        return new OllamaEmbeddings({
          model: this.model,
          baseUrl: this.config.models.ollamaBaseUrl,
        });
    }
  }

  private createOpenAIEmbeddings(): OpenAIEmbeddings {
    const apiKey = this.config.models.openaiApiKey;
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY is required for OpenAI embeddings');
    }

    return new OpenAIEmbeddings({
      model: this.model,
      apiKey,
    });
  }
}
