/**
 * Collaborator adapters bound to their ports.
 * Unconfigured collaborators are bound to stand-ins that fail per request.
 */

import { Inject, Module, OnApplicationShutdown } from '@nestjs/common';
import { QdrantClient } from '@qdrant/js-client-rest';
import { createPool } from 'mysql2/promise';
import { APP_CONFIG, AppConfig, availableCapabilities } from '../config/app-config';
import {
  COMPLETION_CLIENT,
  DOCUMENT_PARSER,
  EMBEDDING_CLIENT,
  SQL_EXECUTOR,
  SQL_GENERATOR,
  VECTOR_INDEX,
} from './types';
import type { CompletionClient, SqlExecutor } from './types';
import { EmbeddingProviderFactory } from './embedding-provider.factory';
import { LLMProviderFactory } from './llm-provider.factory';
import { TokenCounterService } from './token-counter.service';
import { TextDocumentParser } from './text-document.parser';
import { LangChainEmbeddingClient } from './langchain-embedding.client';
import { LangChainCompletionClient } from './langchain-completion.client';
import { LangChainSqlGenerator } from './langchain-sql.generator';
import { QdrantVectorIndex } from './qdrant-vector.index';
import { MySqlExecutor } from './mysql-sql.executor';
import {
  unavailableCompletionClient,
  unavailableEmbeddingClient,
  unavailableSqlExecutor,
  unavailableSqlGenerator,
  unavailableVectorIndex,
} from './unavailable-collaborator';

@Module({
  providers: [
    TokenCounterService,
    LLMProviderFactory,
    EmbeddingProviderFactory,
    TextDocumentParser,
    { provide: DOCUMENT_PARSER, useExisting: TextDocumentParser },
    {
      provide: EMBEDDING_CLIENT,
      useFactory: (config: AppConfig, factory: EmbeddingProviderFactory) =>
        availableCapabilities(config).has('embeddings')
          ? new LangChainEmbeddingClient(factory.createEmbeddingModel(), factory.model)
          : unavailableEmbeddingClient(factory.model),
      inject: [APP_CONFIG, EmbeddingProviderFactory],
    },
    {
      provide: COMPLETION_CLIENT,
      useFactory: (config: AppConfig, factory: LLMProviderFactory) =>
        availableCapabilities(config).has('completions')
          ? new LangChainCompletionClient(factory.createChatModel())
          : unavailableCompletionClient(),
      inject: [APP_CONFIG, LLMProviderFactory],
    },
    {
      provide: SQL_EXECUTOR,
      useFactory: (config: AppConfig): SqlExecutor =>
        config.sql
          ? new MySqlExecutor(
              createPool({
                uri: config.sql.databaseUrl,
                waitForConnections: true,
                connectionLimit: 10,
                queueLimit: 0,
                charset: 'utf8mb4',
                dateStrings: true,
                supportBigNumbers: true,
                bigNumberStrings: true,
              }),
            )
          : unavailableSqlExecutor(),
      inject: [APP_CONFIG],
    },
    {
      provide: SQL_GENERATOR,
      useFactory: (config: AppConfig, completion: CompletionClient, executor: SqlExecutor) =>
        availableCapabilities(config).has('text_to_sql') && executor instanceof MySqlExecutor
          ? new LangChainSqlGenerator(completion, executor)
          : unavailableSqlGenerator(),
      inject: [APP_CONFIG, COMPLETION_CLIENT, SQL_EXECUTOR],
    },
    {
      provide: VECTOR_INDEX,
      useFactory: async (config: AppConfig, embeddings: EmbeddingProviderFactory) => {
        if (!config.vectorIndex) {
          return unavailableVectorIndex();
        }
        const { url, apiKey, collection } = config.vectorIndex;
        const index = new QdrantVectorIndex(
          new QdrantClient({ url, ...(apiKey && { apiKey }) }),
          collection,
          embeddings.getEmbeddingDimensions(),
        );
        await index.ensureCollection();
        return index;
      },
      inject: [APP_CONFIG, EmbeddingProviderFactory],
    },
  ],
  exports: [
    TokenCounterService,
    EMBEDDING_CLIENT,
    COMPLETION_CLIENT,
    SQL_GENERATOR,
    SQL_EXECUTOR,
    VECTOR_INDEX,
    DOCUMENT_PARSER,
  ],
})
export class ProvidersModule implements OnApplicationShutdown {
  constructor(@Inject(SQL_EXECUTOR) private readonly executor: SqlExecutor) {}

  async onApplicationShutdown(): Promise<void> {
    if (this.executor instanceof MySqlExecutor) {
      await this.executor.close();
    }
  }
}
