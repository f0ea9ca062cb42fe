/**
 * Typed application configuration.
 *
 * Built once at startup from ConfigService (environment and .env).
 * Optional sections are absent when their settings are missing; which
 * features can run is then derived by availableCapabilities().
 */

import {
  DEFAULT_TIER_TTL_SECONDS,
  TIER_NAMES,
  TIER_TTL_CONFIG_KEYS,
  TierName,
} from '../cache/tiers/tier.types';

export const APP_CONFIG = 'APP_CONFIG';

/**
 * The part of ConfigService the loader needs
 */
export interface ConfigReader {
  get(key: string): unknown;
}

export type CacheBackend = 'redis' | 'memory' | 'none';
export type ArtifactStorageType = 's3' | 'local';
export type ModelProvider = 'openai' | 'ollama';

export interface S3StorageConfig {
  endpoint: string;
  port: number;
  accessKey: string;
  secretKey: string;
  useSSL: boolean;
  region: string;
  bucket: string;
  forcePathStyle: boolean;
}

export interface AppConfig {
  server: {
    port: number;
    tcpPort: number;
    logLevel: string;
  };
  cache: {
    backend: CacheBackend;
    redisUrl?: string;
    operationTimeoutMs: number;
    ttlSeconds: Record<TierName, number>;
  };
  artifacts: {
    storage: ArtifactStorageType;
    localDir: string;
    s3?: S3StorageConfig;
  };
  models: {
    llmProvider: ModelProvider;
    embeddingProvider: ModelProvider;
    openaiApiKey?: string;
    openaiChatModel: string;
    openaiEmbeddingModel: string;
    ollamaBaseUrl: string;
    ollamaChatModel: string;
    ollamaEmbeddingModel: string;
  };
  vectorIndex?: {
    url: string;
    apiKey?: string;
    collection: string;
  };
  sql?: {
    databaseUrl: string;
    executionTimeoutMs: number;
  };
  collaboratorTimeoutMs: number;
  pendingRetentionMinutes: number;
  chunking: {
    sizeTokens: number;
    overlapTokens: number;
  };
}

export type Capability =
  | 'query_cache'
  | 'remote_query_cache'
  | 'artifact_storage_s3'
  | 'embeddings'
  | 'completions'
  | 'vector_search'
  | 'sql_execution'
  | 'text_to_sql'
  | 'document_answering'
  | 'document_ingestion';

export function loadAppConfig(configService: ConfigReader): AppConfig {
  const redisUrl = resolveRedisUrl(configService);
  const storageEndpoint = readString(configService, 'STORAGE_ENDPOINT');
  const databaseUrl = readString(configService, 'DATABASE_URL');
  const qdrantUrl = readString(configService, 'QDRANT_URL');
  const llmProvider = readProvider(configService, 'LLM_PROVIDER', 'openai');

  const ttlSeconds = { ...DEFAULT_TIER_TTL_SECONDS };
  for (const tier of TIER_NAMES) {
    ttlSeconds[tier] = readNumber(
      configService,
      TIER_TTL_CONFIG_KEYS[tier],
      DEFAULT_TIER_TTL_SECONDS[tier],
    );
  }

  const requestedBackend = readString(configService, 'CACHE_BACKEND')?.toLowerCase();
  const backend = resolveCacheBackend(requestedBackend, redisUrl);

  const requestedStorage = readString(configService, 'ARTIFACT_STORAGE')?.toLowerCase();
  const storage: ArtifactStorageType =
    requestedStorage === 'local' || (requestedStorage !== 's3' && !storageEndpoint)
      ? 'local'
      : 's3';

  return {
    server: {
      port: readNumber(configService, 'PORT', 3000),
      tcpPort: readNumber(configService, 'TCP_PORT', 4010),
      logLevel: readString(configService, 'LOG_LEVEL') ?? 'info',
    },
    cache: {
      backend,
      redisUrl,
      operationTimeoutMs: readNumber(configService, 'CACHE_OPERATION_TIMEOUT_MS', 2000),
      ttlSeconds,
    },
    artifacts: {
      storage,
      localDir: readString(configService, 'ARTIFACT_LOCAL_DIR') ?? './data/artifacts',
      s3:
        storage === 's3'
          ? {
              endpoint: storageEndpoint ?? 'localhost',
              port: readNumber(configService, 'STORAGE_PORT', 9000),
              accessKey: readString(configService, 'STORAGE_ACCESS_KEY') ?? 'minioadmin',
              secretKey: readString(configService, 'STORAGE_SECRET_KEY') ?? 'minioadmin',
              useSSL: readBoolean(configService, 'STORAGE_USE_SSL', false),
              region: readString(configService, 'STORAGE_REGION') ?? 'us-east-1',
              bucket: readString(configService, 'STORAGE_BUCKET') ?? 'artifacts',
              forcePathStyle: readBoolean(configService, 'STORAGE_FORCE_PATH_STYLE', true),
            }
          : undefined,
    },
    models: {
      llmProvider,
      embeddingProvider: readProvider(configService, 'EMBEDDING_PROVIDER', llmProvider),
      openaiApiKey: readString(configService, 'OPENAI_API_KEY'),
      openaiChatModel: readString(configService, 'OPENAI_CHAT_MODEL') ?? 'gpt-4o-mini',
      openaiEmbeddingModel:
        readString(configService, 'OPENAI_EMBEDDING_MODEL') ?? 'text-embedding-3-small',
      ollamaBaseUrl: readString(configService, 'OLLAMA_BASE_URL') ?? 'http://localhost:11434',
      ollamaChatModel: readString(configService, 'OLLAMA_CHAT_MODEL') ?? 'llama3.1',
      ollamaEmbeddingModel:
        readString(configService, 'OLLAMA_EMBEDDING_MODEL') ?? 'nomic-embed-text',
    },
    vectorIndex: qdrantUrl
      ? {
          url: qdrantUrl,
          apiKey: readString(configService, 'QDRANT_API_KEY'),
          collection: readString(configService, 'QDRANT_COLLECTION') ?? 'documents',
        }
      : undefined,
    sql: databaseUrl
      ? {
          databaseUrl,
          executionTimeoutMs: readNumber(configService, 'SQL_EXECUTION_TIMEOUT_MS', 30000),
        }
      : undefined,
    collaboratorTimeoutMs: readNumber(configService, 'COLLABORATOR_TIMEOUT_MS', 30000),
    pendingRetentionMinutes: readNumber(configService, 'PENDING_RETENTION_MINUTES', 60),
    chunking: {
      sizeTokens: readNumber(configService, 'CHUNK_SIZE_TOKENS', 512),
      overlapTokens: readNumber(configService, 'CHUNK_OVERLAP_TOKENS', 50),
    },
  };
}

/**
 * Which features the configuration allows. Pure; no connectivity checks.
 */
export function availableCapabilities(config: AppConfig): ReadonlySet<Capability> {
  const capabilities = new Set<Capability>();

  if (config.cache.backend !== 'none') {
    capabilities.add('query_cache');
  }
  if (config.cache.backend === 'redis') {
    capabilities.add('remote_query_cache');
  }
  if (config.artifacts.s3) {
    capabilities.add('artifact_storage_s3');
  }
  if (providerConfigured(config, config.models.embeddingProvider)) {
    capabilities.add('embeddings');
  }
  if (providerConfigured(config, config.models.llmProvider)) {
    capabilities.add('completions');
  }
  if (config.vectorIndex) {
    capabilities.add('vector_search');
  }
  if (config.sql) {
    capabilities.add('sql_execution');
  }

  if (capabilities.has('completions') && capabilities.has('sql_execution')) {
    capabilities.add('text_to_sql');
  }
  if (capabilities.has('embeddings') && capabilities.has('vector_search')) {
    capabilities.add('document_ingestion');
    if (capabilities.has('completions')) {
      capabilities.add('document_answering');
    }
  }

  return capabilities;
}

function providerConfigured(config: AppConfig, provider: ModelProvider): boolean {
  // Ollama runs locally without credentials
  return provider === 'ollama' || Boolean(config.models.openaiApiKey);
}

function resolveCacheBackend(requested: string | undefined, redisUrl?: string): CacheBackend {
  if (requested === 'memory' || requested === 'none') {
    return requested;
  }
  if (requested === 'redis' || requested === undefined) {
    return redisUrl ? 'redis' : 'none';
  }
  return 'none';
}

/**
 * REDIS_URL, or one built from REDIS_HOST/PORT/PASSWORD/DB
 */
function resolveRedisUrl(configService: ConfigReader): string | undefined {
  const url = readString(configService, 'REDIS_URL');
  if (url) {
    return url;
  }

  const host = readString(configService, 'REDIS_HOST');
  if (!host) {
    return undefined;
  }

  const port = readNumber(configService, 'REDIS_PORT', 6379);
  const db = readNumber(configService, 'REDIS_DB', 0);
  const password = readString(configService, 'REDIS_PASSWORD');

  return password
    ? `redis://:${encodeURIComponent(password)}@${host}:${port}/${db}`
    : `redis://${host}:${port}/${db}`;
}

function readProvider(
  configService: ConfigReader,
  key: string,
  defaultValue: ModelProvider,
): ModelProvider {
  const value = readString(configService, key)?.toLowerCase();
  return value === 'openai' || value === 'ollama' ? value : defaultValue;
}

function readString(configService: ConfigReader, key: string): string | undefined {
  const value = configService.get(key);
  if (value === undefined || value === null) {
    return undefined;
  }
  const trimmed = String(value).trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readNumber(configService: ConfigReader, key: string, defaultValue: number): number {
  const raw = readString(configService, key);
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

function readBoolean(configService: ConfigReader, key: string, defaultValue: boolean): boolean {
  const raw = readString(configService, key);
  return raw === undefined ? defaultValue : raw.toLowerCase() === 'true';
}
