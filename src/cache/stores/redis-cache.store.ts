import { Logger } from '@nestjs/common';
import { createClient } from 'redis';
import { CacheStore, StoreReachability } from '../interfaces/cache-store.interface';
import { TransientStoreError, describeError } from '../../common/errors/query-cache.errors';
import { withTimeout } from '../../common/utils/with-timeout';

export interface RedisCacheStoreOptions {
  url: string;
  operationTimeoutMs: number;
  scanBatchSize?: number;
}

type RedisClient = ReturnType<typeof createClient>;

const MAX_RECONNECT_DELAY_MS = 3000;

/**
 * Redis-backed store (node-redis).
 *
 * The offline queue is disabled: while the connection is down every command
 * fails at once instead of waiting, and the client keeps reconnecting in
 * the background.
 */
export class RedisCacheStore implements CacheStore {
  readonly backend = 'redis';

  private readonly logger = new Logger(RedisCacheStore.name);
  private readonly client: RedisClient;
  private readonly scanBatchSize: number;

  constructor(private readonly options: RedisCacheStoreOptions) {
    this.scanBatchSize = options.scanBatchSize ?? 500;
    this.client = createClient({
      url: options.url,
      disableOfflineQueue: true,
      socket: {
        connectTimeout: options.operationTimeoutMs,
        reconnectStrategy: (retries: number) =>
          Math.min(retries * 100, MAX_RECONNECT_DELAY_MS),
      },
    });

    this.client.on('error', (error: unknown) => {
      this.logger.warn(`[Cache] backend=redis status=error error=${describeError(error)}`);
    });
  }

  /**
   * Open the connection. Resolves false when the server is not reachable
   * within the operation timeout; reconnection continues in the background.
   */
  async connect(): Promise<boolean> {
    const connecting = this.client.connect().then(
      () => true,
      (error: unknown) => {
        this.logger.warn(
          `[Cache] backend=redis status=connect_failed error=${describeError(error)}`,
        );
        return false;
      },
    );

    try {
      const connected = await withTimeout(
        connecting,
        this.options.operationTimeoutMs,
        () => new TransientStoreError('connect', 'connection attempt timed out'),
      );
      if (connected) {
        this.logger.log(`[Cache] backend=redis status=connected`);
      }
      return connected;
    } catch (error) {
      this.logger.warn(
        `[Cache] backend=redis status=unreachable error=${describeError(error)}`,
      );
      return false;
    }
  }

  async get(key: string): Promise<string | null> {
    return this.run('get', () => this.client.get(key));
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.run('set', () => this.client.set(key, value, { EX: ttlSeconds }));
  }

  async delete(key: string): Promise<boolean> {
    const removed = await this.run('delete', () => this.client.del(key));
    return removed > 0;
  }

  /**
   * SCAN MATCH plus batched DEL; never KEYS or FLUSHDB
   */
  async deleteMatching(pattern: string): Promise<number> {
    return this.run('deleteMatching', async () => {
      let deleted = 0;
      let batch: string[] = [];

      for await (const key of this.client.scanIterator({
        MATCH: pattern,
        COUNT: this.scanBatchSize,
      })) {
        batch.push(key);
        if (batch.length >= this.scanBatchSize) {
          deleted += await this.client.del(batch);
          batch = [];
        }
      }

      if (batch.length > 0) {
        deleted += await this.client.del(batch);
      }

      return deleted;
    });
  }

  async ping(): Promise<StoreReachability> {
    try {
      await this.run('ping', () => this.client.ping());
      return 'reachable';
    } catch {
      return 'unreachable';
    }
  }

  async close(): Promise<void> {
    if (!this.client.isOpen) {
      return;
    }
    try {
      await this.client.quit();
    } catch (error) {
      this.logger.warn(`[Cache] backend=redis status=close_failed error=${describeError(error)}`);
    }
  }

  private async run<T>(operation: string, command: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(
        command(),
        this.options.operationTimeoutMs,
        () =>
          new TransientStoreError(
            operation,
            `timed out after ${this.options.operationTimeoutMs}ms`,
          ),
      );
    } catch (error) {
      if (error instanceof TransientStoreError) {
        throw error;
      }
      throw new TransientStoreError(
        operation,
        describeError(error),
        error instanceof Error ? error : undefined,
      );
    }
  }
}
