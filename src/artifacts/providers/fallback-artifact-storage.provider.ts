import { Logger } from '@nestjs/common';
import type {
  ArtifactStorage,
  ArtifactStorageKind,
} from '../interfaces/artifact-storage.interface';
import { FileNotFoundError, StorageError } from '../errors';

/**
 * Primary backend with a local directory behind it.
 *
 * A StorageError from the primary sends the same key to the fallback, so
 * writes made during an outage land locally and reads that miss on the
 * primary still find them. Errors that are not StorageErrors propagate.
 */
export class FallbackArtifactStorage implements ArtifactStorage {
  private readonly logger = new Logger(FallbackArtifactStorage.name);

  constructor(
    private readonly primary: ArtifactStorage,
    private readonly fallback: ArtifactStorage,
  ) {}

  get kind(): ArtifactStorageKind {
    return this.primary.kind;
  }

  async ensureAvailable(): Promise<void> {
    await this.primary.ensureAvailable();
    await this.fallback.ensureAvailable();
  }

  async getObjectAsBuffer(key: string): Promise<Buffer> {
    try {
      return await this.primary.getObjectAsBuffer(key);
    } catch (error) {
      this.assertStorageError(error, 'read', key);
      return this.fallback.getObjectAsBuffer(key);
    }
  }

  async putObject(key: string, body: Buffer, contentType: string): Promise<void> {
    try {
      await this.primary.putObject(key, body, contentType);
    } catch (error) {
      this.assertStorageError(error, 'write', key);
      await this.fallback.putObject(key, body, contentType);
    }
  }

  /**
   * Removes the key from both backends
   */
  async deleteObject(key: string): Promise<boolean> {
    let deleted = false;
    try {
      deleted = await this.primary.deleteObject(key);
    } catch (error) {
      this.assertStorageError(error, 'delete', key);
    }
    const deletedLocally = await this.fallback.deleteObject(key);
    return deleted || deletedLocally;
  }

  async objectExists(key: string): Promise<boolean> {
    try {
      if (await this.primary.objectExists(key)) {
        return true;
      }
    } catch (error) {
      this.assertStorageError(error, 'stat', key);
    }
    return this.fallback.objectExists(key);
  }

  private assertStorageError(error: unknown, action: string, key: string): void {
    if (!(error instanceof StorageError)) {
      throw error;
    }
    if (!(error instanceof FileNotFoundError)) {
      this.logger.warn(
        `[Artifacts] backend=${this.primary.kind} key=${key} action=${action} status=failed fallback=${this.fallback.kind} error=${error.message}`,
      );
    }
  }
}
