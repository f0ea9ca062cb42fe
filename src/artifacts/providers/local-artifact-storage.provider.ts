import { Logger } from '@nestjs/common';
import { constants } from 'fs';
import { access, mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname, join, resolve, sep } from 'path';
import { randomUUID } from 'crypto';
import type { ArtifactStorage } from '../interfaces/artifact-storage.interface';
import { FileNotFoundError, StorageError } from '../errors';

/**
 * Filesystem backend. Writes go to a temp file in the target directory
 * and are renamed into place, so readers never see a partial bundle.
 */
export class LocalArtifactStorage implements ArtifactStorage {
  readonly kind = 'local';

  private readonly logger = new Logger(LocalArtifactStorage.name);
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = resolve(rootDir);
  }

  async ensureAvailable(): Promise<void> {
    try {
      await mkdir(this.rootDir, { recursive: true });
      await access(this.rootDir, constants.W_OK);
      this.logger.log(`[Artifacts] backend=local dir=${this.rootDir} status=ready`);
    } catch (error) {
      throw new StorageError(
        `Artifact directory not writable: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }

  async getObjectAsBuffer(key: string): Promise<Buffer> {
    try {
      return await readFile(this.pathFor(key));
    } catch (error) {
      if (isMissingFile(error)) {
        throw new FileNotFoundError(key);
      }
      throw new StorageError(
        `Failed to read artifact: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }

  async putObject(key: string, body: Buffer, _contentType?: string): Promise<void> {
    const target = this.pathFor(key);
    const temp = `${target}.${randomUUID()}.tmp`;

    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(temp, body);
      await rename(temp, target);
    } catch (error) {
      await rm(temp, { force: true });
      throw new StorageError(
        `Failed to write artifact: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }

  async deleteObject(key: string): Promise<boolean> {
    const exists = await this.objectExists(key);
    if (!exists) {
      return false;
    }

    try {
      await rm(this.pathFor(key), { force: true });
      return true;
    } catch (error) {
      throw new StorageError(
        `Failed to delete artifact: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }

  async objectExists(key: string): Promise<boolean> {
    try {
      await access(this.pathFor(key), constants.F_OK);
      return true;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw new StorageError(
        `Failed to stat artifact: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }

  private pathFor(key: string): string {
    const path = resolve(join(this.rootDir, key));
    if (!path.startsWith(this.rootDir + sep)) {
      throw new StorageError(`Artifact key escapes storage directory: ${key}`, 'InvalidKey', 400);
    }
    return path;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
