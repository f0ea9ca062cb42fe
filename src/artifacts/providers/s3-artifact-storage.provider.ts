import {
  S3Client,
  HeadBucketCommand,
  CreateBucketCommand,
  PutObjectCommand,
  GetObjectCommand,
  DeleteObjectCommand,
  HeadObjectCommand,
  NoSuchKey,
  NotFound,
} from '@aws-sdk/client-s3';
import { Logger } from '@nestjs/common';
import type { S3StorageConfig } from '../../config/app-config';
import type { ArtifactStorage } from '../interfaces/artifact-storage.interface';
import { StorageError, FileNotFoundError, AccessDeniedError } from '../errors';

export class S3ArtifactStorage implements ArtifactStorage {
  readonly kind = 's3';

  private readonly logger = new Logger(S3ArtifactStorage.name);
  private readonly s3Client: S3Client;
  private readonly bucket: string;

  constructor(config: S3StorageConfig, s3Client?: S3Client) {
    this.bucket = config.bucket;

    this.s3Client =
      s3Client ??
      new S3Client({
        endpoint: `${config.useSSL ? 'https' : 'http'}://${config.endpoint}:${config.port}`,
        region: config.region,
        credentials: {
          accessKeyId: config.accessKey,
          secretAccessKey: config.secretKey,
        },
        forcePathStyle: config.forcePathStyle, // Required for MinIO and other S3-compatible providers
      });
  }

  /**
   * Check the bucket, creating it when missing
   */
  async ensureAvailable(): Promise<void> {
    try {
      await this.s3Client.send(new HeadBucketCommand({ Bucket: this.bucket }));
      this.logger.log(`[Artifacts] backend=s3 bucket=${this.bucket} status=ready`);
    } catch (error) {
      if (!(error instanceof NotFound)) {
        throw new StorageError(
          `Failed to check bucket: ${error instanceof Error ? error.message : 'Unknown error'}`,
        );
      }

      try {
        await this.s3Client.send(new CreateBucketCommand({ Bucket: this.bucket }));
        this.logger.log(`[Artifacts] backend=s3 bucket=${this.bucket} status=created`);
      } catch (createError) {
        throw new StorageError(
          `Failed to create bucket: ${createError instanceof Error ? createError.message : 'Unknown error'}`,
        );
      }
    }
  }

  async getObjectAsBuffer(key: string): Promise<Buffer> {
    try {
      const response = await this.s3Client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: key,
        }),
      );

      if (!response.Body) {
        throw new FileNotFoundError(key);
      }

      const bytes = await response.Body.transformToByteArray();
      return Buffer.from(bytes);
    } catch (error) {
      throw this.translateError(error, key, 'read');
    }
  }

  async putObject(key: string, body: Buffer, contentType: string): Promise<void> {
    try {
      await this.s3Client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: contentType,
        }),
      );
    } catch (error) {
      throw this.translateError(error, key, 'write');
    }
  }

  async deleteObject(key: string): Promise<boolean> {
    const exists = await this.objectExists(key);
    if (!exists) {
      return false;
    }

    try {
      await this.s3Client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
      this.logger.log(`[Artifacts] backend=s3 key=${key} status=deleted`);
      return true;
    } catch (error) {
      throw this.translateError(error, key, 'delete');
    }
  }

  async objectExists(key: string): Promise<boolean> {
    try {
      await this.s3Client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return true;
    } catch (error) {
      const translated = this.translateError(error, key, 'stat');
      if (translated instanceof FileNotFoundError) {
        return false;
      }
      throw translated;
    }
  }

  private translateError(error: unknown, key: string, action: string): StorageError {
    if (error instanceof StorageError) {
      return error;
    }

    if (error instanceof NoSuchKey || error instanceof NotFound) {
      return new FileNotFoundError(key);
    }

    if (error instanceof Error && (error.name === 'Forbidden' || error.name === 'AccessDenied')) {
      return new AccessDeniedError(key);
    }

    this.logger.error(`[Artifacts] backend=s3 key=${key} action=${action} status=failed`);
    return new StorageError(
      `Failed to ${action} artifact: ${error instanceof Error ? error.message : 'Unknown error'}`,
    );
  }
}
