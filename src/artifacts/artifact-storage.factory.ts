import { FactoryProvider, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { ARTIFACT_STORAGE, ArtifactStorage } from './interfaces/artifact-storage.interface';
import { FallbackArtifactStorage } from './providers/fallback-artifact-storage.provider';
import { LocalArtifactStorage } from './providers/local-artifact-storage.provider';
import { S3ArtifactStorage } from './providers/s3-artifact-storage.provider';

/**
 * S3 when configured and its bucket answers at startup, backed by the local
 * directory for failures at run time; otherwise the local directory alone.
 * Both use the same key scheme.
 */
export async function createArtifactStorage(
  artifacts: AppConfig['artifacts'],
  createS3: (config: NonNullable<AppConfig['artifacts']['s3']>) => ArtifactStorage = (config) =>
    new S3ArtifactStorage(config),
): Promise<ArtifactStorage> {
  const logger = new Logger('ArtifactStorageFactory');

  const local = new LocalArtifactStorage(artifacts.localDir);
  await local.ensureAvailable();

  if (artifacts.storage === 's3' && artifacts.s3) {
    const s3 = createS3(artifacts.s3);
    try {
      await s3.ensureAvailable();
      return new FallbackArtifactStorage(s3, local);
    } catch (error) {
      logger.warn(
        `[Artifacts] backend=s3 bucket=${artifacts.s3.bucket} status=unavailable fallback=local error=${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  return local;
}

export const artifactStorageFactory: FactoryProvider<Promise<ArtifactStorage>> = {
  provide: ARTIFACT_STORAGE,
  useFactory: (config: AppConfig) => createArtifactStorage(config.artifacts),
  inject: [APP_CONFIG],
};
