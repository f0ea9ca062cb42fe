import { Module } from '@nestjs/common';
import { artifactStorageFactory } from './artifact-storage.factory';
import { ArtifactCacheService } from './artifact-cache.service';

@Module({
  providers: [artifactStorageFactory, ArtifactCacheService],
  exports: [ArtifactCacheService],
})
export class ArtifactCacheModule {}
