import { Module } from '@nestjs/common';
import { ProvidersModule } from '../providers/providers.module';
import { ArtifactCacheModule } from '../artifacts/artifact-cache.module';
import { ApprovalsModule } from '../approvals/approvals.module';
import { EmbeddingService } from './embedding.service';
import { SqlQueryPipeline } from './sql-query.pipeline';
import { DocumentAnswerPipeline } from './document-answer.pipeline';
import { IngestionPipeline } from './ingestion.pipeline';

@Module({
  imports: [ProvidersModule, ArtifactCacheModule, ApprovalsModule],
  providers: [EmbeddingService, SqlQueryPipeline, DocumentAnswerPipeline, IngestionPipeline],
  exports: [
    EmbeddingService,
    SqlQueryPipeline,
    DocumentAnswerPipeline,
    IngestionPipeline,
    ArtifactCacheModule,
    ApprovalsModule,
  ],
})
export class PipelinesModule {}
