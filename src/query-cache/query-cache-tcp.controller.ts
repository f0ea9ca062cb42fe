/**
 * Query Cache TCP Controller
 *
 * TCP Endpoints ({ cmd }):
 * - cache_lookup, cache_store, cache_invalidate, cache_stats
 * - artifact_lookup, artifact_delete
 * - pending_create, pending_approve, pending_reject, pending_get, pending_list
 * - sql_ask, documents_answer, documents_ingest
 * - get_health
 *
 * Output: { success: true, ... } or { success: false, error: { kind, message, suggestion? } }
 */

import { Controller, Logger } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';
import { TieredCacheService } from '../cache/tiered-cache.service';
import {
  CacheInvalidationService,
  InvalidationReport,
  InvalidationTarget,
} from '../cache/cache-invalidation.service';
import { CacheStatsService, CacheStatsSnapshot } from '../cache/cache-stats.service';
import { TierName, TierValueMap } from '../cache/tiers/tier.types';
import { ArtifactCacheService } from '../artifacts/artifact-cache.service';
import { ArtifactRecord } from '../artifacts/records/artifact-record';
import { PendingApprovalService } from '../approvals/pending-approval.service';
import { PendingStatus, PendingUnit } from '../approvals/types/pending-unit.types';
import { ApprovedSqlAnswer, SqlAnswer, SqlQueryPipeline } from '../pipelines/sql-query.pipeline';
import { DocumentAnswer, DocumentAnswerPipeline } from '../pipelines/document-answer.pipeline';
import { IngestionPipeline, IngestionReport } from '../pipelines/ingestion.pipeline';
import { InputValidationError } from '../common/errors/query-cache.errors';
import { CacheInvalidateDto, CacheLookupDto, CacheStoreDto } from './dto/cache-command.dto';
import { ArtifactDeleteDto, ArtifactLookupDto } from './dto/artifact-lookup.dto';
import { PendingCreateDto, PendingIdDto } from './dto/pending.dto';
import { DocumentsAnswerDto, DocumentsIngestDto, SqlAskDto } from './dto/query.dto';
import { QueryCacheResponse, parsePayload, respond } from './query-cache-response';
import { toTierRequest } from './tier-request';
import { HealthReport, HealthService } from './health.service';

const PENDING_STATUSES: readonly PendingStatus[] = ['pending', 'approved', 'rejected', 'executed'];

type CacheLookupResult =
  | { hit: true; key: string; value: TierValueMap[TierName] }
  | { hit: false; key: string };

@Controller()
export class QueryCacheTcpController {
  private readonly logger = new Logger(QueryCacheTcpController.name);

  constructor(
    private readonly cache: TieredCacheService,
    private readonly invalidation: CacheInvalidationService,
    private readonly stats: CacheStatsService,
    private readonly artifacts: ArtifactCacheService,
    private readonly ledger: PendingApprovalService,
    private readonly sqlPipeline: SqlQueryPipeline,
    private readonly answerPipeline: DocumentAnswerPipeline,
    private readonly ingestionPipeline: IngestionPipeline,
    private readonly healthService: HealthService,
  ) {}

  @MessagePattern({ cmd: 'cache_lookup' })
  cacheLookup(@Payload() payload: unknown): Promise<QueryCacheResponse<CacheLookupResult>> {
    return respond(this.logger, 'cache_lookup', async () => {
      const dto = parsePayload(CacheLookupDto, payload);
      const request = toTierRequest(dto.tier, dto.input);
      return this.cache.lookup(request.tier, request.input);
    });
  }

  @MessagePattern({ cmd: 'cache_store' })
  cacheStore(
    @Payload() payload: unknown,
  ): Promise<QueryCacheResponse<{ key: string; ttlSeconds: number }>> {
    return respond(this.logger, 'cache_store', async () => {
      const dto = parsePayload(CacheStoreDto, payload);
      const request = toTierRequest(dto.tier, dto.input);
      return this.cache.store(request.tier, request.input, dto.value);
    });
  }

  @MessagePattern({ cmd: 'cache_invalidate' })
  cacheInvalidate(
    @Payload() payload: unknown,
  ): Promise<QueryCacheResponse<{ target: InvalidationTarget; removed: InvalidationReport }>> {
    return respond(this.logger, 'cache_invalidate', async () => {
      const { target } = parsePayload(CacheInvalidateDto, payload);
      const removed = await this.invalidation.invalidate(target);
      this.logger.log(`TCP cache_invalidate: target=${target}`);
      return { target, removed };
    });
  }

  @MessagePattern({ cmd: 'cache_stats' })
  cacheStats(): Promise<QueryCacheResponse<{ stats: CacheStatsSnapshot }>> {
    return respond(this.logger, 'cache_stats', async () => ({ stats: this.stats.snapshot() }));
  }

  @MessagePattern({ cmd: 'artifact_lookup' })
  artifactLookup(
    @Payload() payload: unknown,
  ): Promise<QueryCacheResponse<{ found: boolean; record: ArtifactRecord | null }>> {
    return respond(this.logger, 'artifact_lookup', async () => {
      const { contentHash } = parsePayload(ArtifactLookupDto, payload);
      const record = await this.artifacts.get(contentHash);
      return { found: record !== null, record };
    });
  }

  /**
   * Operator removal of a stored bundle; the next ingestion of the same bytes parses again
   */
  @MessagePattern({ cmd: 'artifact_delete' })
  artifactDelete(
    @Payload() payload: unknown,
  ): Promise<QueryCacheResponse<{ contentHash: string; deleted: boolean }>> {
    return respond(this.logger, 'artifact_delete', async () => {
      const { contentHash } = parsePayload(ArtifactDeleteDto, payload);
      const deleted = await this.artifacts.delete(contentHash);
      return { contentHash, deleted };
    });
  }

  @MessagePattern({ cmd: 'pending_create' })
  pendingCreate(@Payload() payload: unknown): Promise<QueryCacheResponse<{ pending: PendingUnit }>> {
    return respond(this.logger, 'pending_create', async () => {
      const dto = parsePayload(PendingCreateDto, payload);
      return { pending: this.ledger.create(dto.question, dto.statement, dto.explanation ?? '') };
    });
  }

  /**
   * Approves and executes the statement; the result comes from the res tier when cached
   */
  @MessagePattern({ cmd: 'pending_approve' })
  pendingApprove(@Payload() payload: unknown): Promise<QueryCacheResponse<ApprovedSqlAnswer>> {
    return respond(this.logger, 'pending_approve', async () => {
      const { id } = parsePayload(PendingIdDto, payload);
      return this.sqlPipeline.approve(id);
    });
  }

  @MessagePattern({ cmd: 'pending_reject' })
  pendingReject(@Payload() payload: unknown): Promise<QueryCacheResponse<{ pending: PendingUnit }>> {
    return respond(this.logger, 'pending_reject', async () => {
      const { id } = parsePayload(PendingIdDto, payload);
      return { pending: this.sqlPipeline.reject(id) };
    });
  }

  @MessagePattern({ cmd: 'pending_get' })
  pendingGet(@Payload() payload: unknown): Promise<QueryCacheResponse<{ pending: PendingUnit }>> {
    return respond(this.logger, 'pending_get', async () => {
      const { id } = parsePayload(PendingIdDto, payload);
      return { pending: this.ledger.get(id) };
    });
  }

  @MessagePattern({ cmd: 'pending_list' })
  pendingList(
    @Payload() payload: { status?: unknown } | undefined,
  ): Promise<QueryCacheResponse<{ pending: PendingUnit[] }>> {
    return respond(this.logger, 'pending_list', async () => {
      const status = payload?.status;
      if (status === undefined) {
        return { pending: this.ledger.list() };
      }
      const known = PENDING_STATUSES.find((candidate) => candidate === status);
      if (!known) {
        throw new InputValidationError(
          `status must be one of ${PENDING_STATUSES.join(', ')}`,
          'status',
        );
      }
      return { pending: this.ledger.list(known) };
    });
  }

  @MessagePattern({ cmd: 'sql_ask' })
  sqlAsk(@Payload() payload: unknown): Promise<QueryCacheResponse<SqlAnswer>> {
    return respond(this.logger, 'sql_ask', async () => {
      const dto = parsePayload(SqlAskDto, payload);
      return this.sqlPipeline.ask(dto.question, { autoApprove: dto.autoApprove });
    });
  }

  @MessagePattern({ cmd: 'documents_answer' })
  documentsAnswer(@Payload() payload: unknown): Promise<QueryCacheResponse<DocumentAnswer>> {
    return respond(this.logger, 'documents_answer', async () => {
      const dto = parsePayload(DocumentsAnswerDto, payload);
      return this.answerPipeline.answer(dto.question, dto.topK);
    });
  }

  @MessagePattern({ cmd: 'documents_ingest' })
  documentsIngest(@Payload() payload: unknown): Promise<QueryCacheResponse<IngestionReport>> {
    return respond(this.logger, 'documents_ingest', async () => {
      const dto = parsePayload(DocumentsIngestDto, payload);
      return this.ingestionPipeline.ingest({
        filename: dto.filename,
        contentType: dto.contentType,
        data: Buffer.from(dto.data, 'base64'),
      });
    });
  }

  @MessagePattern({ cmd: 'get_health' })
  getHealth(): Promise<QueryCacheResponse<HealthReport>> {
    return respond(this.logger, 'get_health', () => this.healthService.check());
  }
}
