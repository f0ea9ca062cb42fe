/**
 * Ingestion Pipeline
 *
 * bytes -> content hash -> artifact cache (parse, chunk, embed once)
 *       -> vector upsert -> ans tier invalidation
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { v5 as uuidv5 } from 'uuid';
import { ArtifactCacheService } from '../artifacts/artifact-cache.service';
import { ArtifactRecord, ParsedArtifact } from '../artifacts/records/artifact-record';
import { CacheInvalidationService } from '../cache/cache-invalidation.service';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { contentHash } from '../fingerprint/fingerprint';
import {
  DOCUMENT_PARSER,
  DocumentParser,
  VECTOR_INDEX,
  VectorIndex,
  VectorPoint,
} from '../providers/types';
import { callCollaborator } from '../common/utils/call-collaborator';
import { InputValidationError, describeError } from '../common/errors/query-cache.errors';
import { EmbeddingService } from './embedding.service';

const POINT_ID_NAMESPACE = 'b3f1c0de-4a5e-4c1a-9a77-0d2f5e8c6a10';

export interface IngestDocumentInput {
  filename: string;
  contentType: string;
  data: Buffer;
}

export type AnswerInvalidation =
  | { status: 'invalidated'; removed: number }
  | { status: 'failed'; error: string };

export interface IngestionReport {
  documentId: string;
  contentHash: string;
  filename: string;
  chunkCount: number;
  pointsUpserted: number;
  artifactCached: boolean;
  answerInvalidation: AnswerInvalidation;
}

/**
 * Point ids derive from content and chunk position, so re-ingesting the
 * same bytes overwrites the same points.
 */
export function chunkPointId(hash: string, chunkIndex: number): string {
  return uuidv5(`${hash}:${chunkIndex}`, POINT_ID_NAMESPACE);
}

@Injectable()
export class IngestionPipeline {
  private readonly logger = new Logger(IngestionPipeline.name);

  constructor(
    private readonly artifacts: ArtifactCacheService,
    private readonly embeddings: EmbeddingService,
    private readonly invalidation: CacheInvalidationService,
    @Inject(DOCUMENT_PARSER) private readonly parser: DocumentParser,
    @Inject(VECTOR_INDEX) private readonly vectorIndex: VectorIndex,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  async ingest(input: IngestDocumentInput): Promise<IngestionReport> {
    const filename = input.filename.trim();
    if (filename.length === 0) {
      throw new InputValidationError('filename must not be empty', 'filename');
    }
    if (input.data.length === 0) {
      throw new InputValidationError('Document is empty', 'data');
    }

    const hash = contentHash(input.data);
    this.logger.log(`[Ingest] file=${filename} bytes=${input.data.length} hash=${hash}`);

    const { record, hit } = await this.artifacts.getOrParse(
      hash,
      input.data,
      (bytes) => this.parse(bytes, input.contentType),
      { filename },
    );

    const points = toPoints(record, filename);
    await callCollaborator('VectorIndex', this.config.collaboratorTimeoutMs, () =>
      this.vectorIndex.upsert(points),
    );

    const answerInvalidation = await this.invalidateAnswers();

    this.logger.log(
      `[Ingest] hash=${hash} status=indexed chunks=${record.chunks.length} artifact_cached=${hit} invalidation=${answerInvalidation.status}`,
    );

    return {
      documentId: hash,
      contentHash: hash,
      filename,
      chunkCount: record.chunks.length,
      pointsUpserted: points.length,
      artifactCached: hit,
      answerInvalidation,
    };
  }

  private async parse(bytes: Buffer, contentType: string): Promise<ParsedArtifact> {
    const chunks = await callCollaborator('DocumentParser', this.config.collaboratorTimeoutMs, () =>
      this.parser.parse(bytes, contentType),
    );
    const embeddings = await this.embeddings.embedMany(chunks.map((chunk) => chunk.text));
    return { chunks, embeddings, parser: this.parser.name };
  }

  /**
   * Cached answers may predate this document. The upsert has already
   * happened, so a failed invalidation is reported rather than thrown.
   */
  private async invalidateAnswers(): Promise<AnswerInvalidation> {
    try {
      const report = await this.invalidation.invalidate('ans');
      return { status: 'invalidated', removed: report.ans ?? 0 };
    } catch (error) {
      this.logger.warn(`[Ingest] status=invalidation_failed error=${describeError(error)}`);
      return { status: 'failed', error: describeError(error) };
    }
  }
}

function toPoints(record: ArtifactRecord, filename: string): VectorPoint[] {
  return record.chunks.map((chunk, position) => ({
    id: chunkPointId(record.contentHash, chunk.index),
    vector: record.embeddings[position],
    payload: {
      documentId: record.contentHash,
      filename,
      chunkIndex: chunk.index,
      text: chunk.text,
    },
  }));
}
