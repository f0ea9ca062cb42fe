/**
 * Document Answer Pipeline
 *
 * ans tier -> (miss) question embedding (emb tier) -> vector search -> completion
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { TieredCacheService } from '../cache/tiered-cache.service';
import { AnswerRecord, SourceAttribution } from '../cache/records/cache-records';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import {
  COMPLETION_CLIENT,
  CompletionClient,
  VECTOR_INDEX,
  VectorIndex,
  VectorMatch,
} from '../providers/types';
import { callCollaborator } from '../common/utils/call-collaborator';
import { EmbeddingService } from './embedding.service';
import { validateQuestion, validateTopK } from './validation/query-validator';

export const NO_CONTEXT_ANSWER = 'No indexed documents match this question.';

const EXCERPT_LENGTH = 200;

const ANSWER_SYSTEM_PROMPT = `You answer questions using only the numbered context passages provided.
Cite passages by their number in square brackets, e.g. [1].
If the context does not contain the answer, say that you do not know.`;

export interface DocumentAnswer {
  answer: AnswerRecord;
  cached: boolean;
}

@Injectable()
export class DocumentAnswerPipeline {
  private readonly logger = new Logger(DocumentAnswerPipeline.name);

  constructor(
    private readonly cache: TieredCacheService,
    private readonly embeddings: EmbeddingService,
    @Inject(VECTOR_INDEX) private readonly vectorIndex: VectorIndex,
    @Inject(COMPLETION_CLIENT) private readonly completion: CompletionClient,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  async answer(question: string, topK?: number): Promise<DocumentAnswer> {
    const trimmed = validateQuestion(question);
    const limit = validateTopK(topK);

    const outcome = await this.cache.lookupOrCompute(
      'ans',
      { question: trimmed, topK: limit },
      () => this.compose(trimmed, limit),
    );

    this.logger.log(
      `[Answer] top_k=${limit} cached=${outcome.hit} sources=${outcome.value.sources.length}`,
    );
    return { answer: outcome.value, cached: outcome.hit };
  }

  private async compose(question: string, topK: number): Promise<AnswerRecord> {
    const timeoutMs = this.config.collaboratorTimeoutMs;
    const { vector } = await this.embeddings.embed(question);
    const matches = await callCollaborator('VectorIndex', timeoutMs, () =>
      this.vectorIndex.search(vector, topK),
    );

    const answer =
      matches.length === 0
        ? NO_CONTEXT_ANSWER
        : await callCollaborator('CompletionClient', timeoutMs, () =>
            this.completion.complete(ANSWER_SYSTEM_PROMPT, buildPrompt(question, matches)),
          );

    return {
      answer,
      sources: matches.map(toSourceAttribution),
      retrievedCount: matches.length,
      createdAt: new Date().toISOString(),
    };
  }
}

export function buildPrompt(question: string, matches: VectorMatch[]): string {
  const context = matches
    .map(
      (match, position) =>
        `[${position + 1}] ${match.payload.filename} (chunk ${match.payload.chunkIndex})\n${match.payload.text}`,
    )
    .join('\n\n');

  return `Context:\n${context}\n\nQuestion: ${question}`;
}

function toSourceAttribution(match: VectorMatch): SourceAttribution {
  const { documentId, filename, chunkIndex, text } = match.payload;
  return {
    documentId,
    filename,
    chunkIndex,
    score: match.score,
    excerpt: text.length > EXCERPT_LENGTH ? `${text.slice(0, EXCERPT_LENGTH - 3)}...` : text,
  };
}
