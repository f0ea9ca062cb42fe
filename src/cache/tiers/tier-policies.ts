import {
  AnswerRecord,
  EmbeddingRecord,
  GeneratedStatementRecord,
  ResultSetRecord,
} from '../records/cache-records';
import { assertSafeStatement } from '../../approvals/statement-safety.classifier';
import { canonicalJson, canonicalQuestion } from '../../fingerprint/fingerprint';
import { RecordCodec } from './record-codec';
import { DEFAULT_TIER_TTL_SECONDS, TierName, TierRegistry } from './tier.types';

/**
 * Build the tier table.
 *
 * Canonical forms:
 * - gen: question trimmed, whitespace collapsed, lower-cased
 * - emb: text trimmed; case and inner whitespace kept
 * - ans: canonical JSON of { question (gen form), topK }
 * - res: statement text exactly as approved
 *
 * gen and res only accept statements that pass the safety classifier.
 */
export function createTierRegistry(
  ttlSeconds: Record<TierName, number> = DEFAULT_TIER_TTL_SECONDS,
): TierRegistry {
  return {
    gen: {
      name: 'gen',
      prefix: 'gen',
      description: 'generated query statement',
      ttlSeconds: ttlSeconds.gen,
      codec: new RecordCodec(GeneratedStatementRecord, 'GeneratedStatementRecord'),
      canonicalize: (question) => canonicalQuestion(question),
      assertStorable: (_question, record) => assertSafeStatement(record.sql),
    },
    emb: {
      name: 'emb',
      prefix: 'emb',
      description: 'computed embedding',
      ttlSeconds: ttlSeconds.emb,
      codec: new RecordCodec(EmbeddingRecord, 'EmbeddingRecord'),
      canonicalize: (text) => text.trim(),
    },
    ans: {
      name: 'ans',
      prefix: 'ans',
      description: 'generated answer',
      ttlSeconds: ttlSeconds.ans,
      codec: new RecordCodec(AnswerRecord, 'AnswerRecord'),
      canonicalize: ({ question, topK }) =>
        canonicalJson({ question: canonicalQuestion(question), topK }),
    },
    res: {
      name: 'res',
      prefix: 'res',
      description: 'executed result set',
      ttlSeconds: ttlSeconds.res,
      codec: new RecordCodec(ResultSetRecord, 'ResultSetRecord'),
      canonicalize: (statement) => statement,
      assertStorable: (statement) => assertSafeStatement(statement),
    },
  };
}
