import { DocumentAnswerPipeline, NO_CONTEXT_ANSWER, buildPrompt } from './document-answer.pipeline';
import { EmbeddingService } from './embedding.service';
import { TokenCounterService } from '../providers/token-counter.service';
import { ComputeError, InputValidationError } from '../common/errors/query-cache.errors';
import {
  FakeCompletionClient,
  FakeEmbeddingClient,
  FakeVectorIndex,
  createCacheHarness,
  testConfig,
} from './testing/pipeline-fakes';

const REFUND_POLICY = 'Refunds are processed within five business days.';
const SHIPPING_POLICY = 'Orders ship from the warehouse every weekday.';

describe('DocumentAnswerPipeline', () => {
  let harness: ReturnType<typeof createCacheHarness>;
  let embeddingClient: FakeEmbeddingClient;
  let vectorIndex: FakeVectorIndex;
  let completion: FakeCompletionClient;
  let pipeline: DocumentAnswerPipeline;

  beforeEach(async () => {
    const config = testConfig();
    harness = createCacheHarness();
    embeddingClient = new FakeEmbeddingClient();
    vectorIndex = new FakeVectorIndex();
    completion = new FakeCompletionClient();
    pipeline = new DocumentAnswerPipeline(
      harness.cache,
      new EmbeddingService(harness.cache, embeddingClient, new TokenCounterService(), config),
      vectorIndex,
      completion,
      config,
    );

    await vectorIndex.upsert([
      {
        id: 'point-1',
        vector: [1, 0],
        payload: { documentId: 'doc-1', filename: 'refunds.md', chunkIndex: 0, text: REFUND_POLICY },
      },
      {
        id: 'point-2',
        vector: [0, 1],
        payload: { documentId: 'doc-2', filename: 'shipping.md', chunkIndex: 3, text: SHIPPING_POLICY },
      },
    ]);
  });

  it('answers from retrieved chunks and attributes its sources', async () => {
    const { answer, cached } = await pipeline.answer('How do refunds work?', 2);

    expect(cached).toBe(false);
    expect(answer).toMatchObject({
      answer: 'Refunds are processed within five days [1].',
      retrievedCount: 2,
      sources: [
        { documentId: 'doc-1', filename: 'refunds.md', chunkIndex: 0, score: 0.9, excerpt: REFUND_POLICY },
        { documentId: 'doc-2', filename: 'shipping.md', chunkIndex: 3, score: 0.8, excerpt: SHIPPING_POLICY },
      ],
    });
    expect(completion.prompts).toEqual([
      `Context:\n[1] refunds.md (chunk 0)\n${REFUND_POLICY}\n\n[2] shipping.md (chunk 3)\n${SHIPPING_POLICY}\n\nQuestion: How do refunds work?`,
    ]);
    expect(vectorIndex.searches).toEqual([{ vector: [20, 1], topK: 2 }]);
  });

  it('serves a repeated question from the ans tier', async () => {
    await pipeline.answer('How do refunds work?', 2);
    const second = await pipeline.answer('how do REFUNDS work?', 2);

    expect(second.cached).toBe(true);
    expect(completion.prompts).toHaveLength(1);
    expect(vectorIndex.searches).toHaveLength(1);
    expect(embeddingClient.embedCalls).toEqual(['How do refunds work?']);
  });

  it('keys answers on topK', async () => {
    await pipeline.answer('How do refunds work?', 2);
    const narrower = await pipeline.answer('How do refunds work?', 1);

    expect(narrower.cached).toBe(false);
    expect(narrower.answer.sources).toHaveLength(1);
    expect(embeddingClient.embedCalls).toHaveLength(1);
  });

  it('answers without a completion call when nothing matches', async () => {
    vectorIndex.points.clear();

    const { answer } = await pipeline.answer('How do refunds work?');

    expect(answer.answer).toBe(NO_CONTEXT_ANSWER);
    expect(answer.sources).toEqual([]);
    expect(completion.prompts).toEqual([]);
  });

  it('shortens long excerpts', async () => {
    vectorIndex.points.clear();
    await vectorIndex.upsert([
      {
        id: 'point-3',
        vector: [1, 1],
        payload: { documentId: 'doc-3', filename: 'terms.txt', chunkIndex: 0, text: 'a'.repeat(250) },
      },
    ]);

    const { answer } = await pipeline.answer('What are the terms?');

    expect(answer.sources[0].excerpt).toBe(`${'a'.repeat(197)}...`);
  });

  it('propagates search failures and caches no answer', async () => {
    vectorIndex.search = async () => {
      throw new Error('collection not found');
    };

    await expect(pipeline.answer('How do refunds work?')).rejects.toThrow(
      new ComputeError('VectorIndex', 'collection not found'),
    );
    await expect(
      harness.cache.lookup('ans', { question: 'How do refunds work?', topK: 5 }),
    ).resolves.toMatchObject({ hit: false });
  });

  it('validates topK', async () => {
    await expect(pipeline.answer('How do refunds work?', 11)).rejects.toBeInstanceOf(
      InputValidationError,
    );
  });
});

describe('buildPrompt', () => {
  it('numbers passages in match order', () => {
    expect(
      buildPrompt('Why?', [
        { id: 'a', score: 0.5, payload: { documentId: 'd', filename: 'f.txt', chunkIndex: 1, text: 'Because.' } },
      ]),
    ).toBe('Context:\n[1] f.txt (chunk 1)\nBecause.\n\nQuestion: Why?');
  });
});
