import { Logger } from '@nestjs/common';
import { QdrantClient } from '@qdrant/js-client-rest';
import type { ChunkPayload, VectorIndex, VectorMatch, VectorPoint } from './types';

/**
 * VectorIndex over one Qdrant collection with an unnamed cosine vector
 */
export class QdrantVectorIndex implements VectorIndex {
  private readonly logger = new Logger(QdrantVectorIndex.name);

  constructor(
    private readonly client: QdrantClient,
    private readonly collection: string,
    private readonly dimensions: number,
  ) {}

  /**
   * Create the collection when missing. Failures are logged, not thrown:
   * search and upsert report them per request.
   */
  async ensureCollection(): Promise<void> {
    try {
      const { exists } = await this.client.collectionExists(this.collection);
      if (exists) {
        this.logger.log(`Collection "${this.collection}" already exists`);
        return;
      }

      await this.client.createCollection(this.collection, {
        vectors: { size: this.dimensions, distance: 'Cosine' },
      });
      await this.client.createPayloadIndex(this.collection, {
        field_name: 'documentId',
        field_schema: 'keyword',
      });
      this.logger.log(`Created collection "${this.collection}" (${this.dimensions}D)`);
    } catch (error) {
      this.logger.warn(
        `Failed to initialize collection "${this.collection}": ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  async search(vector: number[], topK: number): Promise<VectorMatch[]> {
    const results = await this.client.search(this.collection, {
      vector,
      limit: topK,
      with_payload: true,
    });

    const matches: VectorMatch[] = [];
    for (const result of results) {
      const payload = toChunkPayload(result.payload);
      if (!payload) {
        this.logger.warn(`[Search] point=${result.id} status=skipped reason=malformed_payload`);
        continue;
      }
      matches.push({ id: String(result.id), score: result.score, payload });
    }
    return matches;
  }

  async upsert(points: VectorPoint[]): Promise<void> {
    if (points.length === 0) {
      return;
    }

    await this.client.upsert(this.collection, {
      wait: true,
      points: points.map((point) => ({
        id: point.id,
        vector: point.vector,
        payload: { ...point.payload },
      })),
    });
  }
}

export function toChunkPayload(payload: unknown): ChunkPayload | null {
  if (payload === null || typeof payload !== 'object') {
    return null;
  }

  const documentId: unknown = Reflect.get(payload, 'documentId');
  const filename: unknown = Reflect.get(payload, 'filename');
  const chunkIndex: unknown = Reflect.get(payload, 'chunkIndex');
  const text: unknown = Reflect.get(payload, 'text');

  if (
    typeof documentId !== 'string' ||
    typeof filename !== 'string' ||
    typeof chunkIndex !== 'number' ||
    typeof text !== 'string'
  ) {
    return null;
  }

  return { documentId, filename, chunkIndex, text };
}
