/**
 * Artifact Cache Service
 *
 * Content-addressed store for parsed documents: the same bytes are parsed,
 * chunked and embedded once, whatever filename they arrive under.
 * Bundles never expire; operators remove them with delete().
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ARTIFACT_STORAGE, ArtifactStorage } from './interfaces/artifact-storage.interface';
import { ArtifactRecord, ParsedArtifact } from './records/artifact-record';
import { FileNotFoundError } from './errors';
import { RecordCodec } from '../cache/tiers/record-codec';
import { contentHash, isHexDigest } from '../fingerprint/fingerprint';
import {
  ArtifactIntegrityError,
  InputValidationError,
  describeError,
} from '../common/errors/query-cache.errors';

export interface ArtifactParseOptions {
  filename?: string;
}

export interface ArtifactLookup {
  record: ArtifactRecord;
  hit: boolean;
}

export function artifactKey(hash: string): string {
  return `artifacts/${hash.slice(0, 2)}/${hash}.json`;
}

@Injectable()
export class ArtifactCacheService {
  private readonly logger = new Logger(ArtifactCacheService.name);
  private readonly codec = new RecordCodec(ArtifactRecord, 'ArtifactRecord');

  constructor(@Inject(ARTIFACT_STORAGE) private readonly storage: ArtifactStorage) {}

  get backend(): string {
    return this.storage.kind;
  }

  /**
   * Return the stored bundle for these bytes, or parse them once and store it.
   */
  async getOrParse(
    hash: string,
    rawBytes: Buffer,
    parseFn: (rawBytes: Buffer) => Promise<ParsedArtifact>,
    options: ArtifactParseOptions = {},
  ): Promise<ArtifactLookup> {
    this.assertHash(hash);
    const actual = contentHash(rawBytes);
    if (actual !== hash) {
      throw new ArtifactIntegrityError(
        hash,
        `Content hash mismatch: expected ${hash}, bytes hash to ${actual}`,
      );
    }

    const existing = await this.load(hash);
    if (existing) {
      this.logger.log(
        `[Artifacts] hash=${hash} status=hit chunks=${existing.metadata.chunkCount}`,
      );
      return { record: existing, hit: true };
    }

    const started = Date.now();
    const parsed = await parseFn(rawBytes);
    const processingMs = Date.now() - started;

    const record = this.codec.fromPlain({
      contentHash: hash,
      chunks: parsed.chunks,
      embeddings: parsed.embeddings,
      metadata: {
        filename: options.filename ?? `${hash}.bin`,
        byteSize: rawBytes.length,
        ingestedAt: new Date().toISOString(),
        processingMs,
        parser: parsed.parser,
        chunkCount: parsed.chunks.length,
      },
    });
    this.assertBundle(record);

    await this.storage.putObject(
      artifactKey(hash),
      Buffer.from(this.codec.encode(record), 'utf8'),
      'application/json',
    );

    this.logger.log(
      `[Artifacts] hash=${hash} status=stored chunks=${record.metadata.chunkCount} processing=${processingMs}ms`,
    );
    return { record, hit: false };
  }

  /**
   * Stored bundle, or null when absent or unreadable
   */
  async get(hash: string): Promise<ArtifactRecord | null> {
    this.assertHash(hash);
    return this.load(hash);
  }

  async delete(hash: string): Promise<boolean> {
    this.assertHash(hash);
    const deleted = await this.storage.deleteObject(artifactKey(hash));
    this.logger.log(`[Artifacts] hash=${hash} status=${deleted ? 'deleted' : 'absent'}`);
    return deleted;
  }

  private async load(hash: string): Promise<ArtifactRecord | null> {
    let raw: Buffer;
    try {
      raw = await this.storage.getObjectAsBuffer(artifactKey(hash));
    } catch (error) {
      if (error instanceof FileNotFoundError) {
        return null;
      }
      throw error;
    }

    try {
      const record = this.codec.decode(raw.toString('utf8'));
      this.assertBundle(record);
      if (record.contentHash !== hash) {
        throw new ArtifactIntegrityError(hash, `Stored bundle carries hash ${record.contentHash}`);
      }
      return record;
    } catch (error) {
      if (error instanceof InputValidationError || error instanceof ArtifactIntegrityError) {
        // Re-parsed and overwritten by the caller
        this.logger.warn(`[Artifacts] hash=${hash} status=corrupt error=${describeError(error)}`);
        return null;
      }
      throw error;
    }
  }

  private assertHash(hash: string): void {
    if (!isHexDigest(hash)) {
      throw new InputValidationError('contentHash must be 64 lowercase hex characters', 'contentHash');
    }
  }

  /**
   * chunks, embeddings and chunkCount agree; chunk indexes run 0..n-1
   */
  private assertBundle(record: ArtifactRecord): void {
    const { chunks, embeddings, metadata, contentHash: hash } = record;

    if (chunks.length !== embeddings.length || chunks.length !== metadata.chunkCount) {
      throw new ArtifactIntegrityError(
        hash,
        `Bundle mismatch: ${chunks.length} chunks, ${embeddings.length} embeddings, chunkCount ${metadata.chunkCount}`,
      );
    }

    chunks.forEach((chunk, position) => {
      if (chunk.index !== position) {
        throw new ArtifactIntegrityError(hash, `Chunk at position ${position} has index ${chunk.index}`);
      }
    });

    for (const vector of embeddings) {
      if (vector.length === 0 || !vector.every((component) => Number.isFinite(component))) {
        throw new ArtifactIntegrityError(hash, 'Embedding vectors must be non-empty finite numbers');
      }
    }
  }
}
