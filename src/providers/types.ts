/**
 * Collaborator ports.
 * Pipelines depend on these interfaces only; adapters live beside them.
 */

import type { ArtifactChunk } from '../artifacts/records/artifact-record';

export type EmbeddingProvider = 'openai' | 'ollama';

export interface EmbeddingClient {
  readonly model: string;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

export interface CompletionClient {
  complete(system: string, prompt: string): Promise<string>;
}

export interface GeneratedStatement {
  sql: string;
  explanation: string;
  confidence: number;
}

export interface SqlGenerator {
  generate(question: string): Promise<GeneratedStatement>;
}

/**
 * Payload stored with every chunk vector
 */
export interface ChunkPayload {
  documentId: string;
  filename: string;
  chunkIndex: number;
  text: string;
}

export interface VectorPoint {
  id: string;
  vector: number[];
  payload: ChunkPayload;
}

export interface VectorMatch {
  id: string;
  score: number;
  payload: ChunkPayload;
}

export interface VectorIndex {
  search(vector: number[], topK: number): Promise<VectorMatch[]>;
  upsert(points: VectorPoint[]): Promise<void>;
}

export interface SqlResult {
  rows: Record<string, unknown>[];
  columns: string[];
}

export interface SqlExecutor {
  execute(statement: string, timeoutMs: number): Promise<SqlResult>;
}

export interface DocumentParser {
  readonly name: string;
  parse(bytes: Buffer, contentType: string): Promise<ArtifactChunk[]>;
}

export const EMBEDDING_CLIENT = 'EMBEDDING_CLIENT';
export const COMPLETION_CLIENT = 'COMPLETION_CLIENT';
export const SQL_GENERATOR = 'SQL_GENERATOR';
export const VECTOR_INDEX = 'VECTOR_INDEX';
export const SQL_EXECUTOR = 'SQL_EXECUTOR';
export const DOCUMENT_PARSER = 'DOCUMENT_PARSER';
