/**
 * Cached record shapes, one per tier.
 * Decorators double as the validation contract applied on read and write.
 */

import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsISO8601,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';

const FINITE = { allowNaN: false, allowInfinity: false };

/**
 * gen: statement produced from a natural-language question
 */
export class GeneratedStatementRecord {
  @IsString()
  @IsNotEmpty()
  sql!: string;

  @IsString()
  explanation!: string;

  @IsNumber(FINITE)
  @Min(0)
  @Max(1)
  confidence!: number;

  @IsISO8601()
  createdAt!: string;
}

/**
 * emb: embedding vector for one text
 */
export class EmbeddingRecord {
  @IsArray()
  @ArrayNotEmpty()
  @IsNumber(FINITE, { each: true })
  vector!: number[];

  @IsString()
  @IsNotEmpty()
  model!: string;

  @IsInt()
  @Min(0)
  tokenCount!: number;
}

export class SourceAttribution {
  @IsString()
  documentId!: string;

  @IsString()
  filename!: string;

  @IsInt()
  @Min(0)
  chunkIndex!: number;

  @IsNumber(FINITE)
  score!: number;

  @IsString()
  excerpt!: string;
}

/**
 * ans: generated answer with the chunks it was grounded on
 */
export class AnswerRecord {
  @IsString()
  answer!: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SourceAttribution)
  sources!: SourceAttribution[];

  @IsInt()
  @Min(0)
  retrievedCount!: number;

  @IsISO8601()
  createdAt!: string;
}

/**
 * res: rows returned by an approved statement
 */
export class ResultSetRecord {
  @IsArray()
  @IsObject({ each: true })
  rows!: Record<string, unknown>[];

  @IsArray()
  @IsString({ each: true })
  columns!: string[];

  @IsInt()
  @Min(0)
  rowCount!: number;

  @IsNumber(FINITE)
  @Min(0)
  executionMs!: number;
}
