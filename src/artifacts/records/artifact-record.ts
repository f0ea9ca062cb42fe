import { Type } from 'class-transformer';
import {
  IsArray,
  IsISO8601,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsString,
  Matches,
  Min,
  ValidateNested,
} from 'class-validator';

export class ArtifactChunk {
  @IsInt()
  @Min(0)
  index!: number;

  @IsString()
  text!: string;

  @IsInt()
  @Min(0)
  tokenCount!: number;

  @IsInt()
  @Min(0)
  startChar!: number;

  @IsInt()
  @Min(0)
  endChar!: number;
}

export class ArtifactMetadata {
  @IsString()
  @IsNotEmpty()
  filename!: string;

  @IsInt()
  @Min(0)
  byteSize!: number;

  @IsISO8601()
  ingestedAt!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  processingMs!: number;

  @IsString()
  parser!: string;

  @IsInt()
  @Min(0)
  chunkCount!: number;
}

/**
 * Parsed, chunked and embedded form of one file, addressed by its content hash.
 * embeddings[i] belongs to chunks[i].
 */
export class ArtifactRecord {
  @Matches(/^[0-9a-f]{64}$/)
  contentHash!: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ArtifactChunk)
  chunks!: ArtifactChunk[];

  @IsArray()
  @IsArray({ each: true })
  embeddings!: number[][];

  @ValidateNested()
  @Type(() => ArtifactMetadata)
  metadata!: ArtifactMetadata;
}

/**
 * What a parse function hands back on a cache miss
 */
export interface ParsedArtifact {
  chunks: ArtifactChunk[];
  embeddings: number[][];
  parser: string;
}
