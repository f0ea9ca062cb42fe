import { IsBase64, IsBoolean, IsInt, IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class SqlAskDto {
  @IsString()
  question!: string;

  @IsOptional()
  @IsBoolean()
  autoApprove?: boolean;
}

export class DocumentsAnswerDto {
  @IsString()
  question!: string;

  @IsOptional()
  @IsInt()
  topK?: number;
}

/**
 * data carries the file bytes, base64-encoded
 */
export class DocumentsIngestDto {
  @IsString()
  @IsNotEmpty()
  filename!: string;

  @IsString()
  @IsNotEmpty()
  contentType!: string;

  @IsBase64()
  data!: string;
}
