import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class PendingCreateDto {
  @IsString()
  @IsNotEmpty()
  question!: string;

  @IsString()
  @IsNotEmpty()
  statement!: string;

  @IsOptional()
  @IsString()
  explanation?: string;
}

export class PendingIdDto {
  @IsString()
  @IsNotEmpty()
  id!: string;
}
