import { Matches } from 'class-validator';

export class ArtifactLookupDto {
  @Matches(/^[0-9a-f]{64}$/, { message: 'contentHash must be 64 lowercase hex characters' })
  contentHash!: string;
}

export class ArtifactDeleteDto extends ArtifactLookupDto {}
