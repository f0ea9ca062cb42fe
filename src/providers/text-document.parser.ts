import { Inject, Injectable, Logger } from '@nestjs/common';
import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { InputValidationError } from '../common/errors/query-cache.errors';
import type { ArtifactChunk } from '../artifacts/records/artifact-record';
import type { DocumentParser } from './types';
import { TokenCounterService } from './token-counter.service';

const TEXT_CONTENT_TYPES = new Set([
  'text/plain',
  'text/markdown',
  'text/csv',
  'text/html',
  'application/json',
  'application/xml',
  'text/xml',
]);

/**
 * Parser for UTF-8 text formats.
 * Chunks are sized in tokens, with character offsets into the decoded text.
 */
@Injectable()
export class TextDocumentParser implements DocumentParser {
  readonly name = 'text';

  private readonly logger = new Logger(TextDocumentParser.name);
  private readonly splitter: RecursiveCharacterTextSplitter;

  constructor(
    @Inject(APP_CONFIG) config: AppConfig,
    private readonly tokenCounter: TokenCounterService,
  ) {
    this.splitter = new RecursiveCharacterTextSplitter({
      chunkSize: config.chunking.sizeTokens,
      chunkOverlap: config.chunking.overlapTokens,
      separators: ['\n\n', '\n', '. ', ', ', ' ', ''],
      lengthFunction: (text: string) => this.tokenCounter.countTokens(text),
    });
  }

  supports(contentType: string): boolean {
    return TEXT_CONTENT_TYPES.has(normalizeContentType(contentType));
  }

  async parse(bytes: Buffer, contentType: string): Promise<ArtifactChunk[]> {
    if (!this.supports(contentType)) {
      throw new InputValidationError(`Unsupported content type: ${contentType}`, 'contentType');
    }

    const content = bytes.toString('utf8').replace(/^\uFEFF/, '');
    if (content.trim().length === 0) {
      return [];
    }

    const texts = await this.splitter.splitText(content);
    const chunks: ArtifactChunk[] = [];
    let searchFrom = 0;

    texts.forEach((text, index) => {
      const found = content.indexOf(text, searchFrom);
      const startChar = found === -1 ? searchFrom : found;
      chunks.push({
        index,
        text,
        tokenCount: this.tokenCounter.countTokens(text),
        startChar,
        endChar: startChar + text.length,
      });
      searchFrom = startChar + 1;
    });

    this.logger.log(`[Parse] parser=text bytes=${bytes.length} chunks=${chunks.length}`);
    return chunks;
  }
}

function normalizeContentType(contentType: string): string {
  return contentType.split(';')[0].trim().toLowerCase();
}
