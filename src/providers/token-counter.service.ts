import { Injectable, Logger } from '@nestjs/common';
import { encodingForModel, Tiktoken } from 'js-tiktoken';

/**
 * Token Counter Service
 * js-tiktoken with the cl100k_base encoding (gpt-3.5-turbo family)
 */
@Injectable()
export class TokenCounterService {
  private readonly logger = new Logger(TokenCounterService.name);
  private readonly encoding: Tiktoken;
  private readonly MODEL_ENCODING = 'gpt-3.5-turbo';

  constructor() {
    this.encoding = encodingForModel(this.MODEL_ENCODING);
    this.logger.log(`Token counter initialized with encoding: ${this.MODEL_ENCODING}`);
  }

  countTokens(text: string): number {
    return this.encoding.encode(text).length;
  }
}
