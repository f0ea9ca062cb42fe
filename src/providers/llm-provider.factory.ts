/**
 * LLM Provider Factory
 * Creates chat models for OpenAI or a local Ollama server
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ChatOpenAI } from '@langchain/openai';
import { ChatOllama } from '@langchain/ollama';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { APP_CONFIG, AppConfig } from '../config/app-config';

@Injectable()
export class LLMProviderFactory {
  private readonly logger = new Logger(LLMProviderFactory.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  /**
   * Chat model for the configured LLM_PROVIDER, at temperature 0
   */
  createChatModel(): BaseChatModel {
    const provider = this.config.models.llmProvider;

    this.logger.log(`Creating chat model for provider: ${provider}`);

    switch (provider) {
      case 'openai':
        return this.createOpenAIModel();
      case 'ollama':
        return this.createOllamaModel();
    }
  }

  private createOpenAIModel(): ChatOpenAI {
    const apiKey = this.config.models.openaiApiKey;
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY is required for OpenAI provider');
    }

    return new ChatOpenAI({
      model: this.config.models.openaiChatModel,
      temperature: 0,
      maxTokens: 1024,
      maxRetries: 2,
      apiKey,
    });
  }

  private createOllamaModel(): ChatOllama {
    return new ChatOllama({
      model: this.config.models.ollamaChatModel,
      temperature: 0,
      numPredict: 1024,
      baseUrl: this.config.models.ollamaBaseUrl,
    });
  }
}
