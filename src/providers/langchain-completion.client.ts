import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { ChatPromptTemplate } from '@langchain/core/prompts';
import { StringOutputParser } from '@langchain/core/output_parsers';
import type { CompletionClient } from './types';

/**
 * CompletionClient over a LangChain chat model.
 * System text and prompt are passed as template values, so braces in
 * either are never read as template variables.
 */
export class LangChainCompletionClient implements CompletionClient {
  private readonly prompt = ChatPromptTemplate.fromMessages([
    ['system', '{system}'],
    ['user', '{prompt}'],
  ]);

  constructor(private readonly chat: BaseChatModel) {}

  async complete(system: string, prompt: string): Promise<string> {
    const chain = this.prompt.pipe(this.chat).pipe(new StringOutputParser());
    const result = await chain.invoke({ system, prompt });
    return result.trim();
  }
}
