/**
 * Vercel AI SDK v6 LLM Client
 *
 * Wraps the AI SDK generateText function for extraction calls.
 * No streaming: extraction needs the complete response for parsing.
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import { generateText } from 'ai';
import type { CompletionOptions, LLMClient, Message, ModelProviderName } from './types';

export class VercelLLMClient implements LLMClient {
  readonly modelId: string;

  constructor(
    private readonly model: LanguageModelV3,
    readonly provider: ModelProviderName
  ) {
    this.modelId = model.modelId;
  }

  async complete(messages: Message[], options?: CompletionOptions): Promise<string> {
    const providerOptions = options?.options ? { [this.provider]: options.options } : undefined;

    const { text } = await generateText({
      model: this.model,
      messages,
      maxOutputTokens: options?.maxTokens,
      temperature: options?.temperature,
      providerOptions,
      abortSignal: options?.abortSignal,
      // The extraction runner owns the retry budget
      maxRetries: 0
    });

    return text;
  }
}
