/**
 * Extraction Provider Factory
 *
 * The single place where the configured provider name turns into an
 * implementation.
 */

import type { ProviderConfig } from '@/config/schema';
import { createLLMClient } from '@/providers/llm/factory';
import type { LLMClient, ModelProviderName } from '@/providers/llm/types';
import type { ExtractionProvider } from '../types';
import { AnthropicExtractionProvider } from './anthropic';
import { LocalHeuristicProvider } from './local';
import { OllamaExtractionProvider } from './ollama';
import { OpenAIExtractionProvider } from './openai';

export type LLMClientFactory = (
  provider: ModelProviderName,
  model: string,
  options: { apiKey?: string; baseUrl?: string }
) => LLMClient;

/**
 * Create the configured provider. `llmClientFactory` is swapped in tests.
 */
export function createExtractionProvider(
  config: Readonly<ProviderConfig>,
  llmClientFactory: LLMClientFactory = createLLMClient
): ExtractionProvider {
  const connection = config.connection;
  if (config.provider === 'local' || connection === null) {
    return new LocalHeuristicProvider();
  }

  const llm = llmClientFactory(connection.name, connection.model, {
    apiKey: connection.apiKey,
    baseUrl: connection.baseUrl
  });
  const settings = { maxConcurrentCalls: config.maxConcurrentCalls };

  switch (connection.name) {
    case 'ollama':
      return new OllamaExtractionProvider(llm, {
        ...settings,
        keepAlive: connection.keepAlive ?? '5m'
      });
    case 'openai':
      return new OpenAIExtractionProvider(llm, settings);
    case 'anthropic':
      return new AnthropicExtractionProvider(llm, settings);
    default: {
      const _exhaustive: never = connection.name;
      throw new Error(`Unknown provider: ${_exhaustive}`);
    }
  }
}
