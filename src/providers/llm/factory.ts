/**
 * LLM Client Factory
 *
 * Creates LLM clients using Vercel AI SDK v6 with direct provider packages.
 * All requests go directly to provider APIs.
 */

import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import type { LanguageModelV3 } from '@ai-sdk/provider';
import type { ModelProviderName } from '@/config/schema';
import { VercelLLMClient } from './client';
import type { LLMClient } from './types';

const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434/v1';

export interface CreateLLMClientOptions {
  apiKey?: string;
  baseUrl?: string;
}

export function createLLMClient(
  provider: ModelProviderName,
  model: string,
  options: CreateLLMClientOptions = {}
): LLMClient {
  return new VercelLLMClient(getLanguageModel(provider, model, options), provider);
}

function getLanguageModel(
  provider: ModelProviderName,
  model: string,
  options: CreateLLMClientOptions
): LanguageModelV3 {
  switch (provider) {
    case 'openai': {
      const openai = createOpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl });
      return openai(model);
    }

    case 'anthropic': {
      const anthropic = createAnthropic({ apiKey: options.apiKey, baseURL: options.baseUrl });
      return anthropic(model);
    }

    case 'ollama': {
      // Use OpenAI-compatible API for Ollama (supports /v1/chat/completions).
      // Options under providerOptions.ollama are passed through in the request body.
      const ollamaProvider = createOpenAICompatible({
        name: 'ollama',
        baseURL: options.baseUrl ?? DEFAULT_OLLAMA_BASE_URL,
        apiKey: 'ollama' // Required by SDK but not used by Ollama
      });
      return ollamaProvider.languageModel(model);
    }

    default: {
      const _exhaustive: never = provider;
      throw new Error(`Unknown provider: ${_exhaustive}`);
    }
  }
}
