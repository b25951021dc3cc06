/**
 * Ollama Provider
 *
 * Talks to a long-lived local model server through its OpenAI-compatible
 * endpoint. keep_alive holds the model in memory between entries.
 */

import type { LLMClient, CompletionOptions } from '@/providers/llm/types';
import type { ExtractionRequest } from '../types';
import { ModelExtractionProvider, type ModelProviderSettings } from './model';

/** Largest num_ctx requested from the server */
const MAX_NUM_CTX = 128_000;

export interface OllamaSettings extends ModelProviderSettings {
  keepAlive: string;
}

export class OllamaExtractionProvider extends ModelExtractionProvider {
  private readonly keepAlive: string;

  constructor(llm: LLMClient, settings: OllamaSettings) {
    super('ollama', llm, settings);
    this.keepAlive = settings.keepAlive;
  }

  protected override completionOptions(request: ExtractionRequest): CompletionOptions {
    return {
      ...super.completionOptions(request),
      options: {
        keep_alive: this.keepAlive,
        options: { num_ctx: Math.min(request.contextWindowTokens, MAX_NUM_CTX) }
      }
    };
  }
}
