/**
 * Anthropic Provider
 *
 * The Messages API requires max_tokens, so a cap is always sent.
 */

import type { CompletionOptions, LLMClient } from '@/providers/llm/types';
import type { ExtractionRequest } from '../types';
import { ModelExtractionProvider, type ModelProviderSettings } from './model';

const DEFAULT_MAX_TOKENS = 4096;

export class AnthropicExtractionProvider extends ModelExtractionProvider {
  constructor(llm: LLMClient, settings: ModelProviderSettings) {
    super('anthropic', llm, settings);
  }

  protected override completionOptions(request: ExtractionRequest): CompletionOptions {
    const base = super.completionOptions(request);
    return { ...base, maxTokens: base.maxTokens ?? DEFAULT_MAX_TOKENS };
  }
}
