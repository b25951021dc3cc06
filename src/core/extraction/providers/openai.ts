/**
 * OpenAI Provider
 */

import type { LLMClient } from '@/providers/llm/types';
import { ModelExtractionProvider, type ModelProviderSettings } from './model';

export class OpenAIExtractionProvider extends ModelExtractionProvider {
  constructor(llm: LLMClient, settings: ModelProviderSettings) {
    super('openai', llm, settings);
  }
}
