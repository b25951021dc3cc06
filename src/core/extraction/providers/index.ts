export { AnthropicExtractionProvider } from './anthropic';
export { createExtractionProvider, type LLMClientFactory } from './factory';
export { LocalHeuristicProvider, loadLexicon } from './local';
export {
  classifyProviderError,
  ModelExtractionProvider,
  type ModelProviderSettings,
  parseModelOutput,
  rejectEmptyPayload
} from './model';
export { OllamaExtractionProvider } from './ollama';
export { OpenAIExtractionProvider } from './openai';
