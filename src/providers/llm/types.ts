import type { JSONObject } from '@ai-sdk/provider';
import type { ModelProviderName } from '@/config/schema';

export type { ModelProviderName };

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Options for LLM completion requests.
 * If not provided, provider uses the API's defaults.
 */
export interface CompletionOptions {
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** Sampling temperature (0-2 for most providers) */
  temperature?: number;
  /** Provider-specific options (e.g., keep_alive for Ollama) */
  options?: JSONObject;
  /** Aborts the request; the caller owns timeouts */
  abortSignal?: AbortSignal;
}

export interface LLMClient {
  /**
   * Generate a completion from the LLM.
   * Makes exactly one request: retries belong to the caller.
   * @returns The assistant's response content as a string
   */
  complete(messages: Message[], options?: CompletionOptions): Promise<string>;

  /** The provider serving the model. */
  readonly provider: ModelProviderName;

  /** The model identifier being used. */
  readonly modelId: string;
}
