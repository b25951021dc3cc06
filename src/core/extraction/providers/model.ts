/**
 * Model-Backed Provider
 *
 * Shared machinery for the network providers: prompt, bounded concurrency,
 * JSON extraction and error classification. Subclasses only decide which
 * provider-specific options go with the request.
 */

import { APICallError, LoadAPIKeyError } from '@ai-sdk/provider';
import pLimit, { type LimitFunction } from 'p-limit';
import { z } from 'zod';
import { extractJSON } from '@/providers/llm/json';
import type { CompletionOptions, LLMClient } from '@/providers/llm/types';
import { ProviderError } from '../errors';
import type { ExtractionProvider, ExtractionRequest } from '../types';
import { buildExtractionMessages } from './prompt';

export interface ModelProviderSettings {
  /** Calls in flight at once against this provider */
  maxConcurrentCalls: number;
  maxTokens?: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Error Classification
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map an AI SDK (or fetch) failure to a ProviderError kind.
 */
export function classifyProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;

  const cause = error instanceof Error ? error : undefined;
  const message = error instanceof Error ? error.message : String(error);

  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    if (status === 401 || status === 403) {
      return new ProviderError(`Authentication rejected (${status})`, 'AUTH_FAILURE', cause);
    }
    if (status === 429) {
      return new ProviderError('Rate limited by provider', 'RATE_LIMITED', cause);
    }
    return new ProviderError(
      status === undefined ? message : `Provider returned ${status}: ${message}`,
      'NETWORK_ERROR',
      cause
    );
  }

  if (LoadAPIKeyError.isInstance(error)) {
    return new ProviderError(message, 'AUTH_FAILURE', cause);
  }

  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return new ProviderError('Provider call timed out', 'TIMEOUT', cause);
  }

  return new ProviderError(message, 'NETWORK_ERROR', cause);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Response Parsing
// ═══════════════════════════════════════════════════════════════════════════════

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Parse model text into a JSON value.
 * Fences and surrounding prose are stripped. Truncated output does not
 * parse and is rejected.
 */
export function parseModelOutput(text: string): unknown {
  const candidate = extractJSON(text);

  const parsed = tryParse(candidate);
  if (parsed.ok) return parsed.value;

  throw new ProviderError(
    `Model response is not valid JSON: ${candidate.slice(0, 80)}`,
    'INVALID_RESPONSE'
  );
}

const EmptyPayloadSchema = z.object({
  entities: z.array(z.unknown()).length(0),
  relations: z.array(z.unknown()).length(0)
});

/**
 * Model output with both lists empty is INVALID_RESPONSE. The local
 * heuristic may still legitimately find nothing.
 */
export function rejectEmptyPayload(output: unknown): unknown {
  if (EmptyPayloadSchema.safeParse(output).success) {
    throw new ProviderError('Provider returned an empty payload', 'INVALID_RESPONSE');
  }
  return output;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Provider
// ═══════════════════════════════════════════════════════════════════════════════

export class ModelExtractionProvider implements ExtractionProvider {
  private readonly limit: LimitFunction;

  constructor(
    readonly name: string,
    protected readonly llm: LLMClient,
    protected readonly settings: ModelProviderSettings
  ) {
    this.limit = pLimit(settings.maxConcurrentCalls);
  }

  /** Provider-specific request options. */
  protected completionOptions(_request: ExtractionRequest): CompletionOptions {
    return { temperature: 0, maxTokens: this.settings.maxTokens };
  }

  async extract(request: ExtractionRequest, signal: AbortSignal): Promise<unknown> {
    const text = await this.limit(async () => {
      // The call may have waited in the limiter past its deadline
      signal.throwIfAborted();
      try {
        return await this.llm.complete(buildExtractionMessages(request), {
          ...this.completionOptions(request),
          abortSignal: signal
        });
      } catch (error) {
        throw classifyProviderError(error);
      }
    });

    return rejectEmptyPayload(parseModelOutput(text));
  }
}
