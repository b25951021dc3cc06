import { z } from 'zod';

// Provider types
export const extractionProviders = ['local', 'ollama', 'openai', 'anthropic'] as const;
export type ExtractionProviderName = (typeof extractionProviders)[number];

export const modelProviders = ['ollama', 'openai', 'anthropic'] as const;
export type ModelProviderName = (typeof modelProviders)[number];

const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434/v1';

/**
 * `{env:VAR}` placeholders for unset variables resolve to "".
 * Treat those as absent so defaults apply.
 */
function optionalString<T extends z.ZodType>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema.optional());
}

// Per-provider overrides of the extraction-wide limits
const providerLimitsSchema = z.object({
  timeoutMs: z.number().int().positive().optional(),
  maxRetries: z.number().int().min(0).optional()
});

const ollamaSchema = providerLimitsSchema.extend({
  baseUrl: optionalString(z.url()),
  model: z.string().min(1).default('gpt-oss:20b'),
  keepAlive: z.string().min(1).default('5m')
});

const hostedSchema = providerLimitsSchema.extend({
  apiKey: optionalString(z.string()),
  baseUrl: optionalString(z.url()),
  model: z.string().min(1)
});

// Extraction section
const extractionSchema = z
  .object({
    provider: z.enum(extractionProviders).default('local'),
    allowFallback: z.boolean().default(false),
    contextWindowTokens: z.number().int().positive().default(128_000),
    segmentTokens: z.number().int().positive().default(4_000),
    timeoutMs: z.number().int().positive().default(60_000),
    maxRetries: z.number().int().min(0).default(2),
    retryBaseDelayMs: z.number().int().min(0).default(500),
    maxConcurrentCalls: z.number().int().positive().default(4),
    providers: z
      .object({
        ollama: ollamaSchema.optional(),
        openai: hostedSchema.extend({ model: z.string().min(1).default('gpt-4.1') }).optional(),
        anthropic: hostedSchema
          .extend({ model: z.string().min(1).default('claude-3-opus-20240229') })
          .optional()
      })
      .prefault({})
  })
  .superRefine((data, ctx) => {
    switch (data.provider) {
      case 'openai':
      case 'anthropic':
        if (!data.providers[data.provider]?.apiKey)
          ctx.addIssue({
            code: 'custom',
            path: ['providers', data.provider, 'apiKey'],
            message: `apiKey required for provider '${data.provider}'`
          });
        break;
      case 'local':
      case 'ollama':
        break;
    }
    if (data.segmentTokens > data.contextWindowTokens) {
      ctx.addIssue({
        code: 'custom',
        path: ['segmentTokens'],
        message: 'segmentTokens must not exceed contextWindowTokens'
      });
    }
  });

// Config schema
export const configSchema = z
  .object({
    $schema: z.string().optional(),

    server: z
      .object({
        port: z.number().int().min(1).max(65535).default(6366)
      })
      .optional(),

    graph: z
      .object({
        uri: optionalString(z.string().min(1)),
        user: optionalString(z.string()),
        password: optionalString(z.string()),
        database: optionalString(z.string().min(1)),
        timeoutMs: z.number().int().positive().default(15_000)
      })
      .optional(),

    extraction: extractionSchema.prefault({}),

    dispatcher: z
      .object({
        concurrency: z.number().int().positive().default(2),
        maxQueueSize: z.number().int().positive().default(100)
      })
      .prefault({})
  })
  .transform((data) => {
    // Apply server and graph defaults
    const server = {
      port: data.server?.port ?? 6366
    };

    const graph = {
      uri: data.graph?.uri ?? 'bolt://localhost:7687',
      user: data.graph?.user ?? 'neo4j',
      password: data.graph?.password ?? 'neo4j',
      database: data.graph?.database ?? 'neo4j',
      timeoutMs: data.graph?.timeoutMs ?? 15_000
    };

    return { ...data, server, graph, provider: resolveProviderConfig(data.extraction) };
  });

type ExtractionSection = z.output<typeof extractionSchema>;

/**
 * Connection settings of the active model provider.
 */
export interface ModelConnection {
  name: ModelProviderName;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  /** Ollama only */
  keepAlive?: string;
}

/**
 * Effective extraction settings for the process lifetime.
 * Per-provider overrides are already folded in.
 */
export interface ProviderConfig {
  provider: ExtractionProviderName;
  allowFallback: boolean;
  contextWindowTokens: number;
  segmentTokens: number;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  maxConcurrentCalls: number;
  /** Null for the local heuristic */
  connection: ModelConnection | null;
}

function resolveProviderConfig(extraction: ExtractionSection): ProviderConfig {
  const { providers, ...limits } = extraction;
  const base = {
    provider: limits.provider,
    allowFallback: limits.allowFallback,
    contextWindowTokens: limits.contextWindowTokens,
    segmentTokens: limits.segmentTokens,
    retryBaseDelayMs: limits.retryBaseDelayMs,
    maxConcurrentCalls: limits.maxConcurrentCalls
  };

  switch (limits.provider) {
    case 'local':
      return {
        ...base,
        timeoutMs: limits.timeoutMs,
        maxRetries: limits.maxRetries,
        connection: null
      };

    case 'ollama': {
      const ollama = providers.ollama;
      return {
        ...base,
        // A local model server is slow to load; allow it more time by default
        timeoutMs: ollama?.timeoutMs ?? Math.max(limits.timeoutMs, 150_000),
        maxRetries: ollama?.maxRetries ?? limits.maxRetries,
        connection: {
          name: 'ollama',
          model: ollama?.model ?? 'gpt-oss:20b',
          baseUrl: ollama?.baseUrl ?? DEFAULT_OLLAMA_BASE_URL,
          keepAlive: ollama?.keepAlive ?? '5m'
        }
      };
    }

    case 'openai':
    case 'anthropic': {
      const hosted = providers[limits.provider];
      return {
        ...base,
        timeoutMs: hosted?.timeoutMs ?? limits.timeoutMs,
        maxRetries: hosted?.maxRetries ?? limits.maxRetries,
        connection: {
          name: limits.provider,
          model: hosted?.model ?? (limits.provider === 'openai' ? 'gpt-4.1' : 'claude-3-opus-20240229'),
          apiKey: hosted?.apiKey,
          baseUrl: hosted?.baseUrl
        }
      };
    }

    default: {
      const _exhaustive: never = limits.provider;
      throw new Error(`Unknown provider: ${_exhaustive}`);
    }
  }
}

export type Config = z.infer<typeof configSchema>;
