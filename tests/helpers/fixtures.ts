/**
 * Test Fixtures
 *
 * Shared test data for unit and integration tests.
 * Keep these minimal and focused on what each test category needs.
 */

import type { ProviderConfig } from '@/config/schema';

// ═══════════════════════════════════════════════════════════════════════════════
// Config Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

/** Valid minimal config: everything defaulted */
export const VALID_MINIMAL_CONFIG = {};

/** Hosted provider with its key */
export const VALID_OPENAI_CONFIG = {
  extraction: {
    provider: 'openai' as const,
    providers: {
      openai: { apiKey: 'test-secret' }
    }
  }
};

/**
 * Effective extraction settings for runner tests.
 * Delays are zero so retry tests run instantly.
 */
export function makeProviderConfig(overrides: Partial<ProviderConfig> = {}): ProviderConfig {
  return {
    provider: 'openai',
    allowFallback: false,
    contextWindowTokens: 1_000,
    segmentTokens: 1_000,
    timeoutMs: 1_000,
    maxRetries: 2,
    retryBaseDelayMs: 0,
    maxConcurrentCalls: 2,
    connection: { name: 'openai', model: 'gpt-4.1', apiKey: 'test-secret' },
    ...overrides
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Entry Texts
// ═══════════════════════════════════════════════════════════════════════════════

export const MEETING_TEXT = 'Alice met Bob in Paris.';

export const REVISIT_TEXT = 'Alice visited Paris again.';

// ═══════════════════════════════════════════════════════════════════════════════
// Raw Provider Output
// ═══════════════════════════════════════════════════════════════════════════════

/** Well-formed model output for MEETING_TEXT, keyed to `entryId` */
export function meetingOutput(entryId: string) {
  return {
    entities: [
      { name: 'Alice', kind: 'PERSON', summary: 'Met Bob' },
      { name: 'Bob', kind: 'PERSON' },
      { name: 'Paris', kind: 'LOCATION', summary: 'City in France' }
    ],
    relations: [
      { source: entryId, target: 'Alice', kind: 'MENTIONS' },
      { source: 'Alice', target: 'Bob', kind: 'MET', confidence: 0.8 },
      { source: 'Alice', target: 'Paris', kind: 'visited', confidence: 0.6 }
    ]
  };
}

/** Structurally wrong: entities is not an array */
export const MALFORMED_OUTPUT = { entities: 'Alice, Bob' };
