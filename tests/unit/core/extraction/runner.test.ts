/**
 * Extraction Runner Tests
 *
 * Timeout, retry, fallback and cancellation policy, driven by scripted
 * providers.
 */

import { describe, expect, test } from 'vitest';
import { ExtractionError, ProviderError } from '@/core/extraction/errors';
import { ObserverRegistry, type PipelineEvent } from '@/core/extraction/observers';
import { ExtractionRunner } from '@/core/extraction/runner';
import type { ExtractionProvider } from '@/core/extraction/types';
import { MALFORMED_OUTPUT, MEETING_TEXT, makeProviderConfig, meetingOutput } from '@tests/helpers/fixtures';
import { createScriptedProvider } from '@tests/helpers/mocks';

const ENTRY_ID = 'e1';

function setup(provider: ExtractionProvider, overrides: Parameters<typeof makeProviderConfig>[0] = {}) {
  const events: PipelineEvent[] = [];
  const observers = new ObserverRegistry([{ name: 'recorder', onEvent: (event) => void events.push(event) }]);
  const runner = new ExtractionRunner({ config: makeProviderConfig(overrides), provider, observers });
  return { runner, events };
}

async function failureOf(promise: Promise<unknown>): Promise<ExtractionError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ExtractionError) return error;
    throw error;
  }
  throw new Error('Expected an ExtractionError');
}

describe('ExtractionRunner', () => {
  describe('success', () => {
    test('returns validated candidates and metadata', async () => {
      const provider = createScriptedProvider('primary', [{ output: meetingOutput(ENTRY_ID) }]);
      const { runner } = setup(provider);

      const result = await runner.run({ entryId: ENTRY_ID, text: MEETING_TEXT });

      expect(result.entryId).toBe(ENTRY_ID);
      expect(result.entities.map((e) => e.identityKey)).toEqual(['PERSON:alice', 'PERSON:bob', 'LOCATION:paris']);
      expect(result.relations).toHaveLength(5);
      expect(result.metadata).toMatchObject({
        provider: 'primary',
        truncated: false,
        degraded: false,
        attempts: 1,
        segments: 1
      });
      expect(provider.calls[0]).toEqual({
        entryId: ENTRY_ID,
        text: MEETING_TEXT,
        truncated: false,
        contextWindowTokens: 1_000
      });
    });

    test('calls the provider once per segment', async () => {
      const provider = createScriptedProvider('primary', [{ output: { entities: [], relations: [] } }]);
      const { runner } = setup(provider, { segmentTokens: 3 });

      const result = await runner.run({ entryId: ENTRY_ID, text: 'Aaaa bbbb. Cccc dddd. Eeee ffff.' });

      expect(provider.calls.map((call) => call.text)).toEqual(['Aaaa bbbb.', 'Cccc dddd.', 'Eeee ffff.']);
      expect(result.metadata.segments).toBe(3);
    });

    test('makes no calls for empty text', async () => {
      const provider = createScriptedProvider('primary', [{ output: { entities: [], relations: [] } }]);
      const { runner } = setup(provider);

      const result = await runner.run({ entryId: ENTRY_ID, text: '' });

      expect(provider.calls).toHaveLength(0);
      expect(result.entities).toEqual([]);
      expect(result.metadata.attempts).toBe(0);
    });

    test('emits started, provider_called and succeeded', async () => {
      const provider = createScriptedProvider('primary', [{ output: meetingOutput(ENTRY_ID) }]);
      const { runner, events } = setup(provider);

      await runner.run({ entryId: ENTRY_ID, text: MEETING_TEXT });

      expect(events.map((event) => event.type)).toEqual(['started', 'provider_called', 'succeeded']);
      expect(events[2]).toMatchObject({ provider: 'primary', degraded: false, entities: 3, relations: 5 });
    });
  });

  describe('retry', () => {
    test('retries a retryable failure and succeeds', async () => {
      const provider = createScriptedProvider('primary', [
        { error: new ProviderError('connection reset', 'NETWORK_ERROR') },
        { output: meetingOutput(ENTRY_ID) }
      ]);
      const { runner, events } = setup(provider);

      const result = await runner.run({ entryId: ENTRY_ID, text: MEETING_TEXT });

      expect(provider.calls).toHaveLength(2);
      expect(result.metadata.attempts).toBe(2);
      expect(events.filter((e) => e.type === 'provider_called').map((e) => ('attempt' in e ? e.attempt : 0))).toEqual([
        1, 2
      ]);
    });

    test('gives up after maxRetries timeouts', async () => {
      const provider = createScriptedProvider('primary', ['hang']);
      const { runner } = setup(provider, { timeoutMs: 20, maxRetries: 2 });

      const error = await failureOf(runner.run({ entryId: ENTRY_ID, text: MEETING_TEXT }));

      expect(error.kind).toBe('TIMEOUT');
      expect(error.message).toBe('primary did not answer within 20ms');
      expect(provider.calls).toHaveLength(3);
      expect(provider.signals.every((signal) => signal.aborted)).toBe(true);
    });

    test('does not retry authentication failures', async () => {
      const provider = createScriptedProvider('primary', [{ error: new ProviderError('bad key', 'AUTH_FAILURE') }]);
      const { runner } = setup(provider);

      const error = await failureOf(runner.run({ entryId: ENTRY_ID, text: MEETING_TEXT }));

      expect(error.kind).toBe('AUTH_FAILURE');
      expect(provider.calls).toHaveLength(1);
    });

    test('does not retry invalid output', async () => {
      const provider = createScriptedProvider('primary', [{ output: MALFORMED_OUTPUT }]);
      const { runner, events } = setup(provider);

      const error = await failureOf(runner.run({ entryId: ENTRY_ID, text: MEETING_TEXT }));

      expect(error.kind).toBe('INVALID_RESPONSE');
      expect(provider.calls).toHaveLength(1);
      expect(events.at(-1)).toMatchObject({ type: 'failed', kind: 'INVALID_RESPONSE', stage: 'extraction' });
    });

    test('maps unexpected provider exceptions to NETWORK_ERROR', async () => {
      const provider = createScriptedProvider('primary', [{ error: new Error('socket hang up') }]);
      const { runner } = setup(provider, { maxRetries: 0 });

      const error = await failureOf(runner.run({ entryId: ENTRY_ID, text: MEETING_TEXT }));

      expect(error.kind).toBe('NETWORK_ERROR');
      expect(error.message).toBe('socket hang up');
    });
  });

  describe('fallback', () => {
    test('falls back to the local heuristic when allowed', async () => {
      const provider = createScriptedProvider('primary', [{ output: MALFORMED_OUTPUT }]);
      const { runner, events } = setup(provider, { allowFallback: true });

      const result = await runner.run({ entryId: ENTRY_ID, text: MEETING_TEXT });

      expect(result.metadata).toMatchObject({ provider: 'local', degraded: true, attempts: 2 });
      expect(result.entities.map((e) => e.identityKey)).toEqual(['PERSON:alice', 'PERSON:bob', 'LOCATION:paris']);
      expect(events.map((event) => event.type)).toEqual([
        'started',
        'provider_called',
        'fell_back',
        'provider_called',
        'succeeded'
      ]);
      expect(events[2]).toMatchObject({ from: 'primary', reason: 'INVALID_RESPONSE' });
    });

    test('falls back after retries are exhausted', async () => {
      const provider = createScriptedProvider('primary', [{ error: new ProviderError('slow down', 'RATE_LIMITED') }]);
      const { runner } = setup(provider, { allowFallback: true, maxRetries: 1 });

      const result = await runner.run({ entryId: ENTRY_ID, text: MEETING_TEXT });

      expect(provider.calls).toHaveLength(2);
      expect(result.metadata).toMatchObject({ degraded: true, attempts: 3 });
    });

    test('discards partial output from earlier segments', async () => {
      let call = 0;
      const first = { entities: [{ name: 'Zed', kind: 'PERSON' }], relations: [] };
      const provider = createScriptedProvider('primary', () =>
        call++ === 0 ? { output: first } : { output: MALFORMED_OUTPUT }
      );
      const { runner } = setup(provider, { allowFallback: true, segmentTokens: 3 });

      const result = await runner.run({ entryId: ENTRY_ID, text: 'Aaaa bbbb. Cccc dddd.' });

      expect(result.entities.map((e) => e.name)).toEqual(['Aaaa', 'Cccc']);
    });

    test('never falls back from the local provider to itself', async () => {
      const provider = createScriptedProvider('local', [{ output: MALFORMED_OUTPUT }]);
      const { runner } = setup(provider, { allowFallback: true });

      const error = await failureOf(runner.run({ entryId: ENTRY_ID, text: MEETING_TEXT }));

      expect(error.kind).toBe('INVALID_RESPONSE');
    });
  });

  describe('cancellation', () => {
    test('an aborted signal fails the run without calling the provider', async () => {
      const provider = createScriptedProvider('primary', [{ output: meetingOutput(ENTRY_ID) }]);
      const { runner } = setup(provider, { allowFallback: true });
      const controller = new AbortController();
      controller.abort();

      const error = await failureOf(runner.run({ entryId: ENTRY_ID, text: MEETING_TEXT }, controller.signal));

      expect(error.kind).toBe('CANCELLED');
      expect(provider.calls).toHaveLength(0);
    });

    test('aborting mid-call cancels instead of falling back', async () => {
      const provider = createScriptedProvider('primary', ['hang']);
      const { runner, events } = setup(provider, { allowFallback: true, timeoutMs: 5_000 });
      const controller = new AbortController();

      const pending = failureOf(runner.run({ entryId: ENTRY_ID, text: MEETING_TEXT }, controller.signal));
      setTimeout(() => controller.abort(), 10);
      const error = await pending;

      expect(error.kind).toBe('CANCELLED');
      expect(provider.calls).toHaveLength(1);
      expect(events.some((event) => event.type === 'fell_back')).toBe(false);
    });
  });
});
