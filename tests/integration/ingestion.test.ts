/**
 * Ingestion Integration Tests
 *
 * Entry submission through background extraction to committed graph
 * state, against an in-memory graph.
 */

import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { ValidationError } from '@/core/errors';
import { OpenAIExtractionProvider } from '@/core/extraction/providers/openai';
import { QUEUE_FULL_DETAIL, SHUTDOWN_DETAIL } from '@/core/ingestion/service';
import { type EntryStatusUpdate, StoreError } from '@/providers/graph/types';
import { entityIdFor } from '@/providers/graph/utils';
import { MALFORMED_OUTPUT, MEETING_TEXT, REVISIT_TEXT } from '@tests/helpers/fixtures';
import { createHarness } from '@tests/helpers/harness';
import { createFakeLLMClient, createScriptedProvider } from '@tests/helpers/mocks';

const names = (entities: Array<{ name: string }>) => entities.map((entity) => entity.name);

const TRUNCATED_ANSWER = '{"entities":[{"name":"Alice","kind":"PERSON"},{"name":"Bob","ki';

function modelAnswering(answer: string): OpenAIExtractionProvider {
  return new OpenAIExtractionProvider(createFakeLLMClient([answer]), { maxConcurrentCalls: 1 });
}

describe('Entry ingestion', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('accepts an entry and extracts it in the background', async () => {
    const { graph, service, dispatcher, events } = createHarness();

    const accepted = await service.ingestEntry({ text: MEETING_TEXT });
    expect(accepted.status).toBe('pending');

    await dispatcher.drain();

    const entry = await service.getEntry(accepted.id);
    expect(entry).toMatchObject({
      name: 'Memory Entry',
      summary: null,
      text: MEETING_TEXT,
      status: 'succeeded',
      error: null,
      degraded: false
    });
    expect(names(graph.extractedEntities())).toEqual(['Alice', 'Bob', 'Paris']);
    expect(graph.allRelations().map((r) => [r.sourceId, r.kind])).toEqual([
      [accepted.id, 'MENTIONS'],
      [accepted.id, 'MENTIONS'],
      [accepted.id, 'MENTIONS']
    ]);
    expect(events.at(-1)).toMatchObject({
      type: 'committed',
      entitiesCreated: 3,
      entitiesMerged: 0,
      relationsCreated: 3,
      relationsMerged: 0
    });
  });

  test('uses the title and summary when given', async () => {
    const { service, dispatcher } = createHarness();

    const { id } = await service.ingestEntry({ text: MEETING_TEXT, title: ' Trip notes ', summary: '  ' });
    await dispatcher.drain();

    expect(await service.getEntry(id)).toMatchObject({ name: 'Trip notes', summary: null });
  });

  test('rejects whitespace-only text', async () => {
    const { service } = createHarness();

    await expect(service.ingestEntry({ text: '   ' })).rejects.toBeInstanceOf(ValidationError);
  });

  test('entities mentioned by two entries are stored once', async () => {
    const { graph, service, dispatcher } = createHarness();

    const first = await service.ingestEntry({ text: MEETING_TEXT });
    await dispatcher.drain();
    const second = await service.ingestEntry({ text: REVISIT_TEXT });
    await dispatcher.drain();

    expect(names(graph.extractedEntities())).toEqual(['Alice', 'Bob', 'Paris']);

    const paris = await service.getEntity(entityIdFor('LOCATION:paris'));
    expect(paris.sourceEntryIds).toEqual([first.id, second.id]);

    const mentions = graph
      .allRelations()
      .filter((relation) => relation.targetId === paris.id && relation.kind === 'MENTIONS');
    expect(mentions.map((relation) => relation.sourceId)).toEqual([first.id, second.id]);
    expect(graph.allRelations()).toHaveLength(5);
  });

  test('re-extracting an entry changes nothing', async () => {
    const { graph, service, dispatcher } = createHarness();

    const { id } = await service.ingestEntry({ text: MEETING_TEXT });
    await dispatcher.drain();
    const entities = graph.extractedEntities();
    const relations = graph.allRelations();

    dispatcher.enqueue(id);
    await dispatcher.drain();

    expect(graph.extractedEntities().map((e) => [e.id, e.sourceEntryIds])).toEqual(
      entities.map((e) => [e.id, e.sourceEntryIds])
    );
    expect(graph.allRelations()).toEqual(relations);
    expect((await service.getEntry(id)).status).toBe('succeeded');
  });

  describe('provider failure', () => {
    test('without fallback the entry fails and nothing is written', async () => {
      const provider = createScriptedProvider('openai', [{ output: MALFORMED_OUTPUT }]);
      const { graph, service, dispatcher } = createHarness({ provider, config: { allowFallback: false } });

      const { id } = await service.ingestEntry({ text: MEETING_TEXT });
      await dispatcher.drain();

      const entry = await service.getEntry(id);
      expect(entry.status).toBe('failed');
      expect(entry.error?.startsWith('INVALID_RESPONSE: ')).toBe(true);
      expect(graph.extractedEntities()).toEqual([]);
      expect(graph.allRelations()).toEqual([]);
    });

    test('with fallback the entry succeeds degraded', async () => {
      const provider = createScriptedProvider('openai', [{ output: MALFORMED_OUTPUT }]);
      const { graph, service, dispatcher } = createHarness({ provider, config: { allowFallback: true } });

      const { id } = await service.ingestEntry({ text: MEETING_TEXT });
      await dispatcher.drain();

      expect(await service.getEntry(id)).toMatchObject({ status: 'succeeded', degraded: true, error: null });
      expect(names(graph.extractedEntities())).toEqual(['Alice', 'Bob', 'Paris']);
    });
  });

  describe('unusable model answers', () => {
    test('an empty object fails the entry without fallback', async () => {
      const { graph, service, dispatcher } = createHarness({
        provider: modelAnswering('{}'),
        config: { allowFallback: false }
      });

      const { id } = await service.ingestEntry({ text: MEETING_TEXT });
      await dispatcher.drain();

      const entry = await service.getEntry(id);
      expect(entry).toMatchObject({ status: 'failed', degraded: false });
      expect(entry.error?.startsWith('INVALID_RESPONSE: Output does not match the extraction schema at entities')).toBe(
        true
      );
      expect(graph.extractedEntities()).toEqual([]);
    });

    test('empty lists fail the entry without fallback', async () => {
      const { graph, service, dispatcher } = createHarness({
        provider: modelAnswering('{"entities":[],"relations":[]}'),
        config: { allowFallback: false }
      });

      const { id } = await service.ingestEntry({ text: MEETING_TEXT });
      await dispatcher.drain();

      expect(await service.getEntry(id)).toMatchObject({
        status: 'failed',
        error: 'INVALID_RESPONSE: Provider returned an empty payload'
      });
      expect(graph.allRelations()).toEqual([]);
    });

    test('an empty object falls back to a degraded result', async () => {
      const { graph, service, dispatcher } = createHarness({
        provider: modelAnswering('{}'),
        config: { allowFallback: true }
      });

      const { id } = await service.ingestEntry({ text: MEETING_TEXT });
      await dispatcher.drain();

      expect(await service.getEntry(id)).toMatchObject({ status: 'succeeded', degraded: true, error: null });
      expect(names(graph.extractedEntities())).toEqual(['Alice', 'Bob', 'Paris']);
    });

    test('truncated JSON fails the entry without fallback and writes nothing', async () => {
      const { graph, service, dispatcher } = createHarness({
        provider: modelAnswering(TRUNCATED_ANSWER),
        config: { allowFallback: false }
      });

      const { id } = await service.ingestEntry({ text: MEETING_TEXT });
      await dispatcher.drain();

      expect(await service.getEntry(id)).toMatchObject({
        status: 'failed',
        error: `INVALID_RESPONSE: Model response is not valid JSON: ${TRUNCATED_ANSWER.slice(0, 80)}`
      });
      expect(graph.extractedEntities()).toEqual([]);
      expect(graph.allRelations()).toEqual([]);
    });

    test('truncated JSON falls back to a degraded result', async () => {
      const { graph, service, dispatcher } = createHarness({
        provider: modelAnswering(TRUNCATED_ANSWER),
        config: { allowFallback: true }
      });

      const { id } = await service.ingestEntry({ text: MEETING_TEXT });
      await dispatcher.drain();

      expect(await service.getEntry(id)).toMatchObject({ status: 'succeeded', degraded: true, error: null });
      expect(names(graph.extractedEntities())).toEqual(['Alice', 'Bob', 'Paris']);
    });
  });

  test('a failed running-status write fails the entry', async () => {
    const { graph, service, dispatcher, events } = createHarness();
    const updateEntryStatus = graph.updateEntryStatus.bind(graph);
    vi.spyOn(graph, 'updateEntryStatus').mockImplementation(async (id: string, update: EntryStatusUpdate) => {
      if (update.status === 'running') throw new StoreError('store down', 'UNAVAILABLE');
      return updateEntryStatus(id, update);
    });

    const { id } = await service.ingestEntry({ text: MEETING_TEXT });
    await dispatcher.drain();

    expect(await service.getEntry(id)).toMatchObject({ status: 'failed', error: 'STORE_UNAVAILABLE: store down' });
    expect(graph.extractedEntities()).toEqual([]);
    expect(events.at(-1)).toMatchObject({ type: 'failed', kind: 'STORE_UNAVAILABLE', stage: 'start' });
  });

  test('shutdown during the commit rolls the plan back', async () => {
    const { graph, service, dispatcher, events } = createHarness();
    const stopping: Array<Promise<string[]>> = [];
    graph.onWrite((operation) => {
      if (operation === 'createEntities') stopping.push(service.shutdown());
    });

    const { id } = await service.ingestEntry({ text: MEETING_TEXT });
    await dispatcher.drain();

    expect(await Promise.all(stopping)).toEqual([[]]);
    expect(await service.getEntry(id)).toMatchObject({
      status: 'failed',
      error: 'CANCELLED: Extraction cancelled during commit'
    });
    expect(graph.extractedEntities()).toEqual([]);
    expect(graph.allRelations()).toEqual([]);
    expect(events.at(-1)).toMatchObject({ type: 'failed', kind: 'CANCELLED', stage: 'commit' });
  });

  test('a store failure mid-commit leaves no partial graph', async () => {
    const { graph, service, dispatcher, events } = createHarness();
    // createEntities succeeds, createRelations fails
    graph.failOnWrite(2);

    const { id } = await service.ingestEntry({ text: MEETING_TEXT });
    await dispatcher.drain();

    expect(await service.getEntry(id)).toMatchObject({
      status: 'failed',
      error: 'STORE_UNAVAILABLE: createRelations rejected by store'
    });
    expect(graph.extractedEntities()).toEqual([]);
    expect(graph.allRelations()).toEqual([]);
    expect(events.at(-1)).toMatchObject({ type: 'failed', kind: 'STORE_UNAVAILABLE', stage: 'commit' });
  });

  test('shutdown cancels a running extraction', async () => {
    const provider = createScriptedProvider('openai', ['hang']);
    const { graph, service, dispatcher } = createHarness({ provider, config: { timeoutMs: 5_000 } });

    const { id } = await service.ingestEntry({ text: MEETING_TEXT });
    expect(await dispatcher.shutdown()).toEqual([]);

    expect(await service.getEntry(id)).toMatchObject({
      status: 'failed',
      error: 'CANCELLED: Extraction cancelled'
    });
    expect(graph.extractedEntities()).toEqual([]);
  });

  test('a full queue fails the entry but still answers pending', async () => {
    const provider = createScriptedProvider('openai', ['hang']);
    const { service, dispatcher } = createHarness({
      provider,
      config: { timeoutMs: 5_000 },
      dispatcher: { concurrency: 1, maxQueueSize: 1 }
    });

    await service.ingestEntry({ text: 'First entry.' });
    const queued = await service.ingestEntry({ text: 'Second entry.' });
    const rejected = await service.ingestEntry({ text: 'Third entry.' });

    expect(rejected.status).toBe('pending');
    expect(await service.getEntry(rejected.id)).toMatchObject({ status: 'failed', error: QUEUE_FULL_DETAIL });

    expect(await service.shutdown()).toEqual([queued.id]);
    expect(await service.getEntry(queued.id)).toMatchObject({ status: 'failed', error: SHUTDOWN_DETAIL });
  });
});
