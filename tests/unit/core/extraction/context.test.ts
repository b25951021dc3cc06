/**
 * Context Assembler Tests
 */

import { describe, expect, test } from 'vitest';
import { assembleContext, estimateTokens, splitSentences } from '@/core/extraction/context';

const THREE_SENTENCES = 'Aaaa bbbb. Cccc dddd. Eeee ffff.';

describe('estimateTokens', () => {
  test('counts one token per four characters, rounding up', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('abcde')).toBe(2);
  });
});

describe('splitSentences', () => {
  test('splits on terminal punctuation', () => {
    expect(splitSentences('Alice met Bob. Then they left!  Done?')).toEqual([
      'Alice met Bob.',
      'Then they left!',
      'Done?'
    ]);
  });

  test('splits on blank lines and collapses whitespace', () => {
    expect(splitSentences('First   line\n\nSecond line')).toEqual(['First line', 'Second line']);
  });

  test('returns nothing for blank text', () => {
    expect(splitSentences('  \n ')).toEqual([]);
  });
});

describe('assembleContext', () => {
  test('keeps short text in a single segment', () => {
    expect(assembleContext('Alice met Bob in Paris.', { contextWindowTokens: 100, segmentTokens: 50 })).toEqual({
      segments: ['Alice met Bob in Paris.'],
      truncated: false
    });
  });

  test('packs whole sentences into segments', () => {
    const result = assembleContext(THREE_SENTENCES, { contextWindowTokens: 100, segmentTokens: 6 });

    expect(result).toEqual({
      segments: ['Aaaa bbbb. Cccc dddd.', 'Eeee ffff.'],
      truncated: false
    });
  });

  test('drops sentences past the context window and flags truncation', () => {
    const result = assembleContext(THREE_SENTENCES, { contextWindowTokens: 5, segmentTokens: 5 });

    expect(result).toEqual({ segments: ['Aaaa bbbb.', 'Cccc dddd.'], truncated: true });
  });

  test('cuts a single oversized sentence to the window', () => {
    const result = assembleContext('abcdefghijklmnopqrst', { contextWindowTokens: 3, segmentTokens: 3 });

    expect(result).toEqual({ segments: ['abcdefghijkl'], truncated: true });
  });

  test('hard-splits a sentence longer than a segment at spaces', () => {
    const result = assembleContext('one two three four', { contextWindowTokens: 100, segmentTokens: 2 });

    expect(result).toEqual({ segments: ['one two', 'three', 'four'], truncated: false });
  });

  test('returns no segments for empty text', () => {
    expect(assembleContext('', { contextWindowTokens: 100, segmentTokens: 50 })).toEqual({
      segments: [],
      truncated: false
    });
  });
});
