/**
 * JSON Extraction Tests
 */

import { describe, expect, test } from 'vitest';
import { extractJSON } from '@/providers/llm/json';

describe('extractJSON', () => {
  test('unwraps a fenced block', () => {
    expect(extractJSON('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  test('unwraps a bare fence', () => {
    expect(extractJSON('```\n{"a":1}\n```')).toBe('{"a":1}');
  });

  test('finds an object embedded in prose', () => {
    expect(extractJSON('Here you go: {"a":{"b":2}} thanks')).toBe('{"a":{"b":2}}');
  });

  test('ignores braces inside strings', () => {
    expect(extractJSON('{"a":"}"} trailing')).toBe('{"a":"}"}');
  });

  test('returns a truncated object from its opening brace', () => {
    expect(extractJSON('Sure {"entities":[{"name":"A"},{"na')).toBe('{"entities":[{"name":"A"},{"na');
  });

  test('returns trimmed text when there is no object', () => {
    expect(extractJSON('  hello ')).toBe('hello');
  });
});
