import { describe, test, expect } from 'vitest';
import { z } from 'zod';
import { isChunkLoadFailure, normalizeErrorMessage } from '../utils/errors';

describe('normalizeErrorMessage', () => {
  test('plain Error keeps its message', () => {
    expect(normalizeErrorMessage(new Error('boom'))).toBe('boom');
  });

  test('named errors are prefixed', () => {
    expect(normalizeErrorMessage(new TypeError('x is undefined'))).toBe('TypeError: x is undefined');
  });

  test('failed dynamic imports get a readable line', () => {
    const err = new TypeError('Failed to fetch dynamically imported module: http://localhost/src/Chained.tsx');
    expect(normalizeErrorMessage(err)).toBe('Example failed to load. Check your connection and reload.');
  });

  test('zod errors list their issues', () => {
    const parsed = z.object({ n: z.number() }).safeParse({ n: 'a' });
    if (parsed.success) throw new Error('expected a parse failure');
    expect(normalizeErrorMessage(parsed.error)).toBe('Invalid value — n: Expected number, received string');
  });

  test('error-like objects and empty values', () => {
    expect(normalizeErrorMessage({ message: 'plain' })).toBe('plain');
    expect(normalizeErrorMessage('  ')).toBe('Unknown error');
    expect(normalizeErrorMessage(null)).toBe('Unknown error');
    expect(normalizeErrorMessage(42)).toBe('42');
  });
});

describe('isChunkLoadFailure', () => {
  test('recognises the common bundler phrasings', () => {
    expect(isChunkLoadFailure('Loading chunk 42 failed.')).toBe(true);
    expect(isChunkLoadFailure('Importing a module script failed.')).toBe(true);
    expect(isChunkLoadFailure('Cannot read properties of undefined')).toBe(false);
  });
});
