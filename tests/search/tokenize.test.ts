import { describe, it, expect } from 'vitest';
import {
  findWordSegments,
  isBoundaryCharacter,
  prepareText,
  tokenizeQuery,
} from '../../src/search/tokenize.js';

describe('tokenizeQuery', () => {
  it('splits on runs of whitespace', () => {
    expect(tokenizeQuery('  Open   Folder ')).toEqual(['open', 'folder']);
  });

  it('returns no tokens for a whitespace-only query', () => {
    expect(tokenizeQuery('   ')).toEqual([]);
  });

  it('keeps punctuation inside a token', () => {
    expect(tokenizeQuery('switcher-search :9222')).toEqual(['switcher-search', ':9222']);
  });
});

describe('isBoundaryCharacter', () => {
  it('accepts every boundary character', () => {
    for (const ch of [' ', '-', '_', '/', '.', ':']) {
      expect(isBoundaryCharacter(ch)).toBe(true);
    }
  });

  it('rejects letters, digits and undefined', () => {
    expect(isBoundaryCharacter('a')).toBe(false);
    expect(isBoundaryCharacter('7')).toBe(false);
    expect(isBoundaryCharacter(undefined)).toBe(false);
  });
});

describe('findWordSegments', () => {
  it('splits on mixed boundaries', () => {
    expect(findWordSegments(Array.from('new-window/tab'))).toEqual([
      { start: 0, end: 3 },
      { start: 4, end: 10 },
      { start: 11, end: 14 },
    ]);
  });

  it('skips leading and repeated boundaries', () => {
    expect(findWordSegments(Array.from('..a::bc'))).toEqual([
      { start: 2, end: 3 },
      { start: 5, end: 7 },
    ]);
  });

  it('returns nothing for boundary-only text', () => {
    expect(findWordSegments(Array.from('-/_'))).toEqual([]);
  });
});

describe('prepareText', () => {
  it('normalizes and segments a title', () => {
    const prepared = prepareText('Rename Tab\u2026');
    expect(prepared.text).toBe('rename tab\u2026');
    expect(prepared.segments).toEqual([
      { start: 0, end: 6 },
      { start: 7, end: 11 },
    ]);
  });
});
