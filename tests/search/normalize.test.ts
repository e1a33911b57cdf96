import { describe, it, expect } from 'vitest';
import { foldCharacter, foldText, normalizeText } from '../../src/search/normalize.js';

// ── normalizeText ────────────────────────────────────────────────────────

describe('normalizeText', () => {
  it('lower-cases and trims', () => {
    expect(normalizeText('  Open Folder  ')).toBe('open folder');
  });

  it('strips diacritics from precomposed characters', () => {
    expect(normalizeText('Caf\u00e9 D\u00e9j\u00e0 Vu')).toBe('cafe deja vu');
  });

  it('strips combining marks from decomposed input', () => {
    expect(normalizeText('Ce\u0301line')).toBe('celine');
  });

  it('returns empty string for empty or whitespace-only input', () => {
    expect(normalizeText('')).toBe('');
    expect(normalizeText(' \t ')).toBe('');
  });

  it('keeps inner punctuation', () => {
    expect(normalizeText('Rename Tab\u2026')).toBe('rename tab\u2026');
  });
});

// ── foldCharacter ────────────────────────────────────────────────────────

describe('foldCharacter', () => {
  it('folds dotted capital I to plain i', () => {
    expect(foldCharacter('\u0130')).toBe('i');
  });

  it('returns empty string for a bare combining mark', () => {
    expect(foldCharacter('\u0301')).toBe('');
  });
});

// ── foldText ─────────────────────────────────────────────────────────────

describe('foldText', () => {
  it('tracks source offsets past trimmed whitespace', () => {
    expect(foldText('  Ab')).toEqual({ chars: ['a', 'b'], sourceOffsets: [2, 3] });
  });

  it('skips dropped combining marks in the offset map', () => {
    expect(foldText('e\u0301x')).toEqual({ chars: ['e', 'x'], sourceOffsets: [0, 2] });
  });

  it('counts astral codepoints as one offset', () => {
    expect(foldText('\u{1F680}go')).toEqual({
      chars: ['\u{1F680}', 'g', 'o'],
      sourceOffsets: [0, 1, 2],
    });
  });
});
