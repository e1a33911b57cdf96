/**
 * Query tokens and candidate word segments.
 *
 * A query splits on whitespace only, so a token may itself contain
 * punctuation (`switcher-search`). Candidate text splits into word segments
 * on whitespace and the boundary characters `-`, `_`, `/`, `.` and `:`.
 */

import { foldText, normalizeText } from './normalize.js';
import type { WordSegment } from '../types/index.js';

const BOUNDARY_CHARACTERS = new Set(['-', '_', '/', '.', ':']);

const WHITESPACE = /\s/;

/** Normalized candidate text, ready for the token matcher. */
export interface PreparedText {
  text: string;
  chars: string[];
  segments: WordSegment[];
  /** Codepoint offset of each character in the original string. */
  sourceOffsets: number[];
}

/** True for characters that separate word segments. */
export function isBoundaryCharacter(ch: string | undefined): boolean {
  if (ch === undefined) return false;
  return BOUNDARY_CHARACTERS.has(ch) || WHITESPACE.test(ch);
}

/** Split a raw query into normalized, whitespace-separated tokens. */
export function tokenizeQuery(query: string): string[] {
  const normalized = normalizeText(query);
  if (!normalized) return [];
  return normalized.split(/\s+/).filter((t) => t.length > 0);
}

/** Maximal runs of non-boundary characters, as half-open ranges. */
export function findWordSegments(chars: readonly string[]): WordSegment[] {
  const segments: WordSegment[] = [];
  let start = -1;

  for (let i = 0; i < chars.length; i++) {
    if (isBoundaryCharacter(chars[i])) {
      if (start >= 0) {
        segments.push({ start, end: i });
        start = -1;
      }
    } else if (start < 0) {
      start = i;
    }
  }

  if (start >= 0) segments.push({ start, end: chars.length });
  return segments;
}

/** Normalize a candidate field and compute its word segments. */
export function prepareText(raw: string): PreparedText {
  const { chars, sourceOffsets } = foldText(raw);
  return {
    text: chars.join(''),
    chars,
    segments: findWordSegments(chars),
    sourceOffsets,
  };
}
