/**
 * The token-matching strategy ladder.
 *
 * Each strategy scores one normalized query token against one prepared
 * candidate text and returns `null` when it does not apply. Every strategy
 * owns a score band and clamps its penalties inside that band, so taking the
 * maximum over all of them always prefers, for comparable inputs:
 *
 *   exact > whole prefix > word exact > word prefix > substring at a
 *   boundary > substring mid-word > initialism > stitched >= subsequence
 *
 * Absolute values are tuning, not contract.
 */

import { isBoundaryCharacter, type PreparedText } from './tokenize.js';
import type { MatchStrategy, TokenMatch, WordSegment } from '../types/index.js';

// ── Score bands ─────────────────────────────────────────────────────────────

const EXACT_SCORE = 8000;
const PREFIX_BASE = 6800;
const WORD_EXACT_BASE = 6200;
const WORD_PREFIX_BASE = 5600;
const SUBSTRING_BASE = 4200;
const INITIALISM_BASE = 3000;

/** Largest penalty a banded strategy may take; keeps bands from overlapping. */
const MAX_BAND_PENALTY = 399;

/** Offset of a word from the start of the text, per character. */
const WORD_DISTANCE_PENALTY = 8;

const SUBSTRING_START_BONUS = 220;
const SUBSTRING_BOUNDARY_BONUS = 180;
const SUBSTRING_DISTANCE_PENALTY = 9;

const INITIALISM_CHAR_REWARD = 160;
/** Initialism rewards stop growing here so long initialisms stay below substrings. */
const INITIALISM_MAX_REWARDED_CHARS = 4;
const INITIALISM_LEADING_SKIP_PENALTY = 5;
const INITIALISM_SKIPPED_WORD_PENALTY = 30;

const SUBSEQUENCE_BASE = 800;
const SUBSEQUENCE_CEILING = 1499;
const SUBSEQUENCE_MAX_TOKEN = 3;
const SUBSEQUENCE_CHAR_REWARD = 90;
const SUBSEQUENCE_BOUNDARY_BONUS = 140;
const SUBSEQUENCE_RUN_STEP = 40;
const SUBSEQUENCE_RUN_CAP = 200;
const SUBSEQUENCE_GAP_PENALTY = 6;
const SUBSEQUENCE_EXCESS_CAP = 200;

/** A pure ladder rung. */
export type MatchFn = (token: readonly string[], target: PreparedText) => TokenMatch | null;

// ── Helpers ─────────────────────────────────────────────────────────────────

export function range(start: number, end: number): number[] {
  const out: number[] = [];
  for (let i = start; i < end; i++) out.push(i);
  return out;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * True when `needle[needleStart, needleStart + length)` equals
 * `haystack[haystackStart, haystackStart + length)`.
 */
export function matchesAt(
  haystack: readonly string[],
  haystackStart: number,
  needle: readonly string[],
  needleStart = 0,
  length = needle.length - needleStart,
): boolean {
  if (haystackStart < 0 || haystackStart + length > haystack.length) return false;
  for (let i = 0; i < length; i++) {
    if (haystack[haystackStart + i] !== needle[needleStart + i]) return false;
  }
  return true;
}

/** First offset at or after `from` where `needle` occurs in `haystack`, or -1. */
export function indexOfChars(
  haystack: readonly string[],
  needle: readonly string[],
  from = 0,
): number {
  for (let i = from; i + needle.length <= haystack.length; i++) {
    if (matchesAt(haystack, i, needle)) return i;
  }
  return -1;
}

function banded(base: number, penalty: number): number {
  return base - Math.min(penalty, MAX_BAND_PENALTY);
}

function segmentIndexAt(segments: readonly WordSegment[], position: number): number {
  return segments.findIndex((s) => position >= s.start && position < s.end);
}

// ── Strategies ──────────────────────────────────────────────────────────────

export const matchExact: MatchFn = (token, target) => {
  if (token.length !== target.chars.length) return null;
  if (!matchesAt(target.chars, 0, token)) return null;
  return { strategy: 'exact', score: EXACT_SCORE, positions: range(0, token.length) };
};

/** The whole text starts with the token; shorter remainders score higher. */
export const matchPrefix: MatchFn = (token, target) => {
  const excess = target.chars.length - token.length;
  if (excess <= 0 || !matchesAt(target.chars, 0, token)) return null;
  return {
    strategy: 'prefix',
    score: banded(PREFIX_BASE, excess),
    positions: range(0, token.length),
  };
};

function matchWord(
  token: readonly string[],
  target: PreparedText,
  wholeWord: boolean,
): TokenMatch | null {
  const strategy: MatchStrategy = wholeWord ? 'word-exact' : 'word-prefix';
  const base = wholeWord ? WORD_EXACT_BASE : WORD_PREFIX_BASE;
  let best: TokenMatch | null = null;

  for (const segment of target.segments) {
    const length = segment.end - segment.start;
    if (wholeWord ? token.length !== length : token.length >= length) continue;
    if (!matchesAt(target.chars, segment.start, token)) continue;

    const matchEnd = segment.start + token.length;
    const trailing = target.chars.length - matchEnd;
    const score = banded(base, segment.start * WORD_DISTANCE_PENALTY + trailing);
    if (!best || score > best.score) {
      best = { strategy, score, positions: range(segment.start, matchEnd) };
    }
  }

  return best;
}

/** The token equals one whole word segment. */
export const matchWordExact: MatchFn = (token, target) => matchWord(token, target, true);

/** The token is a proper prefix of a word segment. */
export const matchWordPrefix: MatchFn = (token, target) => matchWord(token, target, false);

/** First occurrence anywhere, with a bonus at the start or after a boundary. */
export const matchSubstring: MatchFn = (token, target) => {
  const at = indexOfChars(target.chars, token);
  if (at < 0) return null;

  let bonus = 0;
  if (at === 0) bonus = SUBSTRING_START_BONUS;
  else if (isBoundaryCharacter(target.chars[at - 1])) bonus = SUBSTRING_BOUNDARY_BONUS;

  const excess = target.chars.length - token.length;
  return {
    strategy: 'substring',
    score: banded(SUBSTRING_BASE + bonus, at * SUBSTRING_DISTANCE_PENALTY + excess),
    positions: range(at, at + token.length),
  };
};

/** Token characters matched, in order, to the first character of words. */
export const matchInitialism: MatchFn = (token, target) => {
  const { segments, chars } = target;
  if (token.length === 0 || token.length > segments.length) return null;

  const matched: number[] = [];
  let next = 0;
  for (const ch of token) {
    while (next < segments.length && chars[segments[next].start] !== ch) next++;
    if (next === segments.length) return null;
    matched.push(next);
    next++;
  }

  const first = matched[0];
  const last = matched[matched.length - 1];
  const skipped = last - first + 1 - token.length;
  const reward =
    INITIALISM_CHAR_REWARD * Math.min(token.length, INITIALISM_MAX_REWARDED_CHARS);

  return {
    strategy: 'initialism',
    score: banded(
      INITIALISM_BASE + reward,
      first * INITIALISM_LEADING_SKIP_PENALTY + skipped * INITIALISM_SKIPPED_WORD_PENALTY,
    ),
    positions: matched.map((i) => segments[i].start),
  };
};

/**
 * Short tokens (2-3 characters) as an ordered, gapped subsequence that
 * spans at least two word segments. A scatter inside a single word is
 * noise for queries this short.
 */
export const matchSubsequence: MatchFn = (token, target) => {
  const { chars, segments } = target;
  if (token.length < 2 || token.length > SUBSEQUENCE_MAX_TOKEN) return null;

  const positions: number[] = [];
  let from = 0;
  for (const ch of token) {
    const at = chars.indexOf(ch, from);
    if (at < 0) return null;
    positions.push(at);
    from = at + 1;
  }

  // Leftmost placement kept every character in one word: the last character
  // has to move past that word for the match to span two segments.
  const firstSegment = segmentIndexAt(segments, positions[0]);
  const lastIndex = positions.length - 1;
  if (
    firstSegment >= 0 &&
    positions.every((p) => segmentIndexAt(segments, p) === firstSegment)
  ) {
    const moved = chars.indexOf(token[lastIndex], segments[firstSegment].end);
    if (moved < 0) return null;
    positions[lastIndex] = moved;
  }

  let score = SUBSEQUENCE_BASE;
  let runLength = 0;
  let runBonus = 0;

  positions.forEach((pos, i) => {
    score += SUBSEQUENCE_CHAR_REWARD;
    if (pos === 0 || isBoundaryCharacter(chars[pos - 1])) {
      score += SUBSEQUENCE_BOUNDARY_BONUS;
    }
    if (i === 0) return;

    const previous = positions[i - 1];
    if (pos === previous + 1) {
      runLength++;
      const step = Math.min(SUBSEQUENCE_RUN_STEP * runLength, SUBSEQUENCE_RUN_CAP - runBonus);
      runBonus += step;
      score += step;
    } else {
      runLength = 0;
      runBonus = 0;
      score -= (pos - previous - 1) * SUBSEQUENCE_GAP_PENALTY;
    }
  });

  score -= Math.min(chars.length - token.length, SUBSEQUENCE_EXCESS_CAP);

  return {
    strategy: 'subsequence',
    score: clamp(score, 1, SUBSEQUENCE_CEILING),
    positions,
  };
};
