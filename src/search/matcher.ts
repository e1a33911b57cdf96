/**
 * Token matcher: runs every ladder rung and keeps the best match.
 *
 * Rungs are independent; adding or reordering one only touches `LADDER`.
 */

import {
  matchExact,
  matchInitialism,
  matchPrefix,
  matchSubsequence,
  matchSubstring,
  matchWordExact,
  matchWordPrefix,
  type MatchFn,
} from './strategies.js';
import { matchStitched } from './stitched.js';
import type { PreparedText } from './tokenize.js';
import type { TokenMatch } from '../types/index.js';

export const LADDER: readonly MatchFn[] = [
  matchExact,
  matchPrefix,
  matchWordExact,
  matchWordPrefix,
  matchSubstring,
  matchInitialism,
  matchStitched,
  matchSubsequence,
];

/**
 * Best match of one normalized token against one prepared text,
 * or `null` when no rung applies.
 */
export function matchToken(token: string, target: PreparedText): TokenMatch | null {
  const tokenChars = Array.from(token);
  if (tokenChars.length === 0 || target.chars.length === 0) return null;

  let best: TokenMatch | null = null;
  for (const rung of LADDER) {
    const match = rung(tokenChars, target);
    if (match && (!best || match.score > best.score)) best = match;
  }
  return best;
}

/** Score-only view of {@link matchToken}. */
export function scoreToken(token: string, target: PreparedText): number | null {
  return matchToken(token, target)?.score ?? null;
}
