/**
 * Candidate aggregation: AND across query tokens, OR across fields.
 */

import { scoreToken } from './matcher.js';
import { prepareText, type PreparedText } from './tokenize.js';
import type { Candidate } from '../types/index.js';

/** Title, subtitle and keywords, normalized, with empty fields dropped. */
export function prepareSearchFields(candidate: Candidate): PreparedText[] {
  return [candidate.title, candidate.subtitle, ...candidate.keywords]
    .map(prepareText)
    .filter((field) => field.chars.length > 0);
}

/**
 * Sum of each token's best score over all fields.
 *
 * Returns 0 for an empty token list and `null` as soon as one token
 * matches no field at all.
 */
export function scoreFields(tokens: readonly string[], fields: readonly PreparedText[]): number | null {
  let total = 0;

  for (const token of tokens) {
    let best: number | null = null;
    for (const field of fields) {
      const score = scoreToken(token, field);
      if (score !== null && (best === null || score > best)) best = score;
    }
    if (best === null) return null;
    total += best;
  }

  return total;
}

/** Match score of a candidate for already-tokenized query text. */
export function scoreCandidate(tokens: readonly string[], candidate: Candidate): number | null {
  if (tokens.length === 0) return 0;
  return scoreFields(tokens, prepareSearchFields(candidate));
}
