/**
 * Title highlighting.
 *
 * Recomputes, for the title alone, which characters each token covered and
 * maps them back to codepoint offsets of the original title. Tokens that only
 * matched the subtitle or a keyword contribute nothing.
 */

import { matchToken } from './matcher.js';
import { prepareText } from './tokenize.js';

/** Sorted, unique codepoint offsets into `title` covered by `tokens`. */
export function highlightTitle(title: string, tokens: readonly string[]): number[] {
  if (tokens.length === 0) return [];

  const prepared = prepareText(title);
  const covered = new Set<number>();

  for (const token of tokens) {
    const match = matchToken(token, prepared);
    if (!match) continue;
    for (const position of match.positions) {
      covered.add(prepared.sourceOffsets[position]);
    }
  }

  return [...covered].sort((a, b) => a - b);
}
