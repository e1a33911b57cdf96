/**
 * "Did you mean" suggestions for queries that match nothing.
 *
 * Compares the normalized query with each normalized title, and with each
 * word of the title, by Levenshtein distance. Only close titles survive.
 */

import levenshtein from 'fast-levenshtein';
import { prepareText } from './tokenize.js';
import type { Candidate } from '../types/index.js';

/** Default number of suggestions returned. */
const DEFAULT_LIMIT = 3;
/** Distance always tolerated, however short the query. */
const MIN_THRESHOLD = 2;

/** Maximum edit distance accepted for a query of `length` characters. */
export function suggestionThreshold(length: number): number {
  return Math.max(MIN_THRESHOLD, Math.floor(length / 3));
}

/** Smallest distance between `query` and the title or any of its words. */
export function titleDistance(query: string, title: string): number {
  const prepared = prepareText(title);
  let best = levenshtein.get(query, prepared.text);

  for (const segment of prepared.segments) {
    const word = prepared.chars.slice(segment.start, segment.end).join('');
    best = Math.min(best, levenshtein.get(query, word));
  }
  return best;
}

/**
 * Up to `limit` distinct titles close to `query`, nearest first,
 * caller rank breaking ties.
 */
export function suggestTitles(
  query: string,
  candidates: readonly Candidate[],
  limit = DEFAULT_LIMIT,
): string[] {
  const normalized = prepareText(query).text;
  if (!normalized) return [];

  const threshold = suggestionThreshold(Array.from(normalized).length);
  const scored: { title: string; distance: number; rank: number }[] = [];

  for (const candidate of candidates) {
    const distance = titleDistance(normalized, candidate.title);
    if (distance <= threshold) {
      scored.push({ title: candidate.title, distance, rank: candidate.rank });
    }
  }

  scored.sort((a, b) => a.distance - b.distance || a.rank - b.rank);

  const titles: string[] = [];
  for (const { title } of scored) {
    if (!titles.includes(title)) titles.push(title);
    if (titles.length >= limit) break;
  }
  return titles;
}
