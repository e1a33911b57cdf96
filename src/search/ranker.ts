/**
 * Ranker – turns a query, a candidate list and a usage history into the
 * ordered palette rows.
 *
 * Pipeline, per candidate:
 *  1. Tokenize the query (an empty query keeps every candidate at 0).
 *  2. Aggregate token scores across title, subtitle and keywords.
 *  3. Add the usage-history boost.
 *  4. Recompute title highlights.
 * then sort by total score, caller rank and title.
 *
 * Synchronous and side-effect free: the same inputs always give the same
 * ordered output.
 */

import { scoreCandidate } from './aggregator.js';
import { highlightTitle } from './highlighter.js';
import { historyBoost, nowInSeconds } from './history.js';
import { tokenizeQuery } from './tokenize.js';
import type { Candidate, SearchResult, UsageHistory } from '../types/index.js';

export interface RankOptions {
  /** Seconds since the epoch used for recency decay. Default: now. */
  now?: number;
  /** Keep at most this many rows. Default: all. */
  maxResults?: number;
}

/** Descending score, ascending rank, then case-insensitive title. */
export function compareResults(a: SearchResult, b: SearchResult): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.candidate.rank !== b.candidate.rank) return a.candidate.rank - b.candidate.rank;

  const left = a.candidate.title.toLowerCase();
  const right = b.candidate.title.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Score, filter and order `candidates` for `query`.
 *
 * @param query      - Raw query text, mode prefix already removed.
 * @param candidates - Candidates in caller order; never mutated.
 * @param history    - Usage entries keyed by candidate id.
 */
export function searchCandidates(
  query: string,
  candidates: readonly Candidate[],
  history: UsageHistory,
  options: RankOptions = {},
): SearchResult[] {
  const now = options.now ?? nowInSeconds();
  const tokens = tokenizeQuery(query);
  const queryIsEmpty = tokens.length === 0;

  const results: SearchResult[] = [];
  for (const candidate of candidates) {
    const matchScore = scoreCandidate(tokens, candidate);
    if (matchScore === null) continue;

    const boost = historyBoost(history.get(candidate.id), now, queryIsEmpty);
    results.push({
      candidate,
      score: matchScore + boost,
      matchScore,
      historyBoost: boost,
      matchedTitleIndices: highlightTitle(candidate.title, tokens),
    });
  }

  results.sort(compareResults);

  if (options.maxResults !== undefined && options.maxResults >= 0) {
    return results.slice(0, options.maxResults);
  }
  return results;
}
