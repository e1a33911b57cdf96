/**
 * JSON formatters for search results and usage history.
 *
 * Serialise to pretty-printed JSON for piping or downstream consumption by
 * other tools.
 */

import { rawUsageBoost } from '../search/history.js';
import type { QueryMode, SearchResult, UsageEntry, UsageHistory } from '../types/index.js';

/**
 * Format ranked results as pretty-printed JSON.
 *
 * @param results - Ranked rows.
 * @param query   - Query text after mode-prefix removal.
 * @param mode    - Palette mode the query ran in.
 * @param suggestions - "Did you mean" titles for an empty result list.
 * @returns A JSON string (2-space indented).
 */
export function formatResultsJson(
  results: SearchResult[],
  query: string,
  mode: QueryMode,
  suggestions: string[] = [],
): string {
  return JSON.stringify(
    {
      query,
      mode,
      suggestions,
      results: results.map((r) => ({
        id: r.candidate.id,
        title: r.candidate.title,
        subtitle: r.candidate.subtitle,
        kind: r.candidate.kind ?? 'command',
        score: r.score,
        matchScore: r.matchScore,
        historyBoost: r.historyBoost,
        matchedTitleIndices: r.matchedTitleIndices,
      })),
    },
    null,
    2,
  );
}

/** Format usage history as JSON, most used first. */
export function formatHistoryJson(history: UsageHistory, now: number): string {
  return JSON.stringify(
    {
      entries: sortHistory(history).map(([id, entry]) => ({
        id,
        useCount: entry.useCount,
        lastUsedAt: new Date(entry.lastUsedAt * 1000).toISOString(),
        boost: Math.floor(rawUsageBoost(entry, now)),
      })),
    },
    null,
    2,
  );
}

/** History entries by use count, then most recent, then id. */
export function sortHistory(history: UsageHistory): [string, UsageEntry][] {
  return [...history.entries()].sort(
    ([idA, a], [idB, b]) =>
      b.useCount - a.useCount || b.lastUsedAt - a.lastUsedAt || idA.localeCompare(idB),
  );
}
