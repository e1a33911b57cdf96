/**
 * Markdown formatters for search results and usage history.
 *
 * Highlighted title characters are rendered in bold.
 */

import { rawUsageBoost } from '../search/history.js';
import { capitalize } from '../utils/strings.js';
import { splitHighlightRuns } from './highlight.js';
import { sortHistory } from './json.js';
import type { QueryMode, SearchResult, UsageHistory } from '../types/index.js';

/** Escape characters that would break a Markdown table cell. */
export function escapeMarkdown(text: string): string {
  return text.replace(/([|*_`\\])/g, '\\$1');
}

/** Title with highlighted runs wrapped in `**`. */
export function markdownTitle(title: string, indices: readonly number[]): string {
  return splitHighlightRuns(title, indices)
    .map((run) => {
      const text = escapeMarkdown(run.text);
      return run.highlighted && run.text.trim() ? `**${text}**` : text;
    })
    .join('');
}

/** Format ranked results as a Markdown table. */
export function formatResultsMarkdown(
  results: SearchResult[],
  query: string,
  mode: QueryMode,
  suggestions: string[] = [],
): string {
  const lines: string[] = [];
  lines.push(`# ${capitalize(mode)}: "${query}"`);
  lines.push('');

  if (results.length === 0) {
    lines.push('_No matching entries._');
    if (suggestions.length > 0) {
      lines.push('');
      lines.push(`Did you mean: ${suggestions.map((s) => `**${escapeMarkdown(s)}**`).join(', ')}?`);
    }
    return lines.join('\n');
  }

  lines.push('| Rank | Score | Title | Subtitle |');
  lines.push('|------|-------|-------|----------|');

  for (let i = 0; i < results.length; i++) {
    const r = results[i];
    const title = markdownTitle(r.candidate.title, r.matchedTitleIndices);
    lines.push(
      `| ${i + 1} | ${r.score} | ${title} | ${escapeMarkdown(r.candidate.subtitle)} |`,
    );
  }

  return lines.join('\n');
}

/** Format usage history as a Markdown table. */
export function formatHistoryMarkdown(history: UsageHistory, now: number): string {
  const lines: string[] = ['# Usage History', ''];

  if (history.size === 0) {
    lines.push('_No usage recorded._');
    return lines.join('\n');
  }

  lines.push('| Id | Uses | Last used | Boost |');
  lines.push('|----|------|-----------|-------|');
  for (const [id, entry] of sortHistory(history)) {
    const lastUsed = new Date(entry.lastUsedAt * 1000).toISOString();
    const boost = Math.floor(rawUsageBoost(entry, now));
    lines.push(`| \`${id}\` | ${entry.useCount} | ${lastUsed} | ${boost} |`);
  }

  return lines.join('\n');
}
