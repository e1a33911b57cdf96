/**
 * Table formatters for the terminal.
 *
 * Uses chalk for colours and highlighted title characters, boxen for the
 * bordered header.
 */

import { rawUsageBoost } from '../search/history.js';
import { capitalize, truncate } from '../utils/strings.js';
import { renderHighlighted } from './highlight.js';
import { sortHistory } from './json.js';
import type { QueryMode, SearchResult, UsageHistory } from '../types/index.js';

/** Subtitles longer than this are cut in the table. */
const SUBTITLE_WIDTH = 40;

/**
 * Format ranked results as a styled terminal table.
 *
 * @param results     - Ranked rows.
 * @param query       - Query text after mode-prefix removal.
 * @param mode        - Palette mode the query ran in.
 * @param suggestions - "Did you mean" titles shown when nothing matched.
 * @returns A multi-line string ready for `console.log`.
 */
export async function formatResultsTable(
  results: SearchResult[],
  query: string,
  mode: QueryMode,
  suggestions: string[] = [],
): Promise<string> {
  const { default: chalk } = await import('chalk');
  const { default: boxen } = await import('boxen');

  const output: string[] = [];

  // ── Header box ─────────────────────────────────────────────────────────────
  const title = chalk.bold.cyan(`PALETTE RANK - ${capitalize(mode)}`);
  const divider = chalk.dim('─'.repeat(55));
  const stats = [
    `${chalk.bold('Query:')} "${query}"`,
    `${chalk.bold('Results:')} ${results.length}`,
  ].join('\n');

  output.push(
    boxen(`${title}\n${divider}\n${stats}`, {
      padding: 1,
      borderStyle: 'round',
      borderColor: 'cyan',
    }),
  );

  output.push('');

  if (results.length === 0) {
    output.push(chalk.dim('  No matching entries.'));
    if (suggestions.length > 0) {
      output.push('');
      output.push(chalk.yellow('Did you mean:'));
      for (const s of suggestions) output.push(`  ${chalk.cyan(s)}`);
    }
    return output.join('\n');
  }

  // ── Results table ──────────────────────────────────────────────────────────
  output.push(
    `${chalk.dim('Rank')}  ${chalk.dim('Score')}  ${chalk.dim('Title')}`,
  );
  output.push(chalk.dim('─'.repeat(72)));

  for (let i = 0; i < results.length; i++) {
    const r = results[i];
    const rank = String(i + 1).padStart(4);
    const score = String(r.score).padStart(5);
    const name = renderHighlighted(r.candidate.title, r.matchedTitleIndices, (text) =>
      chalk.bold.yellow(text),
    );
    const subtitle = r.candidate.subtitle
      ? `  ${chalk.dim(truncate(r.candidate.subtitle, SUBTITLE_WIDTH))}`
      : '';
    output.push(`${chalk.yellow(rank)}  ${chalk.green(score)}  ${name}${subtitle}`);
  }

  output.push('');
  output.push(
    chalk.cyan(
      "Use 'palette-rank run \"<query>\"' to run the top result.",
    ),
  );

  return output.join('\n');
}

/** Format usage history as a styled terminal table. */
export async function formatHistoryTable(history: UsageHistory, now: number): Promise<string> {
  const { default: chalk } = await import('chalk');

  const output: string[] = [];
  output.push(chalk.bold(`USAGE HISTORY (${history.size} tracked)`));
  output.push('');

  if (history.size === 0) {
    output.push(chalk.dim('  No usage recorded.'));
    return output.join('\n');
  }

  output.push(
    `${chalk.dim(' Uses')}  ${chalk.dim('Boost')}  ${chalk.dim('Last used'.padEnd(24))}  ${chalk.dim('Id')}`,
  );
  output.push(chalk.dim('─'.repeat(72)));

  for (const [id, entry] of sortHistory(history)) {
    const uses = String(entry.useCount).padStart(5);
    const boost = String(Math.floor(rawUsageBoost(entry, now))).padStart(5);
    const lastUsed = new Date(entry.lastUsedAt * 1000).toISOString().padEnd(24);
    output.push(`${chalk.green(uses)}  ${chalk.yellow(boost)}  ${chalk.dim(lastUsed)}  ${id}`);
  }

  return output.join('\n');
}
