/**
 * `palette-rank search` command implementation.
 *
 * Orchestrates: path resolution → candidate loading → usage-history
 * loading → mode selection → ranking → formatted output.
 */

import { formatResultsJson } from '../formatters/json.js';
import { formatResultsMarkdown } from '../formatters/markdown.js';
import { formatResultsTable } from '../formatters/table.js';
import { plural } from '../utils/strings.js';
import { openSession, queryPalette, type PaletteQuery } from './session.js';
import type { OutputFormat, SearchOptions, SearchResult } from '../types/index.js';

/** Rows shown when --max-results is not given. */
export const DEFAULT_MAX_RESULTS = 20;

/** Render a palette query in the requested format. */
export async function formatPaletteQuery(
  outcome: PaletteQuery,
  format: OutputFormat,
): Promise<string> {
  const { results, query, mode, suggestions } = outcome;
  switch (format) {
    case 'json':
      return formatResultsJson(results, query, mode, suggestions);
    case 'markdown':
      return formatResultsMarkdown(results, query, mode, suggestions);
    default:
      return formatResultsTable(results, query, mode, suggestions);
  }
}

/**
 * Run the `search` command.
 *
 * @param options - CLI options parsed by Commander.
 * @returns The ranked rows (also printed to stdout).
 */
export async function runSearch(options: SearchOptions): Promise<SearchResult[]> {
  const { default: ora } = await import('ora');
  const { default: chalk } = await import('chalk');

  const spinner = ora('Loading candidates…').start();

  try {
    // 1 ── Load candidates and usage history ─────────────────────────────
    const session = await openSession(options);
    spinner.text = `Ranking ${plural(session.candidates.length, 'candidate')}…`;

    // 2 ── Rank ──────────────────────────────────────────────────────────
    const outcome = queryPalette(
      session,
      options.query,
      options.maxResults ?? DEFAULT_MAX_RESULTS,
    );

    if (outcome.results.length === 0) {
      spinner.warn('No matching entries.');
    } else {
      spinner.succeed(`Found ${plural(outcome.results.length, 'result')}.`);
    }
    console.log('');

    // 3 ── Formatted output ──────────────────────────────────────────────
    console.log(await formatPaletteQuery(outcome, options.format));

    return outcome.results;
  } catch (error) {
    spinner.fail('Search failed');
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`\nError: ${message}`));
    process.exit(1);
  }
}
