/**
 * `palette-rank history` command implementation.
 *
 * Lists the recorded usage entries with the boost each one currently earns,
 * or clears them with `--clear`.
 */

import { formatHistoryJson } from '../formatters/json.js';
import { formatHistoryMarkdown } from '../formatters/markdown.js';
import { formatHistoryTable } from '../formatters/table.js';
import { UsageHistoryStore } from '../history/store.js';
import { nowInSeconds } from '../search/history.js';
import { getSettingsPath } from '../utils/paths.js';
import type { HistoryOptions, UsageHistory } from '../types/index.js';

/**
 * Run the `history` command.
 *
 * @param options - CLI options parsed by Commander.
 * @param now     - Seconds since the epoch used for boost display.
 * @returns The history as it stands after the command.
 */
export async function runHistory(
  options: HistoryOptions,
  now: number = nowInSeconds(),
): Promise<UsageHistory> {
  const { default: chalk } = await import('chalk');

  try {
    const { filePath } = getSettingsPath(options.settingsFile);
    const store = new UsageHistoryStore(filePath);
    const history = await store.load();

    if (options.clear) {
      await store.clear();
      console.log(chalk.green(`Cleared ${history.size} usage entries from ${filePath}.`));
      return store.entries();
    }

    switch (options.format) {
      case 'json':
        console.log(formatHistoryJson(history, now));
        break;
      case 'markdown':
        console.log(formatHistoryMarkdown(history, now));
        break;
      default:
        console.log(await formatHistoryTable(history, now));
        break;
    }

    return history;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`\nError: ${message}`));
    process.exit(1);
  }
}
