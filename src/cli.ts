/**
 * Commander program definition for the palette-rank CLI.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { runSearch } from './commands/search.js';
import { runCandidate } from './commands/run.js';
import { runHistory } from './commands/history.js';
import type { OutputFormat } from './types/index.js';

const FORMATS: readonly OutputFormat[] = ['table', 'json', 'markdown'];

function parseFormat(value: string): OutputFormat {
  const format = FORMATS.find((f) => f === value);
  if (!format) {
    throw new InvalidArgumentError(`Expected one of: ${FORMATS.join(', ')}.`);
  }
  return format;
}

function parseCount(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function formatOption(): Option {
  return new Option('-f, --format <format>', 'output format: table, json, markdown')
    .default('table')
    .argParser(parseFormat);
}

/** Build the `palette-rank` program with its three subcommands. */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('palette-rank')
    .description('Fuzzy command palette and workspace switcher with usage-history ranking')
    .version('1.0.0');

  // ==========================================================================
  // search
  // ==========================================================================

  program
    .command('search')
    .description('Rank candidates for a query (prefix with ">" for commands)')
    .argument('[query...]', 'query text; empty lists everything')
    .option('-c, --candidates <path>', 'candidate list JSON file')
    .option('-s, --settings <path>', 'settings file holding usage history')
    .option('-n, --max-results <count>', 'maximum rows to show', parseCount)
    .addOption(formatOption())
    .action(async (query: string[], options: {
      candidates?: string;
      settings?: string;
      maxResults?: number;
      format: OutputFormat;
    }) => {
      await runSearch({
        query: query.join(' '),
        candidatesFile: options.candidates,
        settingsFile: options.settings,
        maxResults: options.maxResults,
        format: options.format,
      });
    });

  // ==========================================================================
  // run
  // ==========================================================================

  program
    .command('run')
    .description('Run the top-ranked (or --id) candidate and record its use')
    .argument('[query...]', 'query text')
    .option('-c, --candidates <path>', 'candidate list JSON file')
    .option('-s, --settings <path>', 'settings file holding usage history')
    .option('--id <id>', 'pick this candidate among the results')
    .option('--dry-run', 'print the command without running or recording it')
    .addOption(formatOption())
    .action(async (query: string[], options: {
      candidates?: string;
      settings?: string;
      id?: string;
      dryRun?: boolean;
      format: OutputFormat;
    }) => {
      await runCandidate({
        query: query.join(' '),
        candidatesFile: options.candidates,
        settingsFile: options.settings,
        id: options.id,
        dryRun: options.dryRun,
        format: options.format,
      });
    });

  // ==========================================================================
  // history
  // ==========================================================================

  program
    .command('history')
    .description('Show or clear recorded usage')
    .option('-s, --settings <path>', 'settings file holding usage history')
    .option('--clear', 'remove all usage entries')
    .addOption(formatOption())
    .action(async (options: { settings?: string; clear?: boolean; format: OutputFormat }) => {
      await runHistory({
        settingsFile: options.settings,
        clear: options.clear,
        format: options.format,
      });
    });

  return program;
}
