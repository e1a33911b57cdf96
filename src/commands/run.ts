/**
 * `palette-rank run` command implementation.
 *
 * Ranks candidates like `search`, picks the row named by `--id` (or the top
 * row), runs its bound shell command and, when that exits cleanly, records
 * the use so the entry ranks higher next time. Entries without a command
 * are recorded straight away.
 */

import { openSession, queryPalette } from './session.js';
import { formatPaletteQuery } from './search.js';
import type { RunOptions, SearchResult } from '../types/index.js';

/**
 * Run the `run` command.
 *
 * @param options - CLI options parsed by Commander.
 * @returns The chosen row.
 */
export async function runCandidate(options: RunOptions): Promise<SearchResult> {
  const { default: ora } = await import('ora');
  const { default: chalk } = await import('chalk');

  const spinner = ora('Loading candidates…').start();

  try {
    // 1 ── Rank ──────────────────────────────────────────────────────────
    const session = await openSession(options);
    const outcome = queryPalette(session, options.query);

    if (outcome.results.length === 0) {
      spinner.fail('No matching entries.');
      console.log('');
      console.log(await formatPaletteQuery(outcome, options.format));
      process.exit(1);
    }

    // 2 ── Choose ────────────────────────────────────────────────────────
    const chosen = options.id
      ? outcome.results.find((r) => r.candidate.id === options.id)
      : outcome.results[0];
    if (!chosen) {
      spinner.fail(`No result with id "${options.id}" for this query.`);
      process.exit(1);
    }

    const { candidate } = chosen;
    if (options.dryRun) {
      spinner.info(`Would run: ${candidate.title}`);
      console.log(chalk.cyan(`  ${candidate.command ?? '(no command bound)'}`));
      return chosen;
    }

    // 3 ── Execute the bound command ─────────────────────────────────────
    if (candidate.command) {
      spinner.stop();
      console.log(chalk.dim(`$ ${candidate.command}`));
      const { execa } = await import('execa');
      const result = await execa(candidate.command, {
        shell: true,
        stdio: 'inherit',
        reject: false,
      });
      if (result.exitCode !== 0) {
        console.error(
          chalk.red(`\n"${candidate.title}" exited with code ${result.exitCode}; usage not recorded.`),
        );
        process.exit(result.exitCode || 1);
      }
    }

    // 4 ── Record usage ──────────────────────────────────────────────────
    const entry = await session.store.record(candidate.id);
    spinner.succeed(`${candidate.title} (used ${entry.useCount}×)`);

    return chosen;
  } catch (error) {
    spinner.fail('Run failed');
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`\nError: ${message}`));
    process.exit(1);
  }
}
