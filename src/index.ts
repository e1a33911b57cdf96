#!/usr/bin/env node

/**
 * palette-rank CLI - main entry point.
 *
 * Fuzzy command palette and workspace switcher over a JSON candidate list,
 * with usage-history ranking.
 */

import { createProgram } from './cli.js';

await createProgram().parseAsync(process.argv);
