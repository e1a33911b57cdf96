/**
 * Palette modes.
 *
 * A query that starts with `>` searches commands; anything else searches
 * switcher destinations (workspaces and surfaces). The prefix is removed
 * before the query reaches the ranking engine.
 */

import type { Candidate, QueryMode } from '../types/index.js';

export const COMMAND_MODE_PREFIX = '>';

export interface ParsedQuery {
  mode: QueryMode;
  query: string;
}

/** Split a raw palette query into its mode and the text to search for. */
export function parseQueryMode(raw: string): ParsedQuery {
  const trimmed = raw.trimStart();
  if (trimmed.startsWith(COMMAND_MODE_PREFIX)) {
    return { mode: 'commands', query: trimmed.slice(COMMAND_MODE_PREFIX.length) };
  }
  return { mode: 'switcher', query: raw };
}

/** Candidates visible in `mode`. Candidates without a kind are commands. */
export function candidatesForMode(
  candidates: readonly Candidate[],
  mode: QueryMode,
): Candidate[] {
  return candidates.filter((c) => {
    const kind = c.kind ?? 'command';
    return mode === 'commands' ? kind === 'command' : kind !== 'command';
  });
}
