/**
 * Palette session setup shared by the `search` and `run` commands.
 *
 * Resolves the candidate and settings paths, reads the candidate list and
 * loads the usage history once. Ranking itself stays pure: it receives the
 * loaded history map, never the store.
 */

import { loadCandidates } from '../candidates/loader.js';
import { candidatesForMode, parseQueryMode } from '../candidates/modes.js';
import { UsageHistoryStore } from '../history/store.js';
import { searchCandidates } from '../search/ranker.js';
import { suggestTitles } from '../search/suggest.js';
import { fileExists } from '../utils/file-operations.js';
import { CANDIDATES_ENV, getCandidatesPath, getSettingsPath } from '../utils/paths.js';
import type { Candidate, QueryMode, SearchResult } from '../types/index.js';

export interface PaletteSession {
  candidates: Candidate[];
  store: UsageHistoryStore;
  candidatesFile: string;
  settingsFile: string;
}

/** Outcome of one palette query. */
export interface PaletteQuery {
  mode: QueryMode;
  /** Query text with the mode prefix removed. */
  query: string;
  results: SearchResult[];
  /** Close titles, filled only when nothing matched a non-empty query. */
  suggestions: string[];
}

/**
 * Load candidates and usage history.
 *
 * @throws Error when the candidate file is missing or unreadable.
 */
export async function openSession(options: {
  candidatesFile?: string;
  settingsFile?: string;
}): Promise<PaletteSession> {
  const candidatesPath = getCandidatesPath(options.candidatesFile);
  if (!(await fileExists(candidatesPath.filePath))) {
    const tip =
      candidatesPath.source === 'default'
        ? `\nTip: use --candidates <path> or set ${CANDIDATES_ENV} to point at a candidate list.`
        : '';
    throw new Error(`Candidates file not found: ${candidatesPath.filePath}${tip}`);
  }

  const candidates = await loadCandidates(candidatesPath.filePath);
  const settingsFile = getSettingsPath(options.settingsFile).filePath;
  const store = new UsageHistoryStore(settingsFile);
  await store.load();

  return {
    candidates,
    store,
    candidatesFile: candidatesPath.filePath,
    settingsFile,
  };
}

/**
 * Run a raw palette query (mode prefix included) against a session.
 *
 * @param maxResults - Row limit; omit for every match.
 */
export function queryPalette(
  session: PaletteSession,
  rawQuery: string,
  maxResults?: number,
): PaletteQuery {
  const { mode, query } = parseQueryMode(rawQuery);
  const pool = candidatesForMode(session.candidates, mode);
  const results = searchCandidates(query, pool, session.store.entries(), { maxResults });
  const suggestions = results.length === 0 ? suggestTitles(query, pool) : [];
  return { mode, query, results, suggestions };
}
