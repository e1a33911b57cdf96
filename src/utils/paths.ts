/**
 * Candidate and settings file path resolution.
 *
 * Candidates : --candidates flag, then $PALETTE_RANK_CANDIDATES,
 *              then ~/.config/palette-rank/candidates.json
 * Settings   : --settings flag, then $PALETTE_RANK_SETTINGS,
 *              then ~/.config/palette-rank/settings.json
 */

import path from 'node:path';
import {
  getDefaultCandidatesPath,
  getDefaultSettingsPath,
} from './file-operations.js';

export const CANDIDATES_ENV = 'PALETTE_RANK_CANDIDATES';
export const SETTINGS_ENV = 'PALETTE_RANK_SETTINGS';

/** A resolved path together with how it was determined. */
export interface ResolvedPath {
  /** Absolute path to the file. */
  filePath: string;
  source: 'override' | 'env' | 'default';
}

function resolvePath(
  override: string | undefined,
  envName: string,
  fallback: string,
): ResolvedPath {
  // 1) User-supplied override wins unconditionally.
  if (override) {
    return { filePath: path.resolve(override), source: 'override' };
  }

  const envPath = process.env[envName];
  if (envPath) {
    return { filePath: path.resolve(envPath), source: 'env' };
  }

  return { filePath: fallback, source: 'default' };
}

/** Resolve the candidate list path. */
export function getCandidatesPath(override?: string): ResolvedPath {
  return resolvePath(override, CANDIDATES_ENV, getDefaultCandidatesPath());
}

/** Resolve the settings file path. */
export function getSettingsPath(override?: string): ResolvedPath {
  return resolvePath(override, SETTINGS_ENV, getDefaultSettingsPath());
}
