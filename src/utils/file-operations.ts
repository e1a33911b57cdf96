/**
 * Safe file read/write utilities.
 *
 * Used by the usage-history store to read and rewrite the settings file and
 * by the candidate loader to read candidate lists.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';

// ── Constants ────────────────────────────────────────────────────────────────

/** Default config directory: ~/.config/palette-rank */
const CONFIG_DIR = path.join(os.homedir(), '.config', 'palette-rank');

/** Default candidate list file name. */
const CANDIDATES_FILE = 'candidates.json';

/** Default settings (key-value store) file name. */
const SETTINGS_FILE = 'settings.json';

// ── Directory helpers ────────────────────────────────────────────────────────

/**
 * Ensure a directory exists, creating it (and parents) if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Get the config directory path (~/.config/palette-rank).
 */
export function getConfigDir(): string {
  return CONFIG_DIR;
}

/** Default path of the candidate list. */
export function getDefaultCandidatesPath(): string {
  return path.join(getConfigDir(), CANDIDATES_FILE);
}

/** Default path of the settings file. */
export function getDefaultSettingsPath(): string {
  return path.join(getConfigDir(), SETTINGS_FILE);
}

// ── Read helpers ─────────────────────────────────────────────────────────────

/**
 * Read a file's contents as UTF-8 text.
 * Returns `null` if the file does not exist.
 */
export async function readFileIfExists(
  filePath: string,
): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch {
    return null;
  }
}

/**
 * Read and parse a JSON file. Returns `null` if the file doesn't exist
 * or contains invalid JSON.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  const content = await readFileIfExists(filePath);
  if (content === null) return null;
  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch {
    return null;
  }
}

// ── Write helpers ────────────────────────────────────────────────────────────

/**
 * Write text content to a file, creating parent directories as needed.
 */
export async function writeFileSafe(
  filePath: string,
  content: string,
): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, content, 'utf-8');
}

/**
 * Write a JSON-serialisable value to a file (pretty-printed).
 */
export async function writeJsonFile(
  filePath: string,
  data: unknown,
): Promise<void> {
  const json = JSON.stringify(data, null, 2) + '\n';
  await writeFileSafe(filePath, json);
}

// ── File existence ───────────────────────────────────────────────────────────

/**
 * Check whether a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
