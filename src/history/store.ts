/**
 * Session-scoped usage-history store.
 *
 * The settings file is a JSON object of string keys shared with other
 * settings. Usage history lives under one key as a JSON-encoded string.
 * The store reads it once per session, and every `record()` or `clear()`
 * writes the whole settings object back with the other keys untouched.
 */

import { readJsonFile, writeJsonFile } from '../utils/file-operations.js';
import { isRecord } from '../utils/guards.js';
import {
  decodeUsageHistory,
  encodeUsageHistory,
  nextUsageEntry,
  nowInSeconds,
} from '../search/history.js';
import type { UsageEntry, UsageHistory } from '../types/index.js';

/** Settings key holding the encoded usage history. */
export const USAGE_HISTORY_KEY = 'commandPalette.usageHistory';

export class UsageHistoryStore {
  private history: UsageHistory = new Map();

  /**
   * @param settingsPath - Settings file to read and write.
   * @param clock        - Seconds since the epoch; injectable for tests.
   */
  constructor(
    private readonly settingsPath: string,
    private readonly clock: () => number = nowInSeconds,
  ) {}

  /** Read the history from disk, replacing whatever the store held. */
  async load(): Promise<UsageHistory> {
    const settings = await this.readSettings();
    this.history = decodeUsageHistory(settings[USAGE_HISTORY_KEY]);
    return this.history;
  }

  /** The history as last loaded or recorded. */
  entries(): UsageHistory {
    return this.history;
  }

  /** Count one more use of `id` now and persist immediately. */
  async record(id: string): Promise<UsageEntry> {
    const entry = nextUsageEntry(this.history.get(id), this.clock());
    this.history = new Map(this.history).set(id, entry);
    await this.persist();
    return entry;
  }

  /** Forget all usage and persist. */
  async clear(): Promise<void> {
    this.history = new Map();
    const settings = await this.readSettings();
    delete settings[USAGE_HISTORY_KEY];
    await writeJsonFile(this.settingsPath, settings);
  }

  private async readSettings(): Promise<Record<string, unknown>> {
    const data = await readJsonFile(this.settingsPath);
    return isRecord(data) ? data : {};
  }

  private async persist(): Promise<void> {
    const settings = await this.readSettings();
    settings[USAGE_HISTORY_KEY] = encodeUsageHistory(this.history);
    await writeJsonFile(this.settingsPath, settings);
  }
}
