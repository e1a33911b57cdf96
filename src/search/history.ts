/**
 * Usage-history boost and its persisted encoding.
 *
 * A candidate's boost combines how recently it was used (decaying linearly
 * over 16 days) with how often (saturating at 15 uses). Unfiltered lists get
 * the full boost; filtered lists get a third of it so history only reorders
 * comparable text matches.
 */

import { isRecord } from '../utils/guards.js';
import type { UsageEntry, UsageHistory } from '../types/index.js';

export const SECONDS_PER_DAY = 86_400;

const MAX_RECENCY_BOOST = 320;
const RECENCY_DECAY_PER_DAY = 20;
const COUNT_BOOST_PER_USE = 12;
const MAX_COUNT_BOOST = 180;
/** Share of the boost applied when the query is not empty. */
const FILTERED_BOOST_DIVISOR = 3;
/** Largest timestamp, in seconds, that a `Date` can represent. */
const MAX_TIMESTAMP_SECONDS = 8.64e12;

/** Current wall-clock time in seconds since the epoch. */
export function nowInSeconds(): number {
  return Date.now() / 1000;
}

export function recencyBoost(entry: UsageEntry, now: number): number {
  const ageDays = Math.max(0, now - entry.lastUsedAt) / SECONDS_PER_DAY;
  return Math.max(0, MAX_RECENCY_BOOST - ageDays * RECENCY_DECAY_PER_DAY);
}

export function countBoost(entry: UsageEntry): number {
  return Math.min(MAX_COUNT_BOOST, entry.useCount * COUNT_BOOST_PER_USE);
}

/** Unscaled boost; 0 for a candidate that was never used. */
export function rawUsageBoost(entry: UsageEntry | undefined, now: number): number {
  if (!entry) return 0;
  return recencyBoost(entry, now) + countBoost(entry);
}

/** Integer addend for a candidate's match score. */
export function historyBoost(
  entry: UsageEntry | undefined,
  now: number,
  queryIsEmpty: boolean,
): number {
  const raw = rawUsageBoost(entry, now);
  return Math.floor(queryIsEmpty ? raw : raw / FILTERED_BOOST_DIVISOR);
}

/** The entry that results from using a candidate once more at `now`. */
export function nextUsageEntry(previous: UsageEntry | undefined, now: number): UsageEntry {
  return {
    useCount: (previous?.useCount ?? 0) + 1,
    lastUsedAt: now,
  };
}

// ── Encoding ────────────────────────────────────────────────────────────────

function toUsageEntry(value: unknown): UsageEntry | null {
  if (!isRecord(value)) return null;
  const { useCount, lastUsedAt } = value;
  if (typeof useCount !== 'number' || !Number.isInteger(useCount) || useCount < 0) {
    return null;
  }
  if (typeof lastUsedAt !== 'number' || !Number.isFinite(lastUsedAt)) return null;
  if (Math.abs(lastUsedAt) > MAX_TIMESTAMP_SECONDS) return null;
  return { useCount, lastUsedAt };
}

/**
 * Decode a persisted history blob.
 *
 * Anything other than a JSON object of `{ useCount, lastUsedAt }` entries
 * decodes to an empty map; individual malformed entries are dropped.
 */
export function decodeUsageHistory(blob: unknown): UsageHistory {
  const history: UsageHistory = new Map();
  if (typeof blob !== 'string') return history;

  let parsed: unknown;
  try {
    parsed = JSON.parse(blob);
  } catch {
    return history;
  }
  if (!isRecord(parsed)) return history;

  for (const [id, value] of Object.entries(parsed)) {
    const entry = toUsageEntry(value);
    if (entry) history.set(id, entry);
  }
  return history;
}

/** Encode a history map as the JSON blob stored in settings. */
export function encodeUsageHistory(history: UsageHistory): string {
  return JSON.stringify(
    Object.fromEntries(
      [...history].map(([id, entry]) => [
        id,
        { useCount: entry.useCount, lastUsedAt: entry.lastUsedAt },
      ]),
    ),
  );
}
