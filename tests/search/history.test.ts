import { describe, it, expect } from 'vitest';
import {
  SECONDS_PER_DAY,
  countBoost,
  decodeUsageHistory,
  encodeUsageHistory,
  historyBoost,
  nextUsageEntry,
  rawUsageBoost,
  recencyBoost,
} from '../../src/search/history.js';

const NOW = 1_700_000_000;

// ═══════════════════════════════════════════════════════════════════════════
// Boost
// ═══════════════════════════════════════════════════════════════════════════

describe('recencyBoost', () => {
  it('starts at 320 and loses 20 per day', () => {
    expect(recencyBoost({ useCount: 1, lastUsedAt: NOW }, NOW)).toBe(320);
    expect(recencyBoost({ useCount: 1, lastUsedAt: NOW - 2 * SECONDS_PER_DAY }, NOW)).toBe(280);
  });

  it('bottoms out at 0', () => {
    expect(recencyBoost({ useCount: 1, lastUsedAt: NOW - 30 * SECONDS_PER_DAY }, NOW)).toBe(0);
  });

  it('treats a future timestamp as used just now', () => {
    expect(recencyBoost({ useCount: 1, lastUsedAt: NOW + 5000 }, NOW)).toBe(320);
  });
});

describe('countBoost', () => {
  it('grows by 12 per use up to 180', () => {
    expect(countBoost({ useCount: 3, lastUsedAt: NOW })).toBe(36);
    expect(countBoost({ useCount: 15, lastUsedAt: NOW })).toBe(180);
    expect(countBoost({ useCount: 400, lastUsedAt: NOW })).toBe(180);
  });
});

describe('historyBoost', () => {
  it('is 0 for a candidate that was never used', () => {
    expect(rawUsageBoost(undefined, NOW)).toBe(0);
    expect(historyBoost(undefined, NOW, true)).toBe(0);
  });

  it('applies the full boost to an empty query', () => {
    expect(historyBoost({ useCount: 3, lastUsedAt: NOW }, NOW, true)).toBe(356);
  });

  it('applies a third of the boost to a filtered query', () => {
    expect(historyBoost({ useCount: 3, lastUsedAt: NOW }, NOW, false)).toBe(118);
    expect(
      historyBoost({ useCount: 20, lastUsedAt: NOW - 2 * SECONDS_PER_DAY }, NOW, false),
    ).toBe(153);
  });

  it('never exceeds 500', () => {
    expect(historyBoost({ useCount: 10_000, lastUsedAt: NOW }, NOW, true)).toBe(500);
  });
});

describe('nextUsageEntry', () => {
  it('starts a new entry at one use', () => {
    expect(nextUsageEntry(undefined, NOW)).toEqual({ useCount: 1, lastUsedAt: NOW });
  });

  it('increments and stamps an existing entry', () => {
    expect(nextUsageEntry({ useCount: 4, lastUsedAt: 10 }, NOW)).toEqual({
      useCount: 5,
      lastUsedAt: NOW,
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// Encoding
// ═══════════════════════════════════════════════════════════════════════════

describe('decodeUsageHistory', () => {
  it('decodes a JSON object of entries', () => {
    const history = decodeUsageHistory('{"palette.newTab":{"useCount":2,"lastUsedAt":1000.5}}');
    expect([...history]).toEqual([['palette.newTab', { useCount: 2, lastUsedAt: 1000.5 }]]);
  });

  it('drops malformed entries and keeps the rest', () => {
    const history = decodeUsageHistory(
      JSON.stringify({
        good: { useCount: 1, lastUsedAt: 5 },
        negative: { useCount: -1, lastUsedAt: 5 },
        fractional: { useCount: 1.5, lastUsedAt: 5 },
        missing: { useCount: 1 },
        text: 'nope',
      }),
    );
    expect([...history.keys()]).toEqual(['good']);
  });

  it('drops timestamps outside the representable date range', () => {
    const history = decodeUsageHistory(
      '{"a":{"useCount":1,"lastUsedAt":1e20},"b":{"useCount":1,"lastUsedAt":5},"c":{"useCount":1,"lastUsedAt":-1e13}}',
    );
    expect([...history.keys()]).toEqual(['b']);
  });

  it('decodes anything else to an empty map', () => {
    expect(decodeUsageHistory(undefined).size).toBe(0);
    expect(decodeUsageHistory(42).size).toBe(0);
    expect(decodeUsageHistory('not json').size).toBe(0);
    expect(decodeUsageHistory('[1,2]').size).toBe(0);
    expect(decodeUsageHistory('null').size).toBe(0);
  });
});

describe('encodeUsageHistory', () => {
  it('writes entries as a JSON object', () => {
    const history = new Map([['a', { useCount: 2, lastUsedAt: 7 }]]);
    expect(encodeUsageHistory(history)).toBe('{"a":{"useCount":2,"lastUsedAt":7}}');
  });

  it('is read back by the decoder', () => {
    const history = new Map([
      ['a', { useCount: 2, lastUsedAt: 7 }],
      ['b', { useCount: 9, lastUsedAt: 12.25 }],
    ]);
    expect(decodeUsageHistory(encodeUsageHistory(history))).toEqual(history);
  });

  it('keeps an entry whose id is __proto__', () => {
    const history = new Map([['__proto__', { useCount: 1, lastUsedAt: 2 }]]);
    const blob = encodeUsageHistory(history);
    expect(blob).toBe('{"__proto__":{"useCount":1,"lastUsedAt":2}}');
    expect([...decodeUsageHistory(blob)]).toEqual([['__proto__', { useCount: 1, lastUsedAt: 2 }]]);
  });
});
