import { describe, it, expect } from 'vitest';
import {
  prepareSearchFields,
  scoreCandidate,
  scoreFields,
} from '../../src/search/aggregator.js';
import type { Candidate } from '../../src/types/index.js';

function candidate(overrides: Partial<Candidate> = {}): Candidate {
  return { id: 'c', title: '', subtitle: '', keywords: [], rank: 0, ...overrides };
}

describe('prepareSearchFields', () => {
  it('collects title, subtitle and keywords, dropping empty ones', () => {
    const fields = prepareSearchFields(
      candidate({ title: 'Reload', subtitle: '  ', keywords: ['Browser', ''] }),
    );
    expect(fields.map((f) => f.text)).toEqual(['reload', 'browser']);
  });
});

describe('scoreFields', () => {
  it('sums the best score of every token', () => {
    const fields = prepareSearchFields(candidate({ title: 'Rename Tab' }));
    expect(scoreFields(['rename', 'tab'], fields)).toBe(12940);
  });

  it('lets each token pick its own field', () => {
    const fields = prepareSearchFields(candidate({ title: 'Reload', keywords: ['browser'] }));
    expect(scoreFields(['reload', 'browser'], fields)).toBe(16000);
  });

  it('returns null when any token matches no field', () => {
    const fields = prepareSearchFields(candidate({ title: 'Reload', keywords: ['browser'] }));
    expect(scoreFields(['reload', 'database'], fields)).toBeNull();
  });
});

describe('scoreCandidate', () => {
  it('scores an empty token list as 0', () => {
    expect(scoreCandidate([], candidate({ title: 'Anything' }))).toBe(0);
  });

  it('matches on the subtitle alone', () => {
    expect(
      scoreCandidate(['tab'], candidate({ title: 'Close', subtitle: 'tab' })),
    ).toBe(8000);
  });

  it('scores extra words in the title lower', () => {
    const short = scoreCandidate(['rename', 'tab'], candidate({ title: 'Rename Tab' }));
    const long = scoreCandidate(['rename', 'tab'], candidate({ title: 'Rename Tab Now' }));
    expect(short).toBe(12940);
    expect(long).toBe(12932);
  });
});
