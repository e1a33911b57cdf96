import { describe, it, expect } from 'vitest';
import {
  escapeMarkdown,
  formatHistoryMarkdown,
  formatResultsMarkdown,
  markdownTitle,
} from '../../src/formatters/markdown.js';
import type { SearchResult, UsageHistory } from '../../src/types/index.js';

const NOW = 1_700_000_000;

function makeResult(overrides: Partial<SearchResult> = {}): SearchResult {
  return {
    candidate: {
      id: 'folder.open',
      title: 'Open Folder',
      subtitle: 'File | Workspace',
      keywords: [],
      rank: 0,
    },
    score: 6793,
    matchScore: 6793,
    historyBoost: 0,
    matchedTitleIndices: [0, 1, 2, 3, 5, 6, 7, 8],
    ...overrides,
  };
}

describe('escapeMarkdown', () => {
  it('escapes table and emphasis characters', () => {
    expect(escapeMarkdown('a|b*c_d`e\\f')).toBe('a\\|b\\*c\\_d\\`e\\\\f');
  });
});

describe('markdownTitle', () => {
  it('bolds highlighted runs', () => {
    expect(markdownTitle('Open Folder', [0, 1, 2, 3, 5, 6, 7, 8])).toBe('**Open** **Fold**er');
  });

  it('does not bold a whitespace-only run', () => {
    expect(markdownTitle(' x', [0])).toBe(' x');
  });
});

describe('formatResultsMarkdown', () => {
  it('renders a header and a table row per result', () => {
    const output = formatResultsMarkdown([makeResult()], 'open fold', 'commands');
    expect(output.split('\n')).toEqual([
      '# Commands: "open fold"',
      '',
      '| Rank | Score | Title | Subtitle |',
      '|------|-------|-------|----------|',
      '| 1 | 6793 | **Open** **Fold**er | File \\| Workspace |',
    ]);
  });

  it('renders a placeholder and suggestions for no results', () => {
    const output = formatResultsMarkdown([], 'termnal', 'switcher', ['New Terminal']);
    expect(output.split('\n')).toEqual([
      '# Switcher: "termnal"',
      '',
      '_No matching entries._',
      '',
      'Did you mean: **New Terminal**?',
    ]);
  });

  it('omits suggestions when there are none', () => {
    expect(formatResultsMarkdown([], 'zz', 'commands')).toBe(
      '# Commands: "zz"\n\n_No matching entries._',
    );
  });
});

describe('formatHistoryMarkdown', () => {
  it('renders one row per entry', () => {
    const history: UsageHistory = new Map([['tab.new', { useCount: 3, lastUsedAt: NOW }]]);
    expect(formatHistoryMarkdown(history, NOW).split('\n')).toEqual([
      '# Usage History',
      '',
      '| Id | Uses | Last used | Boost |',
      '|----|------|-----------|-------|',
      '| `tab.new` | 3 | 2023-11-14T22:13:20.000Z | 356 |',
    ]);
  });

  it('renders a placeholder for no history', () => {
    expect(formatHistoryMarkdown(new Map(), NOW)).toBe('# Usage History\n\n_No usage recorded._');
  });
});
