/**
 * Shared type definitions for palette-rank.
 */

// ── Candidates ──────────────────────────────────────────────────────────────

/** What a palette row points at. */
export type CandidateKind = 'command' | 'workspace' | 'surface';

/** Directory, branch and port metadata attached to switcher destinations. */
export interface SwitcherMetadata {
  directories?: string[];
  branches?: string[];
  ports?: number[];
}

/** One addressable palette entry. */
export interface Candidate {
  /** Stable identity, also the usage-history key. */
  id: string;
  title: string;
  subtitle: string;
  keywords: string[];
  /** Insertion order from the caller, used only as a tie-break. */
  rank: number;
  kind?: CandidateKind;
  /** Shell command bound to this entry. */
  command?: string;
  metadata?: SwitcherMetadata;
}

// ── Matching ────────────────────────────────────────────────────────────────

/** Which rung of the strategy ladder produced a token match. */
export type MatchStrategy =
  | 'exact'
  | 'prefix'
  | 'word-exact'
  | 'word-prefix'
  | 'substring'
  | 'initialism'
  | 'stitched'
  | 'subsequence';

/** A half-open `[start, end)` range of a word segment. */
export interface WordSegment {
  start: number;
  end: number;
}

/** Result of matching one token against one normalized text. */
export interface TokenMatch {
  strategy: MatchStrategy;
  score: number;
  /** Matched codepoint offsets into the normalized text. */
  positions: number[];
}

/** A ranked palette row. */
export interface SearchResult {
  candidate: Candidate;
  /** `matchScore + historyBoost`. */
  score: number;
  matchScore: number;
  historyBoost: number;
  /** Sorted codepoint offsets into `candidate.title`. */
  matchedTitleIndices: number[];
}

// ── Usage history ───────────────────────────────────────────────────────────

export interface UsageEntry {
  useCount: number;
  /** Seconds since the epoch. */
  lastUsedAt: number;
}

export type UsageHistory = Map<string, UsageEntry>;

// ── CLI options ─────────────────────────────────────────────────────────────

export type OutputFormat = 'table' | 'json' | 'markdown';

/** Palette mode selected by the query prefix. */
export type QueryMode = 'commands' | 'switcher';

/** Options for the `search` command. */
export interface SearchOptions {
  query: string;
  candidatesFile?: string;
  settingsFile?: string;
  maxResults?: number;
  format: OutputFormat;
}

/** Options for the `run` command. */
export interface RunOptions extends SearchOptions {
  id?: string;
  dryRun?: boolean;
}

/** Options for the `history` command. */
export interface HistoryOptions {
  settingsFile?: string;
  clear?: boolean;
  format: OutputFormat;
}
