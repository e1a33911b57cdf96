/**
 * Candidate file loading.
 *
 * Accepts either a bare array of candidate objects or
 * `{ "candidates": [...] }`. Entries without a string `id` and `title`, and
 * repeated ids, are skipped; `rank` is the position among accepted entries.
 * Switcher destinations with metadata get their keywords indexed here.
 */

import { readFileIfExists } from '../utils/file-operations.js';
import { isRecord, stringArray } from '../utils/guards.js';
import { buildSwitcherKeywords } from './switcher-keywords.js';
import type { Candidate, CandidateKind, SwitcherMetadata } from '../types/index.js';

const KINDS: readonly CandidateKind[] = ['command', 'workspace', 'surface'];

function normalizeKind(value: unknown): CandidateKind | undefined {
  return KINDS.find((k) => k === value);
}

function normalizeMetadata(value: unknown): SwitcherMetadata | undefined {
  if (!isRecord(value)) return undefined;
  const ports = Array.isArray(value.ports)
    ? value.ports.filter((p): p is number => typeof p === 'number')
    : [];
  return {
    directories: stringArray(value.directories),
    branches: stringArray(value.branches),
    ports,
  };
}

/** Validate parsed JSON into ranked candidates. */
export function parseCandidates(data: unknown): Candidate[] {
  let items: unknown[] = [];
  if (Array.isArray(data)) {
    items = data;
  } else if (isRecord(data) && Array.isArray(data.candidates)) {
    items = data.candidates;
  }

  const seen = new Set<string>();
  const candidates: Candidate[] = [];

  for (const item of items) {
    if (!isRecord(item)) continue;
    const { id, title } = item;
    if (typeof id !== 'string' || !id || typeof title !== 'string') continue;
    if (seen.has(id)) continue;
    seen.add(id);

    const kind = normalizeKind(item.kind);
    const metadata = normalizeMetadata(item.metadata);
    let keywords = stringArray(item.keywords);
    if (metadata && (kind === 'workspace' || kind === 'surface')) {
      keywords = buildSwitcherKeywords(keywords, metadata, kind);
    }

    const candidate: Candidate = {
      id,
      title,
      subtitle: typeof item.subtitle === 'string' ? item.subtitle : '',
      keywords,
      rank: candidates.length,
    };
    if (kind) candidate.kind = kind;
    if (typeof item.command === 'string' && item.command.trim()) {
      candidate.command = item.command;
    }
    if (metadata) candidate.metadata = metadata;

    candidates.push(candidate);
  }

  return candidates;
}

/**
 * Read and validate a candidate file.
 *
 * @throws Error when the file is missing or is not valid JSON.
 */
export async function loadCandidates(filePath: string): Promise<Candidate[]> {
  const content = await readFileIfExists(filePath);
  if (content === null) {
    throw new Error(`Candidates file not found: ${filePath}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Candidates file is not valid JSON (${filePath}): ${reason}`);
  }

  return parseCandidates(data);
}
