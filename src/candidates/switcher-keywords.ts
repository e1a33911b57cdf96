/**
 * Keyword indexing for switcher destinations.
 *
 * Workspaces and surfaces become searchable by their working directories,
 * git branches and listening ports. Surface rows also get the short forms
 * (directory name, branch name after the last `/`) so that a directory-name
 * query ranks the surface above the workspace that contains it.
 */

import type { SwitcherMetadata } from '../types/index.js';

/** How much metadata detail to index. */
export type SwitcherDetail = 'workspace' | 'surface';

/** Last non-empty `/`-separated component, or `null` for `/` or `''`. */
export function lastPathComponent(value: string): string | null {
  const parts = value.split('/').filter((p) => p.length > 0);
  return parts.length > 0 ? parts[parts.length - 1] : null;
}

/**
 * Base keywords followed by metadata keywords, de-duplicated in order.
 *
 * @param baseKeywords - Keywords the destination already carries.
 * @param metadata     - Directories, branches and ports to index.
 * @param detail       - `'surface'` adds directory and branch short names.
 */
export function buildSwitcherKeywords(
  baseKeywords: readonly string[],
  metadata: SwitcherMetadata,
  detail: SwitcherDetail = 'surface',
): string[] {
  const keywords: string[] = [...baseKeywords];

  for (const raw of metadata.directories ?? []) {
    const directory = raw.trim();
    if (!directory) continue;
    keywords.push(directory);
    if (detail === 'surface') {
      const name = lastPathComponent(directory);
      if (name) keywords.push(name);
    }
  }

  for (const raw of metadata.branches ?? []) {
    const branch = raw.trim();
    if (!branch) continue;
    keywords.push(branch);
    if (detail === 'surface' && branch.includes('/')) {
      const name = lastPathComponent(branch);
      if (name) keywords.push(name);
    }
  }

  for (const port of metadata.ports ?? []) {
    if (!Number.isInteger(port) || port <= 0) continue;
    keywords.push(String(port), `:${port}`);
  }

  return [...new Set(keywords)];
}
