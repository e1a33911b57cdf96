/**
 * Split a title into highlighted and plain runs for rendering.
 */

export interface TitleRun {
  text: string;
  highlighted: boolean;
}

/**
 * Group the codepoints of `title` into maximal runs that are either all
 * highlighted or all plain. Offsets outside the title are ignored.
 */
export function splitHighlightRuns(title: string, indices: readonly number[]): TitleRun[] {
  const marked = new Set(indices);
  const runs: TitleRun[] = [];

  Array.from(title).forEach((ch, offset) => {
    const highlighted = marked.has(offset);
    const last = runs[runs.length - 1];
    if (last && last.highlighted === highlighted) {
      last.text += ch;
    } else {
      runs.push({ text: ch, highlighted });
    }
  });

  return runs;
}

/** Render `title` with `mark` applied to every highlighted run. */
export function renderHighlighted(
  title: string,
  indices: readonly number[],
  mark: (text: string) => string,
): string {
  return splitHighlightRuns(title, indices)
    .map((run) => (run.highlighted ? mark(run.text) : run.text))
    .join('');
}
