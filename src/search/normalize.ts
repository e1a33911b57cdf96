/**
 * Case and diacritic folding for queries and candidate text.
 *
 * Folding works one codepoint at a time so every folded character still
 * knows which codepoint of the source string it came from. The highlighter
 * relies on that mapping to turn matched positions back into title offsets.
 */

/** Combining diacritical marks left behind by NFD decomposition. */
const COMBINING_MARKS = /[\u0300-\u036f]/g;

const WHITESPACE = /\s/;

/** A folded string together with the source offset of each character. */
export interface FoldedText {
  /** Folded codepoints, trimmed of leading and trailing whitespace. */
  chars: string[];
  /** `sourceOffsets[i]` is the codepoint offset of `chars[i]` in the input. */
  sourceOffsets: number[];
}

/**
 * Fold a single codepoint: strip diacritics, lower-case.
 * Returns an empty string for a bare combining mark.
 */
export function foldCharacter(ch: string): string {
  const folded = ch.normalize('NFD').replace(COMBINING_MARKS, '').toLowerCase();
  const [first] = Array.from(folded);
  return first ?? '';
}

/** Fold a string into codepoints with their source offsets, trimmed. */
export function foldText(input: string): FoldedText {
  const chars: string[] = [];
  const sourceOffsets: number[] = [];

  Array.from(input).forEach((ch, offset) => {
    const folded = foldCharacter(ch);
    if (folded === '') return;
    chars.push(folded);
    sourceOffsets.push(offset);
  });

  let start = 0;
  let end = chars.length;
  while (start < end && WHITESPACE.test(chars[start])) start++;
  while (end > start && WHITESPACE.test(chars[end - 1])) end--;

  return {
    chars: chars.slice(start, end),
    sourceOffsets: sourceOffsets.slice(start, end),
  };
}

/** Diacritic-free, lower-cased, trimmed form of `input`. */
export function normalizeText(input: string): string {
  return foldText(input).chars.join('');
}
