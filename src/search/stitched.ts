/**
 * Stitched multi-word prefix matching.
 *
 * A token such as `termrig` is split into contiguous chunks (`term` + `rig`)
 * that each match the start of a distinct word segment, left to right, with
 * words allowed to be skipped but never reused or reordered. At least two
 * words must take part.
 *
 * The search fills a table over `(tokenIndex, wordIndex, usedWordCount)`
 * bottom-up, from the last word segment back to the first, keeping only the
 * row for the following word. Only "none / one / two or more" matters for
 * the used-word condition, so the count is capped at 2. No recursion is
 * involved, so long fields cannot exhaust the stack.
 */

import { clamp, matchesAt, range, type MatchFn } from './strategies.js';
import type { PreparedText } from './tokenize.js';

export const STITCHED_MIN_TOKEN = 4;

const STITCHED_BASE = 1500;
const STITCHED_CEILING = 2700;
const CHUNK_CHAR_REWARD = 60;
const CONTIGUOUS_WORD_BONUS = 30;
const LEFTOVER_CHAR_PENALTY = 4;
const POSITION_PENALTY = 1;
/** Skipping a word between chunks also forfeits the contiguity bonus. */
const SKIPPED_WORD_PENALTY = 40 + CONTIGUOUS_WORD_BONUS;
const EXCESS_CHAR_PENALTY = 2;
const EXCESS_CAP = 200;

interface StitchPlan {
  reward: number;
  positions: number[];
}

/** Row of plans for one word index, laid out as `tokenIndex * 3 + used`. */
type PlanRow = (StitchPlan | null)[];

function finishedRow(tokenLength: number): PlanRow {
  const row: PlanRow = new Array<StitchPlan | null>((tokenLength + 1) * 3).fill(null);
  row[tokenLength * 3 + 2] = { reward: 0, positions: [] };
  return row;
}

function planStitch(token: readonly string[], target: PreparedText): StitchPlan | null {
  const { chars, segments } = target;
  const tokenLength = token.length;

  // Row for wordIndex = segments.length: only a fully consumed token counts.
  let next = finishedRow(tokenLength);

  for (let wordIndex = segments.length - 1; wordIndex >= 0; wordIndex--) {
    const row = finishedRow(tokenLength);
    const segment = segments[wordIndex];
    const wordLength = segment.end - segment.start;

    for (let tokenIndex = 0; tokenIndex < tokenLength; tokenIndex++) {
      const longest = Math.min(tokenLength - tokenIndex, wordLength);

      for (let used = 0; used <= 2; used++) {
        let best: StitchPlan | null = null;

        for (let length = longest; length >= 1; length--) {
          if (!matchesAt(chars, segment.start, token, tokenIndex, length)) continue;

          const rest = next[(tokenIndex + length) * 3 + Math.min(used + 1, 2)];
          if (!rest) continue;

          const reward =
            length * CHUNK_CHAR_REWARD +
            (used > 0 ? CONTIGUOUS_WORD_BONUS : 0) -
            (wordLength - length) * LEFTOVER_CHAR_PENALTY -
            segment.start * POSITION_PENALTY +
            rest.reward;

          if (!best || reward > best.reward) {
            best = {
              reward,
              positions: [...range(segment.start, segment.start + length), ...rest.positions],
            };
          }
        }

        const skipped = next[tokenIndex * 3 + used];
        if (skipped) {
          const reward = skipped.reward - (used > 0 ? SKIPPED_WORD_PENALTY : 0);
          if (!best || reward > best.reward) {
            best = { reward, positions: skipped.positions };
          }
        }

        row[tokenIndex * 3 + used] = best;
      }
    }

    next = row;
  }

  return next[0];
}

export const matchStitched: MatchFn = (token, target) => {
  if (token.length < STITCHED_MIN_TOKEN || target.segments.length < 2) return null;

  const plan = planStitch(token, target);
  if (!plan) return null;

  const excess = Math.max(0, target.chars.length - token.length);
  const score =
    STITCHED_BASE + plan.reward - Math.min(excess * EXCESS_CHAR_PENALTY, EXCESS_CAP);

  return {
    strategy: 'stitched',
    score: clamp(score, STITCHED_BASE, STITCHED_CEILING),
    positions: plan.positions,
  };
};
