/**
 * Title Similarity Scorer
 *
 * Fuzzy partial match between two free-text titles. Both scores below are
 * built on the Dice coefficient from string-similarity, which is symmetric and
 * bounded in [0,1]; taking the max keeps those properties.
 */

import { compareTwoStrings } from "string-similarity";

export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();
}

function tokenSorted(title: string): string {
  return title.split(" ").sort().join(" ");
}

/**
 * Best Dice score of the shorter title against every same-length window of
 * the longer one, so "developer" fully matches "senior developer".
 */
export function partialRatio(a: string, b: string): number {
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  if (shorter.length === 0) {
    return 0;
  }

  let best = 0;
  for (let start = 0; start + shorter.length <= longer.length; start++) {
    const window = longer.slice(start, start + shorter.length);
    best = Math.max(best, compareTwoStrings(shorter, window));
    if (best === 1) {
      break;
    }
  }
  return best;
}

/**
 * Similarity in [0,1], or null when either title is blank (component omitted)
 */
export function titleSimilarity(a: string | undefined, b: string | undefined): number | null {
  const left = normalizeTitle(a ?? "");
  const right = normalizeTitle(b ?? "");
  if (!left || !right) {
    return null;
  }

  // Word order is ignored so "Developer, Senior" matches "Senior Developer"
  const reordered = compareTwoStrings(tokenSorted(left), tokenSorted(right));
  return Math.max(partialRatio(left, right), reordered);
}
