// ─── Combination Rules ─────────────────────────────────────────────
// The beats-relation between plays and the legal-play search over a
// hand. Comparisons use the cached classification of each id.

import type { ActionId, ComboCategory, Combination, RankCounts } from "../types/index";
import { combinationOf, encodeCombination } from "./action-space";
import { COMBO_CATEGORIES, generateCombinations } from "./patterns";

/**
 * Whether `candidate` may follow `current` within a trick.
 *
 * A rocket beats anything but a rocket; a bomb beats anything but a
 * bomb or rocket. Otherwise the category and chain length must match
 * and the primary rank must be strictly higher. Any other pairing is
 * incomparable, which makes the play illegal rather than losing.
 */
export function beats(candidate: Combination, current: Combination): boolean {
  if (candidate.category === "rocket") {
    return current.category !== "rocket";
  }
  if (candidate.category === "bomb" && current.category !== "bomb") {
    return current.category !== "rocket";
  }
  return (
    candidate.category === current.category &&
    candidate.length === current.length &&
    candidate.primaryRank > current.primaryRank
  );
}

/** Id-level form of {@link beats}. */
export function actionBeats(candidate: ActionId, current: ActionId): boolean {
  return beats(combinationOf(candidate), combinationOf(current));
}

/**
 * Every play from `hand` that may follow `winningAction`, or every
 * play the hand supports when leading (`winningAction` null).
 * Returns deduplicated ids in ascending order. Pass is not included.
 */
export function searchLegalPlays(
  hand: RankCounts,
  winningAction: ActionId | null
): ActionId[] {
  const current = winningAction === null ? null : combinationOf(winningAction);
  const categories: readonly ComboCategory[] =
    current === null
      ? COMBO_CATEGORIES
      : Array.from(new Set<ComboCategory>([current.category, "bomb", "rocket"]));

  const ids = new Set<ActionId>();
  for (const category of categories) {
    for (const candidate of generateCombinations(hand, category)) {
      if (current === null || beats(candidate, current)) {
        ids.add(encodeCombination(candidate));
      }
    }
  }

  return Array.from(ids).sort((a, b) => a - b);
}
