// ─── Combination Patterns ──────────────────────────────────────────
// Generates every combination of one category that a rank-count
// vector can supply. Run over a full deck it yields the static action
// table; run over a hand it yields the candidate plays.

import type { ComboCategory, Combination, Rank, RankCounts } from "../types/index";
import {
  BLACK_JOKER,
  MAX_CHAIN_RANK,
  NUM_CARDS_PER_SUIT,
  NUM_RANKS,
  RED_JOKER,
  emptyCounts,
  isJoker,
} from "../deck/cards";

/** Categories in action-id band order. */
export const COMBO_CATEGORIES: readonly ComboCategory[] = [
  "solo",
  "soloChain",
  "pair",
  "pairChain",
  "trio",
  "trioWithSolo",
  "trioWithPair",
  "airplane",
  "airplaneWithSolo",
  "airplaneWithPair",
  "bomb",
  "rocket",
];

/** Cards per chain link and per kicker for each category. */
interface CategoryShape {
  readonly width: number;
  readonly kickerWidth: number;
}

const CATEGORY_SHAPES: Readonly<Record<ComboCategory, CategoryShape>> = {
  solo: { width: 1, kickerWidth: 0 },
  soloChain: { width: 1, kickerWidth: 0 },
  pair: { width: 2, kickerWidth: 0 },
  pairChain: { width: 2, kickerWidth: 0 },
  trio: { width: 3, kickerWidth: 0 },
  trioWithSolo: { width: 3, kickerWidth: 1 },
  trioWithPair: { width: 3, kickerWidth: 2 },
  airplane: { width: 3, kickerWidth: 0 },
  airplaneWithSolo: { width: 3, kickerWidth: 1 },
  airplaneWithPair: { width: 3, kickerWidth: 2 },
  bomb: { width: 4, kickerWidth: 0 },
  rocket: { width: 1, kickerWidth: 0 },
};

// A hand holds at most 20 cards, which bounds every chain length.
const SOLO_CHAIN_LENGTHS = { min: 5, max: 12 } as const;
const PAIR_CHAIN_LENGTHS = { min: 3, max: 10 } as const;
const AIRPLANE_LENGTHS = { min: 2, max: 6 } as const;
const AIRPLANE_WITH_SOLO_LENGTHS = { min: 2, max: 5 } as const;
const AIRPLANE_WITH_PAIR_LENGTHS = { min: 2, max: 4 } as const;

/** Solo kickers may repeat a rank up to a trio, never a bomb. */
const MAX_SOLO_KICKER_COPIES = 3;

export function makeCombination(
  category: ComboCategory,
  primaryRank: Rank,
  length = 1,
  kickers: readonly Rank[] = []
): Combination {
  return { category, primaryRank, length, kickers };
}

/** Stable string key for table lookups. */
export function combinationKey(combination: Combination): string {
  const { category, primaryRank, length, kickers } = combination;
  return `${category}:${primaryRank}:${length}:${kickers.join(".")}`;
}

/** The per-rank card counts a combination consumes. */
export function combinationCounts(combination: Combination): number[] {
  const counts = emptyCounts();
  if (combination.category === "rocket") {
    counts[BLACK_JOKER] = 1;
    counts[RED_JOKER] = 1;
    return counts;
  }
  const shape = CATEGORY_SHAPES[combination.category];
  for (let i = 0; i < combination.length; i++) {
    counts[combination.primaryRank + i] += shape.width;
  }
  for (const kicker of combination.kickers) {
    counts[kicker] += shape.kickerWidth;
  }
  return counts;
}

// ─── Generators ────────────────────────────────────────────────────

/**
 * Returns every combination of `category` that `hand` can supply,
 * ordered by length, then primary rank, then kickers.
 */
export function generateCombinations(
  hand: RankCounts,
  category: ComboCategory
): Combination[] {
  switch (category) {
    case "solo":
      return sets(hand, category, 1, NUM_RANKS);
    case "pair":
      return sets(hand, category, 2, NUM_CARDS_PER_SUIT);
    case "trio":
      return sets(hand, category, 3, NUM_CARDS_PER_SUIT);
    case "bomb":
      return sets(hand, category, 4, NUM_CARDS_PER_SUIT);
    case "rocket":
      return hand[BLACK_JOKER] >= 1 && hand[RED_JOKER] >= 1
        ? [makeCombination("rocket", BLACK_JOKER)]
        : [];
    case "soloChain":
      return chains(hand, 1, SOLO_CHAIN_LENGTHS).map(([start, length]) =>
        makeCombination(category, start, length)
      );
    case "pairChain":
      return chains(hand, 2, PAIR_CHAIN_LENGTHS).map(([start, length]) =>
        makeCombination(category, start, length)
      );
    case "airplane":
      return chains(hand, 3, AIRPLANE_LENGTHS).map(([start, length]) =>
        makeCombination(category, start, length)
      );
    case "trioWithSolo":
      return trioWithKicker(hand, category, 1, NUM_RANKS);
    case "trioWithPair":
      return trioWithKicker(hand, category, 2, NUM_CARDS_PER_SUIT);
    case "airplaneWithSolo":
      return airplaneWithSolo(hand);
    case "airplaneWithPair":
      return airplaneWithPair(hand);
  }
}

/** Same-rank sets of `width` cards, over ranks below `rankLimit`. */
function sets(
  hand: RankCounts,
  category: ComboCategory,
  width: number,
  rankLimit: number
): Combination[] {
  const result: Combination[] = [];
  for (let rank = 0; rank < rankLimit; rank++) {
    if (hand[rank] >= width) result.push(makeCombination(category, rank));
  }
  return result;
}

/**
 * Every run of consecutive ranks (3..A) holding at least `width` cards
 * each, as [start, length] pairs ordered by length, then start.
 */
function chains(
  hand: RankCounts,
  width: number,
  lengths: { readonly min: number; readonly max: number }
): Array<readonly [Rank, number]> {
  const result: Array<readonly [Rank, number]> = [];
  for (let length = lengths.min; length <= lengths.max; length++) {
    for (let start = 0; start + length - 1 <= MAX_CHAIN_RANK; start++) {
      let fits = true;
      for (let rank = start; rank < start + length; rank++) {
        if (hand[rank] < width) {
          fits = false;
          break;
        }
      }
      if (fits) result.push([start, length]);
    }
  }
  return result;
}

function trioWithKicker(
  hand: RankCounts,
  category: ComboCategory,
  kickerWidth: number,
  kickerLimit: number
): Combination[] {
  const result: Combination[] = [];
  for (let trio = 0; trio < NUM_CARDS_PER_SUIT; trio++) {
    if (hand[trio] < 3) continue;
    for (let kicker = 0; kicker < kickerLimit; kicker++) {
      if (kicker !== trio && hand[kicker] >= kickerWidth) {
        result.push(makeCombination(category, trio, 1, [kicker]));
      }
    }
  }
  return result;
}

function airplaneWithSolo(hand: RankCounts): Combination[] {
  const result: Combination[] = [];
  for (const [start, length] of chains(hand, 3, AIRPLANE_WITH_SOLO_LENGTHS)) {
    const candidates = ranksOutside(start, length, NUM_RANKS);
    const capOf = (rank: Rank): number =>
      Math.min(hand[rank], isJoker(rank) ? 1 : MAX_SOLO_KICKER_COPIES);
    for (const kickers of multisets(candidates, length, capOf)) {
      // Both jokers together would be a rocket, not a kicker pair.
      if (kickers.includes(BLACK_JOKER) && kickers.includes(RED_JOKER)) continue;
      result.push(makeCombination("airplaneWithSolo", start, length, kickers));
    }
  }
  return result;
}

function airplaneWithPair(hand: RankCounts): Combination[] {
  const result: Combination[] = [];
  for (const [start, length] of chains(hand, 3, AIRPLANE_WITH_PAIR_LENGTHS)) {
    const candidates = ranksOutside(start, length, NUM_CARDS_PER_SUIT).filter(
      (rank) => hand[rank] >= 2
    );
    for (const kickers of multisets(candidates, length, () => 1)) {
      result.push(makeCombination("airplaneWithPair", start, length, kickers));
    }
  }
  return result;
}

function ranksOutside(start: Rank, length: number, rankLimit: number): Rank[] {
  const ranks: Rank[] = [];
  for (let rank = 0; rank < rankLimit; rank++) {
    if (rank < start || rank >= start + length) ranks.push(rank);
  }
  return ranks;
}

/**
 * Ascending multisets of `size` ranks drawn from `candidates`, taking
 * at most `capOf(rank)` copies of each.
 */
function multisets(
  candidates: readonly Rank[],
  size: number,
  capOf: (rank: Rank) => number
): Rank[][] {
  const result: Rank[][] = [];
  const picked: Rank[] = [];

  const visit = (from: number, remaining: number): void => {
    if (remaining === 0) {
      result.push(picked.slice());
      return;
    }
    for (let i = from; i < candidates.length; i++) {
      const rank = candidates[i];
      const limit = Math.min(capOf(rank), remaining);
      for (let copies = 1; copies <= limit; copies++) {
        picked.push(rank);
        visit(i + 1, remaining - copies);
      }
      picked.length -= limit;
    }
  };

  visit(0, size);
  return result;
}
