// ─── Card Codec ────────────────────────────────────────────────────
// Bijection between flat card ids and (rank, suit), plus the rank
// ordering used by bidding and trick comparison. Pure functions only.

import type { CardId, Rank, RankCounts, Suit } from "../types/index";

export const NUM_PLAYERS = 3;
export const NUM_SUITS = 4;
export const NUM_CARDS_PER_SUIT = 13;
/** 13 suited ranks plus the two jokers. */
export const NUM_RANKS = 15;
export const NUM_CARDS = 54;
export const NUM_LEFTOVER_CARDS = 3;
export const NUM_DEALT_CARDS = NUM_CARDS - NUM_LEFTOVER_CARDS;

export const BLACK_JOKER: Rank = 13;
export const RED_JOKER: Rank = 14;
/** Highest rank allowed in a chain (the ace). */
export const MAX_CHAIN_RANK: Rank = 11;

const RANK_LABELS: readonly string[] = [
  "3", "4", "5", "6", "7", "8", "9", "T", "J", "Q", "K", "A", "2", "BJ", "RJ",
];

const SUIT_SYMBOLS: readonly string[] = ["♣", "♦", "♥", "♠"];

/** Returns the rank of a card. Jokers occupy the two top ranks. */
export function rankOf(card: CardId): Rank {
  if (card === NUM_CARDS - 2) return BLACK_JOKER;
  if (card === NUM_CARDS - 1) return RED_JOKER;
  return card % NUM_CARDS_PER_SUIT;
}

/** Returns the suit of a suited card, or null for a joker. */
export function suitOf(card: CardId): Suit | null {
  if (card >= NUM_CARDS - 2) return null;
  const suit = Math.floor(card / NUM_CARDS_PER_SUIT);
  switch (suit) {
    case 0:
    case 1:
    case 2:
    case 3:
      return suit;
    default:
      return null;
  }
}

/** Inverse of rankOf/suitOf. Jokers ignore the suit. */
export function cardOf(rank: Rank, suit: Suit): CardId {
  if (rank === BLACK_JOKER) return NUM_CARDS - 2;
  if (rank === RED_JOKER) return NUM_CARDS - 1;
  return suit * NUM_CARDS_PER_SUIT + rank;
}

export function isJoker(rank: Rank): boolean {
  return rank === BLACK_JOKER || rank === RED_JOKER;
}

/** Copies of a rank in a full deck: four for suited ranks, one per joker. */
export function copiesOfRank(rank: Rank): number {
  return isJoker(rank) ? 1 : NUM_SUITS;
}

/**
 * Total order over ranks: negative when `a` ranks below `b`.
 * Rank indices are already in play order, so this is a subtraction.
 */
export function compareRanks(a: Rank, b: Rank): number {
  return a - b;
}

export function rankLabel(rank: Rank): string {
  const label = RANK_LABELS[rank];
  if (label === undefined) {
    throw new RangeError(`Rank out of range: ${rank}`);
  }
  return label;
}

/** Human-readable card, e.g. "T♥" or "RJ". */
export function cardLabel(card: CardId): string {
  const suit = suitOf(card);
  const rank = rankLabel(rankOf(card));
  return suit === null ? rank : `${rank}${SUIT_SYMBOLS[suit]}`;
}

/** A fresh all-zero count vector. */
export function emptyCounts(): number[] {
  return new Array<number>(NUM_RANKS).fill(0);
}

export function countCards(counts: RankCounts): number {
  return counts.reduce((sum, n) => sum + n, 0);
}

/** Ranks in ascending order, each repeated by its count: "33TBJ". */
export function formatCounts(counts: RankCounts): string {
  let text = "";
  for (let rank = 0; rank < NUM_RANKS; rank++) {
    for (let i = 0; i < (counts[rank] ?? 0); i++) {
      text += rankLabel(rank);
    }
  }
  return text;
}
