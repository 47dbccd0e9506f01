// ─── Test Helpers ──────────────────────────────────────────────────
// Builds exact deals for scenario tests. Hands are written as rank
// characters: "3456789TJQKA2", with "B" and "R" for the jokers.

import type { ActionId, CardId, GameOptionsInput, GameState, Rank, Suit } from "../types/index";
import { BLACK_JOKER, RED_JOKER, cardOf, emptyCounts } from "../deck/cards";
import { dealAction, faceUpSlotAction } from "./action-space";
import { createInitialState } from "./game-state";
import { applyAction } from "./reducer";

const RANK_CHARS = "3456789TJQKA2";
const SUITS: readonly Suit[] = [0, 1, 2, 3];

export function rankFromChar(char: string): Rank {
  if (char === "B") return BLACK_JOKER;
  if (char === "R") return RED_JOKER;
  const rank = RANK_CHARS.indexOf(char);
  if (rank === -1) throw new Error(`Unknown rank character: "${char}"`);
  return rank;
}

/** Per-rank counts for a hand string, e.g. handOf("334B"). */
export function handOf(text: string): number[] {
  const counts = emptyCounts();
  for (const char of text) counts[rankFromChar(char)]++;
  return counts;
}

/** Hands out card ids rank by rank, taking suits in order. */
function cardAllocator(): (rank: Rank) => CardId {
  const used = emptyCounts();
  return (rank) => {
    const copy = used[rank]++;
    if (rank === BLACK_JOKER || rank === RED_JOKER) {
      if (copy > 0) throw new Error(`Joker dealt twice: ${rank}`);
      return cardOf(rank, 0);
    }
    if (copy >= SUITS.length) throw new Error(`Rank ${rank} dealt more than four times`);
    return cardOf(rank, SUITS[copy]);
  };
}

/**
 * Plays out the deal so seat `s` ends up with `hands[s]` (17 cards
 * each) and the face-up card is the one dealt at `faceUpSlot`. The
 * three undealt cards form the leftover block.
 */
export function dealHands(
  hands: readonly [string, string, string],
  faceUpSlot: number,
  options: GameOptionsInput = {}
): GameState {
  const allocate = cardAllocator();
  const queues = hands.map((hand) => Array.from(hand, (char) => allocate(rankFromChar(char))));

  let state = applyAction(createInitialState(options), faceUpSlotAction(faceUpSlot));
  for (let i = 0; i < 51; i++) {
    const card = queues[i % 3].shift();
    if (card === undefined) throw new Error(`Seat ${i % 3} has fewer than 17 cards`);
    state = applyAction(state, dealAction(card));
  }
  return state;
}

/** Applies actions in order. */
export function applyAll(state: GameState, actions: readonly ActionId[]): GameState {
  return actions.reduce((current, action) => applyAction(current, action), state);
}

/** The deal most scenario tests share. The leftover block is 2, BJ, RJ. */
export const STANDARD_HANDS = [
  "33334444555566667",
  "77788889999TTTTJJ",
  "JJQQQQKKKKAAAA222",
] as const;
