// ─── Action Space ──────────────────────────────────────────────────
// Maps the flat integer action space to its meaning in each phase.
// Bands are contiguous and fixed: face-up slot choices, card deals,
// Pass, bids, then one id per play combination. Decoding is a range
// check plus a table lookup.

import type { ActionId, CardId, ComboCategory, Combination, RankCounts } from "../types/index";
import { NUM_CARDS, NUM_DEALT_CARDS, NUM_RANKS, copiesOfRank } from "../deck/cards";
import {
  COMBO_CATEGORIES,
  combinationCounts,
  combinationKey,
  generateCombinations,
} from "./patterns";
import { InvariantViolationError } from "./errors";

export const MAX_BID = 3;

/** One choice per chronological deal position. */
export const NUM_FACE_UP_SLOTS = NUM_DEALT_CARDS;
export const FACE_UP_SLOT_BASE: ActionId = 0;
export const DEAL_ACTION_BASE: ActionId = FACE_UP_SLOT_BASE + NUM_FACE_UP_SLOTS;
export const PASS: ActionId = DEAL_ACTION_BASE + NUM_CARDS;
/** Bid `v` is `BID_ACTION_BASE + v`; the base itself is Pass. */
export const BID_ACTION_BASE: ActionId = PASS;
export const PLAY_ACTION_BASE: ActionId = BID_ACTION_BASE + MAX_BID + 1;

/** A contiguous run of play ids sharing one category. */
export interface PlayBand {
  readonly category: ComboCategory;
  readonly base: ActionId;
  readonly size: number;
}

interface PlayTable {
  readonly combinations: readonly Combination[];
  readonly bands: readonly PlayBand[];
  readonly ids: ReadonlyMap<string, ActionId>;
}

const FULL_DECK: RankCounts = Array.from({ length: NUM_RANKS }, (_, rank) =>
  copiesOfRank(rank)
);

function buildPlayTable(): PlayTable {
  const combinations: Combination[] = [];
  const bands: PlayBand[] = [];
  const ids = new Map<string, ActionId>();

  let next = PLAY_ACTION_BASE;
  for (const category of COMBO_CATEGORIES) {
    const members = generateCombinations(FULL_DECK, category);
    bands.push({ category, base: next, size: members.length });
    for (const combination of members) {
      ids.set(combinationKey(combination), next);
      combinations.push(combination);
      next++;
    }
  }

  return { combinations, bands, ids };
}

const PLAY_TABLE = buildPlayTable();

export const PLAY_BANDS: readonly PlayBand[] = PLAY_TABLE.bands;
export const NUM_DISTINCT_ACTIONS =
  PLAY_ACTION_BASE + PLAY_TABLE.combinations.length;

export function bandOf(category: ComboCategory): PlayBand {
  const band = PLAY_BANDS.find((b) => b.category === category);
  if (!band) {
    throw new InvariantViolationError(`No action band for category "${category}"`);
  }
  return band;
}

/** First id of the bomb band; every id from here on is a bomb or the rocket. */
export const BOMB_ACTION_BASE: ActionId = bandOf("bomb").base;
export const ROCKET_ACTION: ActionId = bandOf("rocket").base;

// ─── Encoding ──────────────────────────────────────────────────────

export function faceUpSlotAction(slot: number): ActionId {
  return FACE_UP_SLOT_BASE + slot;
}

export function dealAction(card: CardId): ActionId {
  return DEAL_ACTION_BASE + card;
}

export function bidAction(value: number): ActionId {
  return BID_ACTION_BASE + value;
}

/**
 * Returns the id of a combination.
 * @throws {InvariantViolationError} if the combination is not in the table.
 */
export function encodeCombination(combination: Combination): ActionId {
  const id = PLAY_TABLE.ids.get(combinationKey(combination));
  if (id === undefined) {
    throw new InvariantViolationError(
      `Combination is not in the action table: ${combinationKey(combination)}`
    );
  }
  return id;
}

// ─── Decoding ──────────────────────────────────────────────────────

/** The semantic payload of an action id. */
export type DecodedAction =
  | { readonly kind: "face_up_slot"; readonly slot: number }
  | { readonly kind: "deal"; readonly card: CardId }
  | { readonly kind: "pass" }
  | { readonly kind: "bid"; readonly value: number }
  | { readonly kind: "play"; readonly combination: Combination };

/**
 * Decodes an action id by band.
 * @throws {RangeError} for ids outside the action space.
 */
export function decodeAction(action: ActionId): DecodedAction {
  if (!Number.isInteger(action) || action < 0 || action >= NUM_DISTINCT_ACTIONS) {
    throw new RangeError(`Action id out of range: ${action}`);
  }
  if (action < DEAL_ACTION_BASE) {
    return { kind: "face_up_slot", slot: action - FACE_UP_SLOT_BASE };
  }
  if (action < PASS) {
    return { kind: "deal", card: action - DEAL_ACTION_BASE };
  }
  if (action === PASS) {
    return { kind: "pass" };
  }
  if (action < PLAY_ACTION_BASE) {
    return { kind: "bid", value: action - BID_ACTION_BASE };
  }
  return { kind: "play", combination: combinationOf(action) };
}

export function isPlayAction(action: ActionId): boolean {
  return action >= PLAY_ACTION_BASE && action < NUM_DISTINCT_ACTIONS;
}

/** Bombs and the rocket both count toward payout doubling. */
export function isBombAction(action: ActionId): boolean {
  return action >= BOMB_ACTION_BASE && action < NUM_DISTINCT_ACTIONS;
}

/**
 * Returns the cached classification of a play id.
 * @throws {RangeError} if the id is not a play.
 */
export function combinationOf(action: ActionId): Combination {
  const combination = isPlayAction(action)
    ? PLAY_TABLE.combinations[action - PLAY_ACTION_BASE]
    : undefined;
  if (combination === undefined) {
    throw new RangeError(`Not a play action: ${action}`);
  }
  return combination;
}

/** The per-rank cards a play action removes from a hand. */
export function actionToHand(action: ActionId): number[] {
  return combinationCounts(combinationOf(action));
}
