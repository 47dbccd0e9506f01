// ─── Deal ──────────────────────────────────────────────────────────
// The chance-driven opening: the face-up slot is chosen first, then 51
// cards are dealt one at a time in round-robin order. The three cards
// left in the pool become the landlord's block.

import type { ActionId, GameState } from "../types/index";
import { NUM_CARDS, NUM_DEALT_CARDS, rankOf } from "../deck/cards";
import {
  NUM_FACE_UP_SLOTS,
  decodeAction,
  dealAction,
  faceUpSlotAction,
} from "./action-space";
import { InvariantViolationError } from "./errors";
import { type GameDraft, seatForDealIndex } from "./game-state";
import { advancePhase } from "./phase-machine";

/** Deal-phase actions in ascending order: slot choices, then undealt cards. */
export function dealLegalActions(state: GameState): ActionId[] {
  if (state.faceUpSlot === null) {
    return Array.from({ length: NUM_FACE_UP_SLOTS }, (_, slot) => faceUpSlotAction(slot));
  }
  const actions: ActionId[] = [];
  for (let card = 0; card < NUM_CARDS; card++) {
    if (state.pool[card] === 1) actions.push(dealAction(card));
  }
  return actions;
}

/** Applies a slot choice or a card deal to the draft. */
export function applyDealAction(draft: GameDraft, action: ActionId): void {
  const decoded = decodeAction(action);

  if (decoded.kind === "face_up_slot") {
    draft.faceUpSlot = decoded.slot;
    return;
  }
  if (decoded.kind !== "deal") {
    throw new InvariantViolationError(`Not a deal action: ${action}`);
  }

  const { card } = decoded;
  if (draft.pool[card] !== 1) {
    throw new InvariantViolationError(`Card ${card} is not in the pool`);
  }

  const seat = seatForDealIndex(draft.dealIndex);
  const rank = rankOf(card);
  if (draft.dealIndex === draft.faceUpSlot) {
    draft.firstPlayer = seat;
    draft.faceUpRank = rank;
  }
  draft.pool[card] = 0;
  draft.hands[seat][rank]++;
  draft.dealIndex++;

  if (draft.dealIndex === NUM_DEALT_CARDS) {
    finishDeal(draft);
  }
}

/** Sets the leftover block aside and opens the auction. */
function finishDeal(draft: GameDraft): void {
  for (let card = 0; card < NUM_CARDS; card++) {
    if (draft.pool[card] === 1) {
      draft.leftover.push(rankOf(card));
      draft.pool[card] = 0;
    }
  }
  if (draft.firstPlayer === null) {
    throw new InvariantViolationError("Deal finished without a face-up card");
  }
  advancePhase(draft, "auction");
  draft.currentPlayer = draft.firstPlayer;
}
