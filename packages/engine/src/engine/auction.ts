// ─── Auction ───────────────────────────────────────────────────────
// Sequential bidding that elects the landlord. Bids strictly increase;
// the turn moves round-robin after every bid or pass.

import type { ActionId, GameState, Seat } from "../types/index";
import { MAX_BID, PASS, bidAction, decodeAction } from "./action-space";
import { InvariantViolationError } from "./errors";
import { type GameDraft, nextSeat } from "./game-state";
import { advancePhase } from "./phase-machine";
import { NUM_PLAYERS } from "../deck/cards";

/** Pass, then every bid above the current winning bid. */
export function biddingLegalActions(state: GameState): ActionId[] {
  const actions: ActionId[] = [PASS];
  for (let value = state.winningBid + 1; value <= MAX_BID; value++) {
    actions.push(bidAction(value));
  }
  return actions;
}

export function applyBiddingAction(draft: GameDraft, seat: Seat, action: ActionId): void {
  const decoded = decodeAction(action);

  if (decoded.kind === "bid") {
    if (decoded.value <= draft.winningBid || decoded.value > MAX_BID) {
      throw new InvariantViolationError(
        `Bid ${decoded.value} does not raise the winning bid ${draft.winningBid}`
      );
    }
    draft.winningBid = decoded.value;
    draft.landlord = seat;
    draft.consecutivePasses = 0;
    if (decoded.value === MAX_BID) {
      finalizeAuction(draft, seat);
      return;
    }
    draft.currentPlayer = nextSeat(seat);
    return;
  }

  if (decoded.kind !== "pass") {
    throw new InvariantViolationError(`Not an auction action: ${action}`);
  }

  draft.consecutivePasses++;
  if (draft.consecutivePasses === NUM_PLAYERS && draft.winningBid === 0) {
    // Nobody bid: the hand is thrown in and the leftover stays aside.
    advancePhase(draft, "game_over");
    draft.currentPlayer = null;
    return;
  }
  if (draft.consecutivePasses === NUM_PLAYERS - 1 && draft.landlord !== null) {
    finalizeAuction(draft, draft.landlord);
    return;
  }
  draft.currentPlayer = nextSeat(seat);
}

/** Hands the leftover block to the landlord and opens the first trick. */
function finalizeAuction(draft: GameDraft, landlord: Seat): void {
  for (const rank of draft.leftover) {
    draft.hands[landlord][rank]++;
  }
  draft.leftover = [];
  advancePhase(draft, "play");
  draft.landlord = landlord;
  draft.currentPlayer = landlord;
  draft.consecutivePasses = 0;
  draft.tricks.push({ leader: landlord, winningAction: null, winningPlayer: landlord });
  draft.newTrickBegin = true;
}
