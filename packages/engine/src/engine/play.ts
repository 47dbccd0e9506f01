// ─── Trick Engine ──────────────────────────────────────────────────
// Applies passes and plays within the open trick, closes tricks after
// two passes, and ends the game when a hand runs out.

import type { ActionId, GameState, Seat } from "../types/index";
import { NUM_PLAYERS, NUM_RANKS, countCards } from "../deck/cards";
import { PASS, actionToHand, isBombAction, isPlayAction } from "./action-space";
import { searchLegalPlays } from "./combinations";
import { InvariantViolationError } from "./errors";
import { type GameDraft, currentTrick, nextSeat } from "./game-state";
import { advancePhase } from "./phase-machine";
import { computeReturns } from "./settlement";

/**
 * Legal actions for the seat to move. The trick leader may not pass;
 * everyone else may pass or play something that beats the standing play.
 */
export function playLegalActions(state: GameState): ActionId[] {
  const seat = state.currentPlayer;
  const trick = currentTrick(state);
  if (seat === null || trick === null) return [];

  const plays = searchLegalPlays(
    state.hands[seat],
    state.newTrickBegin ? null : trick.winningAction
  );
  return state.newTrickBegin ? plays : [PASS, ...plays];
}

export function applyPlayAction(draft: GameDraft, seat: Seat, action: ActionId): void {
  if (action === PASS) {
    applyPass(draft, seat);
    return;
  }
  if (!isPlayAction(action)) {
    throw new InvariantViolationError(`Not a play action: ${action}`);
  }

  const trick = draft.tricks[draft.tricks.length - 1];
  if (trick === undefined) {
    throw new InvariantViolationError("No open trick");
  }

  const used = actionToHand(action);
  const hand = draft.hands[seat];
  for (let rank = 0; rank < NUM_RANKS; rank++) {
    if (hand[rank] < used[rank]) {
      throw new InvariantViolationError(
        `Seat ${seat} holds ${hand[rank]} of rank ${rank} but action ${action} uses ${used[rank]}`
      );
    }
  }
  for (let rank = 0; rank < NUM_RANKS; rank++) {
    hand[rank] -= used[rank];
    draft.playedCards[rank] += used[rank];
  }

  trick.winningAction = action;
  trick.winningPlayer = seat;
  draft.consecutivePasses = 0;
  draft.newTrickBegin = false;
  draft.handsPlayed[seat]++;
  if (isBombAction(action)) draft.bombsPlayed++;

  if (countCards(hand) === 0) {
    finishGame(draft, seat);
    return;
  }
  draft.currentPlayer = nextSeat(seat);
}

function applyPass(draft: GameDraft, seat: Seat): void {
  if (draft.newTrickBegin) {
    throw new InvariantViolationError("The trick leader cannot pass");
  }
  const trick = draft.tricks[draft.tricks.length - 1];
  if (trick === undefined) {
    throw new InvariantViolationError("No open trick");
  }

  draft.consecutivePasses++;
  if (draft.consecutivePasses < NUM_PLAYERS - 1) {
    draft.currentPlayer = nextSeat(seat);
    return;
  }

  const winner = trick.winningPlayer;
  draft.tricks.push({ leader: winner, winningAction: null, winningPlayer: winner });
  draft.currentPlayer = winner;
  draft.newTrickBegin = true;
  draft.consecutivePasses = 0;
}

function finishGame(draft: GameDraft, winner: Seat): void {
  const landlord = draft.landlord;
  if (landlord === null) {
    throw new InvariantViolationError("Play ended without a landlord");
  }
  draft.finalWinner = winner;
  draft.returns = computeReturns(
    {
      landlord,
      winningBid: draft.winningBid,
      bombsPlayed: draft.bombsPlayed,
      handsPlayed: draft.handsPlayed,
      finalWinner: winner,
    },
    draft.options
  );
  advancePhase(draft, "game_over");
  draft.currentPlayer = null;
}
