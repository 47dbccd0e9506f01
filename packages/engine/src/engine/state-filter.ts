// ─── State Filter ──────────────────────────────────────────────────
// Produces per-seat views of the game state, hiding what that seat
// must not see: opponents' hands and the leftover block before the
// auction hands it over.

import type { GameState, PlayerView, Seat } from "../types/index";
import { NUM_PLAYERS, countCards } from "../deck/cards";
import { getLegalActions } from "./action-validator";
import { currentTrick } from "./game-state";

/**
 * Creates the view of the game for one seat. Legal actions are only
 * listed when it is that seat's turn.
 */
export function createPlayerView(state: GameState, seat: Seat): PlayerView {
  const isMyTurn =
    (state.phase === "auction" || state.phase === "play") && state.currentPlayer === seat;

  return {
    seat,
    phase: state.phase,
    hand: [...state.hands[seat]],
    handSizes: state.hands.map((hand) => countCards(hand)),
    playedCards: [...state.playedCards],
    faceUpRank: state.faceUpRank,
    firstPlayer: state.firstPlayer,
    landlord: state.landlord,
    positionFromLandlord:
      state.landlord === null ? null : (seat - state.landlord + NUM_PLAYERS) % NUM_PLAYERS,
    winningBid: state.winningBid,
    currentTrick: state.phase === "play" ? currentTrick(state) : null,
    isMyTurn,
    legalActions: isMyTurn ? [...getLegalActions(state)] : [],
  };
}
