// ─── Game State Factory ────────────────────────────────────────────
// Builds the initial state and the mutable drafts the reducer works
// on. A draft is a deep copy: nothing in it aliases the source state.

import type {
  ActionRecord,
  CurrentPlayer,
  GameOptions,
  GameOptionsInput,
  GameState,
  Seat,
  Trick,
} from "../types/index";
import { NUM_CARDS, NUM_PLAYERS, countCards, emptyCounts } from "../deck/cards";
import { loadGameOptions } from "./options";
import { phaseMachine } from "./phase-machine";

/** Recursively strips `readonly` so the reducer can edit a private copy. */
export type Draft<T> = T extends readonly (infer U)[]
  ? Draft<U>[]
  : T extends object
    ? { -readonly [K in keyof T]: Draft<T[K]> }
    : T;

export type GameDraft = Draft<GameState>;

export const SEATS: readonly Seat[] = [0, 1, 2];

/** The seat after `seat` in round-robin order. */
export function nextSeat(seat: Seat): Seat {
  return seat === 0 ? 1 : seat === 1 ? 2 : 0;
}

/** The seat that receives the card at a chronological deal position. */
export function seatForDealIndex(dealIndex: number): Seat {
  const seat = dealIndex % NUM_PLAYERS;
  return seat === 0 ? 0 : seat === 1 ? 1 : 2;
}

/**
 * Creates the state of a fresh game: a full pool, empty hands, and no
 * face-up slot chosen yet.
 *
 * @throws {GameOptionsError} if `options` fails validation.
 */
export function createInitialState(options: GameOptionsInput = {}): GameState {
  return {
    options: loadGameOptions(options),
    phase: "deal",
    pool: new Array<number>(NUM_CARDS).fill(1),
    hands: SEATS.map(() => emptyCounts()),
    dealIndex: 0,
    faceUpSlot: null,
    faceUpRank: null,
    firstPlayer: null,
    leftover: [],
    currentPlayer: null,
    winningBid: 0,
    landlord: null,
    consecutivePasses: 0,
    tricks: [],
    newTrickBegin: false,
    playedCards: emptyCounts(),
    handsPlayed: SEATS.map(() => 0),
    bombsPlayed: 0,
    finalWinner: null,
    returns: SEATS.map(() => 0),
    history: [],
  };
}

/** Deep copy of a state, safe to mutate. */
export function cloneState(state: GameState): GameDraft {
  const options: GameOptions = { ...state.options };
  const tricks: Trick[] = state.tricks.map((trick) => ({ ...trick }));
  const history: ActionRecord[] = state.history.map((record) => ({ ...record }));
  return {
    ...state,
    options,
    pool: [...state.pool],
    hands: state.hands.map((hand) => [...hand]),
    leftover: [...state.leftover],
    tricks,
    playedCards: [...state.playedCards],
    handsPlayed: [...state.handsPlayed],
    returns: [...state.returns],
    history,
  };
}

/** The open trick. Only defined during play. */
export function currentTrick(state: GameState): Trick | null {
  return state.tricks.length > 0 ? state.tricks[state.tricks.length - 1] : null;
}

export function currentPlayer(state: GameState): CurrentPlayer {
  if (state.phase === "deal") return "chance";
  if (state.phase === "game_over" || state.currentPlayer === null) return "terminal";
  return state.currentPlayer;
}

export function isTerminal(state: GameState): boolean {
  return phaseMachine.isTerminalPhase(state.phase);
}

/** Per-seat payouts; all zero until the game ends. */
export function getReturns(state: GameState): readonly number[] {
  return state.returns;
}

/**
 * Cards accounted for across pool, hands, played ledger and leftover
 * block. Always equals 54.
 */
export function countAllCards(state: GameState): number {
  const pool = state.pool.reduce((sum, n) => sum + n, 0);
  const hands = state.hands.reduce((sum, hand) => sum + countCards(hand), 0);
  return pool + hands + countCards(state.playedCards) + state.leftover.length;
}
