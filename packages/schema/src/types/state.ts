// ─── Game State & Actions ──────────────────────────────────────────
// Runtime state of one game, plus the records of applied actions.
// State is never mutated in place; the reducer returns a new state.

import type { Rank, RankCounts, Seat } from "./card";
import type { GameOptions } from "../schema/validation";

// ─── Actions ───────────────────────────────────────────────────────

/**
 * An action in the flat action-id space. Bands, in order: face-up slot
 * choices, card deals, Pass, bids, then every play combination.
 */
export type ActionId = number;

/** Who applied an action: a seat, or the chance player while dealing. */
export type Actor = Seat | "chance";

/** An applied action, stored in the append-only history. */
export interface ActionRecord {
  readonly actor: Actor;
  readonly action: ActionId;
  /** Phase the action was applied in. */
  readonly phase: Phase;
}

// ─── Phase ─────────────────────────────────────────────────────────

/** Game lifecycle. Phases only move forward; none is revisited. */
export type Phase = "deal" | "auction" | "play" | "game_over";

/** Whose move it is: a seat, the chance player, or nobody. */
export type CurrentPlayer = Seat | "chance" | "terminal";

// ─── Trick ─────────────────────────────────────────────────────────

/**
 * One leader-initiated round of play. `winningAction` is null until
 * the leader plays; `winningPlayer` starts as the leader.
 */
export interface Trick {
  readonly leader: Seat;
  readonly winningAction: ActionId | null;
  readonly winningPlayer: Seat;
}

// ─── Game State ────────────────────────────────────────────────────

/**
 * The complete, serializable state of a game at a point in time.
 *
 * Card conservation holds in every reachable state:
 * pool + hands + played ledger + leftover block = 54.
 */
export interface GameState {
  readonly options: GameOptions;
  readonly phase: Phase;

  /** Undealt cards, one slot per card id (1 = still in the pool). */
  readonly pool: readonly number[];
  readonly hands: readonly RankCounts[];
  /** Cards dealt to players so far. */
  readonly dealIndex: number;
  /** Chronological deal position whose card is revealed. */
  readonly faceUpSlot: number | null;
  readonly faceUpRank: Rank | null;
  /** Seat that received the revealed card; opens the auction. */
  readonly firstPlayer: Seat | null;
  /** Ranks of the cards set aside for the landlord. */
  readonly leftover: readonly Rank[];

  readonly currentPlayer: Seat | null;
  /** Highest bid so far; 0 while nobody has bid. */
  readonly winningBid: number;
  readonly landlord: Seat | null;
  /** Consecutive passes since the last bid or real play. */
  readonly consecutivePasses: number;

  readonly tricks: readonly Trick[];
  /** True only between a trick opening and its leader's first play. */
  readonly newTrickBegin: boolean;
  readonly playedCards: RankCounts;
  /** Real (non-pass) plays per seat. */
  readonly handsPlayed: readonly number[];
  /** Bombs and rockets played. */
  readonly bombsPlayed: number;
  readonly finalWinner: Seat | null;

  /** Per-seat payouts; all zero until the game is over. */
  readonly returns: readonly number[];
  readonly history: readonly ActionRecord[];
}

// ─── Player View ───────────────────────────────────────────────────

/**
 * A projection of game state for one seat. Opponent hands are reduced
 * to their sizes; the leftover block is never shown.
 */
export interface PlayerView {
  readonly seat: Seat;
  readonly phase: Phase;
  readonly hand: RankCounts;
  readonly handSizes: readonly number[];
  readonly playedCards: RankCounts;
  readonly faceUpRank: Rank | null;
  readonly firstPlayer: Seat | null;
  readonly landlord: Seat | null;
  /** Seats after the landlord in turn order (0 = the landlord). */
  readonly positionFromLandlord: number | null;
  readonly winningBid: number;
  readonly currentTrick: Trick | null;
  readonly isMyTurn: boolean;
  readonly legalActions: readonly ActionId[];
}

/** A chance outcome with its probability. */
export interface ChanceOutcome {
  readonly action: ActionId;
  readonly probability: number;
}
