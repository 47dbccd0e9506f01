// ─── Game Session ──────────────────────────────────────────────────
// An object wrapper over the pure reducer for hosts that prefer to
// hold one mutable handle per game.

import type {
  ActionId,
  ChanceOutcome,
  CurrentPlayer,
  GameOptionsInput,
  GameState,
  PlayerView,
  Seat,
} from "../types/index";
import { chanceOutcomes, getLegalActions, validateAction, type ActionValidationResult } from "./action-validator";
import { formatState } from "./format";
import { cloneState, createInitialState, currentPlayer, getReturns, isTerminal } from "./game-state";
import { applyAction } from "./reducer";
import { createPlayerView } from "./state-filter";

export class DouDizhuGame {
  private current: GameState;

  /** @throws {GameOptionsError} if `options` fails validation. */
  constructor(options: GameOptionsInput = {}) {
    this.current = createInitialState(options);
  }

  /** Wraps an existing snapshot. States are immutable, so no copy is made. */
  static fromState(state: GameState): DouDizhuGame {
    const game = new DouDizhuGame(state.options);
    game.current = state;
    return game;
  }

  get state(): GameState {
    return this.current;
  }

  legalActions(): readonly ActionId[] {
    return getLegalActions(this.current);
  }

  validate(action: ActionId): ActionValidationResult {
    return validateAction(this.current, action);
  }

  /** @throws {IllegalActionError} if the action is not legal now. */
  apply(action: ActionId): void {
    this.current = applyAction(this.current, action);
  }

  chanceOutcomes(): ChanceOutcome[] {
    return chanceOutcomes(this.current);
  }

  currentPlayer(): CurrentPlayer {
    return currentPlayer(this.current);
  }

  isTerminal(): boolean {
    return isTerminal(this.current);
  }

  returns(): readonly number[] {
    return getReturns(this.current);
  }

  viewFor(seat: Seat): PlayerView {
    return createPlayerView(this.current, seat);
  }

  /**
   * An independent game at the same point. Applying actions to either
   * never affects the other.
   */
  clone(): DouDizhuGame {
    return DouDizhuGame.fromState(cloneState(this.current));
  }

  toString(): string {
    return formatState(this.current);
  }
}
