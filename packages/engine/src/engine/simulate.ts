// ─── Random Play ───────────────────────────────────────────────────
// Drives a full game from a seed: chance outcomes are sampled by their
// probabilities, seat actions uniformly from the legal list.

import type { ActionId, GameOptionsInput, GameState } from "../types/index";
import { chanceOutcomes, getLegalActions } from "./action-validator";
import { InvariantViolationError } from "./errors";
import { createInitialState, isTerminal } from "./game-state";
import { createRng } from "./prng";
import { applyAction } from "./reducer";

export interface RandomGameResult {
  readonly state: GameState;
  /** Number of actions applied, chance actions included. */
  readonly actionCount: number;
}

// 52 chance actions plus a generous bound on auction and play moves.
const MAX_ACTIONS = 1000;

/**
 * Plays one game to the end with seeded random choices.
 *
 * @throws {InvariantViolationError} if a non-terminal state offers no
 *   legal action or the game does not end within the action bound.
 */
export function playRandomGame(seed: number, options: GameOptionsInput = {}): RandomGameResult {
  const rng = createRng(seed);
  let state = createInitialState(options);
  let actionCount = 0;

  while (!isTerminal(state)) {
    if (actionCount >= MAX_ACTIONS) {
      throw new InvariantViolationError(`Game did not end within ${MAX_ACTIONS} actions`);
    }
    const action =
      state.phase === "deal"
        ? rng.sampleOutcome(chanceOutcomes(state)).action
        : rng.pick(legalOrThrow(state));
    state = applyAction(state, action);
    actionCount++;
  }

  return { state, actionCount };
}

function legalOrThrow(state: GameState): readonly ActionId[] {
  const legal = getLegalActions(state);
  if (legal.length === 0) {
    throw new InvariantViolationError(`No legal action in the ${state.phase} phase`);
  }
  return legal;
}
