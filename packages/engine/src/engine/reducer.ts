// ─── Reducer ───────────────────────────────────────────────────────
// (state, action) → new state. The input state is never mutated: the
// action is validated first, then applied to a private deep copy.

import type { ActionId, GameState } from "../types/index";
import { expectedActor, validateAction } from "./action-validator";
import { applyBiddingAction } from "./auction";
import { applyDealAction } from "./deal";
import { IllegalActionError, InvariantViolationError } from "./errors";
import { cloneState } from "./game-state";
import { applyPlayAction } from "./play";

/**
 * Applies one legal action and returns the resulting state.
 *
 * @throws {IllegalActionError} if the action is not legal in `state`
 *   or the game is already over. No state is produced in that case.
 * @throws {InvariantViolationError} if applying a legal action breaks
 *   an internal invariant.
 */
export function applyAction(state: GameState, action: ActionId): GameState {
  const validation = validateAction(state, action);
  if (!validation.valid) {
    throw new IllegalActionError(validation.reason, action);
  }

  const actor = expectedActor(state);
  if (actor === null) {
    throw new IllegalActionError("The game is over", action);
  }

  const draft = cloneState(state);
  switch (draft.phase) {
    case "deal":
      applyDealAction(draft, action);
      break;
    case "auction":
    case "play": {
      if (actor === "chance") {
        throw new InvariantViolationError(`No seat to move in the ${draft.phase} phase`);
      }
      if (draft.phase === "auction") {
        applyBiddingAction(draft, actor, action);
      } else {
        applyPlayAction(draft, actor, action);
      }
      break;
    }
    case "game_over":
      throw new IllegalActionError("The game is over", action);
  }

  draft.history.push({ actor, action, phase: state.phase });
  return draft;
}
