// ─── Action Validator ──────────────────────────────────────────────
// Determines which actions are legal in the current state. Prevents
// illegal moves at the engine level: the reducer consults this before
// building any new state.

import type { ActionId, Actor, ChanceOutcome, GameState } from "../types/index";
import { biddingLegalActions } from "./auction";
import { dealLegalActions } from "./deal";
import { playLegalActions } from "./play";

/** Result of validating an action. */
export type ActionValidationResult =
  | { readonly valid: true }
  | { readonly valid: false; readonly reason: string };

// States are immutable, so a state object's legal actions never change.
const legalActionCache = new WeakMap<GameState, readonly ActionId[]>();

/**
 * Returns the legal actions in ascending id order. Empty once the
 * game is over.
 */
export function getLegalActions(state: GameState): readonly ActionId[] {
  const cached = legalActionCache.get(state);
  if (cached !== undefined) return cached;

  const actions = computeLegalActions(state);
  legalActionCache.set(state, actions);
  return actions;
}

function computeLegalActions(state: GameState): readonly ActionId[] {
  switch (state.phase) {
    case "deal":
      return dealLegalActions(state);
    case "auction":
      return biddingLegalActions(state);
    case "play":
      return playLegalActions(state);
    case "game_over":
      return [];
  }
}

/** The actor whose turn it is, or null once the game is over. */
export function expectedActor(state: GameState): Actor | null {
  if (state.phase === "deal") return "chance";
  if (state.phase === "game_over") return null;
  return state.currentPlayer;
}

/**
 * Validates an action without throwing. When `actor` is given, it must
 * also be the one whose turn it is.
 */
export function validateAction(
  state: GameState,
  action: ActionId,
  actor?: Actor
): ActionValidationResult {
  if (state.phase === "game_over") {
    return { valid: false, reason: "The game is over" };
  }

  const expected = expectedActor(state);
  if (actor !== undefined && actor !== expected) {
    return {
      valid: false,
      reason: `It is not ${describeActor(actor)}'s turn (waiting on ${describeActor(expected)})`,
    };
  }

  if (!getLegalActions(state).includes(action)) {
    return {
      valid: false,
      reason: `Action ${action} is not legal in the ${state.phase} phase`,
    };
  }

  return { valid: true };
}

/**
 * Deal outcomes with uniform probabilities over the legal actions.
 * Empty outside the deal phase.
 */
export function chanceOutcomes(state: GameState): ChanceOutcome[] {
  if (state.phase !== "deal") return [];
  const actions = getLegalActions(state);
  const probability = 1 / actions.length;
  return actions.map((action) => ({ action, probability }));
}

function describeActor(actor: Actor | null): string {
  if (actor === null) return "nobody";
  return actor === "chance" ? "chance" : `seat ${actor}`;
}
