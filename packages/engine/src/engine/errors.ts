// ─── Engine Errors ─────────────────────────────────────────────────
// Every failure is fatal to the operation that raised it; none is
// retried. Illegal requests are rejected before any state is built.

import type { ActionId } from "../types/index";

/**
 * A protocol violation: the action is not legal in the current state,
 * was requested out of turn, or arrived after the game ended.
 */
export class IllegalActionError extends Error {
  constructor(
    message: string,
    public readonly action: ActionId
  ) {
    super(message);
    this.name = "IllegalActionError";
  }
}

/**
 * An internal consistency failure, e.g. a play that removes more cards
 * than the hand holds. Indicates a bug, not a bad request.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolationError";
  }
}

/** Raised when game options fail schema validation. */
export class GameOptionsError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[]
  ) {
    super(message);
    this.name = "GameOptionsError";
  }
}
