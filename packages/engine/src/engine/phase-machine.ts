// ─── Phase Machine ─────────────────────────────────────────────────
// The game's phase graph. Phases only move forward:
// deal → auction → play → game_over, with an auction that nobody bids
// in going straight to game_over.

import type { Phase } from "../types/index";
import { InvariantViolationError } from "./errors";

/** The result of asking whether a phase change is allowed. */
export type TransitionResult =
  | { readonly kind: "stay" }
  | { readonly kind: "advance"; readonly nextPhase: Phase };

const DEFAULT_TRANSITIONS: Readonly<Record<Phase, readonly Phase[]>> = {
  deal: ["auction"],
  auction: ["play", "game_over"],
  play: ["game_over"],
  game_over: [],
};

/**
 * Validates phase changes against a fixed transition table.
 * Constructed once; the reducer consults the shared instance.
 */
export class PhaseMachine {
  private readonly transitions: ReadonlyMap<Phase, ReadonlySet<Phase>>;

  constructor(table: Readonly<Record<Phase, readonly Phase[]>> = DEFAULT_TRANSITIONS) {
    const map = new Map<Phase, ReadonlySet<Phase>>();
    for (const [from, targets] of Object.entries(table)) {
      if (!isPhase(from)) {
        throw new Error(`Unknown phase: "${from}"`);
      }
      map.set(from, new Set(targets));
    }
    this.transitions = map;
  }

  /** Returns whether `from` may move to `to`. */
  canTransition(from: Phase, to: Phase): boolean {
    return this.transitions.get(from)?.has(to) ?? false;
  }

  /**
   * Resolves a requested phase change. Asking for the current phase
   * is a no-op ("stay").
   *
   * @throws {InvariantViolationError} if the change is not in the table.
   */
  transition(from: Phase, to: Phase): TransitionResult {
    if (from === to) {
      return { kind: "stay" };
    }
    if (!this.canTransition(from, to)) {
      throw new InvariantViolationError(
        `Illegal phase transition: "${from}" -> "${to}"`
      );
    }
    return { kind: "advance", nextPhase: to };
  }

  /** Returns whether the phase has no outgoing transitions. */
  isTerminalPhase(phase: Phase): boolean {
    return (this.transitions.get(phase)?.size ?? 0) === 0;
  }
}

function isPhase(value: string): value is Phase {
  return value === "deal" || value === "auction" || value === "play" || value === "game_over";
}

export const phaseMachine = new PhaseMachine();

/**
 * Moves a draft to `to`, enforcing the phase table.
 * @throws {InvariantViolationError} on a backward or skipped transition.
 */
export function advancePhase(draft: { phase: Phase }, to: Phase): void {
  const result = phaseMachine.transition(draft.phase, to);
  if (result.kind === "advance") {
    draft.phase = result.nextPhase;
  }
}
