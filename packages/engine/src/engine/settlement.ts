// ─── Settlement ────────────────────────────────────────────────────
// Zero-sum payouts at the end of a hand.

import type { GameOptions, Seat } from "../types/index";
import { InvariantViolationError } from "./errors";
import { SEATS } from "./game-state";

export interface SettlementInput {
  readonly landlord: Seat;
  readonly winningBid: number;
  readonly bombsPlayed: number;
  readonly handsPlayed: readonly number[];
  readonly finalWinner: Seat;
}

/**
 * A spring: the landlord played only the opening lead, or neither
 * farmer made a single play.
 */
export function isSpring(input: Pick<SettlementInput, "landlord" | "handsPlayed">): boolean {
  const { landlord, handsPlayed } = input;
  if (handsPlayed[landlord] === 1) return true;
  return SEATS.every((seat) => seat === landlord || handsPlayed[seat] === 0);
}

/**
 * The amount each farmer pays (or receives): the bid, doubled once for
 * a spring and once per bomb or rocket.
 */
export function payingAmount(input: SettlementInput, options: GameOptions): number {
  let exponent = 0;
  if (options.springBonus && isSpring(input)) exponent++;
  if (options.bombDoubling) exponent += input.bombsPlayed;
  return input.winningBid * 2 ** exponent;
}

/**
 * Per-seat returns. The landlord collects from or pays both farmers,
 * so the returns always sum to zero.
 */
export function computeReturns(input: SettlementInput, options: GameOptions): number[] {
  if (input.winningBid <= 0) {
    throw new InvariantViolationError("Settlement requires a positive winning bid");
  }
  const paying = payingAmount(input, options);
  const sign = input.finalWinner === input.landlord ? 1 : -1;
  return SEATS.map((seat) =>
    seat === input.landlord ? sign * 2 * paying : -sign * paying
  );
}
