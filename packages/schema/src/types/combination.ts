// ─── Combinations ──────────────────────────────────────────────────
// The tagged description of a play. Every play action id decodes to
// exactly one Combination; comparisons never look at raw id ranges.

import type { Rank } from "./card";

/** Play categories, in action-id band order. */
export type ComboCategory =
  | "solo"
  | "soloChain"
  | "pair"
  | "pairChain"
  | "trio"
  | "trioWithSolo"
  | "trioWithPair"
  | "airplane"
  | "airplaneWithSolo"
  | "airplaneWithPair"
  | "bomb"
  | "rocket";

/**
 * A classified play.
 *
 * `primaryRank` is the rank of the single, pair, trio or bomb, or the
 * lowest rank of a chain. `length` counts the chain's links and is 1
 * for anything that is not a chain. `kickers` lists attached ranks in
 * ascending order (a multiset for solo kickers, distinct ranks for
 * pair kickers); it is empty for categories without attachments.
 */
export interface Combination {
  readonly category: ComboCategory;
  readonly primaryRank: Rank;
  readonly length: number;
  readonly kickers: readonly Rank[];
}
