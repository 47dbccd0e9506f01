// ─── Card Primitives ───────────────────────────────────────────────
// Foundational types for the 54-card Dou Dizhu deck. Cards are plain
// integers; hands are per-rank count vectors, since suits never matter
// once a card has been dealt.

/**
 * A card identifier in [0, 54).
 * `suit * 13 + rank` for suited cards; 52 is the black joker, 53 the red joker.
 */
export type CardId = number;

/**
 * A rank index in [0, 15). Indices 0..12 are 3,4,...,K,A,2 in play
 * order; 13 is the black joker and 14 the red joker.
 */
export type Rank = number;

/** Suit index in [0, 4) for suited cards. Jokers have no suit. */
export type Suit = 0 | 1 | 2 | 3;

/**
 * Per-rank card counts, always of length 15 (one slot per rank).
 * Used for hands, the played-card ledger, and decoded plays.
 */
export type RankCounts = readonly number[];

/** One of the three seats at the table. */
export type Seat = 0 | 1 | 2;
