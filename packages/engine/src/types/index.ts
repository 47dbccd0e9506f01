// Re-export all types from the canonical schema package.
export type { CardId, Rank, RankCounts, Seat, Suit } from "@doudizhu/schema";
export type { ComboCategory, Combination } from "@doudizhu/schema";
export type { ActionId, ActionRecord, Actor, ChanceOutcome, CurrentPlayer, GameState, Phase, PlayerView, Trick } from "@doudizhu/schema";
export type { GameOptions, GameOptionsInput } from "@doudizhu/schema";
