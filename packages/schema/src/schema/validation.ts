// ─── Schema Validation ─────────────────────────────────────────────
// Zod schema for game options. This is the parse boundary: raw
// JSON enters, typed options exit.

import { z } from "zod";

// ─── Game Options ──────────────────────────────────────────────────

export const GameOptionsSchema = z
  .object({
    /** Double the payout when the spring condition holds. */
    springBonus: z.boolean().default(true),
    /** Double the payout once per bomb or rocket played. */
    bombDoubling: z.boolean().default(true),
  })
  .strict();

/** Options after defaults are applied. */
export type GameOptions = z.infer<typeof GameOptionsSchema>;

/** Options as accepted from callers and JSON files. */
export type GameOptionsInput = z.input<typeof GameOptionsSchema>;

export const DEFAULT_GAME_OPTIONS: GameOptions = GameOptionsSchema.parse({});

/**
 * Parses raw input into validated GameOptions, filling defaults.
 * Throws a ZodError with detailed issues on invalid input.
 */
export function parseGameOptions(raw: unknown): GameOptions {
  return GameOptionsSchema.parse(raw);
}

/**
 * Safe parse variant. Returns a discriminated result instead of throwing.
 */
export function safeParseGameOptions(
  raw: unknown
): z.SafeParseReturnType<GameOptionsInput, GameOptions> {
  return GameOptionsSchema.safeParse(raw);
}
