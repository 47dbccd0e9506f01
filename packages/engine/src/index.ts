// ─── @doudizhu/engine ──────────────────────────────────────────────
// Pure TypeScript rules engine for three-player Dou Dizhu.
// Re-exports all public types, engine functions, and utilities.

export * from "./types/index";
export * from "./engine/index";
export * from "./deck/index";
export { DEFAULT_GAME_OPTIONS, GameOptionsSchema, parseGameOptions, safeParseGameOptions } from "@doudizhu/schema";
