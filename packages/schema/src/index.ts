// ─── @doudizhu/schema ──────────────────────────────────────────────
// Canonical type definitions and Zod validation for game options.
// All types and schemas are re-exported from this single entry point.

export * from "./types/index";
export * from "./schema/index";
