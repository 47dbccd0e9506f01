#!/usr/bin/env tsx
// ─── Simulate Games ────────────────────────────────────────────────
// Plays seeded random games and prints each transcript and its returns.
// Usage: tsx scripts/simulate.ts [--seed=<n>] [--games=<n>] [--options=<path>]
// Exits 1 on a bad argument, a bad options file, or an engine failure.

import { readFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import {
  GameOptionsError,
  formatState,
  loadGameOptions,
  playRandomGame,
  type GameOptions,
} from "@doudizhu/engine";

function parseCount(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`--${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

async function readOptions(path: string | undefined): Promise<GameOptions> {
  if (path === undefined) return loadGameOptions({});
  const raw = await readFile(path, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new Error(`${path}: invalid JSON (${detail})`);
  }
  return loadGameOptions(parsed);
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      seed: { type: "string" },
      games: { type: "string" },
      options: { type: "string" },
    },
  });

  const seed = parseCount("seed", values.seed, 1);
  const games = parseCount("games", values.games, 1);
  const options = await readOptions(values.options);

  const totals = [0, 0, 0];
  for (let i = 0; i < games; i++) {
    const { state, actionCount } = playRandomGame(seed + i, options);
    console.log(`\n=== Game ${i + 1} (seed ${seed + i}, ${actionCount} actions) ===`);
    console.log(formatState(state));
    state.returns.forEach((value, seat) => {
      totals[seat] += value;
    });
  }

  console.log(`\nTotals over ${games} game(s): ${totals.join(", ")}`);
}

main().catch((err: unknown) => {
  if (err instanceof GameOptionsError) {
    console.error(err.message);
    for (const issue of err.issues) {
      console.error(`  ${issue}`);
    }
  } else {
    console.error(err instanceof Error ? err.message : err);
  }
  process.exit(1);
});
