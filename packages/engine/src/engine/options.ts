// ─── Game Options Loader ───────────────────────────────────────────
// Validates raw options at the engine boundary. After this call the
// options are trusted.

import { parseGameOptions } from "@doudizhu/schema";
import { ZodError } from "zod";
import type { GameOptions } from "../types/index";
import { GameOptionsError } from "./errors";

/**
 * Loads and validates raw options, filling defaults.
 *
 * @throws {GameOptionsError} if the input does not conform to the schema.
 */
export function loadGameOptions(raw: unknown): GameOptions {
  try {
    return parseGameOptions(raw);
  } catch (error: unknown) {
    if (error instanceof ZodError) {
      const formattedIssues = error.issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        return `${path}: ${issue.message}`;
      });
      throw new GameOptionsError(
        `Invalid game options: ${formattedIssues.length} issue(s)`,
        formattedIssues
      );
    }
    throw error;
  }
}
