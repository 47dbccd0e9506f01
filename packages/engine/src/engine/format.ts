// ─── Text Formatting ───────────────────────────────────────────────
// Human-readable actions and game transcripts for logs and the
// simulation script.

import type { ActionId, ActionRecord, GameState, RankCounts } from "../types/index";
import { NUM_CARDS, cardLabel, emptyCounts, formatCounts, rankLabel, rankOf } from "../deck/cards";
import { decodeAction } from "./action-space";
import { SEATS, seatForDealIndex } from "./game-state";
import { combinationCounts } from "./patterns";

/**
 * Describes an action id.
 *
 * Plays print their ranks in ascending order. Airplanes with kickers
 * print the chain and the kickers separately ("444555+79"), since one
 * set of cards can be played as more than one airplane.
 */
export function actionToString(action: ActionId): string {
  const decoded = decodeAction(action);
  switch (decoded.kind) {
    case "face_up_slot":
      return `Decide first card up position ${decoded.slot}`;
    case "deal":
      return `Deal ${cardLabel(decoded.card)}`;
    case "pass":
      return "Pass";
    case "bid":
      return `Bid ${decoded.value}`;
    case "play": {
      const { combination } = decoded;
      const cards = combinationCounts(combination);
      if (combination.kickers.length === 0 || !combination.category.startsWith("airplane")) {
        return formatCounts(cards);
      }
      const chain = combinationCounts({ ...combination, kickers: [] });
      const kickers = cards.map((count, rank) => count - chain[rank]);
      return `${formatCounts(chain)}+${formatCounts(kickers)}`;
    }
  }
}

/**
 * Reconstructs the three hands as dealt. Once a landlord is chosen the
 * leftover block is credited to the landlord.
 */
export function originalDeal(state: GameState): number[][] {
  const deal = SEATS.map(() => emptyCounts());
  const dealt = new Set<number>();

  let dealIndex = 0;
  for (const record of state.history) {
    const decoded = decodeAction(record.action);
    if (record.actor !== "chance" || decoded.kind !== "deal") continue;
    deal[seatForDealIndex(dealIndex)][rankOf(decoded.card)]++;
    dealt.add(decoded.card);
    dealIndex++;
  }

  if (state.landlord !== null) {
    for (let card = 0; card < NUM_CARDS; card++) {
      if (!dealt.has(card)) deal[state.landlord][rankOf(card)]++;
    }
  }
  return deal;
}

function formatHand(counts: RankCounts): string {
  const text = formatCounts(counts);
  return text.length > 0 ? text : "-";
}

function formatRecords(records: readonly ActionRecord[]): string[] {
  return records.map((record) => `Seat ${record.actor}: ${actionToString(record.action)}`);
}

/**
 * Multi-line transcript: the hands (as dealt, once the game is over),
 * the auction, the play, and the returns when terminal.
 */
export function formatState(state: GameState): string {
  const hands = state.phase === "game_over" ? originalDeal(state) : state.hands;
  const lines = SEATS.map((seat) => {
    const marker = seat === state.landlord ? " (landlord)" : "";
    return `Seat ${seat}${marker}: ${formatHand(hands[seat])}`;
  });

  if (state.faceUpRank !== null && state.firstPlayer !== null) {
    lines.push(
      `Face-up card ${rankLabel(state.faceUpRank)} went to seat ${state.firstPlayer}`
    );
  }

  const auction = state.history.filter((record) => record.phase === "auction");
  if (auction.length > 0) {
    lines.push("Auction:", ...formatRecords(auction));
  }

  const play = state.history.filter((record) => record.phase === "play");
  if (play.length > 0) {
    lines.push("Play:", ...formatRecords(play));
  }

  if (state.phase === "game_over") {
    lines.push("Returns:", ...SEATS.map((seat) => `Seat ${seat}: ${state.returns[seat]}`));
  }

  return lines.join("\n");
}
