import { describe, it, expect } from "vitest";
import type { GameState } from "../types/index";
import { PASS, ROCKET_ACTION, bidAction, dealAction, encodeCombination, faceUpSlotAction } from "./action-space";
import { getLegalActions, validateAction, chanceOutcomes } from "./action-validator";
import { IllegalActionError } from "./errors";
import { countAllCards, createInitialState, currentPlayer, currentTrick } from "./game-state";
import { makeCombination } from "./patterns";
import { applyAction } from "./reducer";
import { STANDARD_HANDS, applyAll, dealHands, handOf, rankFromChar } from "./test-helpers";

// ─── Test Helpers ──────────────────────────────────────────────────

const solo = (char: string) => encodeCombination(makeCombination("solo", rankFromChar(char)));
const pair = (char: string) => encodeCombination(makeCombination("pair", rankFromChar(char)));
const bomb = (char: string) => encodeCombination(makeCombination("bomb", rankFromChar(char)));
const airplane = (char: string, length: number) =>
  encodeCombination(makeCombination("airplane", rankFromChar(char), length));

/** Standard deal with seat 0 holding the face-up card. */
function auctionFromSeat0(): GameState {
  return dealHands(STANDARD_HANDS, 0);
}

/** Seat 0 bids 1 and both farmers pass. */
function playFromSeat0(): GameState {
  return applyAll(auctionFromSeat0(), [bidAction(1), PASS, PASS]);
}

// ─── Tests ─────────────────────────────────────────────────────────

describe("reducer", () => {
  // ══════════════════════════════════════════════════════════════════
  // ── Deal ─────────────────────────────────────────────────────────
  // ══════════════════════════════════════════════════════════════════

  describe("deal", () => {
    it("offers one face-up slot per dealt card first", () => {
      const state = createInitialState();
      const outcomes = chanceOutcomes(state);

      expect(currentPlayer(state)).toBe("chance");
      expect(outcomes).toHaveLength(51);
      expect(outcomes[0]).toEqual({ action: 0, probability: 1 / 51 });
      expect(outcomes[50]).toEqual({ action: 50, probability: 1 / 51 });
    });

    it("offers every pool card once the slot is chosen", () => {
      const state = applyAction(createInitialState(), faceUpSlotAction(7));
      const outcomes = chanceOutcomes(state);

      expect(state.faceUpSlot).toBe(7);
      expect(outcomes).toHaveLength(54);
      expect(outcomes.map((o) => o.action)).toEqual(
        Array.from({ length: 54 }, (_, card) => dealAction(card))
      );
      expect(outcomes.every((o) => o.probability === 1 / 54)).toBe(true);
    });

    it("removes a dealt card from the outcomes", () => {
      let state = applyAction(createInitialState(), faceUpSlotAction(0));
      state = applyAction(state, dealAction(10));

      expect(state.pool[10]).toBe(0);
      expect(state.hands[0][10]).toBe(1);
      expect(getLegalActions(state)).not.toContain(dealAction(10));
      expect(chanceOutcomes(state)).toHaveLength(53);
    });

    it("rejects a card before the slot is chosen", () => {
      expect(() => applyAction(createInitialState(), dealAction(0))).toThrow(IllegalActionError);
    });

    it("rejects a card that was already dealt", () => {
      let state = applyAction(createInitialState(), faceUpSlotAction(0));
      state = applyAction(state, dealAction(5));

      expect(() => applyAction(state, dealAction(5))).toThrow(IllegalActionError);
    });

    it("marks the receiver of the face-up card as first bidder", () => {
      const state = dealHands(STANDARD_HANDS, 4);

      expect(state.firstPlayer).toBe(1);
      expect(state.faceUpRank).toBe(rankFromChar("7"));
      expect(state.phase).toBe("auction");
      expect(currentPlayer(state)).toBe(1);
    });

    it("deals round-robin and sets the leftover block aside", () => {
      const state = auctionFromSeat0();

      expect(state.dealIndex).toBe(51);
      expect(state.hands[0]).toEqual(handOf(STANDARD_HANDS[0]));
      expect(state.hands[1]).toEqual(handOf(STANDARD_HANDS[1]));
      expect(state.hands[2]).toEqual(handOf(STANDARD_HANDS[2]));
      expect(state.leftover).toEqual([rankFromChar("2"), rankFromChar("B"), rankFromChar("R")]);
      expect(state.pool.every((slot) => slot === 0)).toBe(true);
      expect(countAllCards(state)).toBe(54);
      expect(chanceOutcomes(state)).toEqual([]);
    });

    it("records chance actions in the history", () => {
      const state = auctionFromSeat0();

      expect(state.history).toHaveLength(52);
      expect(state.history[0]).toEqual({ actor: "chance", action: 0, phase: "deal" });
    });
  });

  // ══════════════════════════════════════════════════════════════════
  // ── Auction ──────────────────────────────────────────────────────
  // ══════════════════════════════════════════════════════════════════

  describe("auction", () => {
    it("allows Pass and every bid at the start", () => {
      expect(getLegalActions(auctionFromSeat0())).toEqual([PASS, 106, 107, 108]);
    });

    it("only allows higher bids after a bid", () => {
      const state = applyAction(auctionFromSeat0(), bidAction(1));

      expect(state.winningBid).toBe(1);
      expect(state.landlord).toBe(0);
      expect(currentPlayer(state)).toBe(1);
      expect(getLegalActions(state)).toEqual([PASS, bidAction(2), bidAction(3)]);
      expect(() => applyAction(state, bidAction(1))).toThrow(IllegalActionError);
    });

    it("elects the bidder after two passes", () => {
      const state = playFromSeat0();

      expect(state.phase).toBe("play");
      expect(state.landlord).toBe(0);
      expect(state.winningBid).toBe(1);
      expect(state.hands[0]).toEqual(handOf(`${STANDARD_HANDS[0]}2BR`));
      expect(state.leftover).toEqual([]);
      expect(state.tricks).toEqual([{ leader: 0, winningAction: null, winningPlayer: 0 }]);
      expect(state.newTrickBegin).toBe(true);
      expect(currentPlayer(state)).toBe(0);
      expect(countAllCards(state)).toBe(54);
    });

    it("finishes at once on the maximum bid", () => {
      const state = applyAll(auctionFromSeat0(), [PASS, bidAction(3)]);

      expect(state.phase).toBe("play");
      expect(state.landlord).toBe(1);
      expect(state.winningBid).toBe(3);
      expect(currentPlayer(state)).toBe(1);
    });

    it("keeps bidding open while bids keep coming", () => {
      const state = applyAll(auctionFromSeat0(), [PASS, bidAction(1), bidAction(2), PASS]);

      expect(state.phase).toBe("auction");
      expect(state.consecutivePasses).toBe(1);
      expect(currentPlayer(state)).toBe(1);

      const done = applyAction(state, PASS);
      expect(done.phase).toBe("play");
      expect(done.landlord).toBe(2);
      expect(done.winningBid).toBe(2);
    });

    it("ends the game with zero returns when nobody bids", () => {
      const state = applyAll(auctionFromSeat0(), [PASS, PASS, PASS]);

      expect(state.phase).toBe("game_over");
      expect(state.returns).toEqual([0, 0, 0]);
      expect(state.landlord).toBeNull();
      expect(state.tricks).toEqual([]);
      expect(state.leftover).toHaveLength(3);
      expect(countAllCards(state)).toBe(54);
      expect(currentPlayer(state)).toBe("terminal");
      expect(getLegalActions(state)).toEqual([]);
      expect(() => applyAction(state, PASS)).toThrow(IllegalActionError);
    });
  });

  // ══════════════════════════════════════════════════════════════════
  // ── Play ─────────────────────────────────────────────────────────
  // ══════════════════════════════════════════════════════════════════

  describe("play", () => {
    it("does not let the trick leader pass", () => {
      const state = playFromSeat0();

      expect(getLegalActions(state)).not.toContain(PASS);
      expect(validateAction(state, PASS)).toEqual({
        valid: false,
        reason: "Action 105 is not legal in the play phase",
      });
    });

    it("lets the next seat pass or beat the standing play", () => {
      const state = applyAction(playFromSeat0(), solo("7"));
      const legal = getLegalActions(state);

      expect(currentPlayer(state)).toBe(1);
      expect(state.newTrickBegin).toBe(false);
      expect(legal[0]).toBe(PASS);
      expect(legal).toContain(solo("8"));
      expect(legal).not.toContain(solo("7"));
      expect(legal).not.toContain(pair("7"));
      expect(legal).toContain(bomb("8"));
    });

    it("only lets the rocket answer a standing bomb", () => {
      const state = applyAll(applyAll(auctionFromSeat0(), [bidAction(3)]), [
        solo("7"),
        bomb("8"),
        PASS,
      ]);

      expect(currentPlayer(state)).toBe(0);
      expect(getLegalActions(state)).toEqual([PASS, ROCKET_ACTION]);
      expect(validateAction(state, pair("3")).valid).toBe(false);
      expect(() => applyAction(state, pair("3"))).toThrow(IllegalActionError);

      const after = applyAction(state, ROCKET_ACTION);
      expect(after.bombsPlayed).toBe(2);
      expect(currentTrick(after)).toEqual({ leader: 0, winningAction: ROCKET_ACTION, winningPlayer: 0 });
    });

    it("closes the trick after two passes and hands the lead to its winner", () => {
      const state = applyAll(playFromSeat0(), [solo("7"), solo("8"), solo("2"), bomb("3"), PASS, PASS]);

      expect(state.tricks).toEqual([
        { leader: 0, winningAction: bomb("3"), winningPlayer: 0 },
        { leader: 0, winningAction: null, winningPlayer: 0 },
      ]);
      expect(state.newTrickBegin).toBe(true);
      expect(state.consecutivePasses).toBe(0);
      expect(currentPlayer(state)).toBe(0);
      expect(state.bombsPlayed).toBe(1);
      expect(state.hands[0]).toEqual(handOf("4444555566662BR"));
    });

    it("hands the next lead to a winner who did not lead the trick", () => {
      const state = applyAll(playFromSeat0(), [solo("7"), solo("8"), PASS, PASS]);

      expect(state.tricks).toEqual([
        { leader: 0, winningAction: solo("8"), winningPlayer: 1 },
        { leader: 1, winningAction: null, winningPlayer: 1 },
      ]);
      expect(state.newTrickBegin).toBe(true);
      expect(currentPlayer(state)).toBe(1);
      expect(getLegalActions(state)).not.toContain(PASS);
      expect(state.handsPlayed).toEqual([1, 1, 0]);
    });

    it("settles when the landlord empties the hand", () => {
      let state = applyAll(playFromSeat0(), [solo("7"), solo("8"), solo("2"), bomb("3"), PASS, PASS]);
      state = applyAll(state, [airplane("4", 3), PASS, PASS]);
      expect(state.hands[0]).toEqual(handOf("4562BR"));

      for (const char of ["4", "5", "6", "2", "B"]) {
        state = applyAll(state, [solo(char), PASS, PASS]);
      }
      expect(state.phase).toBe("play");

      state = applyAction(state, solo("R"));

      expect(state.phase).toBe("game_over");
      expect(state.finalWinner).toBe(0);
      expect(state.handsPlayed).toEqual([9, 1, 1]);
      expect(state.bombsPlayed).toBe(1);
      expect(state.returns).toEqual([4, -2, -2]);
      expect(currentPlayer(state)).toBe("terminal");
      expect(countAllCards(state)).toBe(54);
    });
  });

  // ══════════════════════════════════════════════════════════════════
  // ── Validation & immutability ────────────────────────────────────
  // ══════════════════════════════════════════════════════════════════

  describe("validation", () => {
    it("rejects an actor whose turn it is not", () => {
      const state = auctionFromSeat0();

      expect(validateAction(state, PASS, 1)).toEqual({
        valid: false,
        reason: "It is not seat 1's turn (waiting on seat 0)",
      });
      expect(validateAction(state, PASS, 0)).toEqual({ valid: true });
    });

    it("rejects seat actors while dealing", () => {
      expect(validateAction(createInitialState(), 0, 0)).toEqual({
        valid: false,
        reason: "It is not seat 0's turn (waiting on chance)",
      });
    });

    it("never mutates the input state", () => {
      const state = auctionFromSeat0();
      const before = JSON.stringify(state);

      applyAction(state, bidAction(2));
      expect(() => applyAction(state, 9999)).toThrow(IllegalActionError);

      expect(JSON.stringify(state)).toBe(before);
    });

    it("records seat actions with their phase", () => {
      const state = applyAction(playFromSeat0(), solo("7"));

      expect(state.history.slice(52)).toEqual([
        { actor: 0, action: bidAction(1), phase: "auction" },
        { actor: 1, action: PASS, phase: "auction" },
        { actor: 2, action: PASS, phase: "auction" },
        { actor: 0, action: solo("7"), phase: "play" },
      ]);
    });

    it("carries the rejected action on the error", () => {
      try {
        applyAction(auctionFromSeat0(), 200);
        expect.unreachable("applyAction should have thrown");
      } catch (error: unknown) {
        expect(error).toBeInstanceOf(IllegalActionError);
        if (error instanceof IllegalActionError) {
          expect(error.action).toBe(200);
          expect(error.name).toBe("IllegalActionError");
        }
      }
    });
  });
});
