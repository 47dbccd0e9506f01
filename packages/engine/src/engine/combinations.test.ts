import { describe, it, expect } from "vitest";
import { PASS, ROCKET_ACTION, combinationOf, encodeCombination } from "./action-space";
import { actionBeats, beats, searchLegalPlays } from "./combinations";
import { combinationKey, generateCombinations, makeCombination } from "./patterns";
import { handOf } from "./test-helpers";

const id = (...args: Parameters<typeof makeCombination>) => encodeCombination(makeCombination(...args));

describe("beats", () => {
  it("compares same-category plays by primary rank", () => {
    expect(beats(makeCombination("solo", 1), makeCombination("solo", 0))).toBe(true);
    expect(beats(makeCombination("solo", 0), makeCombination("solo", 0))).toBe(false);
    expect(beats(makeCombination("solo", 0), makeCombination("solo", 1))).toBe(false);
  });

  it("requires chains of equal length", () => {
    const five = makeCombination("soloChain", 0, 5);
    expect(beats(makeCombination("soloChain", 1, 5), five)).toBe(true);
    expect(beats(makeCombination("soloChain", 1, 6), five)).toBe(false);
  });

  it("treats different categories as incomparable", () => {
    expect(beats(makeCombination("pair", 12), makeCombination("solo", 0))).toBe(false);
    expect(beats(makeCombination("solo", 12), makeCombination("pair", 0))).toBe(false);
    expect(beats(makeCombination("trio", 5), makeCombination("trioWithSolo", 0, 1, [1]))).toBe(false);
  });

  it("ignores kickers when comparing", () => {
    const low = makeCombination("trioWithSolo", 0, 1, [12]);
    const high = makeCombination("trioWithSolo", 1, 1, [0]);
    expect(beats(high, low)).toBe(true);
    expect(beats(low, high)).toBe(false);
  });

  it("lets a bomb beat anything except a higher bomb or the rocket", () => {
    const bomb = makeCombination("bomb", 0);
    expect(beats(bomb, makeCombination("solo", 14))).toBe(true);
    expect(beats(bomb, makeCombination("airplane", 0, 6))).toBe(true);
    expect(beats(makeCombination("bomb", 1), bomb)).toBe(true);
    expect(beats(bomb, makeCombination("bomb", 1))).toBe(false);
    expect(beats(makeCombination("bomb", 12), makeCombination("rocket", 13))).toBe(false);
  });

  it("lets the rocket beat everything but itself", () => {
    const rocket = makeCombination("rocket", 13);
    expect(beats(rocket, makeCombination("bomb", 12))).toBe(true);
    expect(beats(rocket, makeCombination("pairChain", 0, 10))).toBe(true);
    expect(beats(rocket, rocket)).toBe(false);
  });

  it("never holds in both directions", () => {
    const sample = [109, 110, 123, 124, 160, 238, 252, 588, 621, 23209, 26148, 26160, ROCKET_ACTION];
    for (const a of sample) {
      for (const b of sample) {
        expect(actionBeats(a, b) && actionBeats(b, a)).toBe(false);
      }
    }
  });
});

describe("generateCombinations", () => {
  it("finds chains only within 3 through A", () => {
    const hand = handOf("TJQKA2");
    expect(generateCombinations(hand, "soloChain").map(combinationKey)).toEqual([
      "soloChain:7:5:",
    ]);
  });

  it("keeps kickers outside the airplane chain", () => {
    const hand = handOf("333444555666");
    const keys = generateCombinations(hand, "airplaneWithSolo")
      .filter((c) => c.length === 3)
      .map(combinationKey);

    expect(keys).toEqual(["airplaneWithSolo:0:3:3.3.3", "airplaneWithSolo:1:3:0.0.0"]);
  });

  it("never uses both jokers as solo kickers", () => {
    const hand = handOf("333444BR");
    expect(generateCombinations(hand, "airplaneWithSolo")).toEqual([]);
  });

  it("takes pair kickers from distinct ranks", () => {
    const hand = handOf("3334447777");
    expect(generateCombinations(hand, "airplaneWithPair")).toEqual([]);

    const withTwoPairs = handOf("33344477TT");
    expect(generateCombinations(withTwoPairs, "airplaneWithPair").map(combinationKey)).toEqual([
      "airplaneWithPair:0:2:4.7",
    ]);
  });
});

describe("searchLegalPlays", () => {
  it("lists every supported play when leading, in id order", () => {
    expect(searchLegalPlays(handOf("334"), null)).toEqual([109, 110, 160]);
    expect(searchLegalPlays(handOf("3334"), null)).toEqual([109, 110, 160, 225, 238]);
    expect(searchLegalPlays(handOf("BR"), null)).toEqual([122, 123, ROCKET_ACTION]);
  });

  it("keeps only plays that beat the standing play", () => {
    expect(searchLegalPlays(handOf("334"), id("solo", 0))).toEqual([110]);
    expect(searchLegalPlays(handOf("3344"), id("pair", 0))).toEqual([161]);
    expect(searchLegalPlays(handOf("33334"), id("solo", 12))).toEqual([26148]);
  });

  it("answers a bomb only with higher bombs or the rocket", () => {
    expect(searchLegalPlays(handOf("33334444BR"), id("bomb", 0))).toEqual([26149, ROCKET_ACTION]);
    expect(searchLegalPlays(handOf("3333"), id("bomb", 1))).toEqual([]);
  });

  it("never includes Pass", () => {
    expect(searchLegalPlays(handOf("3"), id("solo", 14))).not.toContain(PASS);
  });

  it("offers each airplane identity for the same cards", () => {
    const legal = searchLegalPlays(handOf("333444555666"), null);

    expect(legal).toContain(id("airplane", 0, 4));
    expect(legal).toContain(id("airplaneWithSolo", 0, 3, [3, 3, 3]));
    expect(legal).toContain(id("airplaneWithSolo", 1, 3, [0, 0, 0]));
    expect(combinationOf(id("airplaneWithSolo", 1, 3, [0, 0, 0])).primaryRank).toBe(1);
  });
});
