import { describe, it, expect } from "vitest";
import { makeStartingBoard } from "../src/engine/makeState";
import {
  forcedHigherDie,
  hasAnyLegalStep,
  listLegalSteps,
  maxPlayableDice,
  stepFor,
} from "../src/engine/legalMoves";
import { BAR_POINT } from "../src/engine/constants";
import { board } from "./helpers";

describe("listLegalSteps", () => {
  it("opening 3-1 for white: every origin, both dice, blocked 13/12 left out", () => {
    const steps = listLegalSteps(makeStartingBoard(), "white", [3, 1]);

    expect(steps).toEqual([
      { kind: "normal", from: 24, to: 21, die: 3, hit: false },
      { kind: "normal", from: 24, to: 23, die: 1, hit: false },
      { kind: "normal", from: 13, to: 10, die: 3, hit: false },
      { kind: "normal", from: 8, to: 5, die: 3, hit: false },
      { kind: "normal", from: 8, to: 7, die: 1, hit: false },
      { kind: "normal", from: 6, to: 3, die: 3, hit: false },
      { kind: "normal", from: 6, to: 5, die: 1, hit: false },
    ]);
  });

  it("with a checker on the bar only entering steps are listed", () => {
    // Black's 3 is White's 22 (two checkers: closed); Black's 5 is White's 20 (a blot).
    const b = board({ white: { 13: 5 }, bar: { white: 1 }, black: { 3: 2, 5: 1 } });

    expect(listLegalSteps(b, "white", [3, 5])).toEqual([{ kind: "enter", to: 20, die: 5, hit: true }]);
  });

  it("a double lists each origin once", () => {
    const b = board({ white: { 10: 2, 8: 1 } });
    expect(listLegalSteps(b, "white", [2, 2, 2, 2])).toEqual([
      { kind: "normal", from: 10, to: 8, die: 2, hit: false },
      { kind: "normal", from: 8, to: 6, die: 2, hit: false },
    ]);
  });
});

describe("stepFor: bearing off", () => {
  const home = board({ white: { 5: 1, 3: 1 } });

  it("bears off with an exact die", () => {
    expect(stepFor(home, "white", 3, 3)).toEqual({ kind: "bearOff", from: 3, die: 3, hit: false });
  });

  it("overshoots only from the highest occupied point", () => {
    expect(stepFor(home, "white", 5, 6)).toEqual({ kind: "bearOff", from: 5, die: 6, hit: false });
    expect(stepFor(home, "white", 3, 6)).toBeNull();
  });

  it("never bears off while a checker is outside home", () => {
    const b = board({ white: { 7: 1, 2: 1 } });
    expect(stepFor(b, "white", 2, 2)).toBeNull();
  });

  it("enters from the bar onto 25 minus the die", () => {
    const b = board({ white: { 6: 1 }, bar: { white: 1 } });
    expect(stepFor(b, "white", BAR_POINT, 6)).toEqual({ kind: "enter", to: 19, die: 6, hit: false });
  });
});

describe("maxPlayableDice", () => {
  it("both dice are playable from the opening position", () => {
    expect(maxPlayableDice(makeStartingBoard(), "white", [6, 5])).toBe(2);
  });

  it("all four dice of a double are playable from the opening position", () => {
    expect(maxPlayableDice(makeStartingBoard(), "white", [4, 4, 4, 4])).toBe(4);
  });

  it("a closed home board leaves a checker on the bar with nothing to play", () => {
    const b = board({
      white: { 13: 14 },
      bar: { white: 1 },
      black: { 1: 2, 2: 2, 3: 2, 4: 2, 5: 2, 6: 2 },
    });

    expect(maxPlayableDice(b, "white", [6, 6, 6, 6])).toBe(0);
    expect(hasAnyLegalStep(b, "white", [1, 2])).toBe(false);
  });

  it("counts how far a lone checker can go when the second hop is blocked", () => {
    // Black holds White's 2 (Black's 23).
    const b = board({ white: { 13: 1 }, black: { 23: 2 } });

    expect(maxPlayableDice(b, "white", [6, 5])).toBe(1);
    expect(forcedHigherDie(b, "white", [6, 5], 1)).toBe(6);
  });

  it("the higher-die rule does not bind when both dice can be played", () => {
    expect(forcedHigherDie(makeStartingBoard(), "white", [6, 5], 2)).toBeNull();
  });
});
