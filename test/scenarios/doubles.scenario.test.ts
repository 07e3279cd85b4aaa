import { describe, it, expect } from "vitest";
import { makeStartingBoard } from "../../src/engine/makeState";
import { checkersAt } from "../../src/engine/stateUtils";
import { runScenario } from "./runScenario";

describe("Scenario: doubles", () => {
  it("6-6 from the start moves four checkers six pips each", () => {
    const res = runScenario({
      name: "opening 6-6",
      color: "black",
      dice: [6, 6],
      board: makeStartingBoard(),
      play: "24/18 24/18 13/7 13/7",
    });

    expect(res.ok).toBe(true);
    if (res.ok) {
      const b = res.state.board;
      expect(checkersAt(b, 24, "black")).toBe(0);
      expect(checkersAt(b, 18, "black")).toBe(2);
      expect(checkersAt(b, 13, "black")).toBe(3);
      expect(checkersAt(b, 7, "black")).toBe(2);
      expect(res.record.notation).toBe("24/18 24/18 13/7 13/7");
    }
  });

  it("a two-step hop stops on each intermediate point", () => {
    // 24/18/12 lands on White's 13-point.
    runScenario({
      name: "double through a block",
      color: "black",
      dice: [6, 6],
      board: makeStartingBoard(),
      play: "24/12",
      expectCode: "BLOCKED_DESTINATION",
    });
  });

  it("playing fewer than four of a double is incomplete", () => {
    runScenario({
      name: "partial double",
      color: "black",
      dice: [6, 6],
      board: makeStartingBoard(),
      play: "24/18 24/18",
      expectCode: "INCOMPLETE_TURN",
    });
  });
});
