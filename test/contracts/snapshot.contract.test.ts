import { describe, it, expect } from "vitest";
import { createGame, snapshot, startWithOpeningRoll, submitTurn } from "../../src/engine";
import { awaitingMoves, board } from "../helpers";

describe("Contract: snapshot", () => {
  it("describes a new game for a renderer", () => {
    const snap = snapshot(createGame());

    expect(snap.points).toHaveLength(24);
    // Absolute 1 is White's 24-point, absolute 24 is Black's 24-point.
    expect(snap.points[0]).toEqual({ index: 1, color: "white", count: 2 });
    expect(snap.points[23]).toEqual({ index: 24, color: "black", count: 2 });
    expect(snap.points[1]).toEqual({ index: 2, color: null, count: 0 });

    expect(snap.bar).toEqual({ white: 0, black: 0 });
    expect(snap.off).toEqual({ white: 0, black: 0 });
    expect(snap.pips).toEqual({ white: 167, black: 167 });
    expect(snap.phase).toBe("awaitingRoll");
    expect(snap.currentColor).toBe("white");
    expect(snap.faces).toBeNull();
    expect(snap.remainingDice).toEqual([]);
    expect(snap.winner).toBeNull();
  });

  it("carries the dice while a player is moving", () => {
    const res = startWithOpeningRoll(6, 1);
    if (!res.ok) throw new Error(res.error.message);

    const snap = snapshot(res.state);
    expect(snap.phase).toBe("awaitingMoves");
    expect(snap.currentColor).toBe("white");
    expect(snap.faces).toEqual([6, 1]);
    expect(snap.remainingDice).toEqual([6, 1]);
  });

  it("names the winner once the game is over", () => {
    const state = awaitingMoves(board({ black: { 1: 1 }, white: { 12: 15 } }), "black", 1, 1);
    const res = submitTurn(state, "black", "1/off");
    if (!res.ok) throw new Error(res.error.message);

    const snap = snapshot(res.state);
    expect(snap.phase).toBe("gameOver");
    expect(snap.currentColor).toBeNull();
    expect(snap.winner).toBe("black");
    expect(snap.off.black).toBe(15);
    expect(snap.pips.black).toBe(0);
  });
});
