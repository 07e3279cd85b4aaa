import { describe, it, expect } from "vitest";
import { hashBoard } from "../src/engine/stateHash";
import { makeStartingBoard } from "../src/engine/makeState";
import { board } from "./helpers";

describe("Board hash", () => {
  it("produces the same hash for identical boards", () => {
    expect(hashBoard(makeStartingBoard())).toBe(hashBoard(makeStartingBoard()));
  });

  it("writes each absolute point, then bars and offs", () => {
    // White's 24 is absolute 1, Black's 2 is absolute 2.
    const b = board({ white: { 24: 2 }, black: { 2: 1 }, bar: { black: 1 } });

    const points = ["w2", "b1", ...Array.from({ length: 22 }, () => "-")].join(".");
    expect(hashBoard(b)).toBe(`${points}|bar:0,1|off:13,13`);
  });

  it("differs when a single checker moves", () => {
    const a = board({ white: { 6: 15 } });
    const b = board({ white: { 6: 14, 5: 1 } });
    expect(hashBoard(a)).not.toBe(hashBoard(b));
  });
});
