import { describe, it, expect } from "vitest";
import { createGame, snapshot, startWithOpeningRoll } from "../src/engine";
import { formatCell, renderBoard, statusLine } from "../src/ui/board/boardText";

const SEP = `${"-".repeat(18)}-+${"-".repeat(18)}`;

describe("UI: text board", () => {
  it("draws the starting position from White's side", () => {
    expect(renderBoard(snapshot(createGame()), "white")).toEqual([
      " 13 14 15 16 17 18 | 19 20 21 22 23 24",
      SEP,
      " W5  .  .  . B3  . | B5  .  .  .  . W2",
      " B5  .  .  . W3  . | W5  .  .  .  . B2",
      SEP,
      " 12 11 10  9  8  7 |  6  5  4  3  2  1",
      "Bar  W:0 B:0   Off  W:0 B:0",
      "Pips W:167 B:167",
      "white to roll",
    ]);
  });

  it("mirrors the board for Black", () => {
    const lines = renderBoard(snapshot(createGame()), "black");

    expect(lines[2]).toBe(" B5  .  .  . W3  . | W5  .  .  .  . B2");
    expect(lines[3]).toBe(" W5  .  .  . B3  . | B5  .  .  .  . W2");
  });

  it("formats single cells by viewer point", () => {
    const snap = snapshot(createGame());
    expect(formatCell(snap, 6, "white")).toBe(" W5");
    expect(formatCell(snap, 1, "white")).toBe(" B2");
    expect(formatCell(snap, 2, "white")).toBe("  .");
  });

  it("status line shows the dice still to play", () => {
    const res = startWithOpeningRoll(2, 5);
    if (!res.ok) throw new Error(res.error.message);
    expect(statusLine(snapshot(res.state))).toBe("black to play 2-5 (remaining 2-5)");
  });
});
