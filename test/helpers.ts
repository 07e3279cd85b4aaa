import type { Board, Color, GameState, MoveRequest } from "../src/types";
import { makeBoard, type BoardLayout } from "../src/engine/makeState";
import { makeDiceRoll } from "../src/engine/dice";
import { parseNotation } from "../src/engine/notation";
import { checkersAt } from "../src/engine/stateUtils";
import { BOARD_SIZE } from "../src/engine/constants";

export function board(layout: BoardLayout): Board {
  return makeBoard(layout);
}

/** A game already past the roll: `color` to move with faces a-b. */
export function awaitingMoves(b: Board, color: Color, a: number, d: number): GameState {
  return {
    board: b,
    phase: { status: "awaitingMoves", color, dice: makeDiceRoll(a, d) },
    history: [],
  };
}

export function req(from: MoveRequest["from"], to: MoveRequest["to"], chain = 0, hop = 0): MoveRequest {
  return { from, to, chain, hop };
}

/** Parse notation that the test knows is well-formed. */
export function parse(text: string): MoveRequest[] {
  const parsed = parseNotation(text);
  if (!parsed.ok) throw new Error(`test notation did not parse: ${parsed.error.message}`);
  return parsed.requests;
}

/** Checker total for a color across points, bar and off. */
export function totalCheckers(b: Board, color: Color): number {
  let total = b.bar[color] + b.off[color];
  for (let point = 1; point <= BOARD_SIZE; point++) total += checkersAt(b, point, color);
  return total;
}

/** Scripted die source for controller tests. */
export function scriptedDice(values: readonly number[]): () => number {
  let i = 0;
  return () => {
    const v = values[i++];
    if (v === undefined) throw new Error("scripted dice exhausted");
    return v;
  };
}
