// src/engine/snapshot.ts
//
// Read-only view of a game for renderers. Everything a board drawing needs,
// with no rules knowledge required on the other side.

import type { Color, GameState } from "../types";
import { COLORS } from "../types";
import { pipCount } from "./stateUtils";

export type PointView = {
  /** Absolute index 1..24 (Black's numbering). */
  index: number;
  color: Color | null;
  count: number;
};

export type BoardSnapshot = {
  points: readonly PointView[];
  bar: Record<Color, number>;
  off: Record<Color, number>;
  pips: Record<Color, number>;

  phase: GameState["phase"]["status"];
  currentColor: Color | null;
  faces: readonly [number, number] | null;
  remainingDice: readonly number[];
  winner: Color | null;
};

export function snapshot(state: GameState): BoardSnapshot {
  const { board, phase } = state;

  const pips = { white: 0, black: 0 };
  for (const color of COLORS) pips[color] = pipCount(board, color);

  return {
    points: board.points.map((p, i) => ({ index: i + 1, color: p.color, count: p.count })),
    bar: { ...board.bar },
    off: { ...board.off },
    pips,
    phase: phase.status,
    currentColor: phase.status === "gameOver" ? null : phase.color,
    faces: phase.status === "awaitingMoves" ? phase.dice.faces : null,
    remainingDice: phase.status === "awaitingMoves" ? phase.dice.remaining.slice() : [],
    winner: phase.status === "gameOver" ? phase.winner : null,
  };
}
