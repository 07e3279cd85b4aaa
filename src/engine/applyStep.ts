// src/engine/applyStep.ts
//
// Applies one resolved Step to a Board and returns a new Board.
// Legality is decided elsewhere (legalMoves / validateTurn); this only moves checkers,
// resolves a hit, and re-checks the structural invariants.

import type { Board, Color, PointState, Step } from "../types";
import { oppositeColor, toAbsolute } from "./boardMapping";
import { validateBoard } from "./validateState";

function removeChecker(points: PointState[], point: number, color: Color): void {
  const slot = toAbsolute(point, color) - 1;
  const p = points[slot];
  if (p.color !== color || p.count === 0) {
    throw new Error(`applyStep: no ${color} checker on point ${point}`);
  }
  const count = p.count - 1;
  points[slot] = { color: count === 0 ? null : color, count };
}

/** Lands a checker; returns true when a blot was hit. */
function landChecker(points: PointState[], point: number, color: Color): boolean {
  const slot = toAbsolute(point, color) - 1;
  const p = points[slot];

  if (p.color === oppositeColor(color)) {
    if (p.count > 1) throw new Error(`applyStep: point ${point} is blocked for ${color}`);
    points[slot] = { color, count: 1 };
    return true;
  }

  points[slot] = { color, count: p.count + 1 };
  return false;
}

export function applyStep(board: Board, color: Color, step: Step): Board {
  const points = board.points.slice();
  const bar = { ...board.bar };
  const off = { ...board.off };

  let hit = false;

  switch (step.kind) {
    case "enter": {
      if (bar[color] === 0) throw new Error(`applyStep: ${color} has no checker on the bar`);
      bar[color] -= 1;
      hit = landChecker(points, step.to, color);
      break;
    }
    case "normal": {
      removeChecker(points, step.from, color);
      hit = landChecker(points, step.to, color);
      break;
    }
    case "bearOff": {
      removeChecker(points, step.from, color);
      off[color] += 1;
      break;
    }
    default: {
      const _exhaustive: never = step;
      throw new Error(`applyStep: unknown step ${JSON.stringify(_exhaustive)}`);
    }
  }

  if (hit) bar[oppositeColor(color)] += 1;

  const next: Board = { points, bar, off };
  validateBoard(next, `applyStep:${step.kind}`);
  return next;
}
