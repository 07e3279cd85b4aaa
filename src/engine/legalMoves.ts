// src/engine/legalMoves.ts

import type { Board, Color, Step } from "../types";
import { BAR_POINT } from "./constants";
import { applyStep } from "./applyStep";
import { hashBoard } from "./stateHash";
import {
  allInHome,
  barCount,
  checkersAt,
  hasCheckerAbove,
  isBlot,
  isOpen,
  occupiedPoints,
} from "./stateUtils";

export function distinctDice(dice: readonly number[]): number[] {
  return [...new Set(dice)].sort((a, b) => b - a);
}

function removeOne(dice: readonly number[], die: number): number[] {
  const out = dice.slice();
  const idx = out.indexOf(die);
  if (idx >= 0) out.splice(idx, 1);
  return out;
}

/* ---------- SINGLE STEP ---------- */

/**
 * The step one checker makes from `from` (a point, or BAR_POINT) with `die`,
 * or null if that step is not legal on this board.
 *
 * Bar priority is NOT checked here; callers decide which origins are eligible.
 */
export function stepFor(board: Board, color: Color, from: number, die: number): Step | null {
  if (from === BAR_POINT) {
    if (barCount(board, color) === 0) return null;
    const to = BAR_POINT - die;
    if (!isOpen(board, to, color)) return null;
    return { kind: "enter", to, die, hit: isBlot(board, to, color) };
  }

  if (checkersAt(board, from, color) === 0) return null;

  const to = from - die;
  if (to >= 1) {
    if (!isOpen(board, to, color)) return null;
    return { kind: "normal", from, to, die, hit: isBlot(board, to, color) };
  }

  // Bearing off: exact, or overshoot from the highest occupied point only.
  if (!allInHome(board, color)) return null;
  if (to < 0 && hasCheckerAbove(board, color, from)) return null;
  return { kind: "bearOff", from, die, hit: false };
}

/**
 * Every single step the mover could make with any one of `dice`.
 * While checkers sit on the bar, only entering steps are listed.
 */
export function listLegalSteps(board: Board, color: Color, dice: readonly number[]): Step[] {
  const origins = barCount(board, color) > 0 ? [BAR_POINT] : occupiedPoints(board, color);
  const steps: Step[] = [];

  for (const from of origins) {
    for (const die of distinctDice(dice)) {
      const step = stepFor(board, color, from, die);
      if (step) steps.push(step);
    }
  }

  return steps;
}

export function hasAnyLegalStep(board: Board, color: Color, dice: readonly number[]): boolean {
  return listLegalSteps(board, color, dice).length > 0;
}

/* ---------- FORCED-USE SEARCH ---------- */

/**
 * The largest number of dice any legal sequence of steps can consume.
 *
 * Exhaustive depth-first search, memoised on (board, remaining dice). The space is
 * small: at most four dice and fifteen checkers, so no pruning beyond the early
 * exit when every die has been used.
 */
export function maxPlayableDice(board: Board, color: Color, dice: readonly number[]): number {
  const memo = new Map<string, number>();

  const search = (b: Board, remaining: readonly number[]): number => {
    if (remaining.length === 0) return 0;

    const key = `${hashBoard(b)}#${[...remaining].sort().join("")}`;
    const cached = memo.get(key);
    if (cached !== undefined) return cached;

    let best = 0;
    for (const step of listLegalSteps(b, color, remaining)) {
      const used = 1 + search(applyStep(b, color, step), removeOne(remaining, step.die));
      if (used > best) best = used;
      if (best === remaining.length) break;
    }

    memo.set(key, best);
    return best;
  };

  return search(board, dice);
}

/**
 * With a non-double roll where only one die can be played, the larger one must be
 * played if it can be. Returns that die, or null when the rule does not bind.
 */
export function forcedHigherDie(board: Board, color: Color, dice: readonly number[], maxPlayable: number): number | null {
  if (maxPlayable !== 1 || dice.length !== 2 || dice[0] === dice[1]) return null;
  const higher = Math.max(dice[0], dice[1]);
  return hasAnyLegalStep(board, color, [higher]) ? higher : null;
}
