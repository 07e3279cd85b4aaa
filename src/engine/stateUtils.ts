// src/engine/stateUtils.ts

import type { Board, Color, PointState } from "../types";
import { BOARD_SIZE, HOME_SIZE } from "./constants";
import { oppositeColor, toAbsolute } from "./boardMapping";

/** Point state at a mover-perspective point. */
export function getPoint(board: Board, point: number, perspective: Color): PointState {
  const p = board.points[toAbsolute(point, perspective) - 1];
  if (!p) throw new Error(`point missing: ${point}`);
  return p;
}

export function checkersAt(board: Board, point: number, color: Color): number {
  const p = getPoint(board, point, color);
  return p.color === color ? p.count : 0;
}

export function topColor(board: Board, point: number, perspective: Color): Color | null {
  return getPoint(board, point, perspective).color;
}

/**
 * Empty, held by `color`, or a single opposing checker (a blot that can be hit).
 */
export function isOpen(board: Board, point: number, color: Color): boolean {
  const p = getPoint(board, point, color);
  return p.color !== oppositeColor(color) || p.count <= 1;
}

export function isBlot(board: Board, point: number, color: Color): boolean {
  const p = getPoint(board, point, color);
  return p.color === oppositeColor(color) && p.count === 1;
}

export function barCount(board: Board, color: Color): number {
  return board.bar[color];
}

export function offCount(board: Board, color: Color): number {
  return board.off[color];
}

/** Own points in the mover's perspective, highest first. */
export function occupiedPoints(board: Board, color: Color): number[] {
  const out: number[] = [];
  for (let point = BOARD_SIZE; point >= 1; point--) {
    if (checkersAt(board, point, color) > 0) out.push(point);
  }
  return out;
}

export function allInHome(board: Board, color: Color): boolean {
  if (board.bar[color] > 0) return false;
  for (let point = HOME_SIZE + 1; point <= BOARD_SIZE; point++) {
    if (checkersAt(board, point, color) > 0) return false;
  }
  return true;
}

export function hasCheckerAbove(board: Board, color: Color, point: number): boolean {
  if (board.bar[color] > 0) return true;
  for (let p = point + 1; p <= BOARD_SIZE; p++) {
    if (checkersAt(board, p, color) > 0) return true;
  }
  return false;
}

export function pipCount(board: Board, color: Color): number {
  let pips = board.bar[color] * (BOARD_SIZE + 1);
  for (let point = 1; point <= BOARD_SIZE; point++) {
    pips += checkersAt(board, point, color) * point;
  }
  return pips;
}
