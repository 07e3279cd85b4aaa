import type { Board, Color, PointState } from "../types";
import { BOARD_SIZE, CHECKERS_PER_COLOR, STARTING_LAYOUT } from "./constants";
import { toAbsolute } from "./boardMapping";
import { validateBoard } from "./validateState";

/** Checker counts keyed by mover-perspective point. */
export type PointCounts = Partial<Record<number, number>>;

export type BoardLayout = {
  white?: PointCounts;
  black?: PointCounts;
  bar?: Partial<Record<Color, number>>;
};

function emptyPoints(): PointState[] {
  return Array.from({ length: BOARD_SIZE }, () => ({ color: null, count: 0 }));
}

function place(points: PointState[], color: Color, counts: PointCounts): number {
  let placed = 0;
  for (const [key, count] of Object.entries(counts)) {
    if (count === undefined || count === 0) continue;

    const slot = toAbsolute(Number(key), color) - 1;
    const existing = points[slot];
    if (existing.color !== null && existing.color !== color) {
      throw new Error(`point ${key} (${color}) already holds ${existing.color}`);
    }

    points[slot] = { color, count: existing.count + count };
    placed += count;
  }
  return placed;
}

/**
 * Build a board from per-color point counts. Checkers not placed on a point
 * or the bar are counted as borne off, so every color always totals 15.
 */
export function makeBoard(layout: BoardLayout): Board {
  const points = emptyPoints();
  const bar = { white: layout.bar?.white ?? 0, black: layout.bar?.black ?? 0 };

  const placedWhite = place(points, "white", layout.white ?? {});
  const placedBlack = place(points, "black", layout.black ?? {});

  const board: Board = {
    points,
    bar,
    off: {
      white: CHECKERS_PER_COLOR - placedWhite - bar.white,
      black: CHECKERS_PER_COLOR - placedBlack - bar.black,
    },
  };

  validateBoard(board, "makeBoard");
  return board;
}

export function makeStartingBoard(): Board {
  const layout: PointCounts = {};
  for (const { point, count } of STARTING_LAYOUT) layout[point] = count;
  return makeBoard({ white: layout, black: layout });
}
