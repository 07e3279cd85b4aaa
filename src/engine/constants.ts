// src/engine/constants.ts

export const BOARD_SIZE = 24;
export const CHECKERS_PER_COLOR = 15;

// Home quadrant is points 1..HOME_SIZE in the mover's perspective.
export const HOME_SIZE = 6;

// Pseudo-points used for distance arithmetic: the bar sits above 24, off below 1.
export const BAR_POINT = 25;
export const OFF_POINT = 0;

export const DIE_MIN = 1;
export const DIE_MAX = 6;

// Standard layout, per color, in that color's own perspective.
export const STARTING_LAYOUT: ReadonlyArray<{ point: number; count: number }> = [
  { point: 24, count: 2 },
  { point: 13, count: 5 },
  { point: 8, count: 3 },
  { point: 6, count: 5 },
];

export function isBoardPoint(n: number): boolean {
  return Number.isInteger(n) && n >= 1 && n <= BOARD_SIZE;
}

export function isDieValue(n: unknown): n is number {
  return typeof n === "number" && Number.isInteger(n) && n >= DIE_MIN && n <= DIE_MAX;
}
