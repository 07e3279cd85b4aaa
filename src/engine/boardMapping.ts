// src/engine/boardMapping.ts

import type { Color } from "../types";
import { BOARD_SIZE, isBoardPoint } from "./constants";

// Black's perspective is the storage order; White's is mirrored.
export function toAbsolute(point: number, perspective: Color): number {
  if (!isBoardPoint(point)) throw new Error(`point out of range: ${point}`);
  return perspective === "black" ? point : BOARD_SIZE + 1 - point;
}

export function toPerspective(absolute: number, perspective: Color): number {
  if (!isBoardPoint(absolute)) throw new Error(`absolute point out of range: ${absolute}`);
  return perspective === "black" ? absolute : BOARD_SIZE + 1 - absolute;
}

export function oppositeColor(color: Color): Color {
  return color === "white" ? "black" : "white";
}
