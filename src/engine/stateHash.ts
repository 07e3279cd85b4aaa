import type { Board } from "../types";

/**
 * Deterministic board hash: "w2.-.b5..." per absolute point, then bars and offs.
 * Used for turn history (before/after) and as the memo key for move search.
 */
export function hashBoard(board: Board): string {
  const points = board.points
    .map((p) => (p.color === null ? "-" : `${p.color === "white" ? "w" : "b"}${p.count}`))
    .join(".");
  return `${points}|bar:${board.bar.white},${board.bar.black}|off:${board.off.white},${board.off.black}`;
}
