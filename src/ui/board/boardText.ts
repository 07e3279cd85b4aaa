// src/ui/board/boardText.ts
//
// Plain-text board drawing from a BoardSnapshot.
//
// Convention:
// - Point labels are in the viewer's perspective (their 1..6 bottom right).
// - Cells read "W5" / "B2", or " ." for an empty point.

import type { Color } from "../../types";
import type { BoardSnapshot } from "../../engine/snapshot";
import { toAbsolute } from "../../engine/boardMapping";

const CELL = 3;
const HALF = CELL * 6;

function range(from: number, to: number): number[] {
  const step = from <= to ? 1 : -1;
  const out: number[] = [];
  for (let n = from; n !== to + step; n += step) out.push(n);
  return out;
}

function colorLetter(color: Color): "W" | "B" {
  return color === "white" ? "W" : "B";
}

export function formatCell(snap: BoardSnapshot, point: number, perspective: Color): string {
  const view = snap.points[toAbsolute(point, perspective) - 1];
  const text = view.color === null ? "." : `${colorLetter(view.color)}${view.count}`;
  return text.padStart(CELL);
}

function row(left: number[], right: number[], cell: (n: number) => string): string {
  return `${left.map(cell).join("")} |${right.map(cell).join("")}`;
}

export function statusLine(snap: BoardSnapshot): string {
  switch (snap.phase) {
    case "awaitingRoll":
      return `${snap.currentColor} to roll`;
    case "awaitingMoves": {
      const faces = snap.faces ? `${snap.faces[0]}-${snap.faces[1]}` : "?";
      return `${snap.currentColor} to play ${faces} (remaining ${snap.remainingDice.join("-")})`;
    }
    case "gameOver":
      return `${snap.winner} wins`;
  }
}

/**
 * Draw the board as seen by `perspective`.
 */
export function renderBoard(snap: BoardSnapshot, perspective: Color): string[] {
  const label = (n: number) => String(n).padStart(CELL);
  const cell = (n: number) => formatCell(snap, n, perspective);
  const sep = `${"-".repeat(HALF)}-+${"-".repeat(HALF)}`;

  const topLeft = range(13, 18);
  const topRight = range(19, 24);
  const bottomLeft = range(12, 7);
  const bottomRight = range(6, 1);

  return [
    row(topLeft, topRight, label),
    sep,
    row(topLeft, topRight, cell),
    row(bottomLeft, bottomRight, cell),
    sep,
    row(bottomLeft, bottomRight, label),
    `Bar  W:${snap.bar.white} B:${snap.bar.black}   Off  W:${snap.off.white} B:${snap.off.black}`,
    `Pips W:${snap.pips.white} B:${snap.pips.black}`,
    statusLine(snap),
  ];
}
