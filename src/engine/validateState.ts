import type { Board, Color, GameState, PointState } from "../types";
import { COLORS } from "../types";
import { BOARD_SIZE, CHECKERS_PER_COLOR, isDieValue } from "./constants";

const VALIDATE = process.env.BG_VALIDATE_STATE !== "0";

/**
 * validateBoard (structural invariants only)
 *
 * Intent:
 * - Catch engine defects: negative counts, mixed colors on a point, lost or duplicated checkers
 * - NO rules knowledge (legality lives in legalMoves/validateTurn)
 *
 * Runs at every application checkpoint (applyStep, makeBoard, state transitions).
 */
export function validateBoard(board: Board, where = "unknown"): void {
  if (!VALIDATE) return;

  assert(board, "board missing", where);
  assert(Array.isArray(board.points), "points not array", where);
  assert(board.points.length === BOARD_SIZE, `points must have ${BOARD_SIZE} entries`, where);

  const onPoints: Record<Color, number> = { white: 0, black: 0 };

  board.points.forEach((p: PointState, i: number) => {
    const label = `point[${i + 1}]`;
    assertCount(p.count, `${label}.count`, where);
    if (p.count === 0) {
      assert(p.color === null, `${label} empty but colored ${String(p.color)}`, where);
    } else {
      assert(p.color === "white" || p.color === "black", `${label} has checkers but no color`, where);
      onPoints[p.color] += p.count;
    }
  });

  for (const color of COLORS) {
    assertCount(board.bar[color], `bar.${color}`, where);
    assertCount(board.off[color], `off.${color}`, where);

    const total = onPoints[color] + board.bar[color] + board.off[color];
    assert(total === CHECKERS_PER_COLOR, `${color} has ${total} checkers, expected ${CHECKERS_PER_COLOR}`, where);
  }
}

export function validateGame(state: GameState, where = "unknown"): void {
  if (!VALIDATE) return;

  validateBoard(state.board, where);

  const phase = state.phase;
  switch (phase.status) {
    case "awaitingRoll":
      assert(!state.result, "awaitingRoll with a result", where);
      break;
    case "awaitingMoves":
      assert(!state.result, "awaitingMoves with a result", where);
      for (const d of phase.dice.remaining) assert(isDieValue(d), `invalid remaining die ${d}`, where);
      assert(phase.dice.remaining.length <= 4, "more than four remaining dice", where);
      break;
    case "gameOver":
      assert(state.result?.winner === phase.winner, "gameOver without matching result", where);
      assert(state.board.off[phase.winner] === CHECKERS_PER_COLOR, "winner has not borne off", where);
      break;
    default: {
      const _exhaustive: never = phase;
      assert(false, `phase invalid: ${JSON.stringify(_exhaustive)}`, where);
    }
  }
}

// -------------------------------------
// Helpers
// -------------------------------------

function assert(condition: unknown, message: string, where: string): asserts condition {
  if (!condition) throw new Error(`[validateState @ ${where}] ${message}`);
}

function assertCount(value: unknown, label: string, where: string): void {
  assert(typeof value === "number" && Number.isInteger(value), `${label} not an integer`, where);
  assert(value >= 0, `${label} negative: ${value}`, where);
}
