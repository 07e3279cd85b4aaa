import type { Color, DiceRoll, GameState, TurnRecord } from "../types";
import { oppositeColor } from "./boardMapping";
import { CHECKERS_PER_COLOR } from "./constants";
import { hashBoard } from "./stateHash";
import type { Accepted } from "./validateTurn";
import { validateGame } from "./validateState";

export type SyncResult = {
  nextState: GameState;
  afterHash: string;
  record: TurnRecord;
};

export function nextToRoll(color: Color): GameState["phase"] {
  return { status: "awaitingRoll", color: oppositeColor(color) };
}

/**
 * Commit an accepted turn and return:
 * - nextState (authoritative)
 * - afterHash (board check for the next turn)
 * - record (history entry, also appended to nextState.history)
 *
 * The game ends the moment the mover's fifteenth checker is off; no step can
 * follow that one, so checking the committed board is enough.
 */
export function commitTurn(
  state: GameState,
  color: Color,
  dice: DiceRoll,
  accepted: Accepted,
  notation: string
): SyncResult {
  const board = accepted.board;
  const won = board.off[color] === CHECKERS_PER_COLOR;
  const afterHash = hashBoard(board);

  const record: TurnRecord = {
    color,
    faces: dice.faces,
    notation,
    steps: accepted.steps,
    forfeited: false,
    beforeHash: hashBoard(state.board),
    afterHash,
  };

  const nextState: GameState = {
    board,
    phase: won ? { status: "gameOver", winner: color } : nextToRoll(color),
    history: [...state.history, record],
    ...(won ? { result: { winner: color } } : {}),
  };

  validateGame(nextState, "commitTurn");
  return { nextState, afterHash, record };
}

/**
 * A roll with nothing playable: the board is untouched and the opponent rolls next.
 */
export function recordForfeit(state: GameState, color: Color, dice: DiceRoll): GameState {
  const hash = hashBoard(state.board);
  const record: TurnRecord = {
    color,
    faces: dice.faces,
    notation: "",
    steps: [],
    forfeited: true,
    beforeHash: hash,
    afterHash: hash,
  };

  const nextState: GameState = {
    board: state.board,
    phase: nextToRoll(color),
    history: [...state.history, record],
  };

  validateGame(nextState, "recordForfeit");
  return nextState;
}
