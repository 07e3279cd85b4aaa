import type { Color, GameState, MoveRequest, TurnRecord } from "../types";
import type { Rejected } from "./envelope";
import { formatRequests, parseNotation } from "./notation";
import { commitTurn } from "./sync";
import { checkActor } from "./turn";
import { validateTurn } from "./validateTurn";

export type TurnResponse =
  | {
      ok: true;
      state: GameState;
      record: TurnRecord;
      afterHash: string;
    }
  | Rejected;

/**
 * Validate a proposed turn and, if accepted, move the game on.
 *
 * TURN MODEL:
 * - Dice are external and were handed in by rollDice
 * - The whole turn is submitted at once (notation text or parsed requests)
 * - Rejection never changes state; the caller re-prompts with the error
 */
export function submitTurn(
  state: GameState,
  color: Color,
  input: string | readonly MoveRequest[]
): TurnResponse {
  const checked = checkActor(state, color, "awaitingMoves");
  if (!checked.ok) return checked;
  const { dice } = checked.phase;

  let requests: readonly MoveRequest[];
  if (typeof input === "string") {
    // An all-blank submission is an explicit pass; validateTurn decides if that is allowed.
    if (input.trim() === "") {
      requests = [];
    } else {
      const parsed = parseNotation(input);
      if (!parsed.ok) return parsed;
      requests = parsed.requests;
    }
  } else {
    requests = input;
  }

  const decision = validateTurn(state.board, color, dice.remaining, requests);
  if (!decision.ok) return decision;

  const { nextState, record, afterHash } = commitTurn(state, color, dice, decision, formatRequests(requests));
  return { ok: true, state: nextState, record, afterHash };
}
