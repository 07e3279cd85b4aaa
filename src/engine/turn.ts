// src/engine/turn.ts
//
// Turn phases:
//   awaitingRoll(color) -> awaitingMoves(color, dice) -> awaitingRoll(opponent) ... -> gameOver(winner)
//
// Dice are external: the caller rolls and hands the two faces in.

import type { Board, Color, GamePhase, GameState } from "../types";
import { makeDiceRoll, resolveOpeningRoll } from "./dice";
import { reject, type Rejected } from "./envelope";
import { maxPlayableDice } from "./legalMoves";
import { makeStartingBoard } from "./makeState";
import { isDieValue } from "./constants";
import { recordForfeit } from "./sync";
import { validateGame } from "./validateState";

export type CreateGameOptions = {
  firstColor?: Color;
  board?: Board;
};

export function createGame(opts: CreateGameOptions = {}): GameState {
  const state: GameState = {
    board: opts.board ?? makeStartingBoard(),
    phase: { status: "awaitingRoll", color: opts.firstColor ?? "white" },
    history: [],
  };
  validateGame(state, "createGame");
  return state;
}

/**
 * Start a game from the opening throw: the higher die moves first, playing both dice.
 */
export function startWithOpeningRoll(
  whiteDie: number,
  blackDie: number,
  board?: Board
): { ok: true; state: GameState } | Rejected {
  const opening = resolveOpeningRoll(whiteDie, blackDie);
  if (!opening.ok) return opening;

  const state: GameState = {
    board: board ?? makeStartingBoard(),
    phase: { status: "awaitingMoves", color: opening.color, dice: opening.roll },
    history: [],
  };
  validateGame(state, "startWithOpeningRoll");
  return { ok: true, state };
}

/** Color expected to act next, or null once the game is over. */
export function currentColor(state: GameState): Color | null {
  return state.phase.status === "gameOver" ? null : state.phase.color;
}

export type PhaseOf<S extends GamePhase["status"]> = Extract<GamePhase, { status: S }>;

function isPhase<S extends GamePhase["status"]>(phase: GamePhase, status: S): phase is PhaseOf<S> {
  return phase.status === status;
}

/**
 * Shared guard for every action: game not over, right actor, right phase.
 */
export function checkActor<S extends "awaitingRoll" | "awaitingMoves">(
  state: GameState,
  color: Color,
  expected: S
): { ok: true; phase: PhaseOf<S> } | Rejected {
  const phase = state.phase;
  if (phase.status === "gameOver") {
    return reject("GAME_ENDED", `The game is over; ${phase.winner} won.`);
  }
  if (phase.color !== color) {
    return reject("WRONG_ACTOR", `Not your turn. Expected ${phase.color}.`);
  }
  if (!isPhase(phase, expected)) {
    return reject(
      "BAD_TURN_STATE",
      phase.status === "awaitingRoll" ? `${color} must roll before moving.` : `${color} has already rolled; submit moves.`
    );
  }
  return { ok: true, phase };
}

export type RollResponse =
  | {
      ok: true;
      state: GameState;

      // How many dice the roller can actually use this turn.
      maxPlayable: number;

      // True when nothing was playable and the turn passed straight to the opponent.
      forfeited: boolean;
    }
  | Rejected;

export function rollDice(state: GameState, color: Color, a: number, b: number): RollResponse {
  const checked = checkActor(state, color, "awaitingRoll");
  if (!checked.ok) return checked;

  if (!isDieValue(a) || !isDieValue(b)) {
    return reject("INVALID_DICE_VALUE", `Dice must be integers 1-6, got ${a},${b}.`);
  }

  const dice = makeDiceRoll(a, b);
  const maxPlayable = maxPlayableDice(state.board, color, dice.remaining);

  if (maxPlayable === 0) {
    const next = recordForfeit(state, color, dice);
    return { ok: true, state: next, maxPlayable, forfeited: true };
  }

  const next: GameState = { ...state, phase: { status: "awaitingMoves", color, dice } };
  validateGame(next, "rollDice");
  return { ok: true, state: next, maxPlayable, forfeited: false };
}

